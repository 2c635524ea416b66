import { describe, it, expect } from "vitest";
import { CommandTable } from "../command-table.ts";
import type { CommandRule } from "../command-table.ts";

const RULES: CommandRule<string>[] = [
  { id: "google", phrases: ["open google"], action: "google" },
  { id: "google-chrome", phrases: ["open google in chrome"], action: "google-chrome" },
  { id: "close", phrases: ["close browser", "shut browser"], action: "close" },
];

describe("CommandTable", () => {
  it("matches a phrase anywhere in the text", () => {
    const table = new CommandTable(RULES);
    const m = table.match("please close browser now");
    expect(m?.rule.id).toBe("close");
    expect(m?.phrase).toBe("close browser");
  });

  it("returns null when nothing matches", () => {
    expect(new CommandTable(RULES).match("make coffee")).toBeNull();
  });

  it("first: the earliest rule wins over a longer later phrase", () => {
    const table = new CommandTable(RULES, "first");
    expect(table.match("open google in chrome")?.rule.id).toBe("google");
  });

  it("longest: the most specific phrase wins", () => {
    const table = new CommandTable(RULES, "longest");
    expect(table.match("open google in chrome")?.rule.id).toBe("google-chrome");
    expect(table.match("open google")?.rule.id).toBe("google");
  });

  it("longest: ties keep list order", () => {
    const table = new CommandTable(
      [
        { id: "a", phrases: ["play"], action: 1 },
        { id: "b", phrases: ["stop"], action: 2 },
      ],
      "longest",
    );
    expect(table.match("stop play")?.rule.id).toBe("a");
  });

  it("is case-insensitive on both sides", () => {
    const table = new CommandTable([{ id: "g", phrases: ["Open Google"], action: "g" }]);
    expect(table.match("OPEN GOOGLE")?.phrase).toBe("open google");
  });

  it("phrases() lists every phrase in table order", () => {
    expect(new CommandTable(RULES).phrases()).toEqual([
      "open google",
      "open google in chrome",
      "close browser",
      "shut browser",
    ]);
  });
});
