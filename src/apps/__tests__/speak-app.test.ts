import { describe, it, expect, vi, beforeAll, afterAll } from "vitest";
import { SpeakApp, moodColour, MAX_INPUT } from "../speak-app.ts";
import type { Speaker } from "../../lib/speaker.ts";
import type { InputEvent } from "../../lib/render-loop.ts";
import { getLogLevel, setLogLevel } from "../../lib/log.ts";

function setup(speak: (text: string) => Promise<void> = async () => {}) {
  const spoken: string[] = [];
  const speaker: Speaker = {
    speak: vi.fn(async (text: string) => {
      spoken.push(text);
      await speak(text);
    }),
  };
  const app = new SpeakApp(speaker);
  const key = (name: string, sequence = name) => {
    const event: InputEvent = { type: "key", name, sequence, ctrl: false };
    app.handleEvent(event);
  };
  const type = (text: string) => {
    for (const ch of text) key(ch === " " ? "space" : ch, ch);
  };
  return { app, spoken, key, type };
}

describe("moodColour", () => {
  it("maps mood words to colours", () => {
    expect(moodColour("Hello ")).toBe("green");
    expect(moodColour("happy")).toBe("yellow");
    expect(moodColour("sad")).toBe("blue");
    expect(moodColour("angry")).toBe("red");
    expect(moodColour("love")).toBe("pink");
  });

  it("needs the whole word", () => {
    expect(moodColour("thank you")).toBe("cyan");
    expect(moodColour("sadness")).toBe("cyan");
  });
});

describe("SpeakApp", () => {
  let previousLevel = getLogLevel();
  beforeAll(() => {
    previousLevel = getLogLevel();
    setLogLevel("silent");
  });
  afterAll(() => setLogLevel(previousLevel));

  it("Enter speaks the typed text and clears the box", async () => {
    const { app, spoken, type, key } = setup();
    type("hi there");
    expect(app.input).toBe("hi there");
    key("return", "\r");
    await app.close();
    expect(spoken).toEqual(["hi there"]);
    expect(app.input).toBe("");
    expect(app.lastSpoken).toBe("hi there");
  });

  it("Enter on a blank box does nothing", async () => {
    const { app, spoken, key } = setup();
    key("space", " ");
    key("return", "\r");
    await app.close();
    expect(spoken).toEqual([]);
  });

  it("backspace deletes and escape clears", () => {
    const { app, type, key } = setup();
    type("abc");
    key("backspace", "\x7f");
    expect(app.input).toBe("ab");
    key("escape", "\x1b");
    expect(app.input).toBe("");
  });

  it("stops accepting characters at the limit", () => {
    const { app, type } = setup();
    type("x".repeat(MAX_INPUT + 5));
    expect(app.input).toHaveLength(MAX_INPUT);
  });

  it("shows the mood while speaking, then goes back to white", () => {
    const { app } = setup();
    app.say("hi");
    expect(app.faceColour).toBe("green");
    expect(app.isSpeaking()).toBe(true);
    // "hi" lasts about 1.2 s
    app.update(1000);
    expect(app.isSpeaking()).toBe(true);
    app.update(300);
    expect(app.isSpeaking()).toBe(false);
    expect(app.faceColour).toBe("white");
  });

  it("records a failed speech command", async () => {
    const { app } = setup(async () => {
      throw new Error("espeak exited with code 1");
    });
    app.say("hello");
    await app.close();
    expect(app.lastError).toBe("espeak exited with code 1");
  });

  it("Ctrl+C quits", () => {
    const { app } = setup();
    app.handleEvent({ type: "quit" });
    expect(app.isRunning()).toBe(false);
  });
});
