import { describe, it, expect } from "vitest";
import { VisualizerApp, HISTORY_SIZE, PALETTE } from "../visualizer-app.ts";
import { MessageQueue } from "../../lib/message-queue.ts";
import { StatusLog } from "../../lib/status-log.ts";
import { createMessage } from "../../lib/voice-types.ts";
import type { InputEvent } from "../../lib/render-loop.ts";
import { TextGrid } from "../../lib/terminal.ts";

function setup() {
  const queue = new MessageQueue();
  const app = new VisualizerApp({ queue, status: new StatusLog() });
  const say = (text: string) => {
    queue.push(createMessage("RECOGNIZED", text));
    app.update(0);
  };
  const press = (name: string) => {
    const event: InputEvent = { type: "key", name, sequence: name, ctrl: false };
    app.handleEvent(event);
  };
  return { app, queue, say, press };
}

describe("VisualizerApp", () => {
  it("shows the latest utterance and records it", () => {
    const { app, say } = setup();
    say("hello");
    say("world");
    expect(app.currentText).toBe("world");
    expect(app.history).toEqual(["hello", "world"]);
  });

  it("keeps only the last ten utterances", () => {
    const { app, say } = setup();
    for (let i = 1; i <= 12; i++) say(`line ${i}`);
    expect(app.history).toHaveLength(HISTORY_SIZE);
    expect(app.history[0]).toBe("line 3");
  });

  it("rotates the text colour per utterance", () => {
    const { app, say } = setup();
    expect(app.textColour()).toBe(PALETTE[0]);
    say("one");
    expect(app.textColour()).toBe(PALETTE[1]);
    for (let i = 0; i < PALETTE.length; i++) say("again");
    expect(app.textColour()).toBe(PALETTE[1]);
  });

  it("displays exit words instead of exiting", () => {
    const { app, say } = setup();
    say("exit");
    expect(app.isRunning()).toBe(true);
    expect(app.currentText).toBe("exit");
  });

  it("space clears the text, c clears everything", () => {
    const { app, say, press } = setup();
    say("hello");
    press("space");
    expect(app.currentText).toBe("");
    expect(app.history).toEqual(["hello"]);
    say("again");
    press("c");
    expect(app.currentText).toBe("");
    expect(app.history).toEqual([]);
  });

  it("escape quits", () => {
    const { app, press } = setup();
    press("escape");
    expect(app.isRunning()).toBe(false);
  });

  it("lights the mic indicator while recognizing", () => {
    const { app, queue } = setup();
    const grid = new TextGrid(80, 24);
    app.draw(grid);
    expect(grid.rows()[0].endsWith("( ) READY")).toBe(true);

    queue.push(createMessage("STATUS", "Recognizing speech...", "RECOGNIZING"));
    app.update(0);
    grid.clear();
    app.draw(grid);
    expect(grid.rows()[0].endsWith("(*) LISTENING")).toBe(true);
    expect(grid.coloursAt(0)).toEqual(["white", "green"]);
  });

  it("draws the last five utterances", () => {
    const { app, say } = setup();
    for (let i = 1; i <= 7; i++) say(`line ${i}`);
    const grid = new TextGrid(80, 24);
    app.draw(grid);
    const rows = grid.rows();
    expect(rows[7]).toBe("      * line 3");
    expect(rows[11]).toBe("      * line 7");
  });
});
