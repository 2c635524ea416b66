import { describe, it, expect } from "vitest";
import { EchoApp } from "../echo-app.ts";
import { MessageQueue } from "../../lib/message-queue.ts";
import { StatusLog } from "../../lib/status-log.ts";
import { createMessage } from "../../lib/voice-types.ts";
import { BrowserSession, textPageUrl } from "../../lib/browser-session.ts";
import { TextGrid } from "../../lib/terminal.ts";

function setup() {
  const queue = new MessageQueue();
  const status = new StatusLog(100);
  const visited: string[] = [];
  let windows = 0;
  let quits = 0;
  const session = new BrowserSession({
    report: (line) => status.add(line),
    reopen: true,
    createDriver: async () => {
      windows++;
      return {
        get: async (url: string) => {
          visited.push(url);
        },
        quit: async () => {
          quits++;
        },
      };
    },
  });
  const app = new EchoApp({ queue, status, session });
  const say = async (text: string) => {
    queue.push(createMessage("RECOGNIZED", text));
    app.update(0);
    await app.dispatcher.settle();
  };
  return { app, say, visited, windows: () => windows, quits: () => quits, session };
}

describe("EchoApp", () => {
  it("shows each utterance upper-cased in a fresh window", async () => {
    const { app, say, visited, windows } = setup();
    await say("hello world");
    await say("second line");
    expect(visited).toEqual([textPageUrl("HELLO WORLD"), textPageUrl("SECOND LINE")]);
    expect(windows()).toBe(2);
    expect(app.getLastSpeech()).toBe("second line");
  });

  it("'close browser' closes the window instead of displaying", async () => {
    const { say, visited, quits, session } = setup();
    await say("hello");
    await say("close browser");
    expect(visited).toHaveLength(1);
    expect(quits()).toBe(1);
    expect(session.isOpen()).toBe(false);
  });

  it("exit phrases stop the app without opening a window", async () => {
    const { app, say, windows } = setup();
    await say("quit");
    expect(app.isRunning()).toBe(false);
    expect(windows()).toBe(0);
  });

  it("close() shuts any open window", async () => {
    const { app, say, quits } = setup();
    await say("hello");
    await app.close();
    expect(quits()).toBe(1);
  });

  it("draws the last utterance", () => {
    const { app } = setup();
    const grid = new TextGrid(80, 24);
    app.draw(grid);
    expect(grid.rows()[3]).toBe("    NO SPEECH DETECTED YET.");
  });
});
