import { describe, it, expect } from "vitest";
import { ListenerMirror } from "../listener-mirror.ts";
import { createMessage } from "../voice-types.ts";

describe("ListenerMirror", () => {
  it("starts alive and uncalibrated", () => {
    const m = new ListenerMirror();
    expect(m.stage).toBe("STARTING");
    expect(m.calibrated).toBe(false);
    expect(m.alive).toBe(true);
    expect(m.fatal).toBeNull();
  });

  it("follows stage changes", () => {
    const m = new ListenerMirror();
    m.apply(createMessage("STATUS", "Calibrating...", "CALIBRATING"));
    expect(m.calibrated).toBe(false);
    m.apply(createMessage("STATUS", "Calibration complete.", "LISTENING"));
    expect(m.calibrated).toBe(true);
    m.apply(createMessage("STATUS", "Recognizing speech...", "RECOGNIZING"));
    expect(m.isSpeaking()).toBe(true);
    expect(m.calibrated).toBe(true);
    m.apply(createMessage("STATUS", "Attempting to recalibrate...", "RECALIBRATING"));
    expect(m.isSpeaking()).toBe(false);
    expect(m.calibrated).toBe(false);
  });

  it("messages without a stage leave it unchanged", () => {
    const m = new ListenerMirror();
    m.apply(createMessage("STATUS", "ready", "LISTENING"));
    m.apply(createMessage("RECOGNIZED", "hello"));
    expect(m.stage).toBe("LISTENING");
    expect(m.lastStatus).toBe("ready");
  });

  it("records a fatal error and marks the listener dead", () => {
    const m = new ListenerMirror();
    m.apply(createMessage("FATAL_ERROR", "no microphone", "STOPPED"));
    expect(m.fatal).toBe("no microphone");
    expect(m.alive).toBe(false);
    expect(m.stage).toBe("STOPPED");
  });

  it("a plain stop is not fatal", () => {
    const m = new ListenerMirror();
    m.apply(createMessage("STATUS", "Listener stopped.", "STOPPED"));
    expect(m.alive).toBe(false);
    expect(m.fatal).toBeNull();
  });
});
