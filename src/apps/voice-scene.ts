/**
 * voice-scene.ts — Shared base for the voice-driven demos.
 *
 * Owns the CommandDispatcher (and through it the ListenerMirror), drains it
 * once per frame, and draws the listener line and the status log. Subclasses
 * supply onCommand() and their own screen.
 */

import type { InputEvent, Scene, Surface } from "../lib/render-loop.ts";
import type { MessageQueue } from "../lib/message-queue.ts";
import type { StatusLog } from "../lib/status-log.ts";
import type { DispatcherOptions, HandlerResult } from "../lib/command-dispatcher.ts";
import { CommandDispatcher } from "../lib/command-dispatcher.ts";
import { TONE_COLOURS } from "../lib/terminal.ts";

export interface VoiceSceneDeps {
  queue: MessageQueue;
  status: StatusLog;
}

export type KeyEvent = Extract<InputEvent, { type: "key" }>;

export type SceneDispatchOptions = Omit<DispatcherOptions, "onCommand" | "onExit">;

export abstract class VoiceScene implements Scene {
  readonly dispatcher: CommandDispatcher;
  protected running = true;
  protected readonly status: StatusLog;

  constructor(deps: VoiceSceneDeps, opts: SceneDispatchOptions = {}) {
    this.status = deps.status;
    this.dispatcher = new CommandDispatcher(deps.queue, deps.status, {
      ...opts,
      onCommand: (text) => this.onCommand(text),
      onExit: () => this.stop(),
    });
  }

  /** Handle recognized speech that is not an exit phrase. */
  protected abstract onCommand(text: string): HandlerResult;

  abstract draw(surface: Surface): void;

  /** Keyboard handling beyond Ctrl+C. Escape quits unless overridden. */
  protected onKey(event: KeyEvent): void {
    if (event.name === "escape") this.stop();
  }

  /** Wait for in-flight actions; subclasses release what they opened. */
  async close(): Promise<void> {
    await this.dispatcher.settle();
  }

  isRunning(): boolean {
    return this.running;
  }

  stop() {
    this.running = false;
  }

  handleEvent(event: InputEvent) {
    if (event.type === "quit") {
      this.stop();
      return;
    }
    this.onKey(event);
  }

  update(_dtMs: number) {
    this.dispatcher.drain();
  }

  /** One line describing what the listener is doing. */
  protected listenerLine(): string {
    const mirror = this.dispatcher.mirror;
    if (mirror.fatal) return "Voice input unavailable";
    if (!mirror.alive) return "Listener stopped";
    if (mirror.isSpeaking()) return "Recognizing...";
    if (!mirror.calibrated) return "Calibrating...";
    return "Listening";
  }

  /** Status log, newest line at the bottom, from `top` for `rows` rows. */
  protected drawStatus(surface: Surface, top: number, rows: number, col = 2) {
    const entries = this.status.getAll().slice(-rows);
    entries.forEach((entry, i) => {
      surface.print(top + i, col, entry.line, TONE_COLOURS[entry.tone]);
    });
  }
}
