/**
 * command-dispatcher.ts — Per-frame consumer of the listener's messages.
 *
 * drain() empties the MessageQueue in FIFO order. Every message updates the
 * ListenerMirror; non-speech messages become status lines verbatim
 * ("<KIND>: <text>"). Recognized speech is echoed as "YOU SAID: ..." and then
 * either triggers the exit handler (exit phrases are checked first and
 * suppress everything else) or goes to the app's command handler.
 *
 * Handlers may start async work by returning a promise. The dispatcher keeps
 * it, reports a rejection as an ERROR line, and never lets it reach the
 * render loop.
 */

import type { ListenerMessage } from "./voice-types.ts";
import type { MessageQueue } from "./message-queue.ts";
import type { StatusLog } from "./status-log.ts";
import { ListenerMirror } from "./listener-mirror.ts";
import { describeError } from "./speech-errors.ts";
import { createLogger } from "./log.ts";

const log = createLogger("dispatch");

export const DEFAULT_EXIT_PHRASES = ["exit", "quit", "close game"] as const;

/** false = not a command; true = handled; a promise = handled, still running. */
export type HandlerResult = boolean | Promise<unknown>;

export interface DispatcherOptions {
  onCommand: (text: string) => HandlerResult;
  onExit: () => void;
  exitPhrases?: readonly string[];
  exitMessage?: string;
  /** Extra INFO line after "not recognized" (skipped when empty). */
  hint?: string;
  /** Echo recognized text as "YOU SAID: ..." (default true). */
  echoSpeech?: boolean;
}

export class CommandDispatcher {
  readonly mirror = new ListenerMirror();
  private pending: Set<Promise<void>> = new Set();
  private readonly exitPhrases: readonly string[];

  constructor(
    private readonly queue: MessageQueue,
    private readonly status: StatusLog,
    private readonly opts: DispatcherOptions,
  ) {
    this.exitPhrases = (opts.exitPhrases ?? DEFAULT_EXIT_PHRASES).map((p) => p.toLowerCase());
  }

  /** Process everything queued since the last frame; returns what was handled. */
  drain(): ListenerMessage[] {
    const messages = this.queue.drain();
    for (const msg of messages) {
      this.mirror.apply(msg);
      if (msg.kind === "RECOGNIZED") {
        this.handleSpeech(msg.text);
      } else {
        this.status.add(`${msg.kind}: ${msg.text}`);
      }
    }
    return messages;
  }

  /** True when the text contains one of the exit phrases. */
  isExit(text: string): boolean {
    const lower = text.toLowerCase();
    return this.exitPhrases.some((p) => lower.includes(p));
  }

  /** Watch an async action: failures become ERROR lines. */
  track(work: Promise<unknown>) {
    const tracked: Promise<void> = work.then(
      () => undefined,
      (err: unknown) => {
        log.warn("action failed", { error: describeError(err) });
        this.status.add(`ERROR: ${describeError(err)}`);
      },
    );
    this.pending.add(tracked);
    void tracked.finally(() => this.pending.delete(tracked));
  }

  /** Resolves once every tracked action has finished. */
  async settle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  private handleSpeech(text: string) {
    if (this.opts.echoSpeech !== false) {
      this.status.add(`YOU SAID: ${text.toUpperCase()}`);
    }

    if (this.isExit(text)) {
      this.status.add(this.opts.exitMessage ?? "ACTION: Exiting application. Goodbye!");
      this.opts.onExit();
      return;
    }

    let result: HandlerResult;
    try {
      result = this.opts.onCommand(text);
    } catch (err) {
      log.warn("command failed", { error: describeError(err) });
      this.status.add(`ERROR: ${describeError(err)}`);
      return;
    }

    if (result === false) {
      this.status.add(`INFO: Command '${text}' not recognized.`);
      if (this.opts.hint) this.status.add(`INFO: ${this.opts.hint}`);
    } else if (result !== true) {
      this.track(result);
    }
  }
}
