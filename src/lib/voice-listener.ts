/**
 * voice-listener.ts — Background listen → transcribe loop.
 *
 * Key behaviors:
 *  - Calibrates the microphone once before the first listen
 *  - Each iteration: timed listen, then one transcription request
 *  - Results, status and errors are posted to the MessageQueue; nothing is
 *    thrown to the owner and no field is meant to be read from outside
 *  - A device error triggers reset + recalibration; if that fails the
 *    listener posts FATAL_ERROR and stops itself
 *  - stop() is cooperative: the flag is checked once per iteration, so the
 *    loop exits within one listen timeout
 *
 * Every stage change travels on a message, so a ListenerMirror fed from the
 * queue always agrees with the loop.
 *
 * Stages: STARTING → CALIBRATING → LISTENING ⇄ RECOGNIZING,
 *         LISTENING → RECALIBRATING → LISTENING, any → STOPPED
 */

import { setTimeout as sleep } from "node:timers/promises";
import type { AudioSource } from "./microphone.ts";
import type { Transcriber } from "./transcriber.ts";
import type { MessageQueue } from "./message-queue.ts";
import type { ListenerConfig, ListenerStage, MessageKind } from "./voice-types.ts";
import { DEFAULT_LISTENER_CONFIG, createMessage } from "./voice-types.ts";
import {
  ListenTimeoutError,
  SpeechNotUnderstoodError,
  TranscriptionUnavailableError,
  describeError,
} from "./speech-errors.ts";
import { createLogger } from "./log.ts";

const log = createLogger("listener");

export class VoiceListener {
  private running = false;
  private stage: ListenerStage = "STARTING";
  private loop: Promise<void> | null = null;
  private recalibrations = 0;
  private readonly config: ListenerConfig;

  constructor(
    private readonly source: AudioSource,
    private readonly transcriber: Transcriber,
    private readonly queue: MessageQueue,
    config: Partial<ListenerConfig> = {},
  ) {
    this.config = { ...DEFAULT_LISTENER_CONFIG, ...config };
  }

  /** Launch the loop. Calling start() on a started listener is a no-op. */
  start() {
    if (this.loop) return;
    this.running = true;
    this.loop = this.run();
  }

  /** Ask the loop to finish after its current iteration. */
  stop() {
    this.running = false;
  }

  /** Resolves once the loop has exited (immediately if never started). */
  join(): Promise<void> {
    return this.loop ?? Promise.resolve();
  }

  isRunning(): boolean {
    return this.running;
  }

  private post(kind: MessageKind, text: string, stage?: ListenerStage) {
    if (stage) this.stage = stage;
    this.queue.push(createMessage(kind, text, stage));
  }

  private async run(): Promise<void> {
    this.post("STATUS", "Calibrating microphone for ambient noise... Please be silent.", "CALIBRATING");
    try {
      await this.source.calibrate(this.config.calibrationMs);
    } catch (err) {
      log.error("calibration failed", { error: describeError(err) });
      this.post(
        "FATAL_ERROR",
        `Voice listener failed to start: ${describeError(err)}. Ensure microphone is available and working.`,
        "STOPPED",
      );
      this.running = false;
      return;
    }

    this.post("STATUS", "Calibration complete. Waiting for you to speak.", "LISTENING");
    if (this.config.readyHint) this.post("COMMAND", this.config.readyHint);

    while (this.running) {
      await this.iterate();
      if (this.running && this.config.pollDelayMs > 0) {
        await sleep(this.config.pollDelayMs);
      }
    }

    if (this.stage !== "STOPPED") {
      this.post("STATUS", "Listener stopped.", "STOPPED");
    }
  }

  private async iterate(): Promise<void> {
    if (this.config.announceListening) {
      this.post("STATUS", "Listening for command...");
    }
    try {
      const clip = await this.source.listen(this.config.listenTimeoutMs, this.config.phraseTimeLimitMs);
      this.post("STATUS", "Recognizing speech...", "RECOGNIZING");
      try {
        const text = (await this.transcriber.transcribe(clip)).trim().toLowerCase();
        if (!text) throw new SpeechNotUnderstoodError();
        this.post("RECOGNIZED", text, "LISTENING");
      } finally {
        this.stage = "LISTENING";
      }
    } catch (err) {
      // stop() may have torn the capture down mid-listen
      if (!this.running) return;
      if (err instanceof ListenTimeoutError) {
        // Expected between utterances
        return;
      }
      if (err instanceof SpeechNotUnderstoodError) {
        this.post("ERROR", "Speech recognition could not understand audio. Please speak more clearly.", "LISTENING");
        return;
      }
      if (err instanceof TranscriptionUnavailableError) {
        this.post(
          "ERROR",
          `Could not request results from the speech recognition service; ${describeError(err)}. Check internet connection.`,
          "LISTENING",
        );
        return;
      }
      await this.recover(err);
    }
  }

  private async recover(cause: unknown): Promise<void> {
    log.warn("audio error, recalibrating", { error: describeError(cause) });
    this.post("ERROR", `An unexpected audio error occurred: ${describeError(cause)}. Attempting to reinitialize.`);

    this.recalibrations++;
    if (this.recalibrations > this.config.maxRecalibrations) {
      this.post(
        "FATAL_ERROR",
        `Microphone failed ${this.recalibrations} times; giving up. Please restart the program.`,
        "STOPPED",
      );
      this.running = false;
      return;
    }

    this.post("STATUS", "Attempting to recalibrate microphone after error...", "RECALIBRATING");
    try {
      await this.source.reset();
      if (this.config.recoveryDelayMs > 0) await sleep(this.config.recoveryDelayMs);
      await this.source.calibrate(this.config.calibrationMs);
      this.post("STATUS", "Recalibration successful.", "LISTENING");
    } catch (err) {
      log.error("recalibration failed", { error: describeError(err) });
      this.post("FATAL_ERROR", `Recalibration failed: ${describeError(err)}. Please restart the program.`, "STOPPED");
      this.running = false;
    }
  }
}
