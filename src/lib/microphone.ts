/**
 * microphone.ts — Energy-based phrase capture from a command-line recorder.
 *
 * The recorder (`rec` from SoX, or ALSA's `arecord`) streams raw 16-bit mono
 * PCM on stdout. Frames are scored by RMS against a threshold learned from
 * ambient noise during calibration:
 *
 *  - waiting:  no voiced frame yet; gives up after timeoutMs (ListenTimeoutError)
 *  - speaking: voiced frame seen; ends after SILENCE_MS of quiet or phraseLimitMs
 *
 * A short pre-roll of quiet frames is kept so the first syllable is not clipped.
 */

import { spawn } from "node:child_process";
import type { AudioClip } from "./voice-types.ts";
import { ListenTimeoutError, MicrophoneError, describeError } from "./speech-errors.ts";
import { createLogger } from "./log.ts";

const log = createLogger("mic");

export const FRAME_MS = 30;
export const SILENCE_MS = 800;
export const PRE_ROLL_FRAMES = 10;
export const DEFAULT_THRESHOLD = 0.02;
const MIN_THRESHOLD = 0.005;
const AMBIENT_RATIO = 1.5;

/** Anything the listener can calibrate and pull phrases from. */
export interface AudioSource {
  calibrate(durationMs: number): Promise<void>;
  /** Resolves with one phrase; rejects with ListenTimeoutError if nobody speaks. */
  listen(timeoutMs: number, phraseLimitMs: number): Promise<AudioClip>;
  /** Drop any open capture so the next call starts clean. */
  reset(): Promise<void>;
}

export type CaptureCommand = "rec" | "arecord";

/** A running capture: raw PCM chunks plus a way to end it. */
export interface CaptureStream {
  chunks: AsyncIterable<Buffer>;
  close(): void;
}

export type OpenCapture = () => CaptureStream;

/** RMS of a little-endian int16 frame, scaled to 0–1. */
export function computeRms(frame: Buffer): number {
  const samples = Math.floor(frame.length / 2);
  if (samples === 0) return 0;
  let sum = 0;
  for (let i = 0; i < samples; i++) {
    const v = frame.readInt16LE(i * 2) / 32768;
    sum += v * v;
  }
  return Math.sqrt(sum / samples);
}

/** Speech threshold from ambient frame levels. */
export function calibrateThreshold(levels: number[]): number {
  if (levels.length === 0) return DEFAULT_THRESHOLD;
  const mean = levels.reduce((a, b) => a + b, 0) / levels.length;
  return Math.max(MIN_THRESHOLD, mean * AMBIENT_RATIO);
}

export function frameBytes(sampleRate: number): number {
  return Math.round((sampleRate * FRAME_MS) / 1000) * 2;
}

/** Re-chunk an arbitrary byte stream into fixed-size frames. */
export async function* toFrames(chunks: AsyncIterable<Buffer>, size: number): AsyncGenerator<Buffer> {
  let pending: Buffer = Buffer.alloc(0);
  for await (const chunk of chunks) {
    pending = pending.length ? Buffer.concat([pending, chunk]) : chunk;
    while (pending.length >= size) {
      yield pending.subarray(0, size);
      pending = pending.subarray(size);
    }
  }
}

export type PhraseState = "waiting" | "speaking" | "complete" | "timeout";

export interface PhraseDetectorOptions {
  threshold: number;
  timeoutMs: number;
  phraseLimitMs: number;
  frameMs?: number;
  silenceMs?: number;
}

export class PhraseDetector {
  private state: PhraseState = "waiting";
  private waitedMs = 0;
  private spokenMs = 0;
  private silentMs = 0;
  private preRoll: Buffer[] = [];
  private frames: Buffer[] = [];
  private readonly frameMs: number;
  private readonly silenceMs: number;

  constructor(private readonly opts: PhraseDetectorOptions) {
    this.frameMs = opts.frameMs ?? FRAME_MS;
    this.silenceMs = opts.silenceMs ?? SILENCE_MS;
  }

  push(frame: Buffer): PhraseState {
    if (this.state === "complete" || this.state === "timeout") return this.state;
    const voiced = computeRms(frame) >= this.opts.threshold;

    if (this.state === "waiting") {
      if (!voiced) {
        this.waitedMs += this.frameMs;
        this.preRoll.push(frame);
        if (this.preRoll.length > PRE_ROLL_FRAMES) this.preRoll.shift();
        if (this.opts.timeoutMs > 0 && this.waitedMs >= this.opts.timeoutMs) this.state = "timeout";
        return this.state;
      }
      this.state = "speaking";
      this.frames = [...this.preRoll, frame];
      this.preRoll = [];
      this.spokenMs = this.frameMs;
      return this.state;
    }

    this.frames.push(frame);
    this.spokenMs += this.frameMs;
    this.silentMs = voiced ? 0 : this.silentMs + this.frameMs;
    if (this.silentMs >= this.silenceMs || (this.opts.phraseLimitMs > 0 && this.spokenMs >= this.opts.phraseLimitMs)) {
      this.state = "complete";
    }
    return this.state;
  }

  getState(): PhraseState {
    return this.state;
  }

  clip(sampleRate: number): AudioClip {
    const pcm = Buffer.concat(this.frames);
    return { pcm, sampleRate, durationMs: (pcm.length / 2 / sampleRate) * 1000 };
  }
}

export function captureArgs(command: CaptureCommand, sampleRate: number): string[] {
  const rate = String(sampleRate);
  if (command === "arecord") {
    return ["-q", "-f", "S16_LE", "-r", rate, "-c", "1", "-t", "raw"];
  }
  return ["-q", "-t", "raw", "-r", rate, "-b", "16", "-c", "1", "-e", "signed-integer", "-"];
}

/** Spawn the recorder and expose its stdout as PCM chunks. */
export function spawnCapture(command: CaptureCommand, sampleRate: number): CaptureStream {
  const child = spawn(command, captureArgs(command, sampleRate), { stdio: ["ignore", "pipe", "ignore"] });
  child.once("error", (err) => {
    child.stdout.destroy(new MicrophoneError(`Could not run ${command}: ${err.message}`, { cause: err }));
  });

  async function* chunks(): AsyncGenerator<Buffer> {
    for await (const chunk of child.stdout) {
      if (Buffer.isBuffer(chunk)) yield chunk;
    }
  }

  return {
    chunks: chunks(),
    close() {
      if (child.exitCode === null) child.kill();
    },
  };
}

export interface SoxMicrophoneOptions {
  command?: CaptureCommand;
  sampleRate?: number;
  /** Override the capture process (tests feed PCM here). */
  openCapture?: OpenCapture;
}

export class SoxMicrophone implements AudioSource {
  private threshold = DEFAULT_THRESHOLD;
  private active: CaptureStream | null = null;
  private readonly sampleRate: number;
  private readonly openCapture: OpenCapture;

  constructor(opts: SoxMicrophoneOptions = {}) {
    const command = opts.command ?? "rec";
    this.sampleRate = opts.sampleRate ?? 16000;
    this.openCapture = opts.openCapture ?? (() => spawnCapture(command, this.sampleRate));
  }

  getThreshold(): number {
    return this.threshold;
  }

  async calibrate(durationMs: number): Promise<void> {
    const levels: number[] = [];
    let elapsed = 0;
    await this.capture((frame) => {
      levels.push(computeRms(frame));
      elapsed += FRAME_MS;
      return elapsed >= durationMs;
    });
    if (elapsed < durationMs) {
      throw new MicrophoneError("Audio capture ended during calibration");
    }
    this.threshold = calibrateThreshold(levels);
    log.debug("calibrated", { threshold: this.threshold, frames: levels.length });
  }

  async listen(timeoutMs: number, phraseLimitMs: number): Promise<AudioClip> {
    const detector = new PhraseDetector({ threshold: this.threshold, timeoutMs, phraseLimitMs });
    await this.capture((frame) => {
      const state = detector.push(frame);
      return state === "complete" || state === "timeout";
    });

    const state = detector.getState();
    if (state === "timeout") throw new ListenTimeoutError(timeoutMs);
    if (state !== "complete") throw new MicrophoneError("Audio capture ended unexpectedly");
    return detector.clip(this.sampleRate);
  }

  async reset(): Promise<void> {
    this.active?.close();
    this.active = null;
    this.threshold = DEFAULT_THRESHOLD;
  }

  /** Feed frames to `onFrame` until it returns true or the stream ends. */
  private async capture(onFrame: (frame: Buffer) => boolean): Promise<void> {
    this.active?.close();
    const stream = this.openCapture();
    this.active = stream;
    try {
      for await (const frame of toFrames(stream.chunks, frameBytes(this.sampleRate))) {
        if (onFrame(frame)) break;
      }
    } catch (err) {
      if (err instanceof MicrophoneError) throw err;
      throw new MicrophoneError(`Audio capture failed: ${describeError(err)}`, { cause: err });
    } finally {
      stream.close();
      if (this.active === stream) this.active = null;
    }
  }
}
