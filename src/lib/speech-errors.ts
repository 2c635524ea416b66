/**
 * speech-errors.ts — Failure taxonomy shared by the microphone, the
 * transcriber, the speaker and the listener loop.
 *
 *  - ListenTimeoutError            no speech started before the timeout (ignored)
 *  - SpeechNotUnderstoodError      audio reached the service but gave no text
 *  - TranscriptionUnavailableError service unreachable / refused the request
 *  - MicrophoneError               capture device failed (triggers recalibration)
 *  - SpeechOutputError             the text-to-speech command failed
 */

export class ListenTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`No speech detected within ${timeoutMs}ms`);
    this.name = "ListenTimeoutError";
  }
}

export class SpeechNotUnderstoodError extends Error {
  constructor(message = "Speech could not be understood") {
    super(message);
    this.name = "SpeechNotUnderstoodError";
  }
}

export class TranscriptionUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TranscriptionUnavailableError";
  }
}

export class MicrophoneError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MicrophoneError";
  }
}

/** One-line description of anything thrown. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  if (typeof err === "string") return err;
  return String(err);
}

export class SpeechOutputError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SpeechOutputError";
  }
}
