/**
 * transcriber.ts — Cloud speech-to-text for captured phrases.
 *
 * Each clip becomes one WAV upload to the OpenAI audio transcription
 * endpoint. Failures are sorted into the listener's taxonomy:
 *  - empty text, or a clip too short to bother sending → SpeechNotUnderstoodError
 *  - 400 from the service (unusable audio)              → SpeechNotUnderstoodError
 *  - anything else (network, auth, 429, 5xx)            → TranscriptionUnavailableError
 */

import OpenAI from "openai";
import { toFile } from "openai/uploads";
import type { Uploadable } from "openai/uploads";
import type { AudioClip } from "./voice-types.ts";
import { encodeWav } from "./wav.ts";
import { SpeechNotUnderstoodError, TranscriptionUnavailableError, describeError } from "./speech-errors.ts";
import { createLogger } from "./log.ts";

const log = createLogger("stt");

/** Clips shorter than this are rejected locally. */
export const MIN_CLIP_MS = 100;

export interface Transcriber {
  transcribe(clip: AudioClip): Promise<string>;
}

/** The slice of the OpenAI client this module calls. */
export interface TranscriptionClient {
  audio: {
    transcriptions: {
      create(body: { model: string; file: Uploadable; language?: string }): PromiseLike<{ text: string }>;
    };
  };
}

export interface OpenAITranscriberOptions {
  apiKey?: string;
  model?: string;
  language?: string;
  client?: TranscriptionClient;
}

export class OpenAITranscriber implements Transcriber {
  private readonly client: TranscriptionClient;
  private readonly model: string;
  private readonly language: string | undefined;

  constructor(opts: OpenAITranscriberOptions = {}) {
    this.client = opts.client ?? new OpenAI({ apiKey: opts.apiKey, maxRetries: 1 });
    this.model = opts.model ?? "whisper-1";
    this.language = opts.language || undefined;
  }

  async transcribe(clip: AudioClip): Promise<string> {
    if (clip.durationMs < MIN_CLIP_MS) {
      throw new SpeechNotUnderstoodError("Audio clip too short");
    }

    const file = await toFile(encodeWav(clip.pcm, clip.sampleRate), "speech.wav", { type: "audio/wav" });
    const t0 = performance.now();
    let text: string;
    try {
      const result = await this.client.audio.transcriptions.create({
        model: this.model,
        file,
        ...(this.language ? { language: this.language } : {}),
      });
      text = (result.text || "").trim();
    } catch (err) {
      throw classifyError(err);
    }
    log.debug("transcribed", { ms: Math.round(performance.now() - t0), chars: text.length });

    if (!text) throw new SpeechNotUnderstoodError();
    return text;
  }
}

export function classifyError(err: unknown): Error {
  if (err instanceof OpenAI.APIConnectionError) {
    return new TranscriptionUnavailableError(`connection failed: ${err.message}`, { cause: err });
  }
  if (err instanceof OpenAI.APIError && err.status === 400) {
    return new SpeechNotUnderstoodError(err.message);
  }
  if (err instanceof OpenAI.APIError) {
    return new TranscriptionUnavailableError(`service returned ${err.status ?? "an error"}: ${err.message}`, { cause: err });
  }
  return new TranscriptionUnavailableError(describeError(err), { cause: err });
}
