import { describe, it, expect, vi, beforeAll, afterAll } from "vitest";
import OpenAI from "openai";
import { OpenAITranscriber, classifyError } from "../transcriber.ts";
import type { TranscriptionClient } from "../transcriber.ts";
import type { AudioClip } from "../voice-types.ts";
import { SpeechNotUnderstoodError, TranscriptionUnavailableError } from "../speech-errors.ts";
import { getLogLevel, setLogLevel } from "../log.ts";

const CLIP: AudioClip = { pcm: Buffer.alloc(16000), sampleRate: 16000, durationMs: 500 };

function fakeClient(result: () => Promise<{ text: string }>) {
  const create = vi.fn((_body: Parameters<TranscriptionClient["audio"]["transcriptions"]["create"]>[0]) => result());
  const client: TranscriptionClient = { audio: { transcriptions: { create } } };
  return { client, create };
}

describe("OpenAITranscriber", () => {
  let previousLevel = getLogLevel();
  beforeAll(() => {
    previousLevel = getLogLevel();
    setLogLevel("silent");
  });
  afterAll(() => setLogLevel(previousLevel));

  it("returns the trimmed transcript", async () => {
    const { client } = fakeClient(async () => ({ text: "  Open Google  " }));
    const t = new OpenAITranscriber({ client });
    await expect(t.transcribe(CLIP)).resolves.toBe("Open Google");
  });

  it("sends the model and language", async () => {
    const { client, create } = fakeClient(async () => ({ text: "hi" }));
    await new OpenAITranscriber({ client, model: "gpt-4o-mini-transcribe", language: "en" }).transcribe(CLIP);
    expect(create).toHaveBeenCalledTimes(1);
    const body = create.mock.calls[0][0];
    expect(body.model).toBe("gpt-4o-mini-transcribe");
    expect(body.language).toBe("en");
  });

  it("omits an empty language", async () => {
    const { client, create } = fakeClient(async () => ({ text: "hi" }));
    await new OpenAITranscriber({ client, language: "" }).transcribe(CLIP);
    const body = create.mock.calls[0][0];
    expect(body.model).toBe("whisper-1");
    expect(body).not.toHaveProperty("language");
  });

  it("rejects very short clips without calling the service", async () => {
    const { client, create } = fakeClient(async () => ({ text: "hi" }));
    const short: AudioClip = { ...CLIP, durationMs: 60 };
    await expect(new OpenAITranscriber({ client }).transcribe(short)).rejects.toBeInstanceOf(SpeechNotUnderstoodError);
    expect(create).not.toHaveBeenCalled();
  });

  it("treats an empty transcript as not understood", async () => {
    const { client } = fakeClient(async () => ({ text: "  " }));
    await expect(new OpenAITranscriber({ client }).transcribe(CLIP)).rejects.toBeInstanceOf(SpeechNotUnderstoodError);
  });

  it("classifies client failures", async () => {
    const { client } = fakeClient(async () => {
      throw new OpenAI.APIConnectionError({ message: "offline" });
    });
    const err = await new OpenAITranscriber({ client }).transcribe(CLIP).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TranscriptionUnavailableError);
    expect(err).toHaveProperty("message", "connection failed: offline");
  });
});

describe("classifyError", () => {
  it("a 400 means the audio was unusable", () => {
    const err = classifyError(new OpenAI.APIError(400, undefined, "bad audio", undefined));
    expect(err).toBeInstanceOf(SpeechNotUnderstoodError);
  });

  it("other API errors mean the service is unavailable", () => {
    const err = classifyError(new OpenAI.APIError(503, undefined, "overloaded", undefined));
    expect(err).toBeInstanceOf(TranscriptionUnavailableError);
    expect(err.message.startsWith("service returned 503: ")).toBe(true);
  });

  it("unknown failures keep their message", () => {
    const err = classifyError(new Error("socket hang up"));
    expect(err).toBeInstanceOf(TranscriptionUnavailableError);
    expect(err.message).toBe("socket hang up");
  });
});
