/**
 * config.ts — Environment-driven settings for every demo.
 *
 * Values come from process.env (after `.env` is loaded by dotenv) and are
 * validated with a zod schema. Blank variables fall back to their defaults.
 */

import dotenv from "dotenv";
import { z } from "zod";
import type { ListenerConfig, MatchStrategy } from "./voice-types.ts";
import type { CaptureCommand } from "./microphone.ts";
import type { LogLevel } from "./log.ts";
import type { AutomatedBrowser } from "./browser-session.ts";

function blankToUndefined(value: unknown): unknown {
  return typeof value === "string" && value.trim() === "" ? undefined : value;
}

const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(1).default(fallback));

const flag = z.preprocess(
  (value) => {
    const v = blankToUndefined(value);
    return typeof v === "string" ? ["1", "true", "yes", "on"].includes(v.toLowerCase()) : v;
  },
  z.boolean().default(false),
);

const EnvSchema = z.object({
  OPENAI_API_KEY: z.preprocess(blankToUndefined, z.string().optional()),
  STT_MODEL: z.preprocess(blankToUndefined, z.string().default("whisper-1")),
  STT_LANGUAGE: z.preprocess(blankToUndefined, z.string().default("en")),
  MIC_COMMAND: z.preprocess(blankToUndefined, z.enum(["rec", "arecord"]).default("rec")),
  MIC_SAMPLE_RATE: positiveInt(16000),
  MIC_CALIBRATION_MS: positiveInt(2000),
  LISTEN_TIMEOUT_MS: positiveInt(4000),
  PHRASE_TIME_LIMIT_MS: positiveInt(7000),
  MAX_RECALIBRATIONS: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).optional()),
  COMMAND_MATCH: z.preprocess(blankToUndefined, z.enum(["first", "longest"]).default("first")),
  FPS: z.preprocess(blankToUndefined, z.coerce.number().int().min(30).max(60).default(30)),
  MAX_STATUS_MESSAGES: positiveInt(15),
  DEFAULT_BROWSER: z.preprocess(blankToUndefined, z.enum(["chrome", "firefox", "edge"]).default("chrome")),
  BROWSER_AUTOMATION: flag,
  GITHUB_URL: z.preprocess(blankToUndefined, z.string().url().default("https://github.com/your-username")),
  TTS_COMMAND: z.preprocess(blankToUndefined, z.string().default("")),
  LOG_LEVEL: z.preprocess(
    (value) => {
      const v = blankToUndefined(value);
      return typeof v === "string" ? v.toLowerCase() : v;
    },
    z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  ),
});

export interface AppConfig {
  openaiApiKey: string | undefined;
  sttModel: string;
  sttLanguage: string;
  micCommand: CaptureCommand;
  micSampleRate: number;
  listener: Pick<ListenerConfig, "calibrationMs" | "listenTimeoutMs" | "phraseTimeLimitMs" | "maxRecalibrations">;
  commandMatch: MatchStrategy;
  fps: number;
  maxStatusMessages: number;
  defaultBrowser: AutomatedBrowser;
  browserAutomation: boolean;
  githubUrl: string;
  ttsCommand: string;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

/** Validate an environment map. Throws ConfigError listing every bad variable. */
export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }
  const e = parsed.data;
  return {
    openaiApiKey: e.OPENAI_API_KEY,
    sttModel: e.STT_MODEL,
    sttLanguage: e.STT_LANGUAGE,
    micCommand: e.MIC_COMMAND,
    micSampleRate: e.MIC_SAMPLE_RATE,
    listener: {
      calibrationMs: e.MIC_CALIBRATION_MS,
      listenTimeoutMs: e.LISTEN_TIMEOUT_MS,
      phraseTimeLimitMs: e.PHRASE_TIME_LIMIT_MS,
      maxRecalibrations: e.MAX_RECALIBRATIONS ?? Infinity,
    },
    commandMatch: e.COMMAND_MATCH,
    fps: e.FPS,
    maxStatusMessages: e.MAX_STATUS_MESSAGES,
    defaultBrowser: e.DEFAULT_BROWSER,
    browserAutomation: e.BROWSER_AUTOMATION,
    githubUrl: e.GITHUB_URL,
    ttsCommand: e.TTS_COMMAND,
    logLevel: e.LOG_LEVEL,
  };
}

/** Load `.env` into process.env, then parse it. */
export function loadConfig(): AppConfig {
  dotenv.config();
  return parseConfig(process.env);
}
