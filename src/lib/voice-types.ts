export type ListenerStage =
  | "STARTING"
  | "CALIBRATING"
  | "LISTENING"
  | "RECOGNIZING"
  | "RECALIBRATING"
  | "STOPPED";

export const MESSAGE_KINDS = [
  "STATUS",
  "RECOGNIZED",
  "ERROR",
  "FATAL_ERROR",
  "INFO",
  "COMMAND",
] as const;

export type MessageKind = (typeof MESSAGE_KINDS)[number];

/** A tagged line travelling from the listener to the UI. */
export interface ListenerMessage {
  kind: MessageKind;
  text: string;
  /** Set whenever the listener changes stage, so the UI can mirror it. */
  stage?: ListenerStage;
  at: number;
}

export interface ListenerConfig {
  calibrationMs: number;
  listenTimeoutMs: number;
  phraseTimeLimitMs: number;
  /** Pause between listen iterations. */
  pollDelayMs: number;
  /** Pause between a device error and the recalibration attempt. */
  recoveryDelayMs: number;
  /** Device-error recoveries allowed before giving up. Infinity = no cap. */
  maxRecalibrations: number;
  /** Post "Listening for command..." before every listen. */
  announceListening: boolean;
  /** COMMAND line posted once calibration completes (skipped when empty). */
  readyHint: string;
}

export const DEFAULT_LISTENER_CONFIG: ListenerConfig = {
  calibrationMs: 2000,
  listenTimeoutMs: 4000,
  phraseTimeLimitMs: 7000,
  pollDelayMs: 100,
  recoveryDelayMs: 1000,
  maxRecalibrations: Infinity,
  announceListening: false,
  readyHint: "",
};

/** Mono 16-bit PCM captured from the microphone. */
export interface AudioClip {
  pcm: Buffer;
  sampleRate: number;
  durationMs: number;
}

export type BrowserTarget = "chrome" | "firefox" | "edge" | "default";

export type MatchStrategy = "first" | "longest";

export type LineTone = "plain" | "error" | "action" | "heard" | "warning";

export interface StatusEntry {
  id: number;
  line: string;
  tone: LineTone;
  timestampMs: number;
}

export function createMessage(kind: MessageKind, text: string, stage?: ListenerStage): ListenerMessage {
  const msg: ListenerMessage = { kind, text, at: Date.now() };
  if (stage) msg.stage = stage;
  return msg;
}
