/**
 * speaker.ts — Text-to-speech through the platform's speech command.
 *
 *  - macOS: `say`
 *  - Windows: PowerShell + System.Speech
 *  - elsewhere: `espeak`
 *  - TTS_COMMAND overrides all of these; the text is passed as the last argument
 *
 * speak() resolves when the command exits.
 */

import { spawn } from "node:child_process";
import { SpeechOutputError } from "./speech-errors.ts";
import { createLogger } from "./log.ts";

const log = createLogger("tts");

export interface Speaker {
  speak(text: string): Promise<void>;
}

export type CommandRunner = (command: string, args: string[]) => Promise<void>;

/** Rough time to say `text`: 100 ms per character plus one second. */
export function estimateSpeechMs(text: string): number {
  return (text.length * 0.1 + 1) * 1000;
}

export function speechCommand(
  text: string,
  platform: NodeJS.Platform = process.platform,
  override = "",
): [string, string[]] {
  if (override.trim()) {
    const [command, ...args] = override.trim().split(/\s+/);
    return [command, [...args, text]];
  }
  if (platform === "darwin") return ["say", [text]];
  if (platform === "win32") {
    const quoted = text.replace(/'/g, "''");
    return [
      "powershell",
      [
        "-NoProfile",
        "-Command",
        `Add-Type -AssemblyName System.Speech; (New-Object System.Speech.Synthesis.SpeechSynthesizer).Speak('${quoted}')`,
      ],
    ];
  }
  return ["espeak", [text]];
}

export const runCommand: CommandRunner = (command, args) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: "ignore" });
    child.once("error", (err) => reject(new SpeechOutputError(`Could not run ${command}: ${err.message}`, { cause: err })));
    child.once("exit", (code) => {
      if (code === 0) resolve();
      else reject(new SpeechOutputError(`${command} exited with code ${code ?? "null"}`));
    });
  });

export interface CommandSpeakerOptions {
  command?: string;
  platform?: NodeJS.Platform;
  run?: CommandRunner;
}

export class CommandSpeaker implements Speaker {
  private readonly override: string;
  private readonly platform: NodeJS.Platform;
  private readonly run: CommandRunner;

  constructor(opts: CommandSpeakerOptions = {}) {
    this.override = opts.command ?? "";
    this.platform = opts.platform ?? process.platform;
    this.run = opts.run ?? runCommand;
  }

  async speak(text: string): Promise<void> {
    const trimmed = text.trim();
    if (!trimmed) return;
    const [command, args] = speechCommand(trimmed, this.platform, this.override);
    log.debug("speaking", { command, chars: trimmed.length });
    await this.run(command, args);
  }
}
