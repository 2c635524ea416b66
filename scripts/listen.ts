#!/usr/bin/env tsx
/**
 * listen.ts — Headless listener check.
 *
 * Runs the VoiceListener without a screen and prints every status line the
 * dispatcher produces. Say "exit" or press Ctrl+C to stop.
 */

import { setTimeout as sleep } from "node:timers/promises";
import { loadConfig, ConfigError } from "../src/lib/config.ts";
import { setLogLevel } from "../src/lib/log.ts";
import { MessageQueue } from "../src/lib/message-queue.ts";
import { StatusLog } from "../src/lib/status-log.ts";
import { CommandDispatcher } from "../src/lib/command-dispatcher.ts";
import { VoiceListener } from "../src/lib/voice-listener.ts";
import { SoxMicrophone } from "../src/lib/microphone.ts";
import { OpenAITranscriber } from "../src/lib/transcriber.ts";
import { describeError } from "../src/lib/speech-errors.ts";

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  if (!config.openaiApiKey) throw new ConfigError(["OPENAI_API_KEY: required for listening"]);

  const queue = new MessageQueue();
  const status = new StatusLog(config.maxStatusMessages);
  status.subscribe(() => {
    const entries = status.getAll();
    const newest = entries[entries.length - 1];
    if (newest) console.log(newest.line);
  });

  let done = false;
  const dispatcher = new CommandDispatcher(queue, status, {
    onCommand: () => true,
    onExit: () => {
      done = true;
    },
    exitMessage: "ACTION: Stopping listener.",
  });

  const mic = new SoxMicrophone({ command: config.micCommand, sampleRate: config.micSampleRate });
  const transcriber = new OpenAITranscriber({
    apiKey: config.openaiApiKey,
    model: config.sttModel,
    language: config.sttLanguage,
  });
  const listener = new VoiceListener(mic, transcriber, queue, config.listener);

  process.once("SIGINT", () => {
    done = true;
  });

  listener.start();
  while (!done && dispatcher.mirror.alive) {
    dispatcher.drain();
    await sleep(100);
  }
  listener.stop();
  await mic.reset();
  await listener.join();
  dispatcher.drain();
}

main().catch((err: unknown) => {
  console.error(err instanceof ConfigError ? err.message : `Fatal: ${describeError(err)}`);
  process.exitCode = 1;
});
