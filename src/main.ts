#!/usr/bin/env tsx
/**
 * main.ts — `voice-lab <app>`: builds one demo and runs it in the terminal.
 *
 * Voice apps get a VoiceListener (microphone → OpenAI transcription) feeding
 * the MessageQueue; the RenderLoop drives the scene until it stops, then the
 * listener is stopped and joined and the scene releases what it opened.
 */

import { loadConfig, ConfigError } from "./lib/config.ts";
import type { AppConfig } from "./lib/config.ts";
import { setLogLevel, createLogger, withLogLevel } from "./lib/log.ts";
import { MessageQueue } from "./lib/message-queue.ts";
import { StatusLog } from "./lib/status-log.ts";
import { VoiceListener } from "./lib/voice-listener.ts";
import { SoxMicrophone } from "./lib/microphone.ts";
import { OpenAITranscriber } from "./lib/transcriber.ts";
import { DesktopBrowser } from "./lib/system-browser.ts";
import { BrowserSession } from "./lib/browser-session.ts";
import { CommandSpeaker } from "./lib/speaker.ts";
import { RenderLoop } from "./lib/render-loop.ts";
import type { Scene } from "./lib/render-loop.ts";
import { TerminalInput, TerminalSurface } from "./lib/terminal.ts";
import type { ListenerConfig } from "./lib/voice-types.ts";
import { describeError } from "./lib/speech-errors.ts";
import { LauncherApp } from "./apps/launcher-app.ts";
import { EchoApp } from "./apps/echo-app.ts";
import { AdventureApp } from "./apps/adventure-app.ts";
import { VisualizerApp } from "./apps/visualizer-app.ts";
import { SpeakApp } from "./apps/speak-app.ts";
import { LumiApp } from "./apps/lumi-app.ts";

const log = createLogger("main");

export const APP_NAMES = ["launcher", "echo", "adventure", "visualizer", "speak", "lumi"] as const;
export type AppName = (typeof APP_NAMES)[number];

function isAppName(value: string | undefined): value is AppName {
  return APP_NAMES.some((name) => name === value);
}

const USAGE = `Usage: voice-lab <app>

Apps:
  launcher     open websites by voice ("open google in chrome")
  echo         show everything you say in a browser window
  adventure    voice command adventure game
  visualizer   speech-to-text visualizer
  speak        type a word and hear it spoken
  lumi         teach Lumi the robot with feedback (keyboard)`;

interface RunnableScene extends Scene {
  close?(): Promise<void>;
}

interface Wiring {
  scene: RunnableScene;
  listener: Partial<ListenerConfig> | null;
}

function buildApp(name: AppName, config: AppConfig, queue: MessageQueue, status: StatusLog): Wiring {
  const deps = { queue, status };
  const report = (line: string) => status.add(line);

  switch (name) {
    case "launcher": {
      const session = config.browserAutomation
        ? new BrowserSession({ report, defaultBrowser: config.defaultBrowser })
        : null;
      const hint = session
        ? "Say 'Open Google in Chrome', 'Display What I Said', etc."
        : "Say 'Open Google in Chrome', 'Open YouTube in Firefox', etc.";
      return {
        scene: new LauncherApp({
          ...deps,
          system: new DesktopBrowser(),
          session,
          githubUrl: config.githubUrl,
          matchStrategy: config.commandMatch,
        }),
        listener: { announceListening: true, readyHint: hint },
      };
    }
    case "echo":
      return {
        scene: new EchoApp({
          ...deps,
          session: new BrowserSession({ report, defaultBrowser: config.defaultBrowser, reopen: true }),
        }),
        listener: {},
      };
    case "adventure":
      return { scene: new AdventureApp({ ...deps, matchStrategy: config.commandMatch }), listener: {} };
    case "visualizer":
      return { scene: new VisualizerApp(deps), listener: { listenTimeoutMs: 1000, phraseTimeLimitMs: 5000 } };
    case "speak":
      return { scene: new SpeakApp(new CommandSpeaker({ command: config.ttsCommand })), listener: null };
    case "lumi":
      return { scene: new LumiApp(), listener: null };
  }
}

export async function main(argv: string[]): Promise<number> {
  const name = argv[0];
  if (!isAppName(name)) {
    console.error(USAGE);
    return name === "--help" || name === "-h" ? 0 : 1;
  }

  const config = loadConfig();
  setLogLevel(config.logLevel);

  const queue = new MessageQueue();
  const status = new StatusLog(config.maxStatusMessages);
  const { scene, listener: listenerOverrides } = buildApp(name, config, queue, status);

  let listener: VoiceListener | null = null;
  let mic: SoxMicrophone | null = null;
  if (listenerOverrides) {
    if (!config.openaiApiKey) {
      throw new ConfigError(["OPENAI_API_KEY: required for voice apps"]);
    }
    mic = new SoxMicrophone({ command: config.micCommand, sampleRate: config.micSampleRate });
    const transcriber = new OpenAITranscriber({
      apiKey: config.openaiApiKey,
      model: config.sttModel,
      language: config.sttLanguage,
    });
    listener = new VoiceListener(mic, transcriber, queue, { ...config.listener, ...listenerOverrides });
  }

  const surface = new TerminalSurface();
  const input = new TerminalInput();
  const loop = new RenderLoop(scene, surface, input, { fps: config.fps });

  log.info("starting", { app: name });
  try {
    // stderr would draw over the screen; listener failures still reach the status panel
    await withLogLevel("silent", async () => {
      surface.open();
      input.open();
      listener?.start();
      try {
        await loop.run();
      } finally {
        input.close();
        surface.close();
      }
    });
  } finally {
    if (listener) {
      listener.stop();
      await mic?.reset();
      await listener.join();
    }
    await scene.close?.();
  }
  console.log("Application closed.");
  return 0;
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err instanceof ConfigError ? err.message : `Fatal: ${describeError(err)}`);
    process.exitCode = 1;
  },
);
