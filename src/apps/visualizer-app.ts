/**
 * visualizer-app.ts — Speech-to-text visualizer.
 *
 * Shows the latest utterance in a rotating colour, the last five of a
 * ten-entry history, and a mic indicator that lights up while a phrase is
 * being recognized. Space clears the current text, C clears everything.
 */

import type { Colour, Surface } from "../lib/render-loop.ts";
import type { HandlerResult } from "../lib/command-dispatcher.ts";
import { VoiceScene } from "./voice-scene.ts";
import type { KeyEvent, VoiceSceneDeps } from "./voice-scene.ts";

export const HISTORY_SIZE = 10;
export const HISTORY_SHOWN = 5;

export const PALETTE: readonly Colour[] = ["blue", "green", "red", "yellow", "magenta", "orange", "cyan"];

export class VisualizerApp extends VoiceScene {
  currentText = "";
  history: string[] = [];
  private colourIndex = 0;

  constructor(deps: VoiceSceneDeps) {
    // Every word is displayable here, so no exit phrases
    super(deps, { exitPhrases: [] });
  }

  protected onCommand(text: string): HandlerResult {
    this.currentText = text;
    this.history.push(text);
    if (this.history.length > HISTORY_SIZE) this.history = this.history.slice(-HISTORY_SIZE);
    this.colourIndex = (this.colourIndex + 1) % PALETTE.length;
    return true;
  }

  textColour(): Colour {
    return PALETTE[this.colourIndex];
  }

  protected override onKey(event: KeyEvent) {
    switch (event.name) {
      case "escape":
        this.stop();
        break;
      case "space":
        this.currentText = "";
        break;
      case "c":
        this.history = [];
        this.currentText = "";
        break;
    }
  }

  draw(surface: Surface) {
    surface.center(0, "Speech-to-Text Visualizer", "white");

    const speaking = this.dispatcher.mirror.isSpeaking();
    surface.print(0, Math.max(0, surface.width - 16), speaking ? "(*) LISTENING" : "( ) READY", speaking ? "green" : "white");

    if (this.currentText) {
      surface.print(3, 4, `You said: "${this.currentText}"`, this.textColour());
    }

    if (this.history.length > 0) {
      surface.print(6, 4, "Recent Speech:", "white");
      this.history.slice(-HISTORY_SHOWN).forEach((text, i) => {
        surface.print(7 + i, 6, `* ${text}`, PALETTE[i % PALETTE.length]);
      });
    }

    const help = [
      "Speak into your microphone to see text appear!",
      "Press SPACE to clear current text",
      "Press C to clear history",
      "Press ESC to quit",
    ];
    help.forEach((line, i) => surface.print(13 + i, 4, line, "gray"));

    surface.print(18, 2, this.listenerLine(), "gray");
    this.drawStatus(surface, 19, Math.max(0, surface.height - 19));
  }
}
