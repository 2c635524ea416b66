/**
 * speak-app.ts — Type a word, press Enter, hear it.
 *
 * Keyboard only. The face takes a mood colour while speaking; the speaking
 * indicator lasts estimateSpeechMs() of the spoken text and is counted down
 * in update(), so it does not depend on when the TTS command exits.
 * Enter speaks, Backspace deletes, Escape clears, Ctrl+C quits.
 */

import type { Colour, InputEvent, Scene, Surface } from "../lib/render-loop.ts";
import type { Speaker } from "../lib/speaker.ts";
import { estimateSpeechMs } from "../lib/speaker.ts";
import { describeError } from "../lib/speech-errors.ts";
import { createLogger } from "../lib/log.ts";

const log = createLogger("speak");

export const MAX_INPUT = 50;

const MOODS: ReadonlyArray<readonly [readonly string[], Colour]> = [
  [["hi", "hello", "hey"], "green"],
  [["happy", "smile", "good"], "yellow"],
  [["sad", "cry", "bad"], "blue"],
  [["angry", "mad"], "red"],
  [["love", "heart"], "pink"],
];

/** Face colour for a spoken word; anything unlisted is cyan. */
export function moodColour(text: string): Colour {
  const word = text.trim().toLowerCase();
  for (const [words, colour] of MOODS) {
    if (words.includes(word)) return colour;
  }
  return "cyan";
}

function isPrintable(sequence: string): boolean {
  return sequence.length === 1 && sequence >= " " && sequence !== "\x7f";
}

export class SpeakApp implements Scene {
  input = "";
  lastSpoken = "";
  lastError: string | null = null;
  faceColour: Colour = "white";
  private speakingMs = 0;
  private running = true;
  private pending: Set<Promise<void>> = new Set();

  constructor(private readonly speaker: Speaker) {}

  isRunning(): boolean {
    return this.running;
  }

  isSpeaking(): boolean {
    return this.speakingMs > 0;
  }

  handleEvent(event: InputEvent) {
    if (event.type === "quit") {
      this.running = false;
      return;
    }
    switch (event.name) {
      case "return":
      case "enter":
        if (this.input.trim()) {
          this.say(this.input);
          this.input = "";
        }
        return;
      case "backspace":
        this.input = this.input.slice(0, -1);
        return;
      case "escape":
        this.input = "";
        return;
    }
    if (!event.ctrl && isPrintable(event.sequence) && this.input.length < MAX_INPUT) {
      this.input += event.sequence;
    }
  }

  /** Speak `text` now and start the mood/indicator timer. */
  say(text: string) {
    const spoken = text.trim();
    if (!spoken) return;
    this.lastSpoken = spoken;
    this.lastError = null;
    this.faceColour = moodColour(spoken);
    this.speakingMs = estimateSpeechMs(spoken);

    const work = this.speaker.speak(spoken).catch((err: unknown) => {
      log.warn("speech failed", { error: describeError(err) });
      this.lastError = describeError(err);
    });
    this.pending.add(work);
    void work.finally(() => this.pending.delete(work));
  }

  update(dtMs: number) {
    if (this.speakingMs <= 0) return;
    this.speakingMs -= dtMs;
    if (this.speakingMs <= 0) {
      this.speakingMs = 0;
      this.faceColour = "white";
    }
  }

  /** Wait for any speech still playing. */
  async close(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  draw(surface: Surface) {
    surface.center(0, "Type to Voice", "white");

    const face = this.isSpeaking() ? "( ^o^ )" : "( ^_^ )";
    surface.center(3, face, this.faceColour);

    surface.center(6, "Type any word and press Enter to hear it spoken!", "gray");
    surface.center(7, "Try: hi, hello, happy, sad, love, thank you, etc.", "gray");

    surface.print(9, 4, "Type here:", "white");
    surface.print(10, 4, `[ ${this.input.padEnd(MAX_INPUT)} ]`, "green");

    if (this.isSpeaking()) {
      surface.center(12, `Speaking: '${this.lastSpoken}'`, "green");
    } else {
      surface.center(12, "Ready - Type something!", "gray");
    }
    if (this.lastError) surface.center(13, `Speech failed: ${this.lastError}`, "red");

    surface.center(15, "Press Enter to speak | Escape to clear | Ctrl+C to quit", "gray");
  }
}
