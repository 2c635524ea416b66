/**
 * lumi-app.ts — Terminal front end for the Lumi teaching toy.
 *
 * Keys: C correct, W wrong, then 1/2/3 for the action Lumi should have
 * taken, N next round, Esc or Ctrl+C quit.
 */

import type { Colour, InputEvent, Scene, Surface } from "../lib/render-loop.ts";
import { LUMI_ACTIONS } from "./lumi-brain.ts";
import type { Emotion } from "./lumi-brain.ts";
import { LumiGame, MAX_ROUNDS } from "./lumi-game.ts";

const EMOTION_COLOURS: Record<Emotion, Colour> = {
  neutral: "blue",
  happy: "green",
  sad: "red",
};

const FACES: Record<Emotion, string> = {
  neutral: "( o_o )",
  happy: "( ^_^ )",
  sad: "( ;_; )",
};

const SHAPES = { ball: "( )", square: "[ ]", gem: "< >", coin: "(o)" } as const;

const BRAIN_ROWS = 6;

export class LumiApp implements Scene {
  private running = true;

  constructor(readonly game: LumiGame = new LumiGame()) {}

  isRunning(): boolean {
    return this.running;
  }

  handleEvent(event: InputEvent) {
    if (event.type === "quit") {
      this.running = false;
      return;
    }
    switch (event.name) {
      case "escape":
        this.running = false;
        break;
      case "c":
        this.game.markCorrect();
        break;
      case "w":
        this.game.markWrong();
        break;
      case "1":
      case "2":
      case "3": {
        const action = LUMI_ACTIONS[Number(event.name) - 1];
        this.game.chooseAction(action);
        break;
      }
      case "n":
        this.game.nextRound();
        break;
    }
  }

  update(_dtMs: number) {}

  draw(surface: Surface) {
    const { game } = this;
    const brain = game.brain;
    surface.center(0, "LumiAI Learning Game", "magenta");
    surface.center(1, "Help Lumi learn to make smart decisions!", "white");

    if (!game.gameOver && game.current) {
      surface.center(3, game.current.description, "white");
      surface.center(4, `Lumi decides: ${brain.lastDecision ?? "-"}`, "magenta");
      if (brain.learningMessage) surface.center(5, brain.learningMessage, "orange");

      const lumiColour: Colour = brain.thinking && brain.emotion === "neutral" ? "yellow" : EMOTION_COLOURS[brain.emotion];
      surface.print(7, 10, FACES[brain.emotion], lumiColour);
      surface.print(8, 12, "LUMI", "white");
      surface.print(7, 30, SHAPES[game.current.shape], game.current.colour);

      if (game.choosingAction) {
        surface.center(10, "What should Lumi have done?", "white");
        surface.center(11, "[1] pick_up_red   [2] pick_up_blue   [3] ignore_object", "white");
      } else if (game.waitingForFeedback) {
        surface.center(10, "Was Lumi's decision correct?", "white");
        surface.center(11, "[C] Correct   [W] Wrong", "white");
      } else {
        surface.center(11, "[N] Next Round", "yellow");
      }
    } else {
      surface.center(4, "Game Complete!", "green");
      surface.center(5, `Final Score: ${brain.score}/${brain.roundsPlayed}`, "magenta");
      if (brain.roundsPlayed > 0) {
        surface.center(6, `Lumi's Learning Accuracy: ${(brain.accuracy() * 100).toFixed(1)}%`, "white");
      }
      surface.center(7, "You taught Lumi how to think like AI!", "orange");
    }

    surface.print(13, 2, "Lumi's AI Brain (Rules)", "magenta");
    [...brain.rules].slice(0, BRAIN_ROWS).forEach(([condition, action], i) => {
      surface.print(14 + i, 4, `If '${condition}' -> do '${action}'`, "white");
    });

    const col = Math.max(50, surface.width - 28);
    surface.print(13, col, `Round: ${game.currentRound}/${MAX_ROUNDS}`, "white");
    surface.print(14, col, `Score: ${brain.score}/${brain.roundsPlayed}`, "white");
    if (brain.roundsPlayed > 0) {
      surface.print(15, col, `Accuracy: ${(brain.accuracy() * 100).toFixed(1)}%`, "white");
    }
  }
}
