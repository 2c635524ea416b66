/**
 * lumi-game.ts — Round flow for the Lumi teaching toy.
 *
 * Each round: take the next scenario, let Lumi decide, wait for feedback
 * (correct, or wrong + the action Lumi should have taken), then wait for
 * "next". The game ends after MAX_ROUNDS or when the scenarios run out.
 */

import type { Colour } from "../lib/render-loop.ts";
import { LumiBrain } from "./lumi-brain.ts";
import type { LumiAction } from "./lumi-brain.ts";

export const MAX_ROUNDS = 7;

export interface Scenario {
  description: string;
  condition: string;
  correctAction: LumiAction;
  colour: Colour;
  shape: "ball" | "square" | "gem" | "coin";
}

export const SCENARIOS: readonly Scenario[] = [
  { description: "Lumi sees a bright red ball", condition: "red_ball", correctAction: "pick_up_red", colour: "red", shape: "ball" },
  { description: "Lumi sees a small blue ball", condition: "blue_ball", correctAction: "pick_up_blue", colour: "blue", shape: "ball" },
  {
    description: "Lumi sees a shimmering silver coin",
    condition: "shiny_object",
    correctAction: "ignore_object",
    colour: "white",
    shape: "coin",
  },
  { description: "Lumi sees a red square block", condition: "red_square", correctAction: "ignore_object", colour: "red", shape: "square" },
  { description: "Lumi sees a tiny blue gem", condition: "blue_gem", correctAction: "pick_up_blue", colour: "blue", shape: "gem" },
  {
    description: "Lumi sees a large green sphere",
    condition: "green_sphere",
    correctAction: "ignore_object",
    colour: "green",
    shape: "ball",
  },
];

/** Fisher–Yates shuffle into a new array. */
export function shuffle<T>(items: readonly T[], random: () => number = Math.random): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}

export class LumiGame {
  readonly brain: LumiBrain;
  currentRound = 0;
  current: Scenario | null = null;
  waitingForFeedback = false;
  choosingAction = false;
  gameOver = false;
  private remaining: Scenario[];

  constructor(random: () => number = Math.random, scenarios: readonly Scenario[] = SCENARIOS) {
    this.brain = new LumiBrain(random);
    this.remaining = shuffle(scenarios, random);
    this.nextRound();
  }

  /** Lumi was right. */
  markCorrect() {
    if (!this.current || !this.waitingForFeedback) return;
    this.brain.learnFromFeedback(this.current.condition, "correct");
    this.waitingForFeedback = false;
    this.choosingAction = false;
  }

  /** Lumi was wrong; the player now picks what it should have done. */
  markWrong() {
    if (this.waitingForFeedback) this.choosingAction = true;
  }

  chooseAction(action: LumiAction) {
    if (!this.current || !this.choosingAction) return;
    this.brain.learnFromFeedback(this.current.condition, "incorrect", action);
    this.choosingAction = false;
    this.waitingForFeedback = false;
  }

  /** Start the next round, or end the game. Ignored while feedback is pending. */
  nextRound() {
    if (this.waitingForFeedback || this.gameOver) return;
    const scenario = this.currentRound < MAX_ROUNDS ? this.remaining.shift() : undefined;
    if (!scenario) {
      this.gameOver = true;
      return;
    }
    this.currentRound += 1;
    this.current = scenario;
    this.brain.resetMood();
    this.brain.makeDecision(scenario.condition);
    this.waitingForFeedback = true;
  }
}
