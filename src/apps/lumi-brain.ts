/**
 * lumi-brain.ts — Rule table for the Lumi teaching toy.
 *
 * makeDecision() walks the rules in insertion order and uses the first one
 * whose condition is a substring of the scenario's condition; with no match
 * Lumi guesses. Feedback either scores a point (rules untouched) or rewrites
 * the rule that produced the wrong decision. When no rule produced it, the
 * exact condition is added as a new rule, so the table only grows.
 */

import { createLogger } from "../lib/log.ts";

const log = createLogger("lumi");

export const LUMI_ACTIONS = ["pick_up_red", "pick_up_blue", "ignore_object"] as const;
export type LumiAction = (typeof LUMI_ACTIONS)[number];

export type Feedback = "correct" | "incorrect";
export type Emotion = "neutral" | "happy" | "sad";

export const STARTING_RULES: ReadonlyArray<readonly [string, LumiAction]> = [
  ["red_ball", "pick_up_red"],
  ["blue_ball", "pick_up_blue"],
  ["shiny_object", "ignore_object"],
];

export class LumiBrain {
  readonly rules: Map<string, LumiAction> = new Map(STARTING_RULES);
  score = 0;
  roundsPlayed = 0;
  lastDecision: LumiAction | null = null;
  learningMessage = "";
  emotion: Emotion = "neutral";
  thinking = false;

  constructor(private readonly random: () => number = Math.random) {}

  makeDecision(condition: string): LumiAction {
    this.thinking = true;
    for (const [ruleCondition, action] of this.rules) {
      if (condition.includes(ruleCondition)) {
        log.debug("rule matched", { rule: ruleCondition, action });
        this.lastDecision = action;
        return action;
      }
    }
    const guess = LUMI_ACTIONS[Math.floor(this.random() * LUMI_ACTIONS.length)];
    log.debug("no rule, guessing", { condition, guess });
    this.lastDecision = guess;
    return guess;
  }

  learnFromFeedback(condition: string, feedback: Feedback, correctAction?: LumiAction) {
    this.thinking = false;
    if (feedback === "correct") {
      this.score += 1;
      this.emotion = "happy";
      this.learningMessage = "Great! I was right!";
    } else if (correctAction) {
      this.emotion = "sad";
      this.learningMessage = `Oops! I should '${correctAction}' for '${condition}'`;
      this.teach(condition, correctAction);
    }
    this.roundsPlayed += 1;
  }

  /** Share of rounds Lumi got right, 0 before the first round. */
  accuracy(): number {
    return this.roundsPlayed > 0 ? this.score / this.roundsPlayed : 0;
  }

  /** Clear the per-round mood before a new decision. */
  resetMood() {
    this.emotion = "neutral";
    this.learningMessage = "";
  }

  private teach(condition: string, correctAction: LumiAction) {
    for (const [ruleCondition, action] of this.rules) {
      if (condition.includes(ruleCondition) && action === this.lastDecision) {
        log.info("updating rule", { rule: ruleCondition, action: correctAction });
        this.rules.set(ruleCondition, correctAction);
        return;
      }
    }
    log.info("adding rule", { rule: condition, action: correctAction });
    this.rules.set(condition, correctAction);
  }
}
