import { describe, it, expect } from "vitest";
import { LumiBrain, STARTING_RULES } from "../lumi-brain.ts";
import { LumiGame, MAX_ROUNDS, SCENARIOS, shuffle } from "../lumi-game.ts";
import type { Scenario } from "../lumi-game.ts";
import { LumiApp } from "../lumi-app.ts";
import type { InputEvent } from "../../lib/render-loop.ts";

// floor(0.999 * n) is always the last index: shuffle keeps order, guesses pick "ignore_object"
const KEEP_ORDER = () => 0.999;

describe("LumiBrain", () => {
  it("decides by the first matching rule", () => {
    const brain = new LumiBrain();
    expect(brain.makeDecision("red_ball")).toBe("pick_up_red");
    expect(brain.makeDecision("big_blue_ball")).toBe("pick_up_blue");
    expect(brain.lastDecision).toBe("pick_up_blue");
    expect(brain.thinking).toBe(true);
  });

  it("guesses when no rule matches", () => {
    expect(new LumiBrain(() => 0).makeDecision("green_sphere")).toBe("pick_up_red");
    expect(new LumiBrain(KEEP_ORDER).makeDecision("green_sphere")).toBe("ignore_object");
  });

  it("correct feedback scores without touching the rules", () => {
    const brain = new LumiBrain();
    brain.makeDecision("red_ball");
    brain.learnFromFeedback("red_ball", "correct");
    expect(brain.score).toBe(1);
    expect(brain.roundsPlayed).toBe(1);
    expect(brain.emotion).toBe("happy");
    expect(brain.learningMessage).toBe("Great! I was right!");
    expect([...brain.rules]).toEqual(STARTING_RULES.map(([c, a]) => [c, a]));
  });

  it("wrong feedback rewrites the rule that decided", () => {
    const brain = new LumiBrain();
    brain.makeDecision("blue_ball");
    brain.learnFromFeedback("blue_ball", "incorrect", "ignore_object");
    expect(brain.rules.get("blue_ball")).toBe("ignore_object");
    expect(brain.rules.size).toBe(3);
    expect(brain.emotion).toBe("sad");
    expect(brain.learningMessage).toBe("Oops! I should 'ignore_object' for 'blue_ball'");
  });

  it("wrong feedback on a new condition adds a rule", () => {
    const brain = new LumiBrain(() => 0);
    brain.makeDecision("red_square");
    brain.learnFromFeedback("red_square", "incorrect", "ignore_object");
    expect(brain.rules.size).toBe(4);
    expect(brain.makeDecision("red_square")).toBe("ignore_object");
  });

  it("accuracy is score over rounds", () => {
    const brain = new LumiBrain();
    expect(brain.accuracy()).toBe(0);
    brain.learnFromFeedback("red_ball", "correct");
    brain.learnFromFeedback("blue_ball", "incorrect");
    expect(brain.accuracy()).toBe(0.5);
  });

  it("resetMood() clears the emotion and message", () => {
    const brain = new LumiBrain();
    brain.learnFromFeedback("red_ball", "correct");
    brain.resetMood();
    expect(brain.emotion).toBe("neutral");
    expect(brain.learningMessage).toBe("");
  });
});

describe("shuffle", () => {
  it("returns a new array with the same items", () => {
    const items = [1, 2, 3, 4];
    const out = shuffle(items, () => 0);
    expect(out).toEqual([2, 3, 4, 1]);
    expect(items).toEqual([1, 2, 3, 4]);
  });
});

describe("LumiGame", () => {
  it("opens on round one waiting for feedback", () => {
    const game = new LumiGame(KEEP_ORDER);
    expect(game.currentRound).toBe(1);
    expect(game.current?.condition).toBe("red_ball");
    expect(game.waitingForFeedback).toBe(true);
    expect(game.brain.lastDecision).toBe("pick_up_red");
  });

  it("ignores 'next' until feedback is given", () => {
    const game = new LumiGame(KEEP_ORDER);
    game.nextRound();
    expect(game.currentRound).toBe(1);
    game.markCorrect();
    game.nextRound();
    expect(game.currentRound).toBe(2);
    expect(game.current?.condition).toBe("blue_ball");
  });

  it("wrong needs an action before the round is done", () => {
    const game = new LumiGame(KEEP_ORDER);
    game.markWrong();
    expect(game.choosingAction).toBe(true);
    expect(game.waitingForFeedback).toBe(true);
    game.chooseAction("ignore_object");
    expect(game.choosingAction).toBe(false);
    expect(game.waitingForFeedback).toBe(false);
    expect(game.brain.rules.get("red_ball")).toBe("ignore_object");
  });

  it("an action without a wrong mark is ignored", () => {
    const game = new LumiGame(KEEP_ORDER);
    game.chooseAction("ignore_object");
    expect(game.brain.roundsPlayed).toBe(0);
  });

  it("ends when the scenarios run out", () => {
    const game = new LumiGame(KEEP_ORDER);
    for (let i = 0; i < SCENARIOS.length; i++) {
      game.markCorrect();
      game.nextRound();
    }
    expect(game.gameOver).toBe(true);
    expect(game.currentRound).toBe(SCENARIOS.length);
    expect(game.brain.roundsPlayed).toBe(SCENARIOS.length);
  });

  it("ends after the round limit", () => {
    const many: Scenario[] = Array.from({ length: MAX_ROUNDS + 3 }, (_, i): Scenario => ({
      description: `Lumi sees thing ${i}`,
      condition: `thing_${i}`,
      correctAction: "ignore_object",
      colour: "white",
      shape: "square",
    }));
    const game = new LumiGame(KEEP_ORDER, many);
    while (!game.gameOver) {
      game.markCorrect();
      game.nextRound();
    }
    expect(game.currentRound).toBe(MAX_ROUNDS);
  });
});

describe("LumiApp", () => {
  const key = (name: string): InputEvent => ({ type: "key", name, sequence: name, ctrl: false });

  it("maps keys to feedback", () => {
    const app = new LumiApp(new LumiGame(KEEP_ORDER));
    app.handleEvent(key("w"));
    app.handleEvent(key("2"));
    expect(app.game.brain.rules.get("red_ball")).toBe("pick_up_blue");
    app.handleEvent(key("n"));
    expect(app.game.currentRound).toBe(2);
    app.handleEvent(key("c"));
    expect(app.game.brain.score).toBe(1);
  });

  it("escape quits", () => {
    const app = new LumiApp(new LumiGame(KEEP_ORDER));
    app.handleEvent(key("escape"));
    expect(app.isRunning()).toBe(false);
  });
});
