/**
 * adventure-app.ts — Voice command adventure with a menu state machine.
 *
 * States: MAIN_MENU → PLAYING ⇄ PAUSED, MAIN_MENU ⇄ INSTRUCTIONS,
 *         PLAYING → GAME_OVER ("give up") → PLAYING | MAIN_MENU
 *
 * Each state has its own phrase table; speech is matched only against the
 * table of the current state. Keyboard shortcuts mirror the voice commands.
 */

import type { Surface } from "../lib/render-loop.ts";
import type { HandlerResult } from "../lib/command-dispatcher.ts";
import type { MatchStrategy } from "../lib/voice-types.ts";
import { CommandTable } from "../lib/command-table.ts";
import type { CommandRule } from "../lib/command-table.ts";
import { VoiceScene } from "./voice-scene.ts";
import type { KeyEvent, VoiceSceneDeps } from "./voice-scene.ts";

export type GameState = "MAIN_MENU" | "PLAYING" | "PAUSED" | "INSTRUCTIONS" | "GAME_OVER";

export type AdventureAction =
  | { kind: "goto"; state: GameState; message: string }
  | { kind: "restart" }
  | { kind: "move" }
  | { kind: "attack" }
  | { kind: "health" };

export const ADVENTURE_EXIT_PHRASES = ["exit", "quit", "close game", "shutdown"];

export const ATTACK_SCORE = 10;

export const STATE_RULES: Record<GameState, CommandRule<AdventureAction>[]> = {
  MAIN_MENU: [
    { id: "start", phrases: ["start game", "play"], action: { kind: "goto", state: "PLAYING", message: "ACTION: Starting game!" } },
    {
      id: "instructions",
      phrases: ["instructions", "how to play"],
      action: { kind: "goto", state: "INSTRUCTIONS", message: "ACTION: Showing instructions." },
    },
  ],
  PLAYING: [
    { id: "move", phrases: ["move forward", "go ahead"], action: { kind: "move" } },
    { id: "attack", phrases: ["attack", "fight"], action: { kind: "attack" } },
    { id: "health", phrases: ["check health", "my health"], action: { kind: "health" } },
    { id: "pause", phrases: ["pause"], action: { kind: "goto", state: "PAUSED", message: "ACTION: Game paused." } },
    { id: "give-up", phrases: ["give up"], action: { kind: "goto", state: "GAME_OVER", message: "ACTION: Game over." } },
  ],
  PAUSED: [
    { id: "resume", phrases: ["resume", "continue"], action: { kind: "goto", state: "PLAYING", message: "ACTION: Resuming game." } },
    { id: "menu", phrases: ["main menu"], action: { kind: "goto", state: "MAIN_MENU", message: "ACTION: Returning to main menu." } },
  ],
  INSTRUCTIONS: [
    {
      id: "back",
      phrases: ["back", "main menu"],
      action: { kind: "goto", state: "MAIN_MENU", message: "ACTION: Returning to main menu from instructions." },
    },
  ],
  GAME_OVER: [
    { id: "restart", phrases: ["restart", "play again"], action: { kind: "restart" } },
    {
      id: "menu",
      phrases: ["main menu"],
      action: { kind: "goto", state: "MAIN_MENU", message: "ACTION: Returning to main menu from game over." },
    },
  ],
};

const INSTRUCTIONS = [
  "Welcome to Voice Command Adventure!",
  "",
  "Your voice is your controller. Speak clearly!",
  "",
  "In Game:",
  "  - Say 'Move Forward' or 'Attack' to play.",
  "  - Say 'Check Health' to know your status.",
  "  - Say 'Pause' to temporarily stop the game, 'Give Up' to end it.",
  "",
  "In Pause Menu:",
  "  - Say 'Resume' to continue, 'Main Menu' to return to the start.",
  "",
  "Anytime: say 'Exit', 'Quit' or 'Close Game' to close the application.",
  "",
  "Say 'Back' or 'Main Menu' to return.",
];

export interface AdventureDeps extends VoiceSceneDeps {
  matchStrategy?: MatchStrategy;
}

export class AdventureApp extends VoiceScene {
  state: GameState = "MAIN_MENU";
  health = 100;
  score = 0;
  level = 1;
  lastSpoken = "No speech detected yet.";
  private readonly tables: Record<GameState, CommandTable<AdventureAction>>;

  constructor(deps: AdventureDeps) {
    super(deps, { exitPhrases: ADVENTURE_EXIT_PHRASES });
    const strategy = deps.matchStrategy;
    this.tables = {
      MAIN_MENU: new CommandTable(STATE_RULES.MAIN_MENU, strategy),
      PLAYING: new CommandTable(STATE_RULES.PLAYING, strategy),
      PAUSED: new CommandTable(STATE_RULES.PAUSED, strategy),
      INSTRUCTIONS: new CommandTable(STATE_RULES.INSTRUCTIONS, strategy),
      GAME_OVER: new CommandTable(STATE_RULES.GAME_OVER, strategy),
    };
  }

  protected onCommand(text: string): HandlerResult {
    this.lastSpoken = text.toUpperCase();
    const match = this.tables[this.state].match(text);
    if (!match) {
      // The menu stays quiet; in-game states say what they did not understand
      if (this.state === "MAIN_MENU") return false;
      this.status.add(`GAME: Unrecognized command in ${this.state} state: '${text}'`);
      return true;
    }

    const action = match.rule.action;
    switch (action.kind) {
      case "goto":
        this.status.add(action.message);
        this.state = action.state;
        break;
      case "restart":
        this.status.add("ACTION: Restarting game.");
        this.reset();
        this.state = "PLAYING";
        break;
      case "move":
        this.status.add("GAME: Player moved forward.");
        break;
      case "attack":
        this.status.add("GAME: Player attacked!");
        this.score += ATTACK_SCORE;
        break;
      case "health":
        this.status.add(`GAME: Your current health is ${this.health}.`);
        break;
    }
    return true;
  }

  reset() {
    this.health = 100;
    this.score = 0;
    this.level = 1;
    this.status.add("GAME: Game state reset.");
  }

  protected override onKey(event: KeyEvent) {
    switch (event.name) {
      case "escape":
        this.stop();
        break;
      case "p":
        if (this.state === "PLAYING") this.keyTo("PAUSED", "Game paused.");
        break;
      case "r":
        if (this.state === "PAUSED") this.keyTo("PLAYING", "Resuming game.");
        break;
      case "m":
        if (this.state === "PAUSED" || this.state === "GAME_OVER" || this.state === "INSTRUCTIONS") {
          this.keyTo("MAIN_MENU", "Returning to main menu.");
        }
        break;
      case "s":
        if (this.state === "MAIN_MENU") this.keyTo("PLAYING", "Starting game.");
        break;
      case "i":
        if (this.state === "MAIN_MENU") this.keyTo("INSTRUCTIONS", "Showing instructions.");
        break;
      case "space":
        if (this.state === "GAME_OVER") {
          this.status.add("ACTION: Keyboard - Restarting game.");
          this.reset();
          this.state = "PLAYING";
        }
        break;
    }
  }

  private keyTo(state: GameState, what: string) {
    this.status.add(`ACTION: Keyboard - ${what}`);
    this.state = state;
  }

  draw(surface: Surface) {
    switch (this.state) {
      case "MAIN_MENU":
        surface.center(2, "Voice Command Adventure", "green");
        surface.center(5, "[ START GAME ]  say 'Start Game' or press S", "white");
        surface.center(7, "[ INSTRUCTIONS ]  say 'Instructions' or press I", "white");
        surface.center(9, "[ EXIT ]  say 'Exit' or press Esc", "red");
        break;
      case "PLAYING":
        this.drawGame(surface);
        break;
      case "PAUSED":
        this.drawGame(surface);
        surface.center(9, "PAUSED", "white");
        surface.center(10, "Say 'Resume' to continue (R)", "gray");
        surface.center(11, "Say 'Main Menu' to go back (M)", "gray");
        break;
      case "INSTRUCTIONS":
        surface.center(0, "Instructions", "green");
        INSTRUCTIONS.forEach((line, i) => surface.print(2 + i, 4, line, "gray"));
        break;
      case "GAME_OVER":
        surface.center(3, "GAME OVER!", "red");
        surface.center(5, `Final Score: ${this.score}`, "white");
        surface.center(7, "Say 'Restart' to play again (Space)", "gray");
        surface.center(8, "Say 'Main Menu' to go back (M)", "gray");
        break;
    }

    const top = Math.max(0, surface.height - 8);
    surface.print(top - 2, 2, `Last Spoken: ${this.lastSpoken}`, "green");
    surface.print(top - 1, 2, `Listener: ${this.listenerLine()}`, "gray");
    this.drawStatus(surface, top, 8);
  }

  private drawGame(surface: Surface) {
    surface.print(1, 2, `Health: ${this.health}`, "white");
    surface.print(2, 2, `Score: ${this.score}`, "white");
    surface.print(3, 2, `Level: ${this.level}`, "white");
    surface.center(5, "ADVENTURE AWAITS!", "green");
    surface.center(6, "Speak commands like 'MOVE FORWARD', 'ATTACK', 'PAUSE'", "gray");
  }
}
