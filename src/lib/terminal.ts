/**
 * terminal.ts — ANSI text surface and raw-mode keyboard input.
 *
 * TextGrid records print() calls for one frame; TerminalSurface paints them
 * to stdout on flip(). TerminalInput turns readline keypress events into
 * InputEvents that the render loop polls.
 */

import * as readline from "node:readline";
import type { Colour, InputEvent, InputSource, Surface } from "./render-loop.ts";
import type { LineTone } from "./voice-types.ts";

const ESC = "\x1b[";
const RESET = `${ESC}0m`;

const ANSI_COLOURS: Record<Colour, string> = {
  white: `${ESC}97m`,
  gray: `${ESC}90m`,
  red: `${ESC}91m`,
  green: `${ESC}92m`,
  blue: `${ESC}94m`,
  yellow: `${ESC}93m`,
  cyan: `${ESC}96m`,
  magenta: `${ESC}95m`,
  orange: `${ESC}38;5;208m`,
  pink: `${ESC}38;5;218m`,
};

export const TONE_COLOURS: Record<LineTone, Colour> = {
  plain: "white",
  error: "red",
  action: "blue",
  heard: "green",
  warning: "orange",
};

interface PrintOp {
  row: number;
  col: number;
  text: string;
  colour: Colour;
}

export class TextGrid implements Surface {
  protected ops: PrintOp[] = [];

  constructor(
    readonly width = 80,
    readonly height = 24,
  ) {}

  clear() {
    this.ops = [];
  }

  print(row: number, col: number, text: string, colour: Colour = "white") {
    if (row < 0 || row >= this.height || col >= this.width) return;
    const start = Math.max(0, col);
    const clipped = text.slice(start - col, start - col + this.width - start);
    if (clipped) this.ops.push({ row, col: start, text: clipped, colour });
  }

  center(row: number, text: string, colour?: Colour) {
    this.print(row, Math.max(0, Math.floor((this.width - text.length) / 2)), text, colour);
  }

  flip() {}

  /** The frame as plain text rows, trailing spaces trimmed. */
  rows(): string[] {
    const grid = Array.from({ length: this.height }, () => " ".repeat(this.width));
    for (const op of this.ops) {
      const line = grid[op.row];
      grid[op.row] = line.slice(0, op.col) + op.text + line.slice(op.col + op.text.length);
    }
    return grid.map((r) => r.trimEnd());
  }

  /** Colours used on a row, in print order. */
  coloursAt(row: number): Colour[] {
    return this.ops.filter((op) => op.row === row).map((op) => op.colour);
  }

  protected renderAnsi(): string {
    return this.ops
      .map((op) => `${ESC}${op.row + 1};${op.col + 1}H${ANSI_COLOURS[op.colour]}${op.text}${RESET}`)
      .join("");
  }
}

export class TerminalSurface extends TextGrid {
  constructor(private readonly out: NodeJS.WriteStream = process.stdout) {
    super(out.columns ?? 80, out.rows ?? 24);
  }

  /** Switch to the alternate screen and hide the cursor. */
  open() {
    this.out.write(`${ESC}?1049h${ESC}?25l`);
  }

  close() {
    this.out.write(`${RESET}${ESC}?25h${ESC}?1049l`);
  }

  override flip() {
    this.out.write(`${ESC}2J${ESC}H${this.renderAnsi()}`);
  }
}

export class TerminalInput implements InputSource {
  private events: InputEvent[] = [];
  private readonly onKeypress = (str: string | undefined, key: readline.Key | undefined) => {
    if (key?.ctrl && key.name === "c") {
      this.events.push({ type: "quit" });
      return;
    }
    const sequence = str ?? key?.sequence ?? "";
    this.events.push({ type: "key", name: key?.name ?? sequence, sequence, ctrl: key?.ctrl ?? false });
  };

  constructor(private readonly input: NodeJS.ReadStream = process.stdin) {}

  open() {
    readline.emitKeypressEvents(this.input);
    if (this.input.isTTY) this.input.setRawMode(true);
    this.input.on("keypress", this.onKeypress);
    this.input.resume();
  }

  close() {
    this.input.off("keypress", this.onKeypress);
    if (this.input.isTTY) this.input.setRawMode(false);
    this.input.pause();
  }

  poll(): InputEvent[] {
    const out = this.events;
    this.events = [];
    return out;
  }
}
