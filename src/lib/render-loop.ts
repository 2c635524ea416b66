/**
 * render-loop.ts — Fixed-rate frame loop shared by every demo.
 *
 * Each tick: poll input → scene.handleEvent, scene.update(dtMs), clear the
 * surface, scene.draw, flip. The loop sleeps off the rest of the frame and
 * ends when the scene stops running or stop() is called.
 */

import { setTimeout as sleep } from "node:timers/promises";

export type Colour =
  | "white"
  | "gray"
  | "red"
  | "green"
  | "blue"
  | "yellow"
  | "cyan"
  | "magenta"
  | "orange"
  | "pink";

export type InputEvent =
  | { type: "key"; name: string; sequence: string; ctrl: boolean }
  | { type: "quit" };

/** Character-cell drawing target. Rows and columns are 0-based. */
export interface Surface {
  readonly width: number;
  readonly height: number;
  clear(): void;
  print(row: number, col: number, text: string, colour?: Colour): void;
  /** Print centred on the row. */
  center(row: number, text: string, colour?: Colour): void;
  flip(): void;
}

export interface InputSource {
  /** Everything typed since the last poll. */
  poll(): InputEvent[];
}

export interface Scene {
  enter?(): void;
  exit?(): void;
  handleEvent(event: InputEvent): void;
  update(dtMs: number): void;
  draw(surface: Surface): void;
  isRunning(): boolean;
}

export interface RenderLoopOptions {
  fps?: number;
  now?: () => number;
}

export const DEFAULT_FPS = 30;

export class RenderLoop {
  private running = false;
  private readonly frameMs: number;
  private readonly now: () => number;

  constructor(
    private readonly scene: Scene,
    private readonly surface: Surface,
    private readonly input: InputSource,
    opts: RenderLoopOptions = {},
  ) {
    this.frameMs = 1000 / Math.max(1, opts.fps ?? DEFAULT_FPS);
    this.now = opts.now ?? (() => performance.now());
  }

  async run(): Promise<void> {
    this.running = true;
    this.scene.enter?.();
    let last = this.now();
    try {
      while (this.running && this.scene.isRunning()) {
        const start = this.now();
        this.tick(start - last);
        last = start;
        await sleep(Math.max(0, this.frameMs - (this.now() - start)));
      }
    } finally {
      this.running = false;
      this.scene.exit?.();
    }
  }

  stop() {
    this.running = false;
  }

  /** One frame. Exposed so scenes can be stepped without timers. */
  tick(dtMs: number) {
    for (const event of this.input.poll()) this.scene.handleEvent(event);
    this.scene.update(dtMs);
    this.surface.clear();
    this.scene.draw(this.surface);
    this.surface.flip();
  }
}
