/**
 * status-log.ts — Bounded on-screen log of timestamped status lines.
 *
 * Lines are stored as "[HH:MM:SS] <line>" and tagged with a tone taken from
 * the line's prefix (ERROR:/FATAL_ERROR:, ACTION:/GAME:, YOU SAID:, WARNING:).
 * Subscribers are notified after every add() and clear().
 */

import type { LineTone, StatusEntry } from "./voice-types.ts";

export const DEFAULT_MAX_STATUS = 15;

export function toneOf(line: string): LineTone {
  if (line.startsWith("ERROR:") || line.startsWith("FATAL_ERROR:")) return "error";
  if (line.startsWith("ACTION:") || line.startsWith("GAME:")) return "action";
  if (line.startsWith("YOU SAID:")) return "heard";
  if (line.startsWith("WARNING:")) return "warning";
  return "plain";
}

export function clockTime(epochMs: number): string {
  const d = new Date(epochMs);
  const pad = (n: number) => n.toString().padStart(2, "0");
  return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

export class StatusLog {
  private entries: StatusEntry[] = [];
  private nextId = 1;
  private listeners: Set<() => void> = new Set();

  constructor(
    private readonly maxEntries = DEFAULT_MAX_STATUS,
    private readonly now: () => number = Date.now,
  ) {}

  add(line: string): StatusEntry {
    const timestampMs = this.now();
    const entry: StatusEntry = {
      id: this.nextId++,
      line: `[${clockTime(timestampMs)}] ${line}`,
      tone: toneOf(line),
      timestampMs,
    };
    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries = this.entries.slice(-this.maxEntries);
    }
    this.notify();
    return entry;
  }

  getAll(): StatusEntry[] {
    return [...this.entries];
  }

  /** Just the formatted lines, oldest first. */
  lines(): string[] {
    return this.entries.map((e) => e.line);
  }

  clear() {
    this.entries = [];
    this.notify();
  }

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private notify() {
    for (const l of this.listeners) l();
  }
}
