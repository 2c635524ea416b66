/**
 * command-table.ts — Ordered phrase → action rules.
 *
 * A rule matches when any of its phrases occurs as a substring of the
 * recognized text. With "first" the earliest matching rule wins even if a
 * later rule matched a longer phrase; "longest" prefers the longest matched
 * phrase and falls back to list order on ties.
 */

import type { MatchStrategy } from "./voice-types.ts";

export interface CommandRule<A> {
  id: string;
  phrases: readonly string[];
  action: A;
}

export interface CommandMatch<A> {
  rule: CommandRule<A>;
  phrase: string;
}

export class CommandTable<A> {
  private readonly rules: readonly CommandRule<A>[];

  constructor(rules: readonly CommandRule<A>[], private readonly strategy: MatchStrategy = "first") {
    this.rules = rules.map((r) => ({ ...r, phrases: r.phrases.map((p) => p.toLowerCase()) }));
  }

  match(text: string): CommandMatch<A> | null {
    const haystack = text.toLowerCase();
    let best: CommandMatch<A> | null = null;

    for (const rule of this.rules) {
      for (const phrase of rule.phrases) {
        if (!haystack.includes(phrase)) continue;
        if (this.strategy === "first") return { rule, phrase };
        if (!best || phrase.length > best.phrase.length) best = { rule, phrase };
      }
    }
    return best;
  }

  /** Every phrase, in table order (used for on-screen help). */
  phrases(): string[] {
    return this.rules.flatMap((r) => [...r.phrases]);
  }
}
