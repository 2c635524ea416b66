/**
 * browser-target.ts — Parse "… in chrome" style suffixes and website names
 * out of a recognized command.
 */

import type { BrowserTarget } from "./voice-types.ts";

/** Checked in this order; only the first suffix found is removed. */
export const BROWSER_SUFFIXES: ReadonlyArray<readonly [string, BrowserTarget]> = [
  ["in chrome", "chrome"],
  ["in firefox", "firefox"],
  ["in edge", "edge"],
  ["in default", "default"],
];

export const BROWSER_LABELS: Record<BrowserTarget, string> = {
  chrome: "Chrome",
  firefox: "Firefox",
  edge: "Edge",
  default: "default browser",
};

export interface TargetedCommand {
  command: string;
  target: BrowserTarget | null;
}

export function splitBrowserTarget(text: string): TargetedCommand {
  for (const [suffix, target] of BROWSER_SUFFIXES) {
    if (text.includes(suffix)) {
      return { command: text.replaceAll(suffix, "").trim(), target };
    }
  }
  return { command: text, target: null };
}

/** Add https:// unless the address already names http or https. */
export function normalizeUrl(raw: string): string {
  return /^https?:\/\//.test(raw) ? raw : `https://${raw}`;
}

/** First word after `phrase`, as a URL; null when nothing follows. */
export function websiteAfter(command: string, phrase: string): string | null {
  const at = command.indexOf(phrase);
  if (at < 0) return null;
  const rest = command.slice(at + phrase.length).trim();
  if (!rest) return null;
  return normalizeUrl(rest.split(" ")[0]);
}
