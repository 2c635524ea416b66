/**
 * launcher-app.ts — Voice browser launcher.
 *
 * "open google in chrome", "open website example.com", "display what i said",
 * "close browser". A trailing "in chrome|firefox|edge|default" picks the
 * browser and is removed before the table is consulted.
 *
 * With a BrowserSession (automation on) pages open in the automated window,
 * except for "in default" which always goes to the system browser.
 */

import type { Surface } from "../lib/render-loop.ts";
import type { HandlerResult } from "../lib/command-dispatcher.ts";
import type { SystemBrowser } from "../lib/system-browser.ts";
import type { BrowserSession } from "../lib/browser-session.ts";
import type { BrowserTarget, MatchStrategy } from "../lib/voice-types.ts";
import { CommandTable } from "../lib/command-table.ts";
import type { CommandRule } from "../lib/command-table.ts";
import { BROWSER_LABELS, splitBrowserTarget, websiteAfter } from "../lib/browser-target.ts";
import { describeError } from "../lib/speech-errors.ts";
import { VoiceScene } from "./voice-scene.ts";
import type { VoiceSceneDeps } from "./voice-scene.ts";

export type LauncherAction =
  | { kind: "open"; url: string }
  | { kind: "website" }
  | { kind: "display" }
  | { kind: "close" };

export function launcherRules(githubUrl: string): CommandRule<LauncherAction>[] {
  return [
    { id: "google", phrases: ["open google"], action: { kind: "open", url: "https://www.google.com" } },
    { id: "youtube", phrases: ["open youtube"], action: { kind: "open", url: "https://www.youtube.com" } },
    { id: "wikipedia", phrases: ["open wikipedia"], action: { kind: "open", url: "https://www.wikipedia.org" } },
    { id: "github", phrases: ["open my github"], action: { kind: "open", url: githubUrl } },
    { id: "website", phrases: ["open website"], action: { kind: "website" } },
    { id: "display", phrases: ["display what i said", "show last command"], action: { kind: "display" } },
    { id: "close", phrases: ["close browser"], action: { kind: "close" } },
  ];
}

export interface LauncherDeps extends VoiceSceneDeps {
  system: SystemBrowser;
  /** null when browser automation is off. */
  session: BrowserSession | null;
  githubUrl: string;
  matchStrategy?: MatchStrategy;
}

export class LauncherApp extends VoiceScene {
  private readonly table: CommandTable<LauncherAction>;
  private readonly system: SystemBrowser;
  private readonly session: BrowserSession | null;
  private lastCommand: string | null = null;

  constructor(deps: LauncherDeps) {
    super(deps, {
      hint: deps.session ? "Try 'Open Google in Chrome' or 'Display what I said'." : "Try 'open Google in Chrome' or 'exit'.",
    });
    this.table = new CommandTable(launcherRules(deps.githubUrl), deps.matchStrategy);
    this.system = deps.system;
    this.session = deps.session;
  }

  protected onCommand(text: string): HandlerResult {
    const previous = this.lastCommand;
    this.lastCommand = text;

    const { command, target } = splitBrowserTarget(text);
    const match = this.table.match(command);
    if (!match) return false;

    const action = match.rule.action;
    switch (action.kind) {
      case "open":
        return this.openUrl(action.url, target);
      case "website": {
        const url = websiteAfter(command, match.phrase);
        if (!url) {
          this.status.add("ERROR: No specific URL provided with 'open website'.");
          this.status.add("INFO: Try 'open website example.com'.");
          return true;
        }
        return this.openUrl(url, target);
      }
      case "display":
        return this.displayPrevious(previous);
      case "close":
        if (!this.session) {
          this.status.add("INFO: No browser is currently open.");
          return true;
        }
        return this.session.close();
    }
  }

  override async close(): Promise<void> {
    await super.close();
    if (this.session?.isOpen()) await this.session.close();
  }

  private openUrl(url: string, target: BrowserTarget | null): HandlerResult {
    if (this.session && target !== "default") {
      return this.session.navigate(url, target ?? undefined);
    }
    const label = BROWSER_LABELS[target ?? "default"];
    this.status.add(`ACTION: Opening ${url} in ${label}...`);
    return this.system.open(url, target).catch((err: unknown) => {
      this.status.add(`ERROR: Could not open browser '${target ?? "default"}': ${describeError(err)}`);
      this.status.add("INFO: Make sure the browser is installed.");
    });
  }

  private displayPrevious(previous: string | null): HandlerResult {
    if (!this.session) {
      this.status.add("ERROR: Displaying text needs browser automation (BROWSER_AUTOMATION=true).");
      return true;
    }
    if (!previous) {
      this.status.add("INFO: Nothing to display yet.");
      return true;
    }
    return this.session.display(previous.toUpperCase());
  }

  draw(surface: Surface) {
    surface.print(0, 2, "Voice Browser Launcher", "green");
    surface.print(1, 2, `Listener: ${this.listenerLine()}`, "gray");
    surface.print(3, 2, "Last command:", "white");
    surface.print(3, 16, this.lastCommand ? this.lastCommand.toUpperCase() : "-", "cyan");

    const help = [
      "Say: 'open google in chrome', 'open youtube', 'open wikipedia', 'open my github'",
      "     'open website example.com', 'display what i said', 'close browser', 'exit'",
    ];
    help.forEach((line, i) => surface.print(5 + i, 2, line, "gray"));

    surface.print(8, 2, "Activity Log:", "white");
    this.drawStatus(surface, 9, Math.max(0, surface.height - 10));
  }
}
