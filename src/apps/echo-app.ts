/**
 * echo-app.ts — Every utterance is shown, upper-cased, in a browser page.
 *
 * The session is normally created with `reopen`, so each utterance gets a
 * fresh window. "close browser" closes the current one.
 */

import type { Surface } from "../lib/render-loop.ts";
import type { HandlerResult } from "../lib/command-dispatcher.ts";
import type { BrowserSession } from "../lib/browser-session.ts";
import { VoiceScene } from "./voice-scene.ts";
import type { VoiceSceneDeps } from "./voice-scene.ts";

export interface EchoDeps extends VoiceSceneDeps {
  session: BrowserSession;
}

export class EchoApp extends VoiceScene {
  private readonly session: BrowserSession;
  private lastSpeech = "No speech detected yet.";

  constructor(deps: EchoDeps) {
    super(deps);
    this.session = deps.session;
  }

  protected onCommand(text: string): HandlerResult {
    this.lastSpeech = text;
    if (text.includes("close browser")) return this.session.close();
    return this.session.display(text.toUpperCase());
  }

  override async close(): Promise<void> {
    await super.close();
    if (this.session.isOpen()) await this.session.close();
  }

  getLastSpeech(): string {
    return this.lastSpeech;
  }

  draw(surface: Surface) {
    surface.center(0, "Voice Echo", "green");
    surface.print(2, 2, "Last Spoken:", "white");
    surface.print(3, 4, this.lastSpeech.toUpperCase(), "blue");
    surface.print(5, 2, "Listener Status:", "white");
    surface.print(6, 4, this.dispatcher.mirror.lastStatus || this.listenerLine(), "gray");

    surface.print(8, 2, "How it works:", "white");
    surface.print(9, 4, "- Speak anything, and it will appear in a browser window.", "gray");
    surface.print(10, 4, "- Say 'Close Browser' to close the last opened browser window.", "gray");
    surface.print(11, 4, "- Say 'Exit' or 'Quit' or 'Close Game' to stop this app.", "gray");

    surface.print(13, 2, "Activity Log:", "white");
    this.drawStatus(surface, 14, Math.max(0, surface.height - 15));
  }
}
