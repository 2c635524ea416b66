/**
 * system-browser.ts — Hand a URL to a desktop browser via the `open` package.
 */

import open, { apps } from "open";
import type { BrowserTarget } from "./voice-types.ts";

export interface SystemBrowser {
  /** null or "default" means the OS default browser. */
  open(url: string, target: BrowserTarget | null): Promise<void>;
}

const APP_NAMES: Record<Exclude<BrowserTarget, "default">, string | readonly string[]> = {
  chrome: apps.chrome,
  firefox: apps.firefox,
  edge: apps.edge,
};

export class DesktopBrowser implements SystemBrowser {
  async open(url: string, target: BrowserTarget | null): Promise<void> {
    if (!target || target === "default") {
      await open(url);
      return;
    }
    await open(url, { app: { name: APP_NAMES[target] } });
  }
}
