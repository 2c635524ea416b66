/**
 * browser-session.ts — One automated browser window driven by Selenium.
 *
 * Used when BROWSER_AUTOMATION is on: the launcher navigates it and shows
 * the last command in it, the echo app shows every utterance in it.
 * All progress is reported as status lines through `report`; methods resolve
 * to false instead of throwing when the browser cannot be reached.
 *
 * With `reopen` set, display() closes the current window and launches a new
 * one first (one window per utterance).
 *
 * launch/navigate/display/close run one at a time in call order, so
 * overlapping commands never start two drivers for the same session.
 */

import webdriver from "selenium-webdriver";
import type { BrowserTarget } from "./voice-types.ts";
import { BROWSER_LABELS } from "./browser-target.ts";
import { describeError } from "./speech-errors.ts";

export type AutomatedBrowser = Exclude<BrowserTarget, "default">;

/** The part of a WebDriver this module uses. */
export interface PageDriver {
  get(url: string): Promise<void>;
  quit(): Promise<void>;
}

export type DriverFactory = (browser: AutomatedBrowser) => Promise<PageDriver>;

const SELENIUM_NAMES: Record<AutomatedBrowser, string> = {
  chrome: webdriver.Browser.CHROME,
  firefox: webdriver.Browser.FIREFOX,
  edge: webdriver.Browser.EDGE,
};

export const seleniumDriver: DriverFactory = async (browser) =>
  new webdriver.Builder().forBrowser(SELENIUM_NAMES[browser]).build();

const PAGE_STYLE =
  "body{font-family:sans-serif;background:#333;color:#93C572;display:flex;justify-content:center;" +
  "align-items:center;height:100vh;margin:0}h1{font-size:4em;text-align:center;max-width:90%;word-wrap:break-word}";

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/** A self-contained page showing `text` as a headline. */
export function textPageUrl(text: string, title = "Recognized Speech"): string {
  const html =
    `<!DOCTYPE html><html><head><meta charset="utf-8"><title>${escapeHtml(title)}</title>` +
    `<style>${PAGE_STYLE}</style></head><body><h1>&quot;${escapeHtml(text)}&quot;</h1></body></html>`;
  return `data:text/html;charset=utf-8,${encodeURIComponent(html)}`;
}

export interface BrowserSessionOptions {
  report: (line: string) => void;
  defaultBrowser?: AutomatedBrowser;
  reopen?: boolean;
  createDriver?: DriverFactory;
}

export class BrowserSession {
  private driver: PageDriver | null = null;
  private browser: AutomatedBrowser | null = null;
  private pending: Promise<unknown> = Promise.resolve();
  private readonly report: (line: string) => void;
  private readonly defaultBrowser: AutomatedBrowser;
  private readonly reopen: boolean;
  private readonly createDriver: DriverFactory;

  constructor(opts: BrowserSessionOptions) {
    this.report = opts.report;
    this.defaultBrowser = opts.defaultBrowser ?? "chrome";
    this.reopen = opts.reopen ?? false;
    this.createDriver = opts.createDriver ?? seleniumDriver;
  }

  isOpen(): boolean {
    return this.driver !== null;
  }

  currentBrowser(): AutomatedBrowser | null {
    return this.browser;
  }

  /** Start a browser, replacing any window already open. */
  launch(browser: AutomatedBrowser = this.defaultBrowser): Promise<boolean> {
    return this.serialize(() => this.launchNow(browser));
  }

  /** Load `url`, launching `browser` first if a different one (or none) is open. */
  navigate(url: string, browser?: AutomatedBrowser): Promise<boolean> {
    return this.serialize(() => this.navigateNow(url, browser));
  }

  display(text: string): Promise<boolean> {
    return this.serialize(() => this.displayNow(text));
  }

  close(): Promise<void> {
    return this.serialize(() => this.closeNow());
  }

  private serialize<T>(op: () => Promise<T>): Promise<T> {
    const next = this.pending.then(op);
    this.pending = next.catch(() => undefined);
    return next;
  }

  private async launchNow(browser: AutomatedBrowser): Promise<boolean> {
    if (this.driver) {
      this.report("ACTION: Closing previous browser instance...");
      await this.quitQuietly();
    }
    const label = BROWSER_LABELS[browser];
    this.report(`ACTION: Initializing ${label} browser...`);
    try {
      this.driver = await this.createDriver(browser);
      this.browser = browser;
      this.report(`STATUS: ${label} browser launched successfully.`);
      return true;
    } catch (err) {
      this.report(`FATAL_ERROR: Failed to launch ${label} browser: ${describeError(err)}`);
      this.report("INFO: Ensure the browser is installed and its driver can be started.");
      return false;
    }
  }

  private async navigateNow(url: string, browser?: AutomatedBrowser): Promise<boolean> {
    const wanted = browser ?? this.browser ?? this.defaultBrowser;
    const driver = this.driver && this.browser === wanted ? this.driver : await this.launchFor(wanted);
    if (!driver) {
      this.report("ERROR: Could not open browser to navigate.");
      return false;
    }
    this.report(`ACTION: Navigating browser to: ${url}`);
    try {
      await driver.get(url);
      return true;
    } catch (err) {
      this.report(`ERROR: Failed to navigate browser: ${describeError(err)}`);
      this.report("INFO: Browser might have been closed unexpectedly.");
      this.forget();
      return false;
    }
  }

  private async displayNow(text: string): Promise<boolean> {
    if (this.reopen || !this.driver) {
      if (!this.reopen) this.report(`INFO: No browser open to display text in. Opening ${BROWSER_LABELS[this.defaultBrowser]}...`);
      if (!(await this.launchNow(this.defaultBrowser))) {
        this.report("ERROR: Could not open a browser to display speech.");
        return false;
      }
    }
    const driver = this.driver;
    if (!driver) return false;

    const preview = text.length > 30 ? `${text.slice(0, 30)}...` : text;
    this.report(`ACTION: Displaying text in browser: '${preview}'`);
    try {
      await driver.get(textPageUrl(text));
      return true;
    } catch (err) {
      this.report(`ERROR: Failed to display text in browser: ${describeError(err)}`);
      this.report("INFO: Browser might have been closed unexpectedly.");
      this.forget();
      return false;
    }
  }

  private async closeNow(): Promise<void> {
    if (!this.driver) {
      this.report("INFO: No browser is currently open.");
      return;
    }
    this.report("ACTION: Closing browser...");
    const driver = this.driver;
    this.forget();
    try {
      await driver.quit();
      this.report("STATUS: Browser closed.");
    } catch (err) {
      this.report(`WARNING: Browser already closed or error during quit: ${describeError(err)}`);
    }
  }

  private async launchFor(browser: AutomatedBrowser): Promise<PageDriver | null> {
    return (await this.launchNow(browser)) ? this.driver : null;
  }

  private async quitQuietly() {
    const driver = this.driver;
    this.forget();
    try {
      await driver?.quit();
    } catch (err) {
      this.report(`WARNING: Previous browser did not close cleanly: ${describeError(err)}`);
    }
  }

  private forget() {
    this.driver = null;
    this.browser = null;
  }
}
