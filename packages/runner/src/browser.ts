import { chromium, errors, firefox, type Page } from "playwright-core";
import { errorText } from "./errors.js";
import type { Logger } from "./logger.js";

/** The DOM questions the checks ask of a rendered page. */
export interface DomProbe {
  readonly name: string;
  open(url: string, timeoutMs: number): Promise<void>;
  /** false when nothing matched within the timeout */
  waitFor(selector: string, timeoutMs: number): Promise<boolean>;
  waitForText(selector: string, text: string, timeoutMs: number): Promise<boolean>;
  /** trimmed text of the first match, null when there is none */
  text(selector: string): Promise<string | null>;
  count(selector: string): Promise<number>;
  texts(selector: string, limit: number): Promise<string[]>;
  title(): Promise<string>;
  close(): Promise<void>;
}

export type LaunchOptions = {
  headless: boolean;
  executablePath?: string;
  logger?: Logger;
};

export type BrowserLauncher = (opts: LaunchOptions) => Promise<DomProbe | null>;

const CHROMIUM_ARGS = ["--no-sandbox", "--disable-dev-shm-usage", "--disable-gpu"];

class PlaywrightProbe implements DomProbe {
  constructor(
    readonly name: string,
    private readonly browser: Pick<LaunchedBrowser, "close">,
    private readonly page: Page
  ) {}

  async open(url: string, timeoutMs: number): Promise<void> {
    await this.page.goto(url, { timeout: timeoutMs, waitUntil: "domcontentloaded" });
  }

  async waitFor(selector: string, timeoutMs: number): Promise<boolean> {
    return this.settle(this.page.locator(selector).first().waitFor({ state: "attached", timeout: timeoutMs }));
  }

  async waitForText(selector: string, text: string, timeoutMs: number): Promise<boolean> {
    return this.settle(
      this.page.locator(selector).filter({ hasText: text }).first().waitFor({ state: "attached", timeout: timeoutMs })
    );
  }

  async text(selector: string): Promise<string | null> {
    const loc = this.page.locator(selector).first();
    if ((await loc.count()) === 0) return null;
    return (await loc.innerText()).trim();
  }

  count(selector: string): Promise<number> {
    return this.page.locator(selector).count();
  }

  async texts(selector: string, limit: number): Promise<string[]> {
    const all = await this.page.locator(selector).allInnerTexts();
    return all.slice(0, limit);
  }

  title(): Promise<string> {
    return this.page.title();
  }

  async close(): Promise<void> {
    await this.browser.close();
  }

  private async settle(wait: Promise<void>): Promise<boolean> {
    try {
      await wait;
      return true;
    } catch (e) {
      if (e instanceof errors.TimeoutError) return false;
      throw e;
    }
  }
}

/** The part of a playwright BrowserType the launch loop touches. */
export interface Launchable {
  launch(opts: { headless: boolean; executablePath?: string; args: string[] }): Promise<LaunchedBrowser>;
}

export interface LaunchedBrowser {
  version(): string;
  newContext(opts: { viewport: { width: number; height: number } }): Promise<{ newPage(): Promise<Page> }>;
  close(): Promise<void>;
}

/** First candidate that yields a page wins; a browser that launched but failed later is closed before moving on. */
export async function launchFirst(
  candidates: Array<[string, Launchable]>,
  { headless, executablePath, logger }: LaunchOptions
): Promise<DomProbe | null> {
  for (const [name, type] of candidates) {
    let browser: LaunchedBrowser | undefined;
    try {
      browser = await type.launch({
        headless,
        executablePath: name === "chromium" ? executablePath : undefined,
        args: name === "chromium" ? CHROMIUM_ARGS : [],
      });
      const context = await browser.newContext({ viewport: { width: 1920, height: 1080 } });
      const page = await context.newPage();
      logger?.info({ browser: name, version: browser.version() }, "browser launched");
      return new PlaywrightProbe(name, browser, page);
    } catch (e) {
      logger?.debug({ browser: name, err: errorText(e) }, "browser launch failed");
      await browser?.close().catch((closeErr: unknown) => {
        logger?.warn({ browser: name, err: errorText(closeErr) }, "browser close failed");
      });
    }
  }
  return null;
}

/**
 * Chromium first, then Firefox. Resolves null when neither can be launched
 * (no browser binary on this machine) so the caller can report it as a failed check.
 */
export const launchBrowser: BrowserLauncher = (opts) =>
  launchFirst(
    [
      ["chromium", chromium],
      ["firefox", firefox],
    ],
    opts
  );
