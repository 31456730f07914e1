import { chromium } from "playwright-core";
import type { Browser, BrowserContext, Locator, Page } from "playwright-core";
import { AppConfig } from "../config";
import { SessionClosedError } from "../core/errors";

/** Locates the first element matching `selector`, optionally inside the `index`-th match of `within`. */
export interface ElementTarget {
  selector: string;
  within?: { selector: string; index: number };
}

/** The slice of a live browser tab the engines depend on. */
export interface BrowserPage {
  goto(url: string, timeoutMs: number): Promise<void>;
  waitForSelector(selector: string, timeoutMs: number): Promise<void>;
  content(): Promise<string>;
  url(): string;
  fill(target: ElementTarget, value: string): Promise<void>;
  click(target: ElementTarget): Promise<void>;
}

export interface BrowserSession {
  readonly page: BrowserPage;
  close(): Promise<void>;
}

export interface BrowserLauncher {
  launch(): Promise<BrowserSession>;
}

const CLOSED_PATTERN = /target (page, context or browser )?(has been )?closed|browser has been closed|context has been closed/i;

function translateError(error: unknown): unknown {
  if (error instanceof Error && CLOSED_PATTERN.test(error.message)) {
    return new SessionClosedError(error.message, { cause: error });
  }
  return error;
}

async function guarded<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw translateError(error);
  }
}

export class PlaywrightBrowserPage implements BrowserPage {
  constructor(private readonly page: Page) {}

  async goto(url: string, timeoutMs: number): Promise<void> {
    await guarded(() => this.page.goto(url, { timeout: timeoutMs, waitUntil: "domcontentloaded" }));
  }

  async waitForSelector(selector: string, timeoutMs: number): Promise<void> {
    await guarded(() => this.page.waitForSelector(selector, { state: "attached", timeout: timeoutMs }));
  }

  async content(): Promise<string> {
    return guarded(() => this.page.content());
  }

  url(): string {
    return this.page.url();
  }

  async fill(target: ElementTarget, value: string): Promise<void> {
    await guarded(() => this.locate(target).fill(value));
  }

  async click(target: ElementTarget): Promise<void> {
    await guarded(() => this.locate(target).click());
  }

  private locate(target: ElementTarget): Locator {
    if (!target.within) {
      return this.page.locator(target.selector).first();
    }
    return this.page.locator(target.within.selector).nth(target.within.index).locator(target.selector).first();
  }
}

class PlaywrightBrowserSession implements BrowserSession {
  constructor(
    readonly page: BrowserPage,
    private readonly browser: Browser,
    private readonly context: BrowserContext,
  ) {}

  async close(): Promise<void> {
    try {
      await this.context.close();
    } finally {
      await this.browser.close();
    }
  }
}

export class PlaywrightBrowserLauncher implements BrowserLauncher {
  constructor(private readonly config: AppConfig) {}

  async launch(): Promise<BrowserSession> {
    const browser = await chromium.launch({
      headless: this.config.headless,
      channel: this.config.browserExecutablePath ? undefined : this.config.browserChannel,
      executablePath: this.config.browserExecutablePath,
      args: ["--disable-blink-features=AutomationControlled"],
    });

    try {
      const context = await browser.newContext({
        ignoreHTTPSErrors: this.config.ignoreHttpsErrors,
        userAgent: this.config.userAgent,
      });
      const page = await context.newPage();
      page.setDefaultTimeout(this.config.requestTimeoutMs);
      return new PlaywrightBrowserSession(new PlaywrightBrowserPage(page), browser, context);
    } catch (error) {
      await browser.close();
      throw error;
    }
  }
}
