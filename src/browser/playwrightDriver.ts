import { chromium, errors, firefox, webkit } from "playwright-core";
import type { Browser, BrowserContext, BrowserType, Page, Response } from "playwright-core";
import type { AppConfig, BrowserEngine } from "../config";
import type { BrowserLauncher, BrowserPage, BrowserSession, GotoOptions, ObservedResponse, SelectorState, TypeOptions } from "./types";

const ENGINES: Record<BrowserEngine, BrowserType> = { firefox, chromium, webkit };

function toObservedResponse(response: Response): ObservedResponse {
  return {
    url: response.url(),
    status: response.status(),
    contentType: response.headers()["content-type"] ?? "",
    body: () => response.body(),
  };
}

class PlaywrightPage implements BrowserPage {
  private readonly page: Page;

  constructor(page: Page) {
    this.page = page;
  }

  async goto(url: string, options: GotoOptions): Promise<void> {
    await this.page.goto(url, { waitUntil: options.waitUntil, timeout: options.timeoutMs });
  }

  onResponse(listener: (response: ObservedResponse) => void): () => void {
    const handler = (response: Response): void => listener(toObservedResponse(response));
    this.page.on("response", handler);
    return () => {
      this.page.off("response", handler);
    };
  }

  async waitForSelector(selector: string, timeoutMs: number, state: SelectorState = "attached"): Promise<boolean> {
    try {
      await this.page.waitForSelector(selector, { timeout: timeoutMs, state });
      return true;
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        return false;
      }
      throw error;
    }
  }

  async isVisible(selector: string): Promise<boolean> {
    return this.page.locator(selector).first().isVisible();
  }

  async click(selector: string, timeoutMs: number): Promise<void> {
    await this.page.locator(selector).first().click({ timeout: timeoutMs });
  }

  async typeText(selector: string, text: string, options: TypeOptions): Promise<void> {
    const input = this.page.locator(selector).first();
    await input.click({ timeout: options.timeoutMs });
    await input.fill("", { timeout: options.timeoutMs });
    await input.pressSequentially(text, { delay: options.delayMs, timeout: options.timeoutMs });
    await input.dispatchEvent("input");
    await input.dispatchEvent("change");
  }

  async html(selector?: string): Promise<string | null> {
    if (!selector) {
      return this.page.content();
    }
    const target = this.page.locator(selector).first();
    if ((await target.count()) === 0) {
      return null;
    }
    return target.evaluate((element) => element.outerHTML);
  }

  async bodyText(): Promise<string> {
    return this.page.evaluate(() => document.body?.innerText ?? "");
  }

  currentUrl(): string {
    return this.page.url();
  }

  async close(): Promise<void> {
    if (!this.page.isClosed()) {
      await this.page.close();
    }
  }
}

class PlaywrightSession implements BrowserSession {
  private readonly browser: Browser;
  private readonly context: BrowserContext;

  constructor(browser: Browser, context: BrowserContext) {
    this.browser = browser;
    this.context = context;
  }

  async newPage(): Promise<BrowserPage> {
    return new PlaywrightPage(await this.context.newPage());
  }

  async close(): Promise<void> {
    try {
      await this.context.close();
    } finally {
      await this.browser.close();
    }
  }
}

export class PlaywrightLauncher implements BrowserLauncher {
  private readonly config: AppConfig;

  constructor(config: AppConfig) {
    this.config = config;
  }

  async launch(): Promise<BrowserSession> {
    const browser = await ENGINES[this.config.browserEngine].launch({
      headless: this.config.headless,
      slowMo: this.config.slowMoMs,
      executablePath: this.config.executablePath,
    });

    try {
      const context = await browser.newContext({
        viewport: { width: 1920, height: 1080 },
        locale: this.config.locale,
        timezoneId: this.config.timezoneId,
        ignoreHTTPSErrors: this.config.ignoreHttpsErrors,
        acceptDownloads: true,
      });
      await context.addInitScript(() => {
        Object.defineProperty(navigator, "webdriver", { get: () => undefined });
      });
      return new PlaywrightSession(browser, context);
    } catch (error) {
      await browser.close();
      throw error;
    }
  }
}
