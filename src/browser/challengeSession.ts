import type { AppConfig } from "../config";
import { sleep } from "../core/timing";
import { ChallengeFailedError, toErrorMessage } from "../errors";
import type { Logger, MetricsRegistry } from "../observability";
import type { BrowserLauncher, BrowserPage, BrowserSession } from "./types";

export type SessionStatus = "COLD" | "WARM" | "STALE";

export interface WarmedContext {
  session: BrowserSession;
  page: BrowserPage;
}

type ChallengeSettings = Pick<
  AppConfig,
  "baseUrl" | "challengeTimeoutMs" | "navigationTimeoutMs" | "rewarmIdleThresholdMs" | "rewarmSettleMs" | "captureTimeoutMs"
>;

export interface ChallengeSessionDeps {
  launcher: BrowserLauncher;
  config: ChallengeSettings;
  logger: Logger;
  metrics: MetricsRegistry;
  /** Element that only exists once the handshake has redirected to real content. */
  readySelector: string;
  now?: () => number;
  signal?: AbortSignal;
}

/**
 * Owns the browser and its primary page. The fingerprint handshake is never
 * inspected; arrival at post-redirect content is the only success signal.
 */
export class ChallengeSession {
  private readonly deps: ChallengeSessionDeps;
  private readonly now: () => number;
  private browser: BrowserSession | undefined;
  private primary: BrowserPage | undefined;
  private warm = false;
  private forcedStale = false;
  private lastActivityAt = 0;

  constructor(deps: ChallengeSessionDeps) {
    this.deps = deps;
    this.now = deps.now ?? Date.now;
  }

  get status(): SessionStatus {
    if (!this.warm) {
      return "COLD";
    }
    if (this.forcedStale || this.now() - this.lastActivityAt > this.deps.config.rewarmIdleThresholdMs) {
      return "STALE";
    }
    return "WARM";
  }

  touch(): void {
    this.lastActivityAt = this.now();
  }

  /** Flags the session for a rewarm, e.g. after a deliberate pause. */
  markStale(): void {
    if (this.warm) {
      this.forcedStale = true;
    }
  }

  context(): WarmedContext {
    if (!this.warm || !this.browser || !this.primary) {
      throw new ChallengeFailedError("browser session is cold; acquire() first");
    }
    return { session: this.browser, page: this.primary };
  }

  async acquire(): Promise<WarmedContext> {
    const { config, logger } = this.deps;
    await this.release();

    logger.info("challenge_acquire_start", { url: config.baseUrl });
    const session = await this.deps.launcher.launch();
    this.browser = session;

    try {
      const page = await session.newPage();
      this.primary = page;
      await page.goto(config.baseUrl, { waitUntil: "domcontentloaded", timeoutMs: config.navigationTimeoutMs });
      const passed = await page.waitForSelector(this.deps.readySelector, config.challengeTimeoutMs);
      if (!passed) {
        throw new ChallengeFailedError(`challenge did not reach content within ${config.challengeTimeoutMs}ms`);
      }

      this.warm = true;
      this.forcedStale = false;
      this.touch();
      logger.info("challenge_acquire_ok", { url: page.currentUrl() });
      return { session, page };
    } catch (error) {
      await this.release();
      if (error instanceof ChallengeFailedError) {
        throw error;
      }
      throw new ChallengeFailedError(`entry navigation failed: ${toErrorMessage(error)}`);
    }
  }

  /**
   * Re-navigates to a content page, then spends one throwaway attachment
   * fetch so the challenge state re-initializes before real fetches resume.
   */
  async rewarm(anchorUrl: string, warmupUrl: string): Promise<void> {
    const { config, logger, metrics } = this.deps;
    const { session, page } = this.context();
    logger.info("session_rewarm_start", { url: anchorUrl });

    try {
      await page.goto(anchorUrl, { waitUntil: "domcontentloaded", timeoutMs: config.navigationTimeoutMs });
    } catch (error) {
      logger.error("session_rewarm_navigation_failed", { url: anchorUrl, error: toErrorMessage(error) });
      await this.release();
      throw new ChallengeFailedError(`rewarm navigation failed: ${toErrorMessage(error)}`);
    }

    await this.warmUp(session, warmupUrl);
    await sleep(config.rewarmSettleMs, this.deps.signal);

    metrics.incrementCounter("rewarms", 1);
    this.forcedStale = false;
    this.touch();
    logger.info("session_rewarm_complete", { url: anchorUrl });
  }

  async release(): Promise<void> {
    const browser = this.browser;
    this.browser = undefined;
    this.primary = undefined;
    this.warm = false;
    this.forcedStale = false;
    if (!browser) {
      return;
    }
    try {
      await browser.close();
    } catch (error) {
      this.deps.logger.warn("browser_close_failed", { error: toErrorMessage(error) });
    }
  }

  private async warmUp(session: BrowserSession, warmupUrl: string): Promise<void> {
    const { config, logger } = this.deps;
    let page: BrowserPage | undefined;
    try {
      page = await session.newPage();
      await page.goto(warmupUrl, { waitUntil: "commit", timeoutMs: config.captureTimeoutMs });
      logger.debug("session_warmup_fetched", { url: warmupUrl });
    } catch (error) {
      logger.warn("session_warmup_failed", { url: warmupUrl, error: toErrorMessage(error) });
    } finally {
      if (page) {
        await page.close().catch((error: unknown) => {
          logger.warn("session_warmup_close_failed", { url: warmupUrl, error: toErrorMessage(error) });
        });
      }
    }
  }
}
