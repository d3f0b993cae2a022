import type { AppConfig } from "../config";
import { SingleSlot } from "../core/channel";
import { CaptureEmptyError, CaptureTimeoutError, RateLimitedError, toErrorMessage } from "../errors";
import type { Logger } from "../observability";
import type { RateLimitMonitor } from "./rateLimitMonitor";
import type { BrowserPage, BrowserSession, ObservedResponse } from "./types";

const PDF_MAGIC = Buffer.from("%PDF");

export interface CapturedAttachment {
  /** Final URL the bytes came from, which may be a redirect target. */
  url: string;
  contentType: string;
  body: Buffer;
}

type CaptureSignal =
  | { kind: "body"; url: string; contentType: string; body: Buffer }
  | { kind: "unreadable"; detail: string };

type CaptureSettings = Pick<AppConfig, "captureUrlMarker" | "expectedContentType" | "captureWaitUntil" | "captureTimeoutMs">;

interface ResponseCaptureDeps {
  config: CaptureSettings;
  logger: Logger;
  monitor: RateLimitMonitor;
}

/**
 * Pulls attachment bytes out of the network layer of a throwaway page. The
 * archive ships the file before its anti-bot script can swap the rendered
 * view, so listening to responses sees bytes the page itself never shows.
 */
export class ResponseCapture {
  private readonly config: CaptureSettings;
  private readonly logger: Logger;
  private readonly monitor: RateLimitMonitor;

  constructor(deps: ResponseCaptureDeps) {
    this.config = deps.config;
    this.logger = deps.logger;
    this.monitor = deps.monitor;
  }

  async fetch(session: BrowserSession, url: string, timeoutMs = this.config.captureTimeoutMs): Promise<CapturedAttachment> {
    const page = await session.newPage();
    const slot = new SingleSlot<CaptureSignal>();
    let claimed = false;
    let nearMiss: string | undefined;

    // Must be armed before goto: the attachment can arrive before navigation resolves.
    const dispose = page.onResponse((response) => {
      if (claimed || !response.url.includes(this.config.captureUrlMarker)) {
        return;
      }
      if (response.status >= 300 && response.status < 400) {
        return;
      }
      if (!this.isExpectedResponse(response)) {
        nearMiss = `${response.status} ${response.contentType || "without content-type"} from ${response.url}`;
        return;
      }

      claimed = true;
      void response.body().then(
        (body) => slot.offer({ kind: "body", url: response.url, contentType: response.contentType, body }),
        (error: unknown) => slot.offer({ kind: "unreadable", detail: `body unreadable: ${toErrorMessage(error)}` }),
      );
    });

    const startedAt = Date.now();
    try {
      try {
        await page.goto(url, { waitUntil: this.config.captureWaitUntil, timeoutMs });
      } catch (error) {
        // Attachment navigations routinely abort once the bytes arrive.
        this.logger.debug("capture_navigation_interrupted", { url, error: toErrorMessage(error) });
      }

      const signal = await slot.take(timeoutMs - (Date.now() - startedAt));
      if (!signal) {
        await this.assertNotThrottled(page, url);
        if (nearMiss) {
          throw new CaptureEmptyError(url, `only non-matching responses arrived (${nearMiss})`);
        }
        throw new CaptureTimeoutError(url, timeoutMs);
      }

      if (signal.kind === "unreadable") {
        throw new CaptureEmptyError(url, signal.detail);
      }
      if (signal.body.length === 0) {
        throw new CaptureEmptyError(url, "empty body");
      }
      if (this.expectsPdf() && !signal.body.subarray(0, PDF_MAGIC.length).equals(PDF_MAGIC)) {
        throw new CaptureEmptyError(url, "body is not a PDF");
      }

      return { url: signal.url, contentType: signal.contentType, body: signal.body };
    } finally {
      dispose();
      await this.closeQuietly(page, url);
    }
  }

  private isExpectedResponse(response: ObservedResponse): boolean {
    return response.status === 200 && response.contentType.toLowerCase().includes(this.config.expectedContentType.toLowerCase());
  }

  private expectsPdf(): boolean {
    return this.config.expectedContentType.toLowerCase().includes("pdf");
  }

  private async assertNotThrottled(page: BrowserPage, url: string): Promise<void> {
    let text: string;
    try {
      text = await page.bodyText();
    } catch (error) {
      this.logger.debug("capture_page_text_unavailable", { url, error: toErrorMessage(error) });
      return;
    }
    const verdict = this.monitor.check(text);
    if (verdict.state === "rate_limited") {
      throw new RateLimitedError(verdict.phrase, url);
    }
  }

  private async closeQuietly(page: BrowserPage, url: string): Promise<void> {
    try {
      await page.close();
    } catch (error) {
      this.logger.warn("capture_page_close_failed", { url, error: toErrorMessage(error) });
    }
  }
}
