import { RateLimitedError } from "../errors";
import type { BrowserPage } from "./types";

export type RateLimitVerdict = { readonly state: "clear" } | { readonly state: "rate_limited"; readonly phrase: string };

export class RateLimitMonitor {
  private readonly phrases: string[];

  constructor(phrases: string[]) {
    this.phrases = phrases.map((phrase) => phrase.trim()).filter((phrase) => phrase.length > 0);
  }

  /** Whole-phrase containment, ignoring case. */
  check(pageText: string): RateLimitVerdict {
    const haystack = pageText.toLowerCase();
    for (const phrase of this.phrases) {
      if (haystack.includes(phrase.toLowerCase())) {
        return { state: "rate_limited", phrase };
      }
    }
    return { state: "clear" };
  }

  /** Reads the page text and throws RateLimitedError when a throttling phrase is present. */
  async assertClear(page: BrowserPage, where: string): Promise<void> {
    const verdict = this.check(await page.bodyText());
    if (verdict.state === "rate_limited") {
      throw new RateLimitedError(verdict.phrase, where);
    }
  }
}
