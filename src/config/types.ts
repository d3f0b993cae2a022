import type { LogLevel } from "../observability/types";

export type BrowserEngine = "firefox" | "chromium" | "webkit";

export type NavigationMilestone = "commit" | "domcontentloaded" | "load";

/** A randomized pause: `baseMs` plus up to `jitterMs`. */
export interface DelayRange {
  baseMs: number;
  jitterMs: number;
}

export interface PacingDelays {
  betweenDocuments: DelayRange;
  betweenPages: DelayRange;
  coffeeBreak: DelayRange;
}

export interface AppConfig {
  baseUrl: string;
  browserEngine: BrowserEngine;
  headless: boolean;
  slowMoMs: number;
  locale: string;
  timezoneId: string;
  ignoreHttpsErrors: boolean;
  executablePath?: string;
  outputRoot: string;
  logLevel: LogLevel;

  challengeTimeoutMs: number;
  maxChallengeAttempts: number;
  navigationTimeoutMs: number;
  elementTimeoutMs: number;
  searchSuggestTimeoutMs: number;
  /** Per-keystroke delay when filling the search input. */
  typingDelayMs: number;
  rewarmIdleThresholdMs: number;
  rewarmSettleMs: number;

  attachmentMarker: string;
  captureUrlMarker: string;
  expectedContentType: string;
  captureWaitUntil: NavigationMilestone;
  captureTimeoutMs: number;
  captureConcurrency: number;
  maxFetchRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  consecutiveFailuresBeforeRewarm: number;

  docsBeforeBreak: number;
  docsBeforeBreakJitter: number;
  delays: PacingDelays;

  rateLimitPhrases: string[];
  minTextLengthForOcr: number;
  saveRawAttachments: boolean;
  verifyDocumentsOnStartup: boolean;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "delays">> & {
  delays?: Partial<PacingDelays>;
};
