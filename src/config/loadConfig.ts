import fs from "node:fs";
import path from "node:path";
import type { LogLevel } from "../observability/types";
import type { AppConfig, BrowserEngine, ConfigOverrides, NavigationMilestone } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  baseUrl: "https://kad.arbitr.ru/",
  browserEngine: "firefox",
  headless: true,
  slowMoMs: 100,
  locale: "ru-RU",
  timezoneId: "Europe/Moscow",
  ignoreHttpsErrors: false,
  executablePath: undefined,
  outputRoot: "output",
  logLevel: "info",

  challengeTimeoutMs: 60_000,
  maxChallengeAttempts: 3,
  navigationTimeoutMs: 30_000,
  elementTimeoutMs: 10_000,
  searchSuggestTimeoutMs: 15_000,
  typingDelayMs: 100,
  rewarmIdleThresholdMs: 40_000,
  rewarmSettleMs: 5_000,

  attachmentMarker: "PdfDocument",
  captureUrlMarker: "Pdf",
  expectedContentType: "application/pdf",
  captureWaitUntil: "domcontentloaded",
  captureTimeoutMs: 60_000,
  captureConcurrency: 1,
  maxFetchRetries: 3,
  retryBaseDelayMs: 2_000,
  retryMaxDelayMs: 10_000,
  consecutiveFailuresBeforeRewarm: 3,

  docsBeforeBreak: 15,
  docsBeforeBreakJitter: 5,
  delays: {
    betweenDocuments: { baseMs: 3_000, jitterMs: 2_000 },
    betweenPages: { baseMs: 2_000, jitterMs: 2_000 },
    coffeeBreak: { baseMs: 45_000, jitterMs: 30_000 },
  },

  rateLimitPhrases: ["Доступ к сервису ограничен", "Слишком много запросов", "Too many requests", "Rate limit"],
  minTextLengthForOcr: 100,
  saveRawAttachments: true,
  verifyDocumentsOnStartup: true,
};

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed = JSON.parse(raw) as ConfigOverrides;
  return parsed ?? {};
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toList(value: string | undefined, fallback: string[]): string[] {
  if (!value) {
    return fallback;
  }
  const items = value
    .split("|")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : fallback;
}

function toEngine(value: string | undefined, fallback: BrowserEngine): BrowserEngine {
  return value === "firefox" || value === "chromium" || value === "webkit" ? value : fallback;
}

function toMilestone(value: string | undefined, fallback: NavigationMilestone): NavigationMilestone {
  return value === "commit" || value === "domcontentloaded" || value === "load" ? value : fallback;
}

function toLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error" ? value : fallback;
}

export function mergeConfig(base: AppConfig, overrides: ConfigOverrides): AppConfig {
  return {
    ...base,
    ...overrides,
    delays: {
      ...base.delays,
      ...(overrides.delays ?? {}),
    },
  };
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const merged = mergeConfig(DEFAULT_CONFIG, readConfigFile(configPath));

  return {
    ...merged,
    baseUrl: env.BASE_URL ?? merged.baseUrl,
    browserEngine: toEngine(env.BROWSER_ENGINE, merged.browserEngine),
    headless: toBool(env.HEADLESS, merged.headless),
    slowMoMs: toInt(env.SLOW_MO_MS, merged.slowMoMs),
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    executablePath: env.BROWSER_EXECUTABLE_PATH ?? merged.executablePath,
    outputRoot: env.OUTPUT_ROOT ?? merged.outputRoot,
    logLevel: toLogLevel(env.LOG_LEVEL, merged.logLevel),
    challengeTimeoutMs: toInt(env.CHALLENGE_TIMEOUT_MS, merged.challengeTimeoutMs),
    maxChallengeAttempts: toInt(env.MAX_CHALLENGE_ATTEMPTS, merged.maxChallengeAttempts),
    navigationTimeoutMs: toInt(env.NAVIGATION_TIMEOUT_MS, merged.navigationTimeoutMs),
    rewarmIdleThresholdMs: toInt(env.REWARM_IDLE_THRESHOLD_MS, merged.rewarmIdleThresholdMs),
    captureWaitUntil: toMilestone(env.CAPTURE_WAIT_UNTIL, merged.captureWaitUntil),
    captureTimeoutMs: toInt(env.CAPTURE_TIMEOUT_MS, merged.captureTimeoutMs),
    captureConcurrency: toInt(env.CAPTURE_CONCURRENCY, merged.captureConcurrency),
    maxFetchRetries: toInt(env.MAX_FETCH_RETRIES, merged.maxFetchRetries),
    rateLimitPhrases: toList(env.RATE_LIMIT_PHRASES, merged.rateLimitPhrases),
    minTextLengthForOcr: toInt(env.MIN_TEXT_LENGTH_FOR_OCR, merged.minTextLengthForOcr),
    saveRawAttachments: toBool(env.SAVE_RAW_ATTACHMENTS, merged.saveRawAttachments),
    verifyDocumentsOnStartup: toBool(env.VERIFY_DOCUMENTS_ON_STARTUP, merged.verifyDocumentsOnStartup),
  };
}

export { DEFAULT_CONFIG };
