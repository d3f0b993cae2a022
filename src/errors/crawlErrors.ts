export type CrawlErrorCode =
  | "InvalidCaseNumber"
  | "ChallengeFailed"
  | "NotFound"
  | "AmbiguousResult"
  | "CaptureTimeout"
  | "CaptureEmpty"
  | "RateLimited"
  | "ParseMismatch"
  | "Fatal";

export abstract class CrawlError extends Error {
  abstract readonly code: CrawlErrorCode;
  /** Whether a single-fetch retry loop may try again. */
  readonly retryable: boolean = false;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidCaseNumberError extends CrawlError {
  readonly code = "InvalidCaseNumber";
  readonly input: string;

  constructor(input: string) {
    super(`Invalid case number: "${input}" (expected <court-prefix>-<number>/<year>, e.g. А60-21280/2023)`);
    this.input = input;
  }
}

export class ChallengeFailedError extends CrawlError {
  readonly code = "ChallengeFailed";

  constructor(message: string) {
    super(message);
  }
}

export class NotFoundError extends CrawlError {
  readonly code = "NotFound";
  readonly caseNumber: string;

  constructor(caseNumber: string, detail = "no matching suggestion appeared") {
    super(`Case ${caseNumber} not found: ${detail}`);
    this.caseNumber = caseNumber;
  }
}

export class AmbiguousResultError extends CrawlError {
  readonly code = "AmbiguousResult";
  readonly candidates: string[];

  constructor(caseNumber: string, candidates: string[]) {
    super(`Search for ${caseNumber} returned ${candidates.length} unrelated matches: ${candidates.join(", ")}`);
    this.candidates = candidates;
  }
}

export class CaptureTimeoutError extends CrawlError {
  readonly code = "CaptureTimeout";
  readonly retryable = true;
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`No attachment response for ${url} within ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export class CaptureEmptyError extends CrawlError {
  readonly code = "CaptureEmpty";
  readonly retryable = true;

  constructor(url: string, detail: string) {
    super(`Attachment response for ${url} unusable: ${detail}`);
  }
}

export class RateLimitedError extends CrawlError {
  readonly code = "RateLimited";
  readonly phrase: string;

  constructor(phrase: string, where: string) {
    super(`Rate limited at ${where}: page contains "${phrase}"`);
    this.phrase = phrase;
  }
}

export class ParseMismatchError extends CrawlError {
  readonly code = "ParseMismatch";

  constructor(message: string) {
    super(message);
  }
}

export function isCrawlError(error: unknown): error is CrawlError {
  return error instanceof CrawlError;
}

export function errorCodeOf(error: unknown): CrawlErrorCode {
  return isCrawlError(error) ? error.code : "Fatal";
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
