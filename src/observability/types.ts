export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  caseNumber?: string;
  identity?: string;
  url?: string;
  tab?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "pages_visited"
  | "refs_discovered"
  | "refs_duplicate"
  | "captures_ok"
  | "captures_failed"
  | "docs_skipped"
  | "rate_limited"
  | "rewarms"
  | "parse_mismatches";

export type MetricTimerName = "navigation_ms" | "capture_ms" | "extract_ms";
