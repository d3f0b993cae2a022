import type { BrowserLauncher } from "../browser";
import type { AppConfig } from "../config";
import { crawlCase } from "../crawl";
import type { CrawlOutcome } from "../crawl";
import { ExitCode, errorCodeOf, exitCodeFor, toErrorMessage } from "../errors";
import type { ExitCodeValue } from "../errors";
import { parseCaseNumber } from "../navigate";
import type { Logger, MetricsRegistry } from "../observability";
import { createProgressStore } from "../store";
import type { ProgressStore } from "../store";
import type { ProgressState, TerminalOutcome } from "../types";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  launcher: BrowserLauncher;
  progressStore?: ProgressStore;
  signal?: AbortSignal;
  /** Where human-facing output goes; stdout by default. */
  write?: (line: string) => void;
}

export interface CrawlCommandOptions {
  caseNumber: string;
  resume: boolean;
  outputRoot?: string;
}

export function exitCodeForOutcome(outcome: CrawlOutcome): ExitCodeValue {
  switch (outcome.status) {
    case "completed":
      return ExitCode.Ok;
    case "paused":
      return ExitCode.RateLimited;
    case "interrupted":
      return ExitCode.Interrupted;
  }
}

export async function runCrawl(ctx: CommandContext, options: CrawlCommandOptions): Promise<ExitCodeValue> {
  ctx.logger.info("crawl_start", { caseNumber: options.caseNumber, resume: options.resume, outputRoot: options.outputRoot });

  try {
    const outcome = await crawlCase(
      {
        config: ctx.config,
        logger: ctx.logger,
        metrics: ctx.metrics,
        launcher: ctx.launcher,
        progressStore: ctx.progressStore,
        signal: ctx.signal,
      },
      { caseIdentifier: options.caseNumber, resume: options.resume, outputRoot: options.outputRoot },
    );
    const exitCode = exitCodeForOutcome(outcome);
    ctx.logger.info("crawl_complete", {
      caseNumber: outcome.caseNumber,
      status: outcome.status,
      fetched: outcome.fetched,
      skipped: outcome.skipped,
      alreadyDone: outcome.alreadyDone,
      totalUnique: outcome.totalUnique,
      pausedReason: outcome.pausedReason,
      exitCode,
    });
    return exitCode;
  } catch (error) {
    const exitCode = exitCodeFor(error);
    ctx.logger.error("crawl_command_failed", { code: errorCodeOf(error), exitCode, error: toErrorMessage(error) });
    return exitCode;
  }
}

export interface StatusReport {
  caseNumber: string;
  checkpointFound: boolean;
  done: number;
  skipped: number;
  lastUpdated?: string;
  pausedReason?: string;
  lastOutcome?: TerminalOutcome;
  skippedReasons: Record<string, string>;
}

export function buildStatusReport(caseNumber: string, state: ProgressState | undefined): StatusReport {
  if (!state) {
    return { caseNumber, checkpointFound: false, done: 0, skipped: 0, skippedReasons: {} };
  }
  const skippedReasons: Record<string, string> = {};
  for (const [key, marker] of state.permanentlySkipped) {
    skippedReasons[key] = marker.reason;
  }
  return {
    caseNumber,
    checkpointFound: true,
    done: state.completedDocumentIdentities.size - state.permanentlySkipped.size,
    skipped: state.permanentlySkipped.size,
    lastUpdated: state.lastUpdated,
    pausedReason: state.pausedReason,
    lastOutcome: state.lastOutcome,
    skippedReasons,
  };
}

export async function runStatus(ctx: CommandContext, rawCaseNumber: string, outputRoot?: string): Promise<ExitCodeValue> {
  ctx.logger.info("status_start", { caseNumber: rawCaseNumber });
  try {
    const caseNumber = parseCaseNumber(rawCaseNumber);
    const store = ctx.progressStore ?? createProgressStore(outputRoot ?? ctx.config.outputRoot);
    const report = buildStatusReport(caseNumber, await store.load(caseNumber));
    (ctx.write ?? console.log)(JSON.stringify(report, null, 2));
    ctx.logger.info("status_complete", { caseNumber, done: report.done, skipped: report.skipped });
    return ExitCode.Ok;
  } catch (error) {
    const exitCode = exitCodeFor(error);
    ctx.logger.error("status_failed", { code: errorCodeOf(error), exitCode, error: toErrorMessage(error) });
    return exitCode;
  }
}
