import crypto from "node:crypto";
import type { CapturedAttachment } from "../browser";
import { ChallengeSession, RateLimitMonitor, ResponseCapture } from "../browser";
import type { BrowserLauncher } from "../browser";
import type { AppConfig } from "../config";
import { processWithConcurrency } from "../core/concurrency";
import type { RandomSource } from "../core/timing";
import { backoffDelay, jitter, sleep } from "../core/timing";
import { DedupIndex } from "../dedup";
import type { DedupEntry } from "../dedup";
import { identityFromUrl, toFetched } from "../documents";
import { ChallengeFailedError, RateLimitedError, errorCodeOf, isCrawlError, toErrorMessage } from "../errors";
import type { TextExtractor } from "../extract/textExtractor";
import { createPdfTextExtractor } from "../extract/textExtractor";
import { SEARCH_FORM, parseCaseNumber } from "../navigate";
import type { Logger, MetricsRegistry } from "../observability";
import { createCaseSink } from "../sink";
import type { CaseSink, ListedReference, TabWarning } from "../sink";
import { ProgressLedger, createProgressStore } from "../store";
import type { ProgressStore } from "../store";
import type { OutcomeStatus, SourceTab } from "../types";
import { SOURCE_TABS } from "../types";
import type { Discovery } from "./discovery";
import { discoverCase } from "./discovery";

export interface CrawlRequest {
  caseIdentifier: string;
  resume: boolean;
  outputRoot?: string;
}

export type CrawlStatus = "completed" | "paused" | "interrupted";

export interface CrawlOutcome {
  status: CrawlStatus;
  caseNumber: string;
  caseDir: string;
  fetched: number;
  skipped: number;
  alreadyDone: number;
  totalUnique: number;
  pausedReason?: string;
  parseWarnings: TabWarning[];
}

export interface CrawlDependencies {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  launcher: BrowserLauncher;
  progressStore?: ProgressStore;
  sinkFactory?: (outputRoot: string, caseNumber: string, logger: Logger) => CaseSink;
  textExtractor?: TextExtractor;
  random?: RandomSource;
  now?: () => Date;
  signal?: AbortSignal;
}

/**
 * Crawls one case end to end. Session and input failures are thrown after
 * the checkpoint records them; throttling and interrupts return normally.
 */
export async function crawlCase(deps: CrawlDependencies, request: CrawlRequest): Promise<CrawlOutcome> {
  const caseNumber = parseCaseNumber(request.caseIdentifier);
  const outputRoot = request.outputRoot ?? deps.config.outputRoot;
  const logger = deps.logger.child("orchestrator");
  const now = deps.now ?? (() => new Date());
  const store = deps.progressStore ?? createProgressStore(outputRoot);
  const sink = (deps.sinkFactory ?? createCaseSink)(outputRoot, caseNumber, deps.logger.child("sink"));

  if (!request.resume) {
    // Document files only mean something next to the checkpoint that marked them done.
    const archivedTo = await store.archive(caseNumber);
    const movedAside = await sink.archiveDocuments(now().toISOString().replace(/[:.]/g, "-"));
    if (archivedTo || movedAside.length > 0) {
      logger.info("previous_run_archived", { caseNumber, progress: archivedTo, directories: movedAside });
    }
  }

  const ledger = await ProgressLedger.open(store, caseNumber, now);
  if (ledger.pausedReason) {
    logger.info("resuming_paused_crawl", { caseNumber, pausedReason: ledger.pausedReason });
    ledger.clearPause();
  }
  if (request.resume && deps.config.verifyDocumentsOnStartup) {
    const { adopted, dropped } = ledger.reconcile(await sink.listDocumentIdentities());
    if (adopted.length > 0 || dropped.length > 0) {
      logger.warn("progress_reconciled", { caseNumber, adopted: adopted.length, dropped: dropped.length });
    }
  }

  const crawl = new CaseCrawl(deps, { caseNumber, ledger, sink, logger, now });
  try {
    const outcome = await crawl.run();
    await crawl.writeReadme(outcome.status);
    ledger.recordOutcome({ status: outcome.status, reason: outcome.pausedReason });
    await ledger.commit();
    logger.info("crawl_finished", { ...outcome, parseWarnings: outcome.parseWarnings.length });
    return outcome;
  } catch (error) {
    ledger.recordOutcome({ status: "failed", code: errorCodeOf(error), reason: toErrorMessage(error) });
    try {
      await ledger.commit();
    } catch (commitError) {
      logger.error("progress_commit_failed", { caseNumber, error: toErrorMessage(commitError) });
    }
    try {
      await crawl.writeReadme("failed");
    } catch (readmeError) {
      logger.error("readme_write_failed", { caseNumber, error: toErrorMessage(readmeError) });
    }
    logger.error("crawl_failed", { caseNumber, code: errorCodeOf(error), error: toErrorMessage(error) });
    throw error;
  } finally {
    await crawl.close();
  }
}

interface CaseCrawlState {
  caseNumber: string;
  ledger: ProgressLedger;
  sink: CaseSink;
  logger: Logger;
  now: () => Date;
}

/**
 * Failures that leave the primary page in an unknown state: a challenge that
 * never cleared, or a browser error such as a navigation timeout. Both are
 * answered with a fresh browser.
 */
function isSessionFailure(error: unknown): boolean {
  return error instanceof ChallengeFailedError || !isCrawlError(error);
}

type Halt = { kind: "rate_limited"; reason: string } | { kind: "fatal"; error: unknown };

class CaseCrawl {
  private readonly config: AppConfig;
  private readonly metrics: MetricsRegistry;
  private readonly random: RandomSource;
  private readonly signal?: AbortSignal;
  private readonly caseNumber: string;
  private readonly ledger: ProgressLedger;
  private readonly sink: CaseSink;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly monitor: RateLimitMonitor;
  private readonly session: ChallengeSession;
  private readonly capture: ResponseCapture;
  private readonly extractText: TextExtractor;
  private readonly dedup: DedupIndex;

  private anchorUrl: string;
  private discovery: Discovery | undefined;
  private halt: Halt | undefined;
  private warming: Promise<void> | undefined;
  private fetched = 0;
  private skipped = 0;
  private consecutiveFailures = 0;
  private docsSinceBreak = 0;
  private nextBreakAt: number;

  constructor(deps: CrawlDependencies, state: CaseCrawlState) {
    this.config = deps.config;
    this.metrics = deps.metrics;
    this.random = deps.random ?? Math.random;
    this.signal = deps.signal;
    this.caseNumber = state.caseNumber;
    this.ledger = state.ledger;
    this.sink = state.sink;
    this.logger = state.logger;
    this.now = state.now;
    this.monitor = new RateLimitMonitor(deps.config.rateLimitPhrases);
    this.session = new ChallengeSession({
      launcher: deps.launcher,
      config: deps.config,
      logger: deps.logger.child("session"),
      metrics: deps.metrics,
      readySelector: SEARCH_FORM.readySelector,
      signal: deps.signal,
    });
    this.capture = new ResponseCapture({
      config: deps.config,
      logger: deps.logger.child("capture"),
      monitor: this.monitor,
    });
    this.extractText = deps.textExtractor ?? createPdfTextExtractor({ logger: deps.logger.child("extract") });
    this.dedup = new DedupIndex(deps.config.attachmentMarker);
    this.anchorUrl = deps.config.baseUrl;
    this.nextBreakAt = this.drawBreakInterval();
  }

  async run(): Promise<CrawlOutcome> {
    if (this.signal?.aborted) {
      return this.outcome("interrupted", 0);
    }

    let discovery: Discovery;
    try {
      discovery = await this.discoverWithRetries();
    } catch (error) {
      if (error instanceof RateLimitedError) {
        await this.pause(error);
        return this.outcome("paused", 0);
      }
      throw error;
    }
    if (!discovery.complete) {
      return this.outcome("interrupted", 0, discovery.warnings);
    }

    this.anchorUrl = discovery.record.cardUrl;
    this.admitAll(discovery);
    await this.writeStructure(discovery);
    this.discovery = discovery;

    const pending = this.dedup.entries().filter((entry) => !this.ledger.isCompleted(entry.identity.key));
    const alreadyDone = this.dedup.size - pending.length;
    this.logger.info("fetch_plan", { caseNumber: this.caseNumber, unique: this.dedup.size, pending: pending.length, alreadyDone });

    if (pending.length > 0) {
      // The first fetches on a fresh context fail; spend a warm-up first.
      this.session.markStale();
      await processWithConcurrency(pending, this.config.captureConcurrency, (entry) => this.fetchWorker(entry));
    }

    const halt = this.halt;
    if (halt?.kind === "fatal") {
      throw halt.error;
    }
    if (halt?.kind === "rate_limited") {
      return this.outcome("paused", alreadyDone, discovery.warnings);
    }
    if (this.signal?.aborted) {
      return this.outcome("interrupted", alreadyDone, discovery.warnings);
    }
    return this.outcome("completed", alreadyDone, discovery.warnings);
  }

  async close(): Promise<void> {
    await this.session.release();
  }

  /** Refreshes `README.md`; a no-op until discovery has written the case structure. */
  async writeReadme(outcome: OutcomeStatus): Promise<void> {
    const discovery = this.discovery;
    if (!discovery) {
      return;
    }

    let downloaded = 0;
    let failed = 0;
    for (const entry of this.dedup.entries()) {
      if (this.ledger.isSkipped(entry.identity.key)) {
        failed += 1;
      } else if (this.ledger.isCompleted(entry.identity.key)) {
        downloaded += 1;
      }
    }

    await this.sink.writeReadme({
      case: discovery.record,
      outcome,
      updatedAt: this.now().toISOString(),
      totalDocuments: this.dedup.size,
      downloaded,
      failed,
      instances: discovery.instances.map((instance) => {
        const own = discovery.references.cards.filter((reference) => reference.instanceId === instance.instanceId);
        return { instance, documents: own.length, pages: Math.max(0, ...own.map((reference) => reference.page)) };
      }),
    });
  }

  private outcome(status: CrawlStatus, alreadyDone: number, parseWarnings: TabWarning[] = []): CrawlOutcome {
    return {
      status,
      caseNumber: this.caseNumber,
      caseDir: this.sink.caseDir,
      fetched: this.fetched,
      skipped: this.skipped,
      alreadyDone,
      totalUnique: this.dedup.size,
      pausedReason: status === "paused" ? this.ledger.pausedReason : undefined,
      parseWarnings,
    };
  }

  private async discoverWithRetries(): Promise<Discovery> {
    const { config } = this;
    for (let attempt = 1; ; attempt += 1) {
      try {
        const { page } = await this.session.acquire();
        return await discoverCase(
          {
            page,
            config,
            logger: this.logger,
            metrics: this.metrics,
            monitor: this.monitor,
            random: this.random,
            signal: this.signal,
            onActivity: () => this.session.touch(),
          },
          this.caseNumber,
        );
      } catch (error) {
        if (!isSessionFailure(error) || attempt >= config.maxChallengeAttempts) {
          throw error;
        }
        this.logger.warn("session_retry", { caseNumber: this.caseNumber, attempt, code: errorCodeOf(error), error: toErrorMessage(error) });
        await this.session.release();
        await sleep(backoffDelay(attempt, config.retryBaseDelayMs, config.retryMaxDelayMs, this.random), this.signal);
      }
    }
  }

  private admitAll(discovery: Discovery): void {
    for (const tab of SOURCE_TABS) {
      for (const reference of discovery.references[tab]) {
        if (!this.dedup.admit(reference).isNew) {
          this.metrics.incrementCounter("refs_duplicate", 1);
        }
      }
    }
  }

  private async writeStructure(discovery: Discovery): Promise<void> {
    const listed = (tab: SourceTab): ListedReference[] =>
      discovery.references[tab].map((reference) => ({
        ...reference,
        identity: identityFromUrl(reference.url, this.config.attachmentMarker).key,
      }));

    const fingerprints: Record<string, string> = {};
    for (const tab of SOURCE_TABS) {
      const references = listed(tab);
      await this.sink.writeTabList(tab, references);
      if (references.length > 0) {
        fingerprints[tab] = references[0].identity;
      }
    }

    const cards = listed("cards");
    for (const instance of discovery.instances) {
      const own = cards.filter((reference) => reference.instanceId === instance.instanceId);
      await this.sink.writeInstance(instance, own);
      if (own.length > 0) {
        fingerprints[`cards:${instance.instanceId}`] = own[0].identity;
      }
    }

    await this.sink.writeCase({
      case: discovery.record,
      instances: discovery.instances,
      referenceCounts: {
        court_acts: discovery.references.court_acts.length,
        cards: discovery.references.cards.length,
        electronic_case: discovery.references.electronic_case.length,
      },
      uniqueDocuments: this.dedup.size,
      fingerprints,
      parseWarnings: discovery.warnings,
      crawledAt: this.now().toISOString(),
    });
  }

  private stopped(): boolean {
    return this.halt !== undefined || this.signal?.aborted === true;
  }

  /** Never rejects: failures either become skips or set `halt`. */
  private async fetchWorker(entry: DedupEntry): Promise<void> {
    try {
      await this.fetchEntry(entry);
    } catch (error) {
      if (error instanceof RateLimitedError) {
        await this.pause(error);
        return;
      }
      this.logger.error("fetch_worker_failed", { identity: entry.identity.key, error: toErrorMessage(error) });
      if (!this.halt) {
        this.halt = { kind: "fatal", error };
      }
    }
  }

  private async fetchEntry(entry: DedupEntry): Promise<void> {
    const { config } = this;
    const key = entry.identity.key;
    const url = entry.reference.url;
    let lastError = "no attempt made";

    for (let attempt = 1; attempt <= config.maxFetchRetries; attempt += 1) {
      if (this.stopped()) {
        return;
      }
      await this.ensureWarm(url);

      let captured: CapturedAttachment;
      const stopTimer = this.metrics.startTimer("capture_ms");
      try {
        captured = await this.capture.fetch(this.session.context().session, url);
      } catch (error) {
        if (error instanceof RateLimitedError) {
          throw error;
        }
        lastError = isCrawlError(error) ? `${error.code}: ${error.message}` : toErrorMessage(error);
        this.metrics.incrementCounter("captures_failed", 1);
        this.logger.warn("capture_failed", { identity: key, url, attempt, error: lastError });
        if (!isCrawlError(error)) {
          // Unexpected browser errors usually mean a dead context.
          this.session.markStale();
        }
        if (attempt < config.maxFetchRetries) {
          await sleep(backoffDelay(attempt, config.retryBaseDelayMs, config.retryMaxDelayMs, this.random), this.signal);
        }
        continue;
      } finally {
        stopTimer();
      }

      this.session.touch();
      await this.persist(entry, captured);
      this.metrics.incrementCounter("captures_ok", 1);
      this.consecutiveFailures = 0;
      await this.pace();
      return;
    }

    if (this.stopped()) {
      return;
    }
    if (await this.sink.removeDocument(key)) {
      this.logger.warn("stale_document_removed", { identity: key });
    }
    this.ledger.markPermanentlySkipped(key, lastError);
    await this.ledger.commit();
    this.skipped += 1;
    this.metrics.incrementCounter("docs_skipped", 1);
    this.logger.error("document_skipped", { identity: key, url, attempts: config.maxFetchRetries, reason: lastError });

    this.consecutiveFailures += 1;
    if (this.consecutiveFailures >= config.consecutiveFailuresBeforeRewarm) {
      this.logger.warn("consecutive_failures_break", { caseNumber: this.caseNumber, failures: this.consecutiveFailures });
      this.consecutiveFailures = 0;
      await this.takeBreak();
    } else {
      await this.pace();
    }
  }

  /** Document file first, then the mark, then the checkpoint. */
  private async persist(entry: DedupEntry, captured: CapturedAttachment): Promise<void> {
    const key = entry.identity.key;
    const stopTimer = this.metrics.startTimer("extract_ms");
    let text = "";
    try {
      text = (await this.extractText(captured.body)).text;
    } catch (error) {
      this.logger.warn("text_extraction_failed", { identity: key, error: toErrorMessage(error) });
    } finally {
      stopTimer();
    }

    const rawLocation = this.config.saveRawAttachments ? await this.sink.writeRaw(key, captured.body) : undefined;
    const document = toFetched(
      entry.reference,
      {
        text,
        byteLength: captured.body.length,
        sha256: crypto.createHash("sha256").update(captured.body).digest("hex"),
        rawLocation,
      },
      {
        identity: key,
        sourceTabs: this.dedup.sourceTabsOf(key),
        minTextLengthForOcr: this.config.minTextLengthForOcr,
        fetchedAt: this.now().toISOString(),
      },
    );

    await this.sink.writeDocument(document);
    this.ledger.markDone(key);
    await this.ledger.commit();
    this.fetched += 1;
    this.logger.info("document_fetched", {
      identity: key,
      tab: entry.reference.sourceTab,
      chars: document.charCount,
      requiresManualReview: document.requiresManualReview,
    });
  }

  private ensureWarm(warmupUrl: string): Promise<void> {
    if (!this.warming) {
      this.warming = this.warm(warmupUrl).finally(() => {
        this.warming = undefined;
      });
    }
    return this.warming;
  }

  private async warm(warmupUrl: string): Promise<void> {
    const status = this.session.status;
    if (status === "WARM") {
      return;
    }
    if (status === "STALE") {
      try {
        await this.session.rewarm(this.anchorUrl, warmupUrl);
        await this.monitor.assertClear(this.session.context().page, "rewarm");
        return;
      } catch (error) {
        if (!(error instanceof ChallengeFailedError)) {
          throw error;
        }
        this.logger.warn("rewarm_failed_reacquiring", { error: error.message });
      }
    }
    await this.reacquire(warmupUrl);
  }

  private async reacquire(warmupUrl: string): Promise<void> {
    const { config } = this;
    for (let attempt = 1; ; attempt += 1) {
      try {
        await this.session.acquire();
        await this.session.rewarm(this.anchorUrl, warmupUrl);
        return;
      } catch (error) {
        if (!(error instanceof ChallengeFailedError) || attempt >= config.maxChallengeAttempts) {
          throw error;
        }
        this.logger.warn("challenge_retry", { caseNumber: this.caseNumber, attempt, error: error.message });
        await sleep(backoffDelay(attempt, config.retryBaseDelayMs, config.retryMaxDelayMs, this.random), this.signal);
      }
    }
  }

  private async pace(): Promise<void> {
    if (this.stopped()) {
      return;
    }
    this.docsSinceBreak += 1;
    if (this.docsSinceBreak >= this.nextBreakAt) {
      await this.takeBreak();
      return;
    }
    await sleep(jitter(this.config.delays.betweenDocuments, this.random), this.signal);
  }

  private async takeBreak(): Promise<void> {
    const pauseMs = jitter(this.config.delays.coffeeBreak, this.random);
    this.logger.info("pacing_break", { caseNumber: this.caseNumber, pauseMs, afterDocuments: this.docsSinceBreak });
    this.docsSinceBreak = 0;
    this.nextBreakAt = this.drawBreakInterval();
    await sleep(pauseMs, this.signal);
    this.session.markStale();
  }

  private drawBreakInterval(): number {
    const { docsBeforeBreak, docsBeforeBreakJitter } = this.config;
    const spread = Math.round((this.random() * 2 - 1) * docsBeforeBreakJitter);
    return Math.max(1, docsBeforeBreak + spread);
  }

  private async pause(error: RateLimitedError): Promise<void> {
    if (this.halt) {
      return;
    }
    this.halt = { kind: "rate_limited", reason: error.message };
    this.metrics.incrementCounter("rate_limited", 1);
    this.ledger.pause(error.message);
    await this.ledger.commit();
    this.logger.warn("crawl_paused", { caseNumber: this.caseNumber, phrase: error.phrase, reason: error.message });
  }
}
