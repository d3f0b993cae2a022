import type { RateLimitMonitor } from "../browser/rateLimitMonitor";
import type { BrowserPage } from "../browser/types";
import type { AppConfig } from "../config";
import type { RandomSource } from "../core/timing";
import { jitter, sleep } from "../core/timing";
import { createReference, identityFromUrl, withStatus } from "../documents";
import { AmbiguousResultError, ChallengeFailedError, NotFoundError, ParseMismatchError, toErrorMessage } from "../errors";
import type { Logger, MetricsRegistry } from "../observability";
import type { CaseRecord, DocumentReference, SourceTab } from "../types";
import { normalizeCaseNumber } from "./caseNumber";
import { InstanceRegistry } from "./instanceRegistry";
import type { FlatTabAdapter, ParseContext, ParsedRow, Suggestion } from "./pageAdapters";
import { CARDS_TAB, CASE_CARD, COURT_ACTS_TAB, ELECTRONIC_CASE_TAB, SEARCH_FORM, parseMaxPage } from "./pageAdapters";

export type NavigationState = "SEARCH" | "CARD_OPEN" | "ACTS_TAB" | "CARDS_TAB" | "EFILE_TAB" | "DONE";

export interface SearchHit {
  caseGuid: string;
  caseNumber: string;
  text: string;
}

export interface ParseMismatchRecord {
  tab: SourceTab;
  message: string;
}

type NavigationSettings = Pick<
  AppConfig,
  | "baseUrl"
  | "attachmentMarker"
  | "navigationTimeoutMs"
  | "elementTimeoutMs"
  | "searchSuggestTimeoutMs"
  | "typingDelayMs"
  | "delays"
>;

export interface NavigationEngineDeps {
  page: BrowserPage;
  config: NavigationSettings;
  logger: Logger;
  metrics: MetricsRegistry;
  monitor: RateLimitMonitor;
  instances?: InstanceRegistry;
  random?: RandomSource;
  signal?: AbortSignal;
  /** Called after every navigation on the primary page. */
  onActivity?: () => void;
}

interface PageCursor {
  tab: SourceTab;
  instanceId?: string;
  page: number;
  seen: Set<string>;
  position: number;
}

/**
 * Exact normalized match wins. Otherwise a lone unrelated suggestion means
 * the case is unknown, and several mean the query is ambiguous.
 */
export function pickSuggestion(caseNumber: string, suggestions: Suggestion[]): Suggestion {
  const wanted = normalizeCaseNumber(caseNumber);
  const exact = suggestions.find((suggestion) => normalizeCaseNumber(suggestion.caseNumber) === wanted);
  if (exact) {
    return exact;
  }
  if (suggestions.length === 0) {
    throw new NotFoundError(caseNumber);
  }
  if (suggestions.length === 1) {
    throw new NotFoundError(caseNumber, `only suggestion was ${suggestions[0].caseNumber}`);
  }
  throw new AmbiguousResultError(
    caseNumber,
    suggestions.map((suggestion) => suggestion.caseNumber),
  );
}

export class NavigationEngine {
  private readonly page: BrowserPage;
  private readonly config: NavigationSettings;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly monitor: RateLimitMonitor;
  private readonly random: RandomSource;
  private readonly signal?: AbortSignal;
  private readonly onActivity: () => void;
  private readonly parseContext: ParseContext;
  private navigationState: NavigationState = "SEARCH";
  private cardUrl: string | undefined;

  readonly instances: InstanceRegistry;
  readonly parseMismatches: ParseMismatchRecord[] = [];

  constructor(deps: NavigationEngineDeps) {
    this.page = deps.page;
    this.config = deps.config;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.monitor = deps.monitor;
    this.instances = deps.instances ?? new InstanceRegistry();
    this.random = deps.random ?? Math.random;
    this.signal = deps.signal;
    this.onActivity = deps.onActivity ?? (() => undefined);
    this.parseContext = { baseUrl: deps.config.baseUrl, attachmentMarker: deps.config.attachmentMarker };
  }

  get state(): NavigationState {
    return this.navigationState;
  }

  async search(caseNumber: string): Promise<SearchHit> {
    const { config, page } = this;
    this.navigationState = "SEARCH";

    let formReady = await page.waitForSelector(SEARCH_FORM.readySelector, config.elementTimeoutMs);
    if (!formReady) {
      await this.navigate(config.baseUrl);
      formReady = await page.waitForSelector(SEARCH_FORM.readySelector, config.elementTimeoutMs);
    }
    await this.monitor.assertClear(page, "search form");
    if (!formReady) {
      throw new ChallengeFailedError("search form did not render");
    }

    await this.dismissPromo();
    this.logger.info("search_submit", { caseNumber });
    await page.typeText(SEARCH_FORM.inputSelector, caseNumber, {
      delayMs: config.typingDelayMs,
      timeoutMs: config.elementTimeoutMs,
    });

    const suggested = await page.waitForSelector(SEARCH_FORM.suggestionItemSelector, config.searchSuggestTimeoutMs);
    await this.assertNoCaptcha();
    await this.monitor.assertClear(page, "search suggestions");
    if (!suggested) {
      throw new NotFoundError(caseNumber, `no suggestion within ${config.searchSuggestTimeoutMs}ms`);
    }

    const suggestions = SEARCH_FORM.parseSuggestions((await page.html(SEARCH_FORM.suggestionListSelector)) ?? "");
    const hit = pickSuggestion(caseNumber, suggestions);
    this.onActivity();
    this.logger.info("search_hit", { caseNumber, caseGuid: hit.caseGuid, candidates: suggestions.length });
    return { caseGuid: hit.caseGuid, caseNumber: hit.caseNumber, text: hit.text };
  }

  async openCard(caseGuid: string, hit?: SearchHit): Promise<CaseRecord> {
    const { config, page } = this;
    this.navigationState = "CARD_OPEN";
    const cardUrl = CASE_CARD.cardUrl(config.baseUrl, caseGuid);

    await this.navigate(cardUrl);
    const ready = await page.waitForSelector(CASE_CARD.readySelector, config.navigationTimeoutMs);
    await this.monitor.assertClear(page, "case card");
    if (!ready) {
      throw new Error(`Case card did not render: ${cardUrl}`);
    }
    this.cardUrl = cardUrl;

    const parsed = CASE_CARD.parseCard((await page.html()) ?? "");
    if (parsed.caseGuid && parsed.caseGuid !== caseGuid) {
      this.logger.warn("card_guid_mismatch", { url: cardUrl, expected: caseGuid, actual: parsed.caseGuid });
    }

    const record: CaseRecord = {
      caseNumber: parsed.caseNumber ?? hit?.caseNumber ?? "",
      caseGuid: parsed.caseGuid ?? caseGuid,
      status: null,
      cardUrl,
      parties: parsed.parties,
      searchResultFields: hit ? { caseNumber: hit.caseNumber, suggestion: hit.text } : {},
    };
    this.logger.info("card_opened", { caseNumber: record.caseNumber, url: cardUrl, status: parsed.status });
    return withStatus(record, parsed.status);
  }

  /**
   * Streams a tab's references. Each call reopens the tab and re-derives its
   * page count; a structural mismatch ends the stream early and is recorded
   * in `parseMismatches`.
   */
  async *listTab(tab: SourceTab): AsyncGenerator<DocumentReference> {
    if (!this.cardUrl) {
      throw new Error("listTab called before openCard");
    }

    try {
      switch (tab) {
        case "court_acts":
          this.navigationState = "ACTS_TAB";
          yield* this.listFlatTab(COURT_ACTS_TAB);
          break;
        case "electronic_case":
          this.navigationState = "EFILE_TAB";
          yield* this.listFlatTab(ELECTRONIC_CASE_TAB);
          break;
        case "cards":
          this.navigationState = "CARDS_TAB";
          yield* this.listCards();
          break;
      }
    } catch (error) {
      if (!(error instanceof ParseMismatchError)) {
        throw error;
      }
      this.metrics.incrementCounter("parse_mismatches", 1);
      this.parseMismatches.push({ tab, message: error.message });
      this.logger.warn("tab_parse_mismatch", { tab, error: error.message });
    }
  }

  finish(): void {
    this.navigationState = "DONE";
  }

  private async *listFlatTab(adapter: FlatTabAdapter): AsyncGenerator<DocumentReference> {
    await this.openTab(adapter.tab, adapter.buttonSelector, adapter.readySelector, adapter.buttonRequired);

    const maxPage = adapter.paginated
      ? parseMaxPage(await this.containerHtml(adapter.containerSelector), adapter.pagerItemSelector)
      : 1;
    this.logger.info("tab_opened", { tab: adapter.tab, maxPage });

    const cursor: PageCursor = { tab: adapter.tab, page: 1, seen: new Set(), position: 0 };
    for (let pageNumber = 1; pageNumber <= maxPage; pageNumber += 1) {
      if (this.signal?.aborted) {
        return;
      }
      if (pageNumber > 1) {
        await this.turnPage(adapter.pageButtonSelector(pageNumber), adapter.tab, pageNumber);
      }
      cursor.page = pageNumber;
      const rows = adapter.parseRows(await this.containerHtml(adapter.containerSelector), this.parseContext);
      yield* this.toReferences(rows, cursor);
    }
  }

  private async *listCards(): AsyncGenerator<DocumentReference> {
    const { config, page } = this;
    await this.openTab(CARDS_TAB.tab, CARDS_TAB.buttonSelector, CARDS_TAB.readySelector, true);

    const headers = CARDS_TAB.parseInstanceHeaders(await this.containerHtml(CARDS_TAB.containerSelector), this.parseContext);
    this.logger.info("tab_opened", { tab: CARDS_TAB.tab, instances: headers.length });

    for (const [index, header] of headers.entries()) {
      if (this.signal?.aborted) {
        return;
      }

      const instance = this.instances.register({
        instanceId: header.instanceId ?? `inst_${index + 1}`,
        instanceType: header.instanceType,
        courtCode: header.courtCode,
        courtName: header.courtName,
        regDate: header.regDate,
        caseNumber: header.caseNumber,
      });

      // Documents pinned in the header count as page 0.
      const cursor: PageCursor = {
        tab: CARDS_TAB.tab,
        instanceId: instance.instanceId,
        page: 0,
        seen: new Set(),
        position: 0,
      };
      yield* this.toReferences(header.rows, cursor);

      if (!header.expandable) {
        continue;
      }

      const itemsSelector = CARDS_TAB.itemsSelector(index);
      if (!(await page.isVisible(itemsSelector))) {
        await page.click(CARDS_TAB.collapseSelector(index), config.elementTimeoutMs);
      }
      const expanded = await page.waitForSelector(itemsSelector, config.elementTimeoutMs, "visible");
      await this.monitor.assertClear(page, `cards instance ${instance.instanceId}`);
      if (!expanded) {
        this.logger.warn("instance_items_hidden", { tab: CARDS_TAB.tab, instanceId: instance.instanceId });
        continue;
      }

      const maxPage = parseMaxPage(await this.containerHtml(itemsSelector), CARDS_TAB.pagerItemSelector);
      this.logger.debug("instance_expanded", { instanceId: instance.instanceId, maxPage });

      for (let pageNumber = 1; pageNumber <= maxPage; pageNumber += 1) {
        if (this.signal?.aborted) {
          return;
        }
        if (pageNumber > 1) {
          await this.turnPage(CARDS_TAB.pageButtonSelector(index, pageNumber), CARDS_TAB.tab, pageNumber);
        }
        cursor.page = pageNumber;
        yield* this.toReferences(CARDS_TAB.parseItems(await this.containerHtml(itemsSelector), this.parseContext), cursor);
      }
    }
  }

  /** Rows repeated across page boundaries are emitted once per tab or instance. */
  private *toReferences(rows: ParsedRow[], cursor: PageCursor): Generator<DocumentReference> {
    for (const [index, row] of rows.entries()) {
      const key = identityFromUrl(row.url, this.config.attachmentMarker).key;
      if (cursor.seen.has(key)) {
        continue;
      }
      cursor.seen.add(key);
      cursor.position += 1;
      this.metrics.incrementCounter("refs_discovered", 1);

      yield createReference({
        url: row.url,
        sourceTab: cursor.tab,
        attachmentMarker: this.config.attachmentMarker,
        instanceId: cursor.instanceId,
        page: cursor.page,
        positionOnPage: index + 1,
        position: cursor.position,
        metadata: row.metadata,
      });
    }
  }

  private async openTab(tab: SourceTab, buttonSelector: string, readySelector: string, buttonRequired: boolean): Promise<void> {
    const { config, page } = this;

    if (await page.isVisible(buttonSelector)) {
      await page.click(buttonSelector, config.elementTimeoutMs);
    } else if (buttonRequired) {
      throw new ParseMismatchError(`${tab}: tab button ${buttonSelector} not found`);
    }

    const ready = await page.waitForSelector(readySelector, config.elementTimeoutMs);
    await this.monitor.assertClear(page, `${tab} tab`);
    if (!ready) {
      throw new ParseMismatchError(`${tab}: ${readySelector} did not render`);
    }
    this.metrics.incrementCounter("pages_visited", 1);
    this.onActivity();
  }

  private async turnPage(selector: string, tab: SourceTab, pageNumber: number): Promise<void> {
    const { config, page } = this;
    if (!(await page.waitForSelector(selector, config.elementTimeoutMs))) {
      throw new ParseMismatchError(`${tab}: pager item for page ${pageNumber} not found`);
    }

    await page.click(selector, config.elementTimeoutMs);
    await sleep(jitter(config.delays.betweenPages, this.random), this.signal);
    await this.monitor.assertClear(page, `${tab} page ${pageNumber}`);
    this.metrics.incrementCounter("pages_visited", 1);
    this.onActivity();
  }

  private async containerHtml(selector: string): Promise<string> {
    const html = await this.page.html(selector);
    if (html === null) {
      throw new ParseMismatchError(`${selector} is missing from the page`);
    }
    return html;
  }

  private async navigate(url: string): Promise<void> {
    const stopTimer = this.metrics.startTimer("navigation_ms");
    try {
      await this.page.goto(url, { waitUntil: "domcontentloaded", timeoutMs: this.config.navigationTimeoutMs });
    } finally {
      stopTimer();
    }
    this.metrics.incrementCounter("pages_visited", 1);
    this.onActivity();
  }

  private async dismissPromo(): Promise<void> {
    try {
      if (await this.page.isVisible(SEARCH_FORM.promoCloseSelector)) {
        await this.page.click(SEARCH_FORM.promoCloseSelector, this.config.elementTimeoutMs);
        this.logger.debug("promo_dismissed");
      }
    } catch (error) {
      this.logger.debug("promo_dismiss_failed", { error: toErrorMessage(error) });
    }
  }

  private async assertNoCaptcha(): Promise<void> {
    if (await this.page.isVisible(SEARCH_FORM.captchaSelector)) {
      throw new ChallengeFailedError("interactive captcha shown after search");
    }
  }
}
