import type { RateLimitMonitor } from "../browser/rateLimitMonitor";
import type { BrowserPage } from "../browser/types";
import type { AppConfig } from "../config";
import type { RandomSource } from "../core/timing";
import { NavigationEngine } from "../navigate";
import type { Logger, MetricsRegistry } from "../observability";
import type { TabWarning } from "../sink";
import type { CaseRecord, DocumentReference, InstanceRecord, SourceTab } from "../types";
import { SOURCE_TABS } from "../types";

export interface Discovery {
  record: CaseRecord;
  references: Record<SourceTab, DocumentReference[]>;
  instances: InstanceRecord[];
  warnings: TabWarning[];
  /** False when an interrupt cut the listing short. */
  complete: boolean;
}

export interface DiscoveryDeps {
  page: BrowserPage;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  monitor: RateLimitMonitor;
  random: RandomSource;
  signal?: AbortSignal;
  onActivity: () => void;
}

/** Search, open the card and list every tab on the primary page, one step at a time. */
export async function discoverCase(deps: DiscoveryDeps, caseNumber: string): Promise<Discovery> {
  const logger = deps.logger.child("navigation");
  const engine = new NavigationEngine({
    page: deps.page,
    config: deps.config,
    logger,
    metrics: deps.metrics,
    monitor: deps.monitor,
    random: deps.random,
    signal: deps.signal,
    onActivity: deps.onActivity,
  });

  const hit = await engine.search(caseNumber);
  const record = await engine.openCard(hit.caseGuid, hit);

  const references: Record<SourceTab, DocumentReference[]> = { court_acts: [], cards: [], electronic_case: [] };
  let complete = true;
  for (const tab of SOURCE_TABS) {
    if (deps.signal?.aborted) {
      complete = false;
      break;
    }
    for await (const reference of engine.listTab(tab)) {
      references[tab].push(reference);
    }
    logger.info("tab_listed", { caseNumber, tab, references: references[tab].length });
  }
  if (deps.signal?.aborted) {
    complete = false;
  }
  engine.finish();

  return {
    record,
    references,
    instances: engine.instances.list(),
    warnings: engine.parseMismatches.map((mismatch) => ({ tab: mismatch.tab, message: mismatch.message })),
    complete,
  };
}
