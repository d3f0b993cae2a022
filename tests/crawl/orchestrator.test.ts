import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import type { BrowserLauncher } from "../../src/browser";
import type { ConfigOverrides } from "../../src/config";
import { crawlCase } from "../../src/crawl";
import type { CrawlDependencies } from "../../src/crawl";
import { InvalidCaseNumberError, NotFoundError } from "../../src/errors";
import { MetricsRegistry } from "../../src/observability";
import { CaseDirectorySink } from "../../src/sink";
import { InMemoryProgressStore } from "../../src/store";
import type { ArchiveScript, FakeArchive } from "../helpers/archiveFixture";
import { attachmentUrl, createFakeArchive } from "../helpers/archiveFixture";
import { FakePage, FakeSession } from "../helpers/fakeBrowser";
import { makeTempDir, readJson, recordingLogger, testConfig } from "../helpers/testEnv";

const BASE = "https://archive.test/";
const CASE_GUID = "5e1f7c1a-0000-4000-8000-000000000001";
const CASE_NUMBER = "А40-1/2024";
const CASE_DIR_NAME = "case_А40-1-2024";
const NOW = "2024-05-01T10:00:00.000Z";

function doc(docGuid: string): string {
  return attachmentUrl(BASE, CASE_GUID, docGuid, `A40-1-2024_20240115_${docGuid}.pdf`);
}

function key(docGuid: string): string {
  return `${CASE_GUID}/${docGuid}`;
}

/**
 * a1 is listed on the acts tab and pinned in the instance header; a2 is on
 * the acts tab and the electronic case; c1 repeats across an instance page
 * boundary. Six unique documents in all.
 */
function caseScript(overrides: Partial<ArchiveScript> = {}): ArchiveScript {
  return {
    baseUrl: BASE,
    caseGuid: CASE_GUID,
    caseNumber: CASE_NUMBER,
    acts: [doc("a1"), doc("a2")],
    instances: [{ id: "a1b2c3d4e5f6", type: "Первая инстанция", header: [doc("a1")], pages: [[doc("c1")], [doc("c1"), doc("c2")]] }],
    efilePages: [[doc("e1"), doc("a2")], [doc("e2")]],
    ...overrides,
  };
}

function crawlDeps(launcher: BrowserLauncher, overrides: ConfigOverrides = {}, extra: Partial<CrawlDependencies> = {}) {
  const metrics = new MetricsRegistry();
  const lines: string[] = [];
  const deps: CrawlDependencies = {
    config: testConfig(overrides),
    logger: recordingLogger(lines),
    metrics,
    launcher,
    textExtractor: async (body) => ({ text: body.toString("utf-8").replace("%PDF-1.4\n", ""), pageCount: 1 }),
    random: () => 0,
    now: () => new Date(NOW),
    ...extra,
  };
  return { deps, metrics, lines };
}

function documentFiles(root: string): string[] {
  const dir = path.join(root, CASE_DIR_NAME, "documents");
  return fs.existsSync(dir) ? fs.readdirSync(dir).sort() : [];
}

function progressFile(root: string): unknown {
  return readJson(path.join(root, CASE_DIR_NAME, "_progress.json"));
}

function readmeLines(root: string): string[] {
  return fs.readFileSync(path.join(root, CASE_DIR_NAME, "README.md"), "utf-8").split("\n");
}

function capturedUrls(archive: FakeArchive): string[][] {
  return archive.capturePages().map((page) => page.visited);
}

describe("crawlCase", () => {
  it("discovers, deduplicates and fetches every document once", async () => {
    const root = makeTempDir();
    const archive = createFakeArchive(caseScript());
    const { deps, metrics } = crawlDeps(archive.launcher);

    const outcome = await crawlCase(deps, { caseIdentifier: CASE_NUMBER, resume: true, outputRoot: root });

    expect(outcome).toEqual({
      status: "completed",
      caseNumber: CASE_NUMBER,
      caseDir: path.join(root, CASE_DIR_NAME),
      fetched: 6,
      skipped: 0,
      alreadyDone: 0,
      totalUnique: 6,
      pausedReason: undefined,
      parseWarnings: [],
    });
    expect(documentFiles(root)).toEqual(["a1.json", "a2.json", "c1.json", "c2.json", "e1.json", "e2.json"]);
    expect(capturedUrls(archive)).toEqual([
      [doc("a1")],
      [doc("a1")],
      [doc("a2")],
      [doc("c1")],
      [doc("c2")],
      [doc("e1")],
      [doc("e2")],
    ]);
    expect(archive.launcher.sessions).toHaveLength(1);
    expect(archive.launcher.sessions[0].closed).toBe(true);
    expect(metrics.getCounter("captures_ok")).toBe(6);
    expect(metrics.getCounter("refs_duplicate")).toBe(2);
    expect(metrics.getCounter("rewarms")).toBe(1);
  });

  it("writes the case structure and one file per unique document", async () => {
    const root = makeTempDir();
    const archive = createFakeArchive(caseScript());
    const { deps } = crawlDeps(archive.launcher);

    await crawlCase(deps, { caseIdentifier: CASE_NUMBER, resume: true, outputRoot: root });

    const caseDir = path.join(root, CASE_DIR_NAME);
    expect(readJson(path.join(caseDir, "case.json"))).toMatchObject({
      case: { caseNumber: CASE_NUMBER, caseGuid: CASE_GUID, cardUrl: `${BASE}Card/${CASE_GUID}` },
      referenceCounts: { court_acts: 2, cards: 3, electronic_case: 3 },
      uniqueDocuments: 6,
      fingerprints: {
        court_acts: key("a1"),
        cards: key("a1"),
        electronic_case: key("e1"),
        "cards:a1b2c3d4e5f6": key("a1"),
      },
      parseWarnings: [],
      crawledAt: NOW,
    });
    expect(readJson(path.join(caseDir, "electronic_case.json"))).toMatchObject({ tab: "electronic_case", count: 3 });
    expect(readJson(path.join(caseDir, "instances", "01_a1b2c3d4.json"))).toMatchObject({
      instance: { instanceId: "a1b2c3d4e5f6", order: 1, instanceType: "Первая инстанция" },
      count: 3,
    });
    expect(readJson(path.join(caseDir, "documents", "a1.json"))).toMatchObject({
      stage: "fetched",
      identity: key("a1"),
      sourceTab: "court_acts",
      sourceTabs: ["court_acts", "cards"],
      text: `text of ${doc("a1")}`,
      rawLocation: path.join("raw", "a1.pdf"),
      fetchedAt: NOW,
    });
    expect(readJson(path.join(caseDir, "documents", "a2.json"))).toMatchObject({ sourceTabs: ["court_acts", "electronic_case"] });
    expect(fs.readdirSync(path.join(caseDir, "raw"))).toHaveLength(6);
    expect(readmeLines(root)).toEqual(
      expect.arrayContaining([
        `# Case ${CASE_NUMBER}`,
        `- Last crawl: completed at ${NOW}`,
        "| Unique documents | 6 |",
        "| Downloaded | 6 |",
        "| Failed | 0 |",
        "| Pending | 0 |",
        "| 1 | Первая инстанция | - | 3 | 2 |",
      ]),
    );
    expect(progressFile(root)).toMatchObject({
      caseIdentifier: CASE_NUMBER,
      completedDocumentIdentities: ["a1", "a2", "c1", "c2", "e1", "e2"].map(key),
      permanentlySkipped: {},
      lastOutcome: { status: "completed", at: NOW },
    });
  });

  it("fetches nothing when resumed after a complete run", async () => {
    const root = makeTempDir();
    const archive = createFakeArchive(caseScript());
    const { deps } = crawlDeps(archive.launcher);
    await crawlCase(deps, { caseIdentifier: CASE_NUMBER, resume: true, outputRoot: root });
    const firstProgress = progressFile(root);

    const outcome = await crawlCase(deps, { caseIdentifier: CASE_NUMBER, resume: true, outputRoot: root });

    expect(outcome).toMatchObject({ status: "completed", fetched: 0, alreadyDone: 6, totalUnique: 6 });
    expect(archive.launcher.sessions).toHaveLength(2);
    expect(archive.launcher.sessions[1].pages).toHaveLength(1);
    expect(progressFile(root)).toEqual(firstProgress);
  });

  it("refetches a document whose file disappeared between runs", async () => {
    const root = makeTempDir();
    const archive = createFakeArchive(caseScript());
    const { deps } = crawlDeps(archive.launcher);
    await crawlCase(deps, { caseIdentifier: CASE_NUMBER, resume: true, outputRoot: root });
    fs.rmSync(path.join(root, CASE_DIR_NAME, "documents", "c2.json"));

    const outcome = await crawlCase(deps, { caseIdentifier: CASE_NUMBER, resume: true, outputRoot: root });

    expect(outcome).toMatchObject({ status: "completed", fetched: 1, alreadyDone: 5 });
    expect(archive.launcher.sessions[1].pages.slice(1).map((page) => page.visited)).toEqual([[doc("c2")], [doc("c2")]]);
    expect(documentFiles(root)).toContain("c2.json");
  });

  it("starts over without resume and keeps the old checkpoint aside", async () => {
    const root = makeTempDir();
    const archive = createFakeArchive(caseScript());
    const { deps } = crawlDeps(archive.launcher);
    await crawlCase(deps, { caseIdentifier: CASE_NUMBER, resume: true, outputRoot: root });

    const outcome = await crawlCase(deps, { caseIdentifier: CASE_NUMBER, resume: false, outputRoot: root });

    expect(outcome).toMatchObject({ status: "completed", fetched: 6, alreadyDone: 0 });
    const archived = fs
      .readdirSync(path.join(root, CASE_DIR_NAME))
      .filter((name) => name.startsWith("_progress.") && name !== "_progress.json");
    expect(archived).toHaveLength(1);
    const stamp = "2024-05-01T10-00-00-000Z";
    expect(fs.readdirSync(path.join(root, CASE_DIR_NAME, `documents.${stamp}`))).toHaveLength(6);
    expect(fs.readdirSync(path.join(root, CASE_DIR_NAME, `raw.${stamp}`))).toHaveLength(6);
  });

  it("leaves no document file behind for a document skipped after starting over", async () => {
    const root = makeTempDir();
    const archive = createFakeArchive(caseScript());
    await crawlCase(crawlDeps(archive.launcher).deps, { caseIdentifier: CASE_NUMBER, resume: true, outputRoot: root });
    archive.attachments.delete(doc("c2"));

    const outcome = await crawlCase(crawlDeps(archive.launcher, { maxFetchRetries: 1 }).deps, {
      caseIdentifier: CASE_NUMBER,
      resume: false,
      outputRoot: root,
    });

    expect(outcome).toMatchObject({ status: "completed", fetched: 5, skipped: 1 });
    expect(documentFiles(root)).toEqual(["a1.json", "a2.json", "c1.json", "e1.json", "e2.json"]);
    expect(progressFile(root)).toMatchObject({ permanentlySkipped: { [key("c2")]: { at: NOW } } });
  });

  it("deletes a stale document file when that document ends up skipped", async () => {
    const root = makeTempDir();
    const archive = createFakeArchive(caseScript());
    await crawlCase(crawlDeps(archive.launcher).deps, { caseIdentifier: CASE_NUMBER, resume: true, outputRoot: root });
    fs.rmSync(path.join(root, CASE_DIR_NAME, "_progress.json"));
    archive.attachments.delete(doc("c2"));
    const { deps, lines } = crawlDeps(archive.launcher, { maxFetchRetries: 1, verifyDocumentsOnStartup: false });

    const outcome = await crawlCase(deps, { caseIdentifier: CASE_NUMBER, resume: true, outputRoot: root });

    expect(outcome).toMatchObject({ fetched: 5, skipped: 1 });
    expect(documentFiles(root)).not.toContain("c2.json");
    expect(fs.existsSync(path.join(root, CASE_DIR_NAME, "raw", "c2.pdf"))).toBe(false);
    expect(lines.some((line) => line.includes('"msg":"stale_document_removed"'))).toBe(true);
  });

  it("pauses on a throttling notice during discovery without fetching", async () => {
    const root = makeTempDir();
    const archive = createFakeArchive(caseScript({ throttleOnEfilePage: 2 }));
    const { deps, metrics } = crawlDeps(archive.launcher);

    const outcome = await crawlCase(deps, { caseIdentifier: CASE_NUMBER, resume: true, outputRoot: root });

    const reason = 'Rate limited at electronic_case page 2: page contains "Слишком много запросов"';
    expect(outcome).toMatchObject({ status: "paused", fetched: 0, pausedReason: reason });
    expect(archive.capturePages()).toEqual([]);
    expect(archive.primaryPages()[0].visited).toEqual([BASE, `${BASE}Card/${CASE_GUID}`]);
    expect(fs.existsSync(path.join(root, CASE_DIR_NAME, "case.json"))).toBe(false);
    expect(fs.existsSync(path.join(root, CASE_DIR_NAME, "README.md"))).toBe(false);
    expect(progressFile(root)).toMatchObject({
      completedDocumentIdentities: [],
      pausedReason: reason,
      lastOutcome: { status: "paused", reason },
    });
    expect(metrics.getCounter("rate_limited")).toBe(1);
  });

  it("clears the pause and finishes on the next run", async () => {
    const root = makeTempDir();
    const throttled = createFakeArchive(caseScript({ throttleOnEfilePage: 2 }));
    await crawlCase(crawlDeps(throttled.launcher).deps, { caseIdentifier: CASE_NUMBER, resume: true, outputRoot: root });

    const archive = createFakeArchive(caseScript());
    const outcome = await crawlCase(crawlDeps(archive.launcher).deps, { caseIdentifier: CASE_NUMBER, resume: true, outputRoot: root });

    expect(outcome).toMatchObject({ status: "completed", fetched: 6 });
    expect(progressFile(root)).not.toHaveProperty("pausedReason");
  });

  it("pauses mid-fetch and leaves the remaining documents for the next run", async () => {
    const root = makeTempDir();
    const archive = createFakeArchive(caseScript());
    archive.attachments.delete(doc("e1"));
    archive.throttled.add(doc("e1"));
    const { deps } = crawlDeps(archive.launcher);

    const outcome = await crawlCase(deps, { caseIdentifier: CASE_NUMBER, resume: true, outputRoot: root });

    const reason = `Rate limited at ${doc("e1")}: page contains "Слишком много запросов"`;
    expect(outcome).toMatchObject({ status: "paused", fetched: 4, skipped: 0, pausedReason: reason });
    expect(documentFiles(root)).toEqual(["a1.json", "a2.json", "c1.json", "c2.json"]);
    expect(capturedUrls(archive).flat()).not.toContain(doc("e2"));
    expect(progressFile(root)).toMatchObject({
      completedDocumentIdentities: ["a1", "a2", "c1", "c2"].map(key),
      pausedReason: reason,
    });
  });

  it("skips a document permanently once its retries are spent", async () => {
    const root = makeTempDir();
    const archive = createFakeArchive(caseScript());
    archive.attachments.delete(doc("c2"));
    const { deps, metrics } = crawlDeps(archive.launcher, { maxFetchRetries: 2 });

    const outcome = await crawlCase(deps, { caseIdentifier: CASE_NUMBER, resume: true, outputRoot: root });

    expect(outcome).toMatchObject({ status: "completed", fetched: 5, skipped: 1 });
    expect(capturedUrls(archive).filter(([url]) => url === doc("c2"))).toHaveLength(2);
    expect(documentFiles(root)).not.toContain("c2.json");
    expect(progressFile(root)).toMatchObject({
      completedDocumentIdentities: ["a1", "a2", "c1", "c2", "e1", "e2"].map(key),
      permanentlySkipped: {
        [key("c2")]: { reason: `CaptureTimeout: No attachment response for ${doc("c2")} within 50ms`, at: NOW },
      },
    });
    expect(metrics.getCounter("captures_failed")).toBe(2);
    expect(metrics.getCounter("docs_skipped")).toBe(1);
    expect(readmeLines(root)).toEqual(expect.arrayContaining(["| Downloaded | 5 |", "| Failed | 1 |"]));

    const again = createFakeArchive(caseScript());
    const resumed = await crawlCase(crawlDeps(again.launcher).deps, { caseIdentifier: CASE_NUMBER, resume: true, outputRoot: root });
    expect(resumed).toMatchObject({ fetched: 0, alreadyDone: 6 });
  });

  it("retries the challenge with a fresh browser", async () => {
    const root = makeTempDir();
    const archive = createFakeArchive(caseScript());
    const blocked = new FakeSession(() => new FakePage());
    let launches = 0;
    const launcher: BrowserLauncher = {
      launch: async () => {
        launches += 1;
        return launches === 1 ? blocked : archive.launcher.launch();
      },
    };
    const { deps } = crawlDeps(launcher);

    const outcome = await crawlCase(deps, { caseIdentifier: CASE_NUMBER, resume: true, outputRoot: root });

    expect(outcome).toMatchObject({ status: "completed", fetched: 6 });
    expect(blocked.closed).toBe(true);
    expect(launches).toBe(2);
  });

  it("relaunches the browser when a navigation times out during discovery", async () => {
    const root = makeTempDir();
    const archive = createFakeArchive(caseScript());
    archive.failCardVisits(1);
    const { deps, lines } = crawlDeps(archive.launcher);

    const outcome = await crawlCase(deps, { caseIdentifier: CASE_NUMBER, resume: true, outputRoot: root });

    expect(outcome).toMatchObject({ status: "completed", fetched: 6 });
    expect(archive.launcher.sessions).toHaveLength(2);
    expect(archive.launcher.sessions[0].closed).toBe(true);
    expect(archive.primaryPages()[0].visited).toEqual([BASE, `${BASE}Card/${CASE_GUID}`]);
    expect(lines.some((line) => line.includes('"msg":"session_retry"') && line.includes("page.goto: Timeout 30000ms exceeded"))).toBe(true);
  });

  it("gives up after the last attempt when navigation keeps failing", async () => {
    const store = new InMemoryProgressStore();
    const archive = createFakeArchive(caseScript());
    archive.failCardVisits(5);
    const { deps } = crawlDeps(archive.launcher, { maxChallengeAttempts: 2 }, { progressStore: store });

    await expect(crawlCase(deps, { caseIdentifier: CASE_NUMBER, resume: true, outputRoot: makeTempDir() })).rejects.toThrow(
      "page.goto: Timeout 30000ms exceeded",
    );
    expect(archive.launcher.sessions).toHaveLength(2);
    expect(archive.launcher.sessions.every((session) => session.closed)).toBe(true);
    expect(store.peek(CASE_NUMBER)?.lastOutcome).toMatchObject({ status: "failed", code: "Fatal" });
  });

  it("takes a break and rewarms after consecutive failures", async () => {
    const root = makeTempDir();
    const archive = createFakeArchive(caseScript());
    archive.attachments.delete(doc("c1"));
    archive.attachments.delete(doc("c2"));
    const { deps, metrics, lines } = crawlDeps(archive.launcher, { maxFetchRetries: 1, consecutiveFailuresBeforeRewarm: 2 });

    const outcome = await crawlCase(deps, { caseIdentifier: CASE_NUMBER, resume: true, outputRoot: root });

    expect(outcome).toMatchObject({ status: "completed", fetched: 4, skipped: 2 });
    expect(lines.filter((line) => line.includes('"msg":"consecutive_failures_break"'))).toHaveLength(1);
    expect(metrics.getCounter("rewarms")).toBe(2);
    expect(archive.capturePages().map((page) => page.visited[0])).toEqual([
      doc("a1"),
      doc("a1"),
      doc("a2"),
      doc("c1"),
      doc("c2"),
      doc("e1"),
      doc("e1"),
      doc("e2"),
    ]);
  });

  it("stops fetching on interrupt and records what was done", async () => {
    const root = makeTempDir();
    const controller = new AbortController();
    const archive = createFakeArchive(caseScript());
    let extracted = 0;
    const { deps } = crawlDeps(archive.launcher, {}, {
      signal: controller.signal,
      textExtractor: async (body) => {
        extracted += 1;
        if (extracted === 2) {
          controller.abort();
        }
        return { text: body.toString("utf-8"), pageCount: 1 };
      },
    });

    const outcome = await crawlCase(deps, { caseIdentifier: CASE_NUMBER, resume: true, outputRoot: root });

    expect(outcome).toMatchObject({ status: "interrupted", fetched: 2, skipped: 0, totalUnique: 6 });
    expect(capturedUrls(archive)).toEqual([[doc("a1")], [doc("a1")], [doc("a2")]]);
    expect(documentFiles(root)).toEqual(["a1.json", "a2.json"]);
    expect(progressFile(root)).toMatchObject({
      completedDocumentIdentities: [key("a1"), key("a2")],
      lastOutcome: { status: "interrupted", at: NOW },
    });
    expect(archive.launcher.sessions.every((session) => session.closed)).toBe(true);
    expect(readmeLines(root)).toEqual(expect.arrayContaining([`- Last crawl: interrupted at ${NOW}`, "| Pending | 4 |"]));
  });

  it("takes a pacing break and rewarms after every few documents", async () => {
    const archive = createFakeArchive(caseScript());
    const { deps, metrics } = crawlDeps(archive.launcher, { docsBeforeBreak: 2 });

    await crawlCase(deps, { caseIdentifier: CASE_NUMBER, resume: true, outputRoot: makeTempDir() });

    expect(metrics.getCounter("rewarms")).toBe(3);
  });

  it("fetches everything with several capture workers", async () => {
    const root = makeTempDir();
    const archive = createFakeArchive(caseScript());
    const { deps } = crawlDeps(archive.launcher, { captureConcurrency: 3 });

    const outcome = await crawlCase(deps, { caseIdentifier: CASE_NUMBER, resume: true, outputRoot: root });

    expect(outcome).toMatchObject({ status: "completed", fetched: 6 });
    expect(documentFiles(root)).toHaveLength(6);
  });

  it("records a fatal write failure and rethrows it", async () => {
    class FailingSink extends CaseDirectorySink {
      async writeDocument(): Promise<string> {
        throw new Error("disk full");
      }
    }
    const store = new InMemoryProgressStore();
    const archive = createFakeArchive(caseScript());
    const { deps } = crawlDeps(archive.launcher, {}, {
      progressStore: store,
      sinkFactory: (outputRoot, caseNumber, logger) => new FailingSink(outputRoot, caseNumber, logger),
    });

    await expect(crawlCase(deps, { caseIdentifier: CASE_NUMBER, resume: true, outputRoot: makeTempDir() })).rejects.toThrow("disk full");
    expect(store.peek(CASE_NUMBER)).toMatchObject({
      completedDocumentIdentities: [],
      lastOutcome: { status: "failed", code: "Fatal", reason: "disk full" },
    });
    expect(capturedUrls(archive)).toEqual([[doc("a1")], [doc("a1")]]);
  });

  it("records a case that cannot be found", async () => {
    const store = new InMemoryProgressStore();
    const archive = createFakeArchive(caseScript({ suggestions: [] }));
    const { deps } = crawlDeps(archive.launcher, {}, { progressStore: store });

    await expect(crawlCase(deps, { caseIdentifier: CASE_NUMBER, resume: true, outputRoot: makeTempDir() })).rejects.toBeInstanceOf(
      NotFoundError,
    );
    expect(store.peek(CASE_NUMBER)?.lastOutcome).toMatchObject({ status: "failed", code: "NotFound" });
  });

  it("rejects an invalid case number before touching disk or browser", async () => {
    const root = makeTempDir();
    const archive = createFakeArchive(caseScript());
    const { deps } = crawlDeps(archive.launcher);

    await expect(crawlCase(deps, { caseIdentifier: "40-1/2024", resume: true, outputRoot: root })).rejects.toBeInstanceOf(
      InvalidCaseNumberError,
    );
    expect(archive.launcher.sessions).toHaveLength(0);
    expect(fs.readdirSync(root)).toEqual([]);
  });

  it("returns interrupted when the signal is already aborted", async () => {
    const store = new InMemoryProgressStore();
    const controller = new AbortController();
    controller.abort();
    const archive = createFakeArchive(caseScript());
    const { deps } = crawlDeps(archive.launcher, {}, { progressStore: store, signal: controller.signal });

    const outcome = await crawlCase(deps, { caseIdentifier: CASE_NUMBER, resume: true, outputRoot: makeTempDir() });

    expect(outcome).toMatchObject({ status: "interrupted", fetched: 0, totalUnique: 0 });
    expect(archive.launcher.sessions).toHaveLength(0);
    expect(store.peek(CASE_NUMBER)?.lastOutcome).toMatchObject({ status: "interrupted" });
  });
});
