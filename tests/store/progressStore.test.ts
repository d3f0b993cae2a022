import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { InMemoryProgressStore, JsonFileProgressStore, ProgressLedger, parseProgress, serializeProgress } from "../../src/store";
import { makeTempDir, readJson } from "../helpers/testEnv";

const CASE = "А40-1/2024";
const fixedNow = () => new Date("2024-05-01T10:00:00.000Z");

describe("ProgressLedger", () => {
  it("only ever adds marks", async () => {
    const ledger = await ProgressLedger.open(new InMemoryProgressStore(), CASE, fixedNow);

    expect(ledger.markDone("c/d1")).toBe(true);
    expect(ledger.markDone("c/d1")).toBe(false);
    expect(ledger.markPermanentlySkipped("c/d1", "CaptureTimeout")).toBe(false);
    expect(ledger.markPermanentlySkipped("c/d2", "CaptureTimeout: no response")).toBe(true);

    expect(ledger.isCompleted("c/d1")).toBe(true);
    expect(ledger.isCompleted("c/d2")).toBe(true);
    expect(ledger.isSkipped("c/d2")).toBe(true);
    expect(ledger.doneKeys()).toEqual(["c/d1"]);
  });

  it("restores the same state from a committed checkpoint", async () => {
    const store = new InMemoryProgressStore();
    const ledger = await ProgressLedger.open(store, CASE, fixedNow);
    ledger.markDone("c/d1");
    ledger.markPermanentlySkipped("c/d2", "CaptureEmpty");
    ledger.pause("Rate limited at search form");
    await ledger.commit();

    const reopened = await ProgressLedger.open(store, CASE, fixedNow);

    expect(reopened.isCompleted("c/d1")).toBe(true);
    expect(reopened.isSkipped("c/d2")).toBe(true);
    expect(reopened.pausedReason).toBe("Rate limited at search form");
    expect(store.peek(CASE)).toEqual({
      caseIdentifier: CASE,
      completedDocumentIdentities: ["c/d1", "c/d2"],
      permanentlySkipped: { "c/d2": { reason: "CaptureEmpty", at: "2024-05-01T10:00:00.000Z" } },
      lastUpdated: "2024-05-01T10:00:00.000Z",
      pausedReason: "Rate limited at search form",
      lastOutcome: undefined,
    });
  });

  it("serializes overlapping commits", async () => {
    const store = new InMemoryProgressStore();
    const ledger = await ProgressLedger.open(store, CASE, fixedNow);

    ledger.markDone("c/d1");
    const first = ledger.commit();
    ledger.markDone("c/d2");
    const second = ledger.commit();
    await Promise.all([first, second]);

    expect(store.commits).toBe(2);
    expect(store.peek(CASE)?.completedDocumentIdentities).toEqual(["c/d1", "c/d2"]);
  });

  it("reconciles against document files on disk", async () => {
    const ledger = await ProgressLedger.open(new InMemoryProgressStore(), CASE, fixedNow);
    ledger.markDone("c/kept");
    ledger.markDone("c/lost");
    ledger.markPermanentlySkipped("c/skipped", "CaptureTimeout");

    const result = ledger.reconcile(["c/kept", "c/orphan"]);

    expect(result).toEqual({ adopted: ["c/orphan"], dropped: ["c/lost"] });
    expect(ledger.isCompleted("c/lost")).toBe(false);
    expect(ledger.isCompleted("c/orphan")).toBe(true);
    expect(ledger.isCompleted("c/skipped")).toBe(true);
  });

  it("records the terminal outcome with a timestamp", async () => {
    const store = new InMemoryProgressStore();
    const ledger = await ProgressLedger.open(store, CASE, fixedNow);
    ledger.recordOutcome({ status: "failed", code: "ChallengeFailed", reason: "blocked" });
    await ledger.commit();

    expect(store.peek(CASE)?.lastOutcome).toEqual({
      status: "failed",
      code: "ChallengeFailed",
      reason: "blocked",
      at: "2024-05-01T10:00:00.000Z",
    });
  });
});

describe("parseProgress", () => {
  it("counts skipped identities as completed and fills defaults", () => {
    const state = parseProgress(
      {
        caseIdentifier: CASE,
        completedDocumentIdentities: ["c/d1", 7],
        permanentlySkipped: { "c/d2": { reason: "CaptureEmpty", at: "2024-01-01T00:00:00.000Z" }, "c/d3": "bad" },
      },
      "test",
    );

    expect([...state.completedDocumentIdentities].sort()).toEqual(["c/d1", "c/d2"]);
    expect([...state.permanentlySkipped.keys()]).toEqual(["c/d2"]);
    expect(state.lastUpdated).toBe("1970-01-01T00:00:00.000Z");
    expect(state.lastOutcome).toBeUndefined();
  });

  it("rejects checkpoints without the required fields", () => {
    expect(() => parseProgress([], "a.json")).toThrow("Checkpoint a.json is not a JSON object");
    expect(() => parseProgress({ caseIdentifier: CASE }, "a.json")).toThrow(
      "Checkpoint a.json is missing caseIdentifier or completedDocumentIdentities",
    );
  });

  it("sorts identities when serializing", () => {
    const state = parseProgress({ caseIdentifier: CASE, completedDocumentIdentities: ["c/b", "c/a"] }, "test");
    expect(serializeProgress(state).completedDocumentIdentities).toEqual(["c/a", "c/b"]);
  });
});

describe("JsonFileProgressStore", () => {
  it("writes the checkpoint atomically inside the case directory", async () => {
    const root = makeTempDir();
    const store = new JsonFileProgressStore(root);
    const ledger = await ProgressLedger.open(store, CASE, fixedNow);
    ledger.markDone("c/d1");
    await ledger.commit();

    const caseDir = path.join(root, "case_А40-1-2024");
    expect(store.pathFor(CASE)).toBe(path.join(caseDir, "_progress.json"));
    expect(fs.readdirSync(caseDir)).toEqual(["_progress.json"]);
    expect(readJson(path.join(caseDir, "_progress.json"))).toMatchObject({
      caseIdentifier: CASE,
      completedDocumentIdentities: ["c/d1"],
      permanentlySkipped: {},
    });
  });

  it("loads nothing for a case without a checkpoint", async () => {
    await expect(new JsonFileProgressStore(makeTempDir()).load(CASE)).resolves.toBeUndefined();
  });

  it("produces the same completed set when resumed twice", async () => {
    const store = new JsonFileProgressStore(makeTempDir());
    const ledger = await ProgressLedger.open(store, CASE, fixedNow);
    ledger.markDone("c/d1");
    ledger.markPermanentlySkipped("c/d2", "CaptureTimeout");
    await ledger.commit();

    const once = await ProgressLedger.open(store, CASE, fixedNow);
    await once.commit();
    const twice = await ProgressLedger.open(store, CASE, fixedNow);

    expect(twice.snapshot()).toEqual(once.snapshot());
  });

  it("moves an old checkpoint aside instead of deleting it", async () => {
    const root = makeTempDir();
    const store = new JsonFileProgressStore(root);
    const ledger = await ProgressLedger.open(store, CASE, fixedNow);
    await ledger.commit();

    const archived = await store.archive(CASE);

    expect(archived).toMatch(/_progress\.\d{4}-\d{2}-\d{2}T[\d-]+Z\.json$/);
    expect(archived !== undefined && fs.existsSync(archived)).toBe(true);
    await expect(store.load(CASE)).resolves.toBeUndefined();
    await expect(store.archive(CASE)).resolves.toBeUndefined();
  });
});
