import type { ProgressState, SkipMarker, TerminalOutcome } from "../types";
import type { ProgressStore, SerializedProgress } from "./types";

export const PROGRESS_FILE = "_progress.json";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function parseOutcome(value: unknown): TerminalOutcome | undefined {
  if (!isRecord(value) || typeof value.at !== "string") {
    return undefined;
  }
  const status = value.status;
  if (status !== "completed" && status !== "paused" && status !== "interrupted" && status !== "failed") {
    return undefined;
  }
  return { status, code: optionalString(value.code), reason: optionalString(value.reason), at: value.at };
}

export function emptyProgress(caseIdentifier: string, now: Date = new Date()): ProgressState {
  return {
    caseIdentifier,
    completedDocumentIdentities: new Set(),
    permanentlySkipped: new Map(),
    lastUpdated: now.toISOString(),
  };
}

export function serializeProgress(state: ProgressState): SerializedProgress {
  const skipped = [...state.permanentlySkipped.entries()].sort(([a], [b]) => a.localeCompare(b));
  return {
    caseIdentifier: state.caseIdentifier,
    completedDocumentIdentities: [...state.completedDocumentIdentities].sort(),
    permanentlySkipped: Object.fromEntries(skipped),
    lastUpdated: state.lastUpdated,
    pausedReason: state.pausedReason,
    lastOutcome: state.lastOutcome,
  };
}

/** Rebuilds state from parsed checkpoint JSON. Skipped identities always count as completed. */
export function parseProgress(raw: unknown, source: string): ProgressState {
  if (!isRecord(raw)) {
    throw new Error(`Checkpoint ${source} is not a JSON object`);
  }
  const caseIdentifier = raw.caseIdentifier;
  const completed = raw.completedDocumentIdentities;
  if (typeof caseIdentifier !== "string" || !Array.isArray(completed)) {
    throw new Error(`Checkpoint ${source} is missing caseIdentifier or completedDocumentIdentities`);
  }

  const completedDocumentIdentities = new Set<string>();
  for (const key of completed) {
    if (typeof key === "string") {
      completedDocumentIdentities.add(key);
    }
  }

  const permanentlySkipped = new Map<string, SkipMarker>();
  if (isRecord(raw.permanentlySkipped)) {
    for (const [key, marker] of Object.entries(raw.permanentlySkipped)) {
      if (isRecord(marker) && typeof marker.reason === "string" && typeof marker.at === "string") {
        permanentlySkipped.set(key, { reason: marker.reason, at: marker.at });
        completedDocumentIdentities.add(key);
      }
    }
  }

  return {
    caseIdentifier,
    completedDocumentIdentities,
    permanentlySkipped,
    lastUpdated: optionalString(raw.lastUpdated) ?? new Date(0).toISOString(),
    pausedReason: optionalString(raw.pausedReason),
    lastOutcome: parseOutcome(raw.lastOutcome),
  };
}

export interface ReconcileResult {
  /** Document files found on disk that the checkpoint did not list. */
  adopted: string[];
  /** Identities marked done whose document file is gone. */
  dropped: string[];
}

/**
 * In-memory owner of one case's progress. Marks only ever add; commits are
 * chained so the checkpoint has a single writer even when fetches overlap.
 */
export class ProgressLedger {
  private readonly store: ProgressStore;
  private readonly state: ProgressState;
  private readonly now: () => Date;
  private pending: Promise<void> = Promise.resolve();

  constructor(store: ProgressStore, state: ProgressState, now: () => Date = () => new Date()) {
    this.store = store;
    this.state = state;
    this.now = now;
  }

  static async open(store: ProgressStore, caseIdentifier: string, now: () => Date = () => new Date()): Promise<ProgressLedger> {
    const loaded = await store.load(caseIdentifier);
    return new ProgressLedger(store, loaded ?? emptyProgress(caseIdentifier, now()), now);
  }

  get caseIdentifier(): string {
    return this.state.caseIdentifier;
  }

  get pausedReason(): string | undefined {
    return this.state.pausedReason;
  }

  isCompleted(key: string): boolean {
    return this.state.completedDocumentIdentities.has(key);
  }

  isSkipped(key: string): boolean {
    return this.state.permanentlySkipped.has(key);
  }

  doneKeys(): string[] {
    return [...this.state.completedDocumentIdentities].filter((key) => !this.isSkipped(key));
  }

  /** Returns false when the identity was already completed. */
  markDone(key: string): boolean {
    if (this.isCompleted(key)) {
      return false;
    }
    this.state.completedDocumentIdentities.add(key);
    return true;
  }

  markPermanentlySkipped(key: string, reason: string): boolean {
    if (this.isCompleted(key)) {
      return false;
    }
    this.state.completedDocumentIdentities.add(key);
    this.state.permanentlySkipped.set(key, { reason, at: this.now().toISOString() });
    return true;
  }

  pause(reason: string): void {
    this.state.pausedReason = reason;
  }

  clearPause(): void {
    this.state.pausedReason = undefined;
  }

  recordOutcome(outcome: Omit<TerminalOutcome, "at">): void {
    this.state.lastOutcome = { ...outcome, at: this.now().toISOString() };
  }

  /**
   * Aligns the checkpoint with the document files on disk before a run
   * starts. Never called mid-run, so marks stay monotonic within a run.
   */
  reconcile(documentKeys: Iterable<string>): ReconcileResult {
    const onDisk = new Set(documentKeys);
    const adopted: string[] = [];
    const dropped: string[] = [];

    for (const key of onDisk) {
      if (this.isSkipped(key)) {
        continue;
      }
      if (this.markDone(key)) {
        adopted.push(key);
      }
    }
    for (const key of this.doneKeys()) {
      if (!onDisk.has(key)) {
        this.state.completedDocumentIdentities.delete(key);
        dropped.push(key);
      }
    }
    return { adopted, dropped };
  }

  snapshot(): ProgressState {
    return {
      ...this.state,
      completedDocumentIdentities: new Set(this.state.completedDocumentIdentities),
      permanentlySkipped: new Map(this.state.permanentlySkipped),
    };
  }

  /** Queues a commit of the state as it stands when the write starts. */
  commit(): Promise<void> {
    const write = (): Promise<void> => {
      this.state.lastUpdated = this.now().toISOString();
      return this.store.commit(this.state.caseIdentifier, this.snapshot());
    };
    const next = this.pending.then(write, write);
    this.pending = next;
    return next;
  }
}
