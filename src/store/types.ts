import type { ProgressState, SkipMarker, TerminalOutcome } from "../types";

/** On-disk shape of `_progress.json`. */
export interface SerializedProgress {
  caseIdentifier: string;
  completedDocumentIdentities: string[];
  permanentlySkipped: Record<string, SkipMarker>;
  lastUpdated: string;
  pausedReason?: string;
  lastOutcome?: TerminalOutcome;
}

export interface ProgressStore {
  load(caseIdentifier: string): Promise<ProgressState | undefined>;
  /** Replaces the checkpoint in one step; a crash leaves the previous one intact. */
  commit(caseIdentifier: string, state: ProgressState): Promise<void>;
  /** Moves an existing checkpoint aside so the next run starts fresh. Returns where it went. */
  archive(caseIdentifier: string): Promise<string | undefined>;
}
