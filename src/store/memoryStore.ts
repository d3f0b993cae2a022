import type { ProgressState } from "../types";
import { parseProgress, serializeProgress } from "./progressStore";
import type { ProgressStore, SerializedProgress } from "./types";

/** Keeps checkpoints in serialized form so callers never share state with the store. */
export class InMemoryProgressStore implements ProgressStore {
  private readonly checkpoints = new Map<string, SerializedProgress>();
  readonly archived: SerializedProgress[] = [];
  commits = 0;

  async load(caseIdentifier: string): Promise<ProgressState | undefined> {
    const stored = this.checkpoints.get(caseIdentifier);
    return stored ? parseProgress(stored, `memory:${caseIdentifier}`) : undefined;
  }

  async commit(caseIdentifier: string, state: ProgressState): Promise<void> {
    this.commits += 1;
    this.checkpoints.set(caseIdentifier, serializeProgress(state));
  }

  async archive(caseIdentifier: string): Promise<string | undefined> {
    const stored = this.checkpoints.get(caseIdentifier);
    if (!stored) {
      return undefined;
    }
    this.checkpoints.delete(caseIdentifier);
    this.archived.push(stored);
    return `memory:${caseIdentifier}#${this.archived.length}`;
  }

  peek(caseIdentifier: string): SerializedProgress | undefined {
    return this.checkpoints.get(caseIdentifier);
  }
}
