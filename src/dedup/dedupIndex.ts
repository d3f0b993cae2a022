import { identityFromUrl } from "../documents";
import type { DocumentIdentity, DocumentReference, SourceTab } from "../types";

export interface Admission {
  isNew: boolean;
  identity: DocumentIdentity;
}

export interface DedupEntry {
  identity: DocumentIdentity;
  /** The reference admitted first; later duplicates only extend `sourceTabs`. */
  reference: DocumentReference;
  sourceTabs: SourceTab[];
}

/**
 * Collapses references that point at the same document. Built fresh for
 * each run and never written to disk.
 */
export class DedupIndex {
  private readonly marker: string;
  private readonly entriesByKey = new Map<string, DedupEntry>();

  constructor(attachmentMarker: string) {
    this.marker = attachmentMarker;
  }

  admit(reference: DocumentReference): Admission {
    const identity = identityFromUrl(reference.url, this.marker);
    const existing = this.entriesByKey.get(identity.key);
    if (existing) {
      if (!existing.sourceTabs.includes(reference.sourceTab)) {
        existing.sourceTabs.push(reference.sourceTab);
      }
      return { isNew: false, identity: existing.identity };
    }

    this.entriesByKey.set(identity.key, { identity, reference, sourceTabs: [reference.sourceTab] });
    return { isNew: true, identity };
  }

  sourceTabsOf(key: string): SourceTab[] {
    return [...(this.entriesByKey.get(key)?.sourceTabs ?? [])];
  }

  /** Entries in first-admission order. */
  entries(): DedupEntry[] {
    return [...this.entriesByKey.values()];
  }

  get size(): number {
    return this.entriesByKey.size;
  }
}
