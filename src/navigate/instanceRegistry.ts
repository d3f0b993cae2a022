import type { InstanceRecord } from "../types";

export type InstanceDraft = Omit<InstanceRecord, "order">;

/**
 * Judicial instances seen on the cards tab. Records are only ever added:
 * re-parsing the tab returns the record registered first for an id.
 */
export class InstanceRegistry {
  private readonly records = new Map<string, InstanceRecord>();

  register(draft: InstanceDraft): InstanceRecord {
    const existing = this.records.get(draft.instanceId);
    if (existing) {
      return existing;
    }
    const record: InstanceRecord = { ...draft, order: this.records.size + 1 };
    this.records.set(record.instanceId, record);
    return record;
  }

  get(instanceId: string): InstanceRecord | undefined {
    return this.records.get(instanceId);
  }

  list(): InstanceRecord[] {
    return [...this.records.values()];
  }

  get size(): number {
    return this.records.size;
  }
}
