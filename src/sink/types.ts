import type { CaseRecord, DocumentReference, FetchedDocument, InstanceRecord, SourceTab } from "../types";
import type { CaseReadme } from "./readme";

export interface ListedReference extends DocumentReference {
  identity: string;
}

export interface TabWarning {
  tab: SourceTab;
  message: string;
}

/** Contents of `case.json`. */
export interface CaseSummaryFile {
  case: CaseRecord;
  instances: InstanceRecord[];
  referenceCounts: Record<SourceTab, number>;
  uniqueDocuments: number;
  /** First identity seen per tab, and per instance as `cards:<instanceId>`. */
  fingerprints: Record<string, string>;
  parseWarnings: TabWarning[];
  crawledAt: string;
}

export interface CaseSink {
  readonly caseDir: string;
  writeCase(summary: CaseSummaryFile): Promise<void>;
  writeTabList(tab: SourceTab, references: ListedReference[]): Promise<void>;
  writeInstance(instance: InstanceRecord, references: ListedReference[]): Promise<void>;
  writeReadme(readme: CaseReadme): Promise<void>;
  writeDocument(document: FetchedDocument): Promise<string>;
  writeRaw(identity: string, body: Buffer): Promise<string>;
  /** Deletes the document file and raw copy of an identity. Returns false when there was no document file. */
  removeDocument(identity: string): Promise<boolean>;
  /** Renames `documents/` and `raw/` to `<dir>.<stamp>`; returns the new paths. */
  archiveDocuments(stamp: string): Promise<string[]>;
  /** Identity keys of every document file already on disk. */
  listDocumentIdentities(): Promise<string[]>;
}
