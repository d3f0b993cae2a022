export type SourceTab = "court_acts" | "cards" | "electronic_case";

export const SOURCE_TABS: readonly SourceTab[] = ["court_acts", "cards", "electronic_case"];

export interface CaseParties {
  plaintiffs: string[];
  defendants: string[];
  thirdParties: string[];
}

export interface CaseRecord {
  readonly caseNumber: string;
  readonly caseGuid: string;
  readonly status: string | null;
  readonly cardUrl: string;
  readonly parties: CaseParties;
  readonly searchResultFields: Readonly<Record<string, string>>;
}

export interface InstanceRecord {
  readonly instanceId: string;
  readonly order: number;
  readonly instanceType: string;
  readonly courtCode: string | null;
  readonly courtName: string | null;
  readonly regDate: string | null;
  readonly caseNumber: string | null;
}

export type DocumentIdentity =
  | { readonly kind: "guid"; readonly key: string; readonly caseGuid: string; readonly docGuid: string }
  | { readonly kind: "digest"; readonly key: string; readonly digest: string };

/** Metadata parsed from the row that links to an attachment. */
export interface RowMetadata {
  readonly title: string | null;
  readonly date: string | null;
  readonly docType: string | null;
  readonly judge: string | null;
  readonly court: string | null;
  readonly signed: boolean;
  readonly signatureValid: boolean;
}

export interface DocumentReference extends RowMetadata {
  readonly stage: "reference";
  readonly caseGuid: string;
  readonly docGuid: string;
  readonly url: string;
  readonly filename: string;
  readonly sourceTab: SourceTab;
  readonly instanceId?: string;
  /** 0 for documents pinned in an instance header, otherwise the pager page. */
  readonly page: number;
  /** 1-based index within the page, and running index within the tab or instance. */
  readonly positionOnPage: number;
  readonly position: number;
}

export interface ExtractedContent {
  readonly text: string;
  readonly byteLength: number;
  readonly sha256: string;
  readonly rawLocation?: string;
}

export interface FetchedDocument extends Omit<DocumentReference, "stage"> {
  readonly stage: "fetched";
  readonly identity: string;
  readonly sourceTabs: SourceTab[];
  readonly text: string;
  readonly charCount: number;
  readonly requiresManualReview: boolean;
  readonly byteLength: number;
  readonly sha256: string;
  readonly rawLocation?: string;
  readonly fetchedAt: string;
}

export interface SkipMarker {
  readonly reason: string;
  readonly at: string;
}

export type OutcomeStatus = "completed" | "paused" | "interrupted" | "failed";

export interface TerminalOutcome {
  readonly status: OutcomeStatus;
  readonly code?: string;
  readonly reason?: string;
  readonly at: string;
}

export interface ProgressState {
  caseIdentifier: string;
  /** Identity keys that are fetched or permanently skipped. */
  completedDocumentIdentities: Set<string>;
  permanentlySkipped: Map<string, SkipMarker>;
  lastUpdated: string;
  pausedReason?: string;
  lastOutcome?: TerminalOutcome;
}
