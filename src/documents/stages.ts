import type {
  CaseRecord,
  DocumentReference,
  ExtractedContent,
  FetchedDocument,
  RowMetadata,
  SourceTab,
} from "../types";
import { dateFromFilename, docTypeFromFilename } from "./filenameMeta";
import { filenameFromUrl, identityFromUrl } from "./identity";

export const EMPTY_ROW_METADATA: RowMetadata = {
  title: null,
  date: null,
  docType: null,
  judge: null,
  court: null,
  signed: false,
  signatureValid: false,
};

export interface ReferenceInput {
  url: string;
  sourceTab: SourceTab;
  attachmentMarker: string;
  instanceId?: string;
  page?: number;
  positionOnPage?: number;
  position?: number;
  metadata?: Partial<RowMetadata>;
}

export function createReference(input: ReferenceInput): DocumentReference {
  const identity = identityFromUrl(input.url, input.attachmentMarker);
  const filename = filenameFromUrl(input.url);
  const metadata = { ...EMPTY_ROW_METADATA, ...input.metadata };

  return {
    ...metadata,
    date: metadata.date ?? dateFromFilename(filename),
    docType: metadata.docType ?? docTypeFromFilename(filename),
    stage: "reference",
    caseGuid: identity.kind === "guid" ? identity.caseGuid : "",
    docGuid: identity.kind === "guid" ? identity.docGuid : identity.digest,
    url: input.url,
    filename,
    sourceTab: input.sourceTab,
    instanceId: input.instanceId,
    page: input.page ?? 1,
    positionOnPage: input.positionOnPage ?? 0,
    position: input.position ?? input.positionOnPage ?? 0,
  };
}

export interface FetchContext {
  identity: string;
  sourceTabs: SourceTab[];
  minTextLengthForOcr: number;
  fetchedAt: string;
}

export function toFetched(reference: DocumentReference, content: ExtractedContent, context: FetchContext): FetchedDocument {
  const { stage: _stage, ...rest } = reference;
  const text = content.text.trim();

  return {
    ...rest,
    stage: "fetched",
    identity: context.identity,
    sourceTabs: [...context.sourceTabs],
    text,
    charCount: text.length,
    requiresManualReview: text.length < context.minTextLengthForOcr,
    byteLength: content.byteLength,
    sha256: content.sha256,
    rawLocation: content.rawLocation,
    fetchedAt: context.fetchedAt,
  };
}

export function withStatus(record: CaseRecord, status: string | null): CaseRecord {
  return { ...record, status };
}
