import type { CaseRecord, InstanceRecord, OutcomeStatus } from "../types";

export interface InstanceSummary {
  instance: InstanceRecord;
  documents: number;
  /** Highest pager page the instance listed; 0 when only header documents exist. */
  pages: number;
}

/** Inputs of the per-case `README.md`. Counts cover this case's unique documents. */
export interface CaseReadme {
  case: CaseRecord;
  outcome: OutcomeStatus;
  updatedAt: string;
  totalDocuments: number;
  downloaded: number;
  failed: number;
  instances: InstanceSummary[];
}

function cell(value: string | null): string {
  const text = (value ?? "").replace(/\s+/g, " ").replace(/\|/g, "\\|").trim();
  return text.length > 0 ? text : "-";
}

function instanceRows(instances: InstanceSummary[]): string[] {
  if (instances.length === 0) {
    return ["No instances listed on the cards tab."];
  }
  return [
    "| # | Type | Court | Documents | Pages |",
    "|---|------|-------|-----------|-------|",
    ...instances.map(
      ({ instance, documents, pages }) =>
        `| ${instance.order} | ${cell(instance.instanceType)} | ${cell(instance.courtName)} | ${documents} | ${pages} |`,
    ),
  ];
}

export function renderReadme(readme: CaseReadme): string {
  const record = readme.case;
  const pending = readme.totalDocuments - readme.downloaded - readme.failed;

  return [
    `# Case ${record.caseNumber}`,
    "",
    `- GUID: \`${record.caseGuid}\``,
    `- Status: ${cell(record.status)}`,
    `- Card: [${record.caseNumber}](${record.cardUrl})`,
    `- Last crawl: ${readme.outcome} at ${readme.updatedAt}`,
    "",
    "## Documents",
    "",
    "| Metric | Value |",
    "|--------|-------|",
    `| Unique documents | ${readme.totalDocuments} |`,
    `| Downloaded | ${readme.downloaded} |`,
    `| Failed | ${readme.failed} |`,
    `| Pending | ${pending} |`,
    `| Instances | ${readme.instances.length} |`,
    "",
    "## Layout",
    "",
    "- [`case.json`](case.json): case metadata, reference counts and fingerprints",
    "- [`court_acts.json`](court_acts.json), [`cards.json`](cards.json), [`electronic_case.json`](electronic_case.json): references per tab",
    "- [`instances/`](instances/): one file per instance of the cards tab",
    "- [`documents/`](documents/): extracted text, one file per unique document",
    "- [`_progress.json`](_progress.json): crawl checkpoint, including the reasons for failed documents",
    "",
    "Documents with `requiresManualReview: true` are scans without a text layer.",
    "",
    "## Instances",
    "",
    ...instanceRows(readme.instances),
    "",
  ].join("\n");
}
