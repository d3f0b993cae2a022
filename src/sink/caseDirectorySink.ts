import fs from "node:fs";
import path from "node:path";
import { writeFileAtomic, writeJsonAtomic } from "../core/atomicWrite";
import { identityFileStem } from "../documents";
import type { Logger } from "../observability";
import { caseDirectoryName } from "../navigate/caseNumber";
import type { FetchedDocument, InstanceRecord, SourceTab } from "../types";
import type { CaseReadme } from "./readme";
import { renderReadme } from "./readme";
import type { CaseSink, CaseSummaryFile, ListedReference } from "./types";

const DOCUMENTS_DIR = "documents";
const INSTANCES_DIR = "instances";
const RAW_DIR = "raw";

export function instanceFileName(instance: InstanceRecord): string {
  const shortId = instance.instanceId.slice(0, 8).replace(/[^\w-]/g, "_");
  return `${String(instance.order).padStart(2, "0")}_${shortId}.json`;
}

function rawPath(identity: string): string {
  return path.join(RAW_DIR, `${identityFileStem(identity)}.pdf`);
}

/**
 * Lays a case out under `<outputRoot>/case_<number>/`. Every file is written
 * through a temp file and rename, so readers never see half a document.
 */
export class CaseDirectorySink implements CaseSink {
  readonly caseDir: string;
  private readonly logger: Logger;

  constructor(outputRoot: string, caseIdentifier: string, logger: Logger) {
    this.caseDir = path.join(path.resolve(outputRoot), caseDirectoryName(caseIdentifier));
    this.logger = logger;
  }

  async writeCase(summary: CaseSummaryFile): Promise<void> {
    await writeJsonAtomic(path.join(this.caseDir, "case.json"), summary);
  }

  async writeTabList(tab: SourceTab, references: ListedReference[]): Promise<void> {
    await writeJsonAtomic(path.join(this.caseDir, `${tab}.json`), {
      tab,
      count: references.length,
      documents: references,
    });
  }

  async writeInstance(instance: InstanceRecord, references: ListedReference[]): Promise<void> {
    await writeJsonAtomic(path.join(this.caseDir, INSTANCES_DIR, instanceFileName(instance)), {
      instance,
      count: references.length,
      documents: references,
    });
  }

  async writeReadme(readme: CaseReadme): Promise<void> {
    await writeFileAtomic(path.join(this.caseDir, "README.md"), renderReadme(readme));
  }

  async writeDocument(document: FetchedDocument): Promise<string> {
    const filePath = this.documentPath(document.identity);
    await writeJsonAtomic(filePath, document);
    return filePath;
  }

  async writeRaw(identity: string, body: Buffer): Promise<string> {
    const relative = rawPath(identity);
    await writeFileAtomic(path.join(this.caseDir, relative), body);
    return relative;
  }

  async removeDocument(identity: string): Promise<boolean> {
    const filePath = this.documentPath(identity);
    const existed = fs.existsSync(filePath);
    await fs.promises.rm(filePath, { force: true });
    await fs.promises.rm(path.join(this.caseDir, rawPath(identity)), { force: true });
    return existed;
  }

  async archiveDocuments(stamp: string): Promise<string[]> {
    const moved: string[] = [];
    for (const dir of [DOCUMENTS_DIR, RAW_DIR]) {
      const source = path.join(this.caseDir, dir);
      if (!fs.existsSync(source)) {
        continue;
      }
      const target = path.join(this.caseDir, `${dir}.${stamp}`);
      await fs.promises.rename(source, target);
      moved.push(target);
    }
    return moved;
  }

  private documentPath(identity: string): string {
    return path.join(this.caseDir, DOCUMENTS_DIR, `${identityFileStem(identity)}.json`);
  }

  async listDocumentIdentities(): Promise<string[]> {
    const dir = path.join(this.caseDir, DOCUMENTS_DIR);
    if (!fs.existsSync(dir)) {
      return [];
    }

    const identities: string[] = [];
    for (const name of (await fs.promises.readdir(dir)).sort()) {
      if (!name.endsWith(".json")) {
        continue;
      }
      const filePath = path.join(dir, name);
      try {
        const raw: unknown = JSON.parse(await fs.promises.readFile(filePath, "utf-8"));
        if (typeof raw === "object" && raw !== null && "identity" in raw && typeof raw.identity === "string") {
          identities.push(raw.identity);
        } else {
          this.logger.warn("document_file_without_identity", { path: filePath });
        }
      } catch (error) {
        this.logger.warn("document_file_unreadable", {
          path: filePath,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return identities;
  }
}
