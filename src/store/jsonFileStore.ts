import fs from "node:fs";
import path from "node:path";
import { writeJsonAtomic } from "../core/atomicWrite";
import { caseDirectoryName } from "../navigate/caseNumber";
import type { ProgressState } from "../types";
import { PROGRESS_FILE, parseProgress, serializeProgress } from "./progressStore";
import type { ProgressStore } from "./types";

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/** Keeps each case's checkpoint at `<outputRoot>/case_<number>/_progress.json`. */
export class JsonFileProgressStore implements ProgressStore {
  private readonly outputRoot: string;

  constructor(outputRoot: string) {
    this.outputRoot = path.resolve(outputRoot);
  }

  pathFor(caseIdentifier: string): string {
    return path.join(this.outputRoot, caseDirectoryName(caseIdentifier), PROGRESS_FILE);
  }

  async load(caseIdentifier: string): Promise<ProgressState | undefined> {
    const filePath = this.pathFor(caseIdentifier);
    let text: string;
    try {
      text = await fs.promises.readFile(filePath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw error;
    }

    const raw: unknown = JSON.parse(text);
    return parseProgress(raw, filePath);
  }

  async commit(caseIdentifier: string, state: ProgressState): Promise<void> {
    await writeJsonAtomic(this.pathFor(caseIdentifier), serializeProgress(state));
  }

  async archive(caseIdentifier: string): Promise<string | undefined> {
    const filePath = this.pathFor(caseIdentifier);
    if (!fs.existsSync(filePath)) {
      return undefined;
    }
    const stamp = new Date().toISOString().replace(/[:.]/g, "-");
    const target = path.join(path.dirname(filePath), `_progress.${stamp}.json`);
    await fs.promises.rename(filePath, target);
    return target;
  }
}
