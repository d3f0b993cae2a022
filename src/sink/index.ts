import type { Logger } from "../observability";
import { CaseDirectorySink } from "./caseDirectorySink";
import type { CaseSink } from "./types";

export function createCaseSink(outputRoot: string, caseIdentifier: string, logger: Logger): CaseSink {
  return new CaseDirectorySink(outputRoot, caseIdentifier, logger);
}

export * from "./caseDirectorySink";
export * from "./readme";
export * from "./types";
