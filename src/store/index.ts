import { JsonFileProgressStore } from "./jsonFileStore";
import type { ProgressStore } from "./types";

export function createProgressStore(outputRoot: string): ProgressStore {
  return new JsonFileProgressStore(outputRoot);
}

export * from "./jsonFileStore";
export * from "./memoryStore";
export * from "./progressStore";
export * from "./types";
