export * from "./dedupIndex";
