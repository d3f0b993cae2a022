export * from "./textExtractor";
