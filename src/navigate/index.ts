export * from "./caseNumber";
export * from "./instanceRegistry";
export * from "./navigationEngine";
export * from "./pageAdapters";
