export * from "./crawlErrors";
export * from "./exitCodes";
