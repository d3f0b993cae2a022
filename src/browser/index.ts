export * from "./challengeSession";
export * from "./playwrightDriver";
export * from "./rateLimitMonitor";
export * from "./responseCapture";
export * from "./types";
