export * from "./discovery";
export * from "./orchestrator";
