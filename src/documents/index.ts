export * from "./filenameMeta";
export * from "./identity";
export * from "./stages";
