export * from "./orchestrator";
export * from "./report";
