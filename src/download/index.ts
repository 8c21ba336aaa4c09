export * from "./downloader";
export * from "./filesystem";
export * from "./orchestrator";
export * from "./summary";
