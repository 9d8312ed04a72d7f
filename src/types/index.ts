export * from "./logger";
export * from "./lead";
export * from "./sources";
export * from "./runner";
export * from "./catalog";
export * from "./config";
export * from "./db";
export * from "./runLock";
export * from "./clients/http";
