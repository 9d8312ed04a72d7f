export * from "./logger";
export * from "./runner";
export * from "./runLock";
export * from "./catalog";
export * from "./sources";
export * from "./phone";
export * from "./textNormalization";
export * from "./clients/http";
