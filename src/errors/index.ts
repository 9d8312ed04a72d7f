export * from "./sourceErrors";
export * from "./configError";
export * from "./schedulerErrors";
