/**
 * Database module barrel exports
 */

export * from "./connection";
export * from "./migrate";
export * from "./repos/leadsRepo";
export * from "./repos/aggregationRunsRepo";
export * from "./repos/runLockRepo";
export * from "./sqliteLeadStore";
export * from "./sqliteRunTracking";
