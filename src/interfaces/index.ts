export type { SourceAdapter } from "./sources/sourceAdapter";
export type {
  LeadStore,
  StoredLead,
  UpsertOptions,
} from "./persistence/leadStore";
export type {
  RunHistory,
  RunLock,
  TouchedLead,
} from "./persistence/runTracking";
