export * from "./mergeLeads";
