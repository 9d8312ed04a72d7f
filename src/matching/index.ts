export * from "./identityMatcher";
