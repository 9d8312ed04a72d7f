/**
 * Utils barrel exports
 */

export * from "./identity/leadIdentity";
export * from "./text/textNormalization";
export * from "./text/removeDiacritics";
export * from "./catalogValidation";
export * from "./backoff";
export * from "./concurrency/keyedMutex";
export * from "./concurrency/rateLimiter";
