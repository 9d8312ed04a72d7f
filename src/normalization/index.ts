export * from "./phone";
export * from "./geo";
export * from "./contact";
export * from "./social";
export * from "./category";
export * from "./city";
export * from "./normalizeListing";
