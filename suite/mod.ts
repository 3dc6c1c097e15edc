export * from "./types.ts";
export * from "./suite.ts";
export * from "./aspect.ts";
export * from "./predicate.ts";
export * from "./errors.ts";
