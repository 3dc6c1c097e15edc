export * from "./types.ts";
export * from "./selectors.ts";
