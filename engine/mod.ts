export * from "./result.ts";
export * from "./execute.ts";
