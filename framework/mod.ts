export * from "./fingerprint.ts";
export * from "./resolver.ts";
export * from "./args.ts";
export * from "./task.ts";
export * from "./runner.ts";
