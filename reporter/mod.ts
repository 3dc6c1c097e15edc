export * from "./colors.ts";
export * from "./events.ts";
export * from "./render.ts";
export * from "./summary.ts";
export * from "./loggers.ts";
