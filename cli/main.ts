#!/usr/bin/env -S node --import tsx
import { exit, main } from "effection";
import { namespace, reportTo } from "@suitebridge/logging";
import { AggregateTestFailure, createConsoleLogger } from "@suitebridge/reporter";
import packageJson from "./package.json" with { type: "json" };
import { loadModules, runAll } from "./cli.ts";
import { parseConfig } from "./config.ts";

await main(function* (argv) {
  let config = parseConfig(argv, packageJson.version);
  let logger = createConsoleLogger();
  if (config.verbose) {
    yield* reportTo([logger]);
  }
  yield* namespace("suitebridge");
  try {
    let registry = yield* loadModules(config);
    yield* runAll(registry, config, { logger });
  } catch (error) {
    if (error instanceof AggregateTestFailure) {
      yield* exit(1);
    }
    throw error;
  }
});
