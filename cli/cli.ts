import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { call, type Operation } from "effection";
import {
  discover,
  framework,
  registryFromModules,
  RunnableSuiteFingerprint,
  type SuiteRegistry,
} from "@suitebridge/framework";
import { log } from "@suitebridge/logging";
import { type Logger, taskDef } from "@suitebridge/protocol";
import { createConsoleLogger, report, type Summary } from "@suitebridge/reporter";
import { type Config, toRunnerArgs } from "./config.ts";

export interface RunOptions {
  /**
   * Where rendered test output goes. Defaults to the console.
   */
  logger?: Logger;

  /**
   * Where the summary line goes. Defaults to `console.log`.
   */
  print?: (line: string) => void;
}

/**
 * Run every suite in `registry` one after the other and report the
 * summary.
 *
 * @throws {@link AggregateTestFailure} if any suite had a failing test
 */
export function* runAll(
  registry: SuiteRegistry,
  config: Config,
  options: RunOptions = {},
): Operation<Summary> {
  let { logger = createConsoleLogger(), print } = options;

  let names = discover(registry);
  yield* log.debug(`discovered ${names.length} suite(s)`);

  let runner = framework.runner(toRunnerArgs(config), registry);
  let tasks = runner.tasks(
    names.map((name) => taskDef(name, RunnableSuiteFingerprint, [], true)),
  );

  for (let task of tasks) {
    yield* task.run(() => {}, [logger]);
  }

  return report(runner.outcomes(), print);
}

/**
 * Import each module named by `config` and register its exports under
 * `<path>#<export>`.
 */
export function* loadModules(config: Config): Operation<SuiteRegistry> {
  let modules: [string, Record<string, unknown>][] = [];
  for (let path of config.modules) {
    let url = pathToFileURL(resolve(path)).href;
    let exports: Record<string, unknown> = yield* call(() => import(url));
    yield* log.debug(`loaded ${path}`);
    modules.push([path, exports]);
  }
  return registryFromModules(modules);
}
