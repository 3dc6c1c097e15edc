import { type Future, type Operation, type Result, run } from "effection";
import { execute, hasFailures } from "@suitebridge/engine";
import { log, reportTo } from "@suitebridge/logging";
import {
  type EventHandler,
  type Logger,
  selectsAny,
  type TaskDef,
} from "@suitebridge/protocol";
import { render, toEvents } from "@suitebridge/reporter";
import { collectTags, type TestSpec } from "@suitebridge/suite";
import type { RunnableSuite } from "./resolver.ts";

/**
 * One suite from the registry, ready to run.
 */
export interface SuiteTask {
  readonly taskDef: TaskDef;

  /**
   * Every tag used by a test in the suite.
   */
  tags(): string[];

  /**
   * Nested tasks for hosts that discover at a finer grain. A suite always
   * runs as a single task, so this is empty.
   */
  subtasks(): SuiteTask[];

  /**
   * Run the suite once, then send one event per test to `eventHandler`
   * and every rendered line to each of `loggers`. Resolves to the nested
   * tasks left to run, which is always none.
   *
   * Each call runs every body again. Rejects with the {@link ResolutionError}
   * of a task whose definition did not name a runnable suite.
   */
  execute(
    eventHandler: EventHandler,
    loggers: readonly Logger[],
  ): Future<SuiteTask[]>;

  /**
   * Like {@link execute}, but as an operation in the caller's scope, so
   * that it shares the caller's diagnostics setup.
   */
  run(
    eventHandler: EventHandler,
    loggers: readonly Logger[],
  ): Operation<SuiteTask[]>;
}

export interface SuiteTaskOptions {
  /**
   * Further restricts which tests run, on top of the task's selectors.
   */
  filter?: (path: readonly string[], test: TestSpec) => boolean;

  /**
   * Send diagnostics to the host's loggers at `debug` when the task is
   * executed by the host.
   */
  verbose?: boolean;

  /**
   * Called after each run with whether every test passed.
   */
  onComplete?: (succeeded: boolean) => void;
}

export function createSuiteTask(
  taskDef: TaskDef,
  suite: Result<RunnableSuite>,
  options: SuiteTaskOptions = {},
): SuiteTask {
  let {
    filter = () => true,
    verbose = false,
    onComplete = () => {},
  } = options;
  let { fullyQualifiedName, fingerprint, selectors } = taskDef;

  let task: SuiteTask = {
    taskDef,
    tags: () => suite.ok ? collectTags(suite.value.spec) : [],
    subtasks: () => [],
    execute(eventHandler, loggers) {
      return run(function* () {
        if (verbose) {
          yield* reportTo(loggers);
        }
        return yield* task.run(eventHandler, loggers);
      });
    },
    *run(eventHandler, loggers) {
      yield* log.debug(`executing ${fullyQualifiedName}`);

      if (!suite.ok) {
        yield* log.debug(suite.error.message);
        onComplete(false);
        throw suite.error;
      }

      let tree = yield* execute(suite.value.spec, {
        filter: (path, test) =>
          selectsAny(selectors, path) && filter(path, test),
      });

      if (!tree) {
        yield* log.debug(`${fullyQualifiedName}: no tests selected`);
        onComplete(true);
        return [];
      }

      for (let event of toEvents(fullyQualifiedName, tree, fingerprint)) {
        eventHandler(event);
      }

      let lines = render(tree);
      for (let logger of loggers) {
        for (let line of lines) {
          logger.info(line);
        }
      }

      onComplete(!hasFailures(tree));
      return [];
    },
  };

  return task;
}
