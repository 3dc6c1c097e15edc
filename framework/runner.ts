import { Err, Ok, type Result } from "effection";
import type { Fingerprint, TaskDef } from "@suitebridge/protocol";
import { renderSummary, summarize } from "@suitebridge/reporter";
import { type RunnerArgs, parseRunnerArgs } from "./args.ts";
import { fingerprints } from "./fingerprint.ts";
import {
  ResolutionError,
  resolveSuite,
  type RunnableSuite,
  type SuiteRegistry,
} from "./resolver.ts";
import { createSuiteTask, type SuiteTask } from "./task.ts";

/**
 * Builds tasks for a host and keeps track of how they went.
 */
export interface Runner {
  readonly args: readonly string[];

  /**
   * One task per definition, in the same order. A definition that does not
   * name a runnable suite still gets its task, but executing it fails with
   * the {@link ResolutionError}. The other tasks are not affected.
   */
  tasks(taskDefs: readonly TaskDef[]): SuiteTask[];

  /**
   * Whether each task run so far succeeded, in the order they finished.
   */
  outcomes(): readonly boolean[];

  /**
   * The summary line of every task run so far.
   */
  done(): string;
}

/**
 * The entry point a host discovers.
 */
export interface Framework {
  readonly name: string;
  fingerprints(): readonly Fingerprint[];
  runner(args: readonly string[], registry: SuiteRegistry): Runner;
}

export const framework: Framework = {
  name: "suitebridge",
  fingerprints,
  runner: createRunner,
};

export function createRunner(
  args: readonly string[],
  registry: SuiteRegistry,
): Runner {
  let options = parseRunnerArgs(args);
  let outcomes: boolean[] = [];

  return {
    args,
    tasks(taskDefs) {
      return taskDefs.map((taskDef) =>
        createSuiteTask(
          taskDef,
          tryResolve(taskDef, registry),
          {
            filter: (path, test) =>
              matchesSearchTerms(options, path) &&
              matchesTags(options, test.annotations.tags),
            verbose: options.verbose,
            onComplete: (succeeded) => outcomes.push(succeeded),
          },
        )
      );
    },
    outcomes: () => [...outcomes],
    done: () => renderSummary(summarize(outcomes)),
  };
}

function tryResolve(
  { fullyQualifiedName, fingerprint }: TaskDef,
  registry: SuiteRegistry,
): Result<RunnableSuite> {
  try {
    return Ok(resolveSuite(fullyQualifiedName, fingerprint, registry));
  } catch (error) {
    if (error instanceof ResolutionError) {
      return Err(error);
    }
    throw error;
  }
}

function matchesSearchTerms(
  { testSearchTerms }: RunnerArgs,
  path: readonly string[],
): boolean {
  let fullname = path.join(" ");
  return testSearchTerms.length === 0 ||
    testSearchTerms.some((term) => fullname.includes(term));
}

function matchesTags(
  { tags }: RunnerArgs,
  testTags: readonly string[],
): boolean {
  return tags.length === 0 || tags.some((tag) => testTags.includes(tag));
}
