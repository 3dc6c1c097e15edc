import { call, type Operation, race, sleep } from "effection";
import {
  AssertionFailure,
  type AssertResult,
  type FailureDetail,
  type Spec,
  type TestSpec,
  TestTimeoutError,
} from "@suitebridge/suite";
import { log } from "@suitebridge/logging";
import type { Outcome, ResultTree, TestResult } from "./result.ts";

export interface ExecuteOptions {
  /**
   * Decide whether a test takes part in the run. Receives the names from
   * the root down to the test. Tests left out do not appear in the result
   * tree, and neither do groups that end up empty.
   */
  filter?: (path: readonly string[], test: TestSpec) => boolean;
}

/**
 * The result of invoking one body, before it becomes an {@link Outcome}.
 */
type Invocation =
  | { type: "ok" }
  | { type: "failed"; details: readonly FailureDetail[] }
  | { type: "errored"; error: Error };

/**
 * Run every test of `spec` one after the other, depth first and in
 * declaration order, and collect the outcomes into a {@link ResultTree}.
 *
 * A failing or throwing body is recorded and the run moves on to the next
 * test. Returns `undefined` if the filter left nothing to run.
 */
export function* execute(
  spec: Spec,
  options: ExecuteOptions = {},
): Operation<ResultTree | undefined> {
  let { filter = () => true } = options;

  function* visit(
    node: Spec,
    parent: readonly string[],
  ): Operation<ResultTree | undefined> {
    let path = [...parent, node.name];
    if (node.type === "test") {
      if (!filter(path, node)) {
        return undefined;
      }
      return yield* runTest(node, path);
    }

    let children: ResultTree[] = [];
    for (let child of node.children) {
      let result = yield* visit(child, path);
      if (result) {
        children.push(result);
      }
    }
    if (children.length === 0 && node.children.length > 0) {
      return undefined;
    }
    return { type: "suite", name: node.name, children };
  }

  return yield* visit(spec, []);
}

function* runTest(test: TestSpec, path: string[]): Operation<TestResult> {
  let fullname = path.join(" > ");

  if (test.annotations.ignored) {
    yield* log.debug(`ignored ${fullname}`);
    return {
      type: "test",
      name: test.name,
      path,
      outcome: { type: "ignored" },
      duration: 0,
    };
  }

  yield* log.debug(`running ${fullname}`);
  let start = performance.now();
  let invocation = yield* invoke(test);
  let duration = Math.round(performance.now() - start);

  let outcome: Outcome;
  switch (invocation.type) {
    case "ok":
      outcome = { type: "passed" };
      break;
    case "failed":
      outcome = { type: "failed", details: invocation.details };
      break;
    case "errored":
      yield* log.debug(`${fullname} threw ${invocation.error.name}`);
      outcome = {
        type: "failed",
        details: [{ type: "error", error: invocation.error }],
      };
      break;
  }
  yield* log.debug(`${fullname}: ${outcome.type} in ${duration}ms`);

  return { type: "test", name: test.name, path, outcome, duration };
}

/**
 * Run the body in its own scope so that anything it spawns is shut down
 * when it returns. This is the one place where a throw from a body is
 * caught.
 */
function* invoke(test: TestSpec): Operation<Invocation> {
  let { timeout } = test.annotations;
  try {
    let result = timeout === undefined
      ? yield* call(test.body)
      : yield* race([call(test.body), expire(timeout)]);
    return fromResult(result);
  } catch (error) {
    if (error instanceof AssertionFailure) {
      return { type: "failed", details: error.details };
    }
    return { type: "errored", error: toError(error) };
  }
}

function fromResult(result: AssertResult | void): Invocation {
  if (!result || result.success) {
    return { type: "ok" };
  }
  return { type: "failed", details: result.details };
}

function* expire(timeout: number): Operation<never> {
  yield* sleep(timeout);
  throw new TestTimeoutError(timeout);
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
