import type { FailureDetail } from "@suitebridge/suite";

export type Outcome =
  | { readonly type: "passed" }
  | { readonly type: "failed"; readonly details: readonly FailureDetail[] }
  | { readonly type: "ignored" };

/**
 * The outcome of running a suite. It has the same shape as the suite that
 * produced it, minus any tests that were filtered out.
 */
export type ResultTree = SuiteResult | TestResult;

export interface SuiteResult {
  readonly type: "suite";
  readonly name: string;
  readonly children: readonly ResultTree[];
}

export interface TestResult {
  readonly type: "test";
  readonly name: string;
  /**
   * Names from the root of the suite down to and including this test.
   */
  readonly path: readonly string[];
  readonly outcome: Outcome;
  /**
   * Wall clock time spent in the body, in whole milliseconds. Always 0 for
   * ignored tests.
   */
  readonly duration: number;
}

/**
 * True if any test at or below `node` failed. Groups have no outcome of
 * their own, this is the status they are rendered with.
 */
export function hasFailures(node: ResultTree): boolean {
  if (node.type === "test") {
    return node.outcome.type === "failed";
  }
  return node.children.some(hasFailures);
}

/**
 * Every test result in depth first, declaration order.
 */
export function leaves(node: ResultTree): TestResult[] {
  if (node.type === "test") {
    return [node];
  }
  return node.children.flatMap(leaves);
}
