import type { Spec, SuiteSpec, TestBody, TestSpec } from "./types.ts";

/**
 * Create a named group of tests and nested suites. Children keep the order
 * in which they are declared.
 *
 * ```ts
 * const math = suite(
 *   "math",
 *   test("adds", function* () {
 *     return assert(1 + 1, equals(2));
 *   }),
 * );
 * ```
 */
export function suite(name: string, ...children: Spec[]): SuiteSpec {
  return Object.freeze<SuiteSpec>({
    type: "suite",
    name,
    children: Object.freeze([...children]),
  });
}

/**
 * Create a single named test.
 */
export function test(name: string, body: TestBody): TestSpec {
  return Object.freeze<TestSpec>({
    type: "test",
    name,
    body,
    annotations: Object.freeze({ ignored: false, tags: Object.freeze([]) }),
  });
}

/**
 * Count the tests below `spec`, including ignored ones.
 */
export function countTests(spec: Spec): number {
  if (spec.type === "test") {
    return 1;
  }
  return spec.children.reduce((sum, child) => sum + countTests(child), 0);
}

/**
 * Every tag used by any test below `spec`, in first-seen order.
 */
export function collectTags(spec: Spec): string[] {
  let tags = new Set<string>();
  let visit = (node: Spec) => {
    if (node.type === "test") {
      node.annotations.tags.forEach((tag) => tags.add(tag));
    } else {
      node.children.forEach(visit);
    }
  };
  visit(spec);
  return [...tags];
}
