import type { Operation } from "effection";

/**
 * What a test body may produce. A body that returns nothing passes, a body
 * that returns an {@link AssertResult} passes only if the result holds.
 */
export type TestBody = () => Operation<AssertResult | void>;

/**
 * A node of a suite definition. Either a named group of children, or a
 * named test with a body.
 */
export type Spec = SuiteSpec | TestSpec;

export interface SuiteSpec {
  readonly type: "suite";
  readonly name: string;
  readonly children: readonly Spec[];
}

export interface TestSpec {
  readonly type: "test";
  readonly name: string;
  readonly body: TestBody;
  readonly annotations: TestAnnotations;
}

/**
 * Modifiers attached to a test by aspects.
 */
export interface TestAnnotations {
  /**
   * When set, the body is never invoked and the test is reported as ignored.
   */
  readonly ignored: boolean;

  /**
   * Maximum number of milliseconds the body may run before it fails.
   */
  readonly timeout?: number;

  readonly tags: readonly string[];
}

/**
 * Why a single check did not hold.
 *
 * An `assertion` detail is a value mismatch: the rendered actual value and
 * the rendered predicate it failed. An `error` detail is anything that was
 * thrown from the body.
 */
export type FailureDetail =
  | { readonly type: "assertion"; readonly actual: string; readonly expected: string }
  | { readonly type: "error"; readonly error: Error };

export type AssertResult =
  | { readonly success: true }
  | { readonly success: false; readonly details: readonly FailureDetail[] };
