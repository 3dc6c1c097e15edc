import { inspect, isDeepStrictEqual } from "node:util";
import type { AssertResult, FailureDetail } from "./types.ts";

/**
 * A named check over a value. `render()` is what a failure report shows on
 * the expected side, e.g. `equals(2)`.
 */
export interface Predicate<T> {
  test(value: T): boolean;
  render(): string;
}

/**
 * Render a value for a failure report. Numbers, booleans and the like print
 * as they are; strings and everything else go through `util.inspect`, so
 * strings print quoted.
 */
export function show(value: unknown): string {
  if (
    value === null ||
    (typeof value !== "object" && typeof value !== "function" &&
      typeof value !== "string")
  ) {
    return String(value);
  }
  return inspect(value, { depth: 4, breakLength: Infinity });
}

export function predicate<T>(
  name: string,
  test: (value: T) => boolean,
  ...args: unknown[]
): Predicate<T> {
  return {
    test,
    render: () => `${name}(${args.map(show).join(", ")})`,
  };
}

export const equals = <T>(expected: T): Predicate<T> =>
  predicate("equals", (value) => deepEquals(value, expected), expected);

export const isTrue: Predicate<boolean> = predicate("isTrue", (v) => v);

export const isFalse: Predicate<boolean> = predicate("isFalse", (v) => !v);

export const isUndefined: Predicate<unknown> = predicate(
  "isUndefined",
  (value) => value === undefined,
);

export const anything: Predicate<unknown> = predicate("anything", () => true);

export const isGreaterThan = (n: number): Predicate<number> =>
  predicate("isGreaterThan", (value) => value > n, n);

export const isLessThan = (n: number): Predicate<number> =>
  predicate("isLessThan", (value) => value < n, n);

export const contains = <T>(element: T): Predicate<Iterable<T>> =>
  predicate(
    "contains",
    (value) => [...value].some((item) => deepEquals(item, element)),
    element,
  );

export function not<T>(inner: Predicate<T>): Predicate<T> {
  return {
    test: (value) => !inner.test(value),
    render: () => `not(${inner.render()})`,
  };
}

/**
 * Check `value` against `predicate`. Unlike `expect`, this does not throw:
 * the result is returned from the test body and read by the engine.
 */
export function assert<T>(value: T, predicate: Predicate<T>): AssertResult {
  if (predicate.test(value)) {
    return { success: true };
  }
  return {
    success: false,
    details: [{
      type: "assertion",
      actual: show(value),
      expected: predicate.render(),
    }],
  };
}

/**
 * Combine results. Holds if every result holds, otherwise carries the
 * details of every failed result in order.
 */
export function all(...results: AssertResult[]): AssertResult {
  let details: FailureDetail[] = [];
  for (let result of results) {
    if (!result.success) {
      details.push(...result.details);
    }
  }
  return details.length > 0 ? { success: false, details } : { success: true };
}

function deepEquals(left: unknown, right: unknown): boolean {
  return Object.is(left, right) || isDeepStrictEqual(left, right);
}
