import type { Fingerprint, Selector, TaskDef } from "./types.ts";

export const suiteSelector: Selector = Object.freeze({ type: "suite" });

export function testSelector(testName: string): Selector {
  return { type: "test", testName };
}

export function testWildcardSelector(testWildcard: string): Selector {
  return { type: "test-wildcard", testWildcard };
}

export function taskDef(
  fullyQualifiedName: string,
  fingerprint: Fingerprint,
  selectors: readonly Selector[] = [],
  explicitlySpecified = false,
): TaskDef {
  return { fullyQualifiedName, fingerprint, explicitlySpecified, selectors };
}

/**
 * Whether a test at `path` (names from the root down to the test) is picked
 * by `selector`. Nested selectors name nested suites, which this adapter
 * does not split out, so they match nothing.
 */
export function selects(selector: Selector, path: readonly string[]): boolean {
  let name = path[path.length - 1];
  switch (selector.type) {
    case "suite":
      return true;
    case "test":
      return name === selector.testName;
    case "test-wildcard":
      return path.join(" ").includes(selector.testWildcard);
    case "nested-suite":
    case "nested-test":
      return false;
  }
}

/**
 * No selectors at all means the whole suite.
 */
export function selectsAny(
  selectors: readonly Selector[],
  path: readonly string[],
): boolean {
  return selectors.length === 0 ||
    selectors.some((selector) => selects(selector, path));
}
