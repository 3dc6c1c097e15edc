import type { Fingerprint } from "@suitebridge/protocol";
import type { Spec } from "@suitebridge/suite";
import { isSupported } from "./fingerprint.ts";

/**
 * The marker a value must carry to be found by the runnable suite
 * fingerprint. Export one from a module to make a suite discoverable.
 *
 * ```ts
 * export const arithmetic = new RunnableSuite(
 *   suite("arithmetic", test("adds", function* () {
 *     return assert(1 + 1, equals(2));
 *   })),
 * );
 * ```
 */
export class RunnableSuite {
  readonly spec: Spec;

  constructor(spec: Spec) {
    this.spec = spec;
  }
}

export class ResolutionError extends Error {
  fullyQualifiedName: string;

  constructor(fullyQualifiedName: string, reason: string) {
    super(`cannot resolve suite '${fullyQualifiedName}': ${reason}`);
    this.fullyQualifiedName = fullyQualifiedName;
  }

  override name = "ResolutionError";
}

/**
 * A read only lookup table from fully qualified name to value. Built once
 * at startup.
 */
export interface SuiteRegistry {
  get(fullyQualifiedName: string): unknown;
  has(fullyQualifiedName: string): boolean;
  names(): string[];
}

export function createSuiteRegistry(
  entries: Iterable<readonly [string, unknown]>,
): SuiteRegistry {
  let table = new Map<string, unknown>(entries);
  return {
    get: (name) => table.get(name),
    has: (name) => table.has(name),
    names: () => [...table.keys()],
  };
}

/**
 * Register every export of every module under `<moduleId>#<exportName>`.
 * Exports that are not suites are registered too, so that asking for them
 * reports why they cannot run.
 */
export function registryFromModules(
  modules: Iterable<readonly [string, Record<string, unknown>]>,
): SuiteRegistry {
  let entries: [string, unknown][] = [];
  for (let [id, exports] of modules) {
    for (let [name, value] of Object.entries(exports)) {
      entries.push([`${id}#${name}`, value]);
    }
  }
  return createSuiteRegistry(entries);
}

/**
 * Names of every registered value that carries the runnable suite marker.
 */
export function discover(registry: SuiteRegistry): string[] {
  return registry.names().filter((name) =>
    registry.get(name) instanceof RunnableSuite
  );
}

/**
 * Look up the suite registered under `fullyQualifiedName`.
 *
 * @throws {@link ResolutionError} if nothing is registered under that name,
 * the value is not a {@link RunnableSuite}, or the fingerprint is not one
 * this adapter supports.
 */
export function resolveSuite(
  fullyQualifiedName: string,
  fingerprint: Fingerprint,
  registry: SuiteRegistry,
): RunnableSuite {
  if (!isSupported(fingerprint)) {
    throw new ResolutionError(fullyQualifiedName, "unsupported fingerprint");
  }
  if (!registry.has(fullyQualifiedName)) {
    throw new ResolutionError(fullyQualifiedName, "not found");
  }
  let value = registry.get(fullyQualifiedName);
  if (!(value instanceof RunnableSuite)) {
    throw new ResolutionError(
      fullyQualifiedName,
      "value is not a RunnableSuite",
    );
  }
  return value;
}
