import type { Spec, SuiteSpec, TestAnnotations, TestSpec } from "./types.ts";

/**
 * An aspect transforms a spec. Applied to a suite, it is applied to every
 * test below it.
 */
export type Aspect = (spec: Spec) => Spec;

function annotate(
  update: (annotations: TestAnnotations) => TestAnnotations,
): Aspect {
  function apply(spec: Spec): Spec {
    if (spec.type === "test") {
      return Object.freeze<TestSpec>({
        ...spec,
        annotations: Object.freeze(update(spec.annotations)),
      });
    }
    return Object.freeze<SuiteSpec>({
      ...spec,
      children: Object.freeze(spec.children.map(apply)),
    });
  }
  return apply;
}

/**
 * Mark tests as ignored. Their bodies are never invoked.
 */
export const ignore: Aspect = annotate((annotations) => ({
  ...annotations,
  ignored: true,
}));

/**
 * Fail tests whose body runs longer than `ms` milliseconds.
 */
export function timeout(ms: number): Aspect {
  if (!Number.isFinite(ms) || ms <= 0) {
    throw new RangeError(`timeout must be a positive number, got ${ms}`);
  }
  return annotate((annotations) => ({ ...annotations, timeout: ms }));
}

/**
 * Attach tags to tests so that a runner can select them.
 */
export function tag(...tags: string[]): Aspect {
  return annotate((annotations) => ({
    ...annotations,
    tags: Object.freeze([
      ...annotations.tags,
      ...tags.filter((tag) => !annotations.tags.includes(tag)),
    ]),
  }));
}

/**
 * Apply several aspects in order.
 *
 * ```ts
 * withAspects(test("slow", body), timeout(100), tag("slow"));
 * ```
 */
export function withAspects(spec: Spec, ...aspects: Aspect[]): Spec {
  return aspects.reduce((current, aspect) => aspect(current), spec);
}
