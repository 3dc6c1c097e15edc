import type { AssertResult, FailureDetail } from "./types.ts";

/**
 * Thrown from a test body to fail it with structured details instead of an
 * opaque error. The engine records the details as they are.
 */
export class AssertionFailure extends Error {
  details: readonly FailureDetail[];

  constructor(details: readonly FailureDetail[]) {
    super();
    this.details = details;
  }

  override name = "AssertionFailure";

  override get message(): string {
    return this.details
      .map((detail) =>
        detail.type === "assertion"
          ? `${detail.actual} did not satisfy ${detail.expected}`
          : `${detail.error.name}: ${detail.error.message}`
      )
      .join("\n");
  }
}

export class TestTimeoutError extends Error {
  timeout: number;

  constructor(timeout: number) {
    super(`test timed out after ${timeout}ms`);
    this.timeout = timeout;
  }

  override name = "TestTimeoutError";
}

/**
 * Throw an {@link AssertionFailure} unless `result` holds. Useful in the
 * middle of a body that keeps going after a check.
 */
export function check(result: AssertResult): void {
  if (!result.success) {
    throw new AssertionFailure(result.details);
  }
}
