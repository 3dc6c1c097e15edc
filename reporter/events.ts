import type { Fingerprint, Status, TestEvent } from "@suitebridge/protocol";
import { type Outcome, type ResultTree, leaves } from "@suitebridge/engine";
import { AssertionFailure } from "@suitebridge/suite";

/**
 * One event per test in `tree`; groups produce none.
 *
 * The selector carries the test's own name and not its path, so two tests
 * with the same name in different groups of one suite report under the
 * same selector. Hosts that consume these events key on that name.
 */
export function toEvents(
  fullyQualifiedName: string,
  tree: ResultTree,
  fingerprint: Fingerprint,
): TestEvent[] {
  return leaves(tree).map((leaf): TestEvent => {
    let throwable = toThrowable(leaf.outcome);
    return {
      fullyQualifiedName,
      selector: { type: "test", testName: leaf.name },
      status: toStatus(leaf.outcome),
      ...(throwable ? { throwable } : {}),
      duration: leaf.duration,
      fingerprint,
    };
  });
}

export function toStatus(outcome: Outcome): Status {
  switch (outcome.type) {
    case "passed":
      return "Success";
    case "failed":
      return "Failure";
    case "ignored":
      return "Ignored";
  }
}

/**
 * A failure caused by a single thrown error reports that error; anything
 * else is wrapped in an {@link AssertionFailure} holding every detail.
 */
function toThrowable(outcome: Outcome): Error | undefined {
  if (outcome.type !== "failed") {
    return undefined;
  }
  let [first] = outcome.details;
  if (outcome.details.length === 1 && first.type === "error") {
    return first.error;
  }
  return new AssertionFailure(outcome.details);
}
