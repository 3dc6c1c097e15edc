import { describe, it } from "node:test";
import { expect } from "expect";
import type { ResultTree } from "@suitebridge/engine";
import type { Fingerprint } from "@suitebridge/protocol";
import { AssertionFailure } from "@suitebridge/suite";
import { toEvents } from "./events.ts";

const fingerprint: Fingerprint = {
  type: "subclass",
  isModule: true,
  superclassName: "RunnableSuite",
  requireNoArgConstructor: false,
};

describe("toEvents", () => {
  it("emits one event per test and none for groups", () => {
    let boom = new Error("boom");
    let tree: ResultTree = {
      type: "suite",
      name: "root",
      children: [
        {
          type: "test",
          name: "passes",
          path: ["root", "passes"],
          outcome: { type: "passed" },
          duration: 3,
        },
        {
          type: "suite",
          name: "group",
          children: [
            {
              type: "test",
              name: "throws",
              path: ["root", "group", "throws"],
              outcome: {
                type: "failed",
                details: [{ type: "error", error: boom }],
              },
              duration: 1,
            },
            {
              type: "test",
              name: "skipped",
              path: ["root", "group", "skipped"],
              outcome: { type: "ignored" },
              duration: 0,
            },
          ],
        },
      ],
    };

    expect(toEvents("my.Suite", tree, fingerprint)).toEqual([
      {
        fullyQualifiedName: "my.Suite",
        selector: { type: "test", testName: "passes" },
        status: "Success",
        duration: 3,
        fingerprint,
      },
      {
        fullyQualifiedName: "my.Suite",
        selector: { type: "test", testName: "throws" },
        status: "Failure",
        throwable: boom,
        duration: 1,
        fingerprint,
      },
      {
        fullyQualifiedName: "my.Suite",
        selector: { type: "test", testName: "skipped" },
        status: "Ignored",
        duration: 0,
        fingerprint,
      },
    ]);
  });

  it("wraps assertion details in an AssertionFailure", () => {
    let [event] = toEvents("my.Suite", {
      type: "test",
      name: "mismatch",
      path: ["mismatch"],
      outcome: {
        type: "failed",
        details: [
          { type: "assertion", actual: "1", expected: "equals(2)" },
          { type: "assertion", actual: "3", expected: "isLessThan(2)" },
        ],
      },
      duration: 0,
    }, fingerprint);

    expect(event.throwable).toBeInstanceOf(AssertionFailure);
    expect(event.throwable?.message).toEqual(
      "1 did not satisfy equals(2)\n3 did not satisfy isLessThan(2)",
    );
  });

  it("uses only the test's own name as the selector", () => {
    let tree: ResultTree = {
      type: "suite",
      name: "root",
      children: ["a", "b"].map((group) => ({
        type: "suite" as const,
        name: group,
        children: [{
          type: "test" as const,
          name: "same",
          path: ["root", group, "same"],
          outcome: { type: "passed" as const },
          duration: 0,
        }],
      })),
    };

    expect(toEvents("my.Suite", tree, fingerprint).map((e) => e.selector))
      .toEqual([
        { type: "test", testName: "same" },
        { type: "test", testName: "same" },
      ]);
  });
});
