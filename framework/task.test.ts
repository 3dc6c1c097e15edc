import { describe, it } from "node:test";
import { expect } from "expect";
import { run, sleep } from "effection";
import {
  type Logger,
  type TestEvent,
  taskDef,
  testSelector,
} from "@suitebridge/protocol";
import {
  blue,
  createRecordingLogger,
  cyan,
  green,
  red,
} from "@suitebridge/reporter";
import {
  assert,
  equals,
  ignore,
  suite,
  tag,
  test,
} from "@suitebridge/suite";
import { captureDiagnostics } from "@suitebridge/logging/testing";
import { RunnableSuiteFingerprint } from "./fingerprint.ts";
import { createSuiteRegistry, RunnableSuite } from "./resolver.ts";
import { createRunner } from "./runner.ts";
import type { SuiteTask } from "./task.ts";

const failingSpecName = "fixtures.SimpleFailingSpec";

let ignoredRuns = 0;

const SimpleFailingSpec = new RunnableSuite(
  suite(
    "some suite",
    test("failing test", function* () {
      return assert(1, equals(2));
    }),
    test("passing test", function* () {
      return assert(1, equals(1));
    }),
    ignore(test("ignored test", function* () {
      ignoredRuns++;
      return assert(1, equals(2));
    })),
  ),
);

function loadTask(
  name: string,
  suites: Record<string, unknown>,
  args: string[] = [],
): SuiteTask {
  let runner = createRunner(args, createSuiteRegistry(Object.entries(suites)));
  let [task] = runner.tasks([taskDef(name, RunnableSuiteFingerprint)]);
  return task;
}

async function loadAndExecute(
  eventHandler: (event: TestEvent) => void = () => {},
  loggers: Logger[] = [],
): Promise<SuiteTask[]> {
  let task = loadTask(failingSpecName, {
    [failingSpecName]: SimpleFailingSpec,
  });
  return await task.execute(eventHandler, loggers);
}

function summarizeEvents(events: TestEvent[]) {
  let unique = new Map<string, TestEvent>();
  for (let event of events) {
    let name = event.selector.type === "test" ? event.selector.testName : "";
    unique.set(`${event.fullyQualifiedName}:${name}`, event);
  }
  return [...unique.values()].map((event) => ({
    fullyQualifiedName: event.fullyQualifiedName,
    selector: event.selector,
    status: event.status,
    fingerprint: event.fingerprint,
  }));
}

describe("SuiteTask", () => {
  it("reports one event per test", async () => {
    let reported: TestEvent[] = [];
    await loadAndExecute((event) => reported.push(event));

    expect(reported).toHaveLength(3);
    expect(summarizeEvents(reported)).toEqual(expect.arrayContaining([
      {
        fullyQualifiedName: failingSpecName,
        selector: testSelector("failing test"),
        status: "Failure",
        fingerprint: RunnableSuiteFingerprint,
      },
      {
        fullyQualifiedName: failingSpecName,
        selector: testSelector("passing test"),
        status: "Success",
        fingerprint: RunnableSuiteFingerprint,
      },
      {
        fullyQualifiedName: failingSpecName,
        selector: testSelector("ignored test"),
        status: "Ignored",
        fingerprint: RunnableSuiteFingerprint,
      },
    ]));
  });

  it("attaches the failure only to failed tests", async () => {
    let reported: TestEvent[] = [];
    await loadAndExecute((event) => reported.push(event));

    let failed = reported.find((event) => event.status === "Failure");
    expect(failed?.throwable?.name).toEqual("AssertionFailure");
    expect(failed?.throwable?.message).toEqual("1 did not satisfy equals(2)");
    expect(
      reported.filter((event) => event.status !== "Failure")
        .map((event) => event.throwable),
    ).toEqual([undefined, undefined]);
  });

  it("never invokes the body of an ignored test", async () => {
    ignoredRuns = 0;
    await loadAndExecute();
    expect(ignoredRuns).toEqual(0);
  });

  it("logs the same messages to every logger", async () => {
    let loggers = [1, 2, 3].map(() => createRecordingLogger());

    await loadAndExecute(() => {}, loggers);

    for (let logger of loggers) {
      expect(logger.messages).toEqual([
        `info: ${red("- some suite")}`,
        `info:   ${red("- failing test")}`,
        `info:     ${blue("1")} did not satisfy ${cyan("equals(2)")}`,
        `info:   ${green("+")} passing test`,
      ]);
    }
  });

  it("has no nested tasks", async () => {
    let task = loadTask(failingSpecName, {
      [failingSpecName]: SimpleFailingSpec,
    });
    expect(task.subtasks()).toEqual([]);
    expect(await task.execute(() => {}, [])).toEqual([]);
  });

  it("reruns the suite on every execution", async () => {
    let runs = 0;
    let counting = new RunnableSuite(
      suite(
        "counting",
        test("counts", function* () {
          runs++;
        }),
      ),
    );
    let task = loadTask("counting", { counting });

    let first: TestEvent[] = [];
    let second: TestEvent[] = [];
    await task.execute((event) => first.push(event), []);
    await task.execute((event) => second.push(event), []);

    expect(runs).toEqual(2);
    expect(summarizeEvents(second)).toEqual(summarizeEvents(first));
  });

  it("produces the same output when executed twice", async () => {
    let task = loadTask(failingSpecName, {
      [failingSpecName]: SimpleFailingSpec,
    });
    let outputs = [];
    for (let i = 0; i < 2; i++) {
      let events: TestEvent[] = [];
      let logger = createRecordingLogger();
      await task.execute((event) => events.push(event), [logger]);
      outputs.push({ events: summarizeEvents(events), lines: logger.messages });
    }
    expect(outputs[1]).toEqual(outputs[0]);
  });

  it("runs only the tests picked by the task's selectors", async () => {
    let runner = createRunner(
      [],
      createSuiteRegistry([[failingSpecName, SimpleFailingSpec]]),
    );
    let [task] = runner.tasks([
      taskDef(failingSpecName, RunnableSuiteFingerprint, [
        testSelector("passing test"),
      ]),
    ]);
    let reported: TestEvent[] = [];
    await task.execute((event) => reported.push(event), []);

    expect(reported.map((event) => event.status)).toEqual(["Success"]);
  });

  it("reports nothing when no test is selected", async () => {
    let task = loadTask(failingSpecName, {
      [failingSpecName]: SimpleFailingSpec,
    }, ["-t", "no such test"]);
    let reported: TestEvent[] = [];
    let logger = createRecordingLogger();
    await task.execute((event) => reported.push(event), [logger]);

    expect(reported).toEqual([]);
    expect(logger.messages).toEqual([]);
  });

  it("lists the tags used by its tests", () => {
    let tagged = new RunnableSuite(
      suite(
        "tagged",
        tag("slow")(test("one", function* () {})),
        tag("slow", "network")(test("two", function* () {})),
      ),
    );
    let task = loadTask("tagged", { tagged });
    expect(task.tags()).toEqual(["slow", "network"]);
  });

  it("logs its progress as debug diagnostics", async () => {
    let task = loadTask(failingSpecName, {
      [failingSpecName]: SimpleFailingSpec,
    });
    let messages = await run(function* () {
      let messages = yield* captureDiagnostics();
      yield* task.run(() => {}, []);
      return messages;
    });

    expect(messages[0]).toEqual(`executing ${failingSpecName}`);
    expect(messages).toContain("ignored some suite > ignored test");
  });

  it("sends diagnostics to the host's loggers when verbose", async () => {
    let task = loadTask(failingSpecName, {
      [failingSpecName]: SimpleFailingSpec,
    }, ["-v"]);
    let logger = createRecordingLogger();
    await task.execute(() => {}, [logger]);

    expect(logger.messages[0]).toEqual(`debug: executing ${failingSpecName}`);
    expect(logger.messages).toContain(
      "debug: ignored some suite > ignored test",
    );
    expect(logger.messages.filter((line) => line.startsWith("info:")))
      .toEqual([
        `info: ${red("- some suite")}`,
        `info:   ${red("- failing test")}`,
        `info:     ${blue("1")} did not satisfy ${cyan("equals(2)")}`,
        `info:   ${green("+")} passing test`,
      ]);
  });

  it("keeps diagnostics out of the loggers unless verbose", async () => {
    let logger = createRecordingLogger();
    await loadAndExecute(() => {}, [logger]);

    expect(logger.messages.filter((line) => line.startsWith("debug:")))
      .toEqual([]);
  });

  it("keeps the lines of each task together on a shared logger", async () => {
    let slow = new RunnableSuite(
      suite(
        "slow suite",
        test("waits", function* () {
          yield* sleep(10);
        }),
        test("fails", function* () {
          return assert(3, equals(4));
        }),
      ),
    );
    let fast = new RunnableSuite(
      suite(
        "fast suite",
        test("first", function* () {}),
        suite("nested", test("second", function* () {})),
      ),
    );
    let runner = createRunner([], createSuiteRegistry([
      ["slow", slow],
      ["fast", fast],
    ]));
    let tasks = runner.tasks([
      taskDef("slow", RunnableSuiteFingerprint),
      taskDef("fast", RunnableSuiteFingerprint),
    ]);
    let logger = createRecordingLogger();

    await Promise.all(tasks.map((task) => task.execute(() => {}, [logger])));

    let slowLines = [
      `info: ${red("- slow suite")}`,
      `info:   ${green("+")} waits`,
      `info:   ${red("- fails")}`,
      `info:     ${blue("3")} did not satisfy ${cyan("equals(4)")}`,
    ];
    let fastLines = [
      `info: ${green("+")} fast suite`,
      `info:   ${green("+")} first`,
      `info:   ${green("+")} nested`,
      `info:     ${green("+")} second`,
    ];
    expect(logger.messages).toEqual([...fastLines, ...slowLines]);
  });
});
