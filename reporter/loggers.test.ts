import { describe, it } from "node:test";
import { expect } from "expect";
import { createRecordingLogger } from "./loggers.ts";

describe("createRecordingLogger", () => {
  it("prefixes each message with its level", () => {
    let logger = createRecordingLogger();
    logger.error("e");
    logger.warn("w");
    logger.info("i");
    logger.debug("d");
    logger.trace(new Error("t"));

    expect(logger.messages).toEqual([
      "error: e",
      "warn: w",
      "info: i",
      "debug: d",
      "trace: Error: t",
    ]);
  });

  it("hands out snapshots that later writes do not change", () => {
    let logger = createRecordingLogger();
    logger.info("first");
    let snapshot = logger.messages;
    logger.info("second");

    expect(snapshot).toEqual(["info: first"]);
    expect(logger.messages).toEqual(["info: first", "info: second"]);
  });
});
