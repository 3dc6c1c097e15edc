import { describe, it } from "node:test";
import { expect } from "expect";
import { parseConfig } from "./config.ts";

describe("parseConfig", () => {
  it("reads modules and defaults", () => {
    expect(parseConfig(["a.ts", "b.ts"], "0.0.0")).toEqual({
      modules: ["a.ts", "b.ts"],
      tests: [],
      tags: [],
      verbose: false,
    });
  });

  it("reads the selection and verbosity", () => {
    expect(
      parseConfig(["a.ts", "--test", "adds", "--verbose"], "0.0.0"),
    ).toEqual({
      modules: ["a.ts"],
      tests: ["adds"],
      tags: [],
      verbose: true,
    });
  });

  it("splits comma separated search terms", () => {
    expect(parseConfig(["a.ts", "-t", "adds, divides"], "0.0.0")).toEqual({
      modules: ["a.ts"],
      tests: ["adds", "divides"],
      tags: [],
      verbose: false,
    });
  });

  it("reads tags", () => {
    expect(parseConfig(["a.ts", "--tag", "slow,db"], "0.0.0")).toEqual({
      modules: ["a.ts"],
      tests: [],
      tags: ["slow", "db"],
      verbose: false,
    });
  });
});
