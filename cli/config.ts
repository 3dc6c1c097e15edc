import { z } from "zod";
import { parser } from "zod-opts";

export interface Config {
  /**
   * Paths of modules whose exported suites should run.
   */
  modules: string[];
  tests: string[];
  tags: string[];
  verbose: boolean;
}

export function parseConfig(argv: string[], version: string): Config {
  let parsed = parser()
    .name("suitebridge")
    .description("run every suite exported by the given modules")
    .version(version)
    .options({
      test: {
        type: z.string().optional(),
        alias: "t",
        description:
          "only run tests whose path contains one of these comma separated terms",
      },
      tag: {
        type: z.string().optional(),
        description: "only run tests carrying one of these comma separated tags",
      },
      verbose: {
        type: z.boolean().default(false),
        alias: "v",
        description: "Print debugging output",
      },
    })
    .args([
      {
        name: "modules",
        type: z.array(z.string()).min(1),
        description: "modules exporting suites",
      },
    ])
    .parse(argv);

  return {
    modules: parsed.modules,
    tests: list(parsed.test),
    tags: list(parsed.tag),
    verbose: parsed.verbose,
  };
}

function list(value: string | undefined): string[] {
  return (value ?? "").split(",").map((item) => item.trim()).filter(Boolean);
}

/**
 * The same selection, expressed as runner arguments.
 */
export function toRunnerArgs(config: Config): string[] {
  return [
    ...config.tests.flatMap((term) => ["-t", term]),
    ...config.tags.flatMap((tag) => ["-tags", tag]),
    ...(config.verbose ? ["-v"] : []),
  ];
}
