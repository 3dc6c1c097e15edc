import { z } from "zod";

export const RunnerArgsSchema = z.object({
  testSearchTerms: z.array(z.string().min(1, "-t needs a search term")),
  tags: z.array(z.string().min(1, "-tags needs a tag")),
  verbose: z.boolean(),
  unrecognized: z.array(z.string()).length(0, "unrecognized runner arguments"),
});

export type RunnerArgs = Omit<z.infer<typeof RunnerArgsSchema>, "unrecognized">;

/**
 * Parse the arguments a host passes to a runner:
 *
 * - `-t <term>` keeps tests whose path contains `term` (repeatable)
 * - `-tags <tag>` keeps tests tagged with `tag` (repeatable)
 * - `-v` turns on debug diagnostics
 *
 * @throws ZodError on a flag without a value or an unknown flag
 */
export function parseRunnerArgs(args: readonly string[]): RunnerArgs {
  let raw: z.input<typeof RunnerArgsSchema> = {
    testSearchTerms: [],
    tags: [],
    verbose: false,
    unrecognized: [],
  };
  for (let i = 0; i < args.length; i++) {
    let arg = args[i];
    switch (arg) {
      case "-t":
        raw.testSearchTerms.push(args[++i] ?? "");
        break;
      case "-tags":
        raw.tags.push(args[++i] ?? "");
        break;
      case "-v":
        raw.verbose = true;
        break;
      default:
        raw.unrecognized.push(arg);
    }
  }
  let { unrecognized: _, ...parsed } = RunnerArgsSchema.parse(raw);
  return parsed;
}
