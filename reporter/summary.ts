import { green, red } from "./colors.ts";

export interface Summary {
  failed: number;
  successful: number;
}

/**
 * Raised once every task has run and at least one of them failed. This is
 * the only error that should end the process.
 */
export class AggregateTestFailure extends Error {
  summary: Summary;

  constructor(summary: Summary) {
    super(`${summary.failed} tests failed`);
    this.summary = summary;
  }

  override name = "AggregateTestFailure";
}

/**
 * Count task outcomes, where each outcome says whether the task as a whole
 * succeeded.
 */
export function summarize(outcomes: Iterable<boolean>): Summary {
  let summary: Summary = { failed: 0, successful: 0 };
  for (let succeeded of outcomes) {
    if (succeeded) {
      summary.successful++;
    } else {
      summary.failed++;
    }
  }
  return summary;
}

/**
 * `Summary: failed: <n>, successful: <n>`, where a count is colored only
 * when it is not zero.
 */
export function renderSummary({ failed, successful }: Summary): string {
  let failedCount = failed > 0 ? red(`failed: ${failed}`) : `failed: ${failed}`;
  let successCount = successful > 0
    ? green(`successful: ${successful}`)
    : `successful: ${successful}`;
  return `Summary: ${failedCount}, ${successCount}`;
}

/**
 * Print the summary line for `outcomes` and throw an
 * {@link AggregateTestFailure} if any of them failed.
 */
export function report(
  outcomes: Iterable<boolean>,
  print: (line: string) => void = console.log,
): Summary {
  let summary = summarize(outcomes);
  print(renderSummary(summary));
  if (summary.failed > 0) {
    throw new AggregateTestFailure(summary);
  }
  return summary;
}
