import { hasFailures, type ResultTree } from "@suitebridge/engine";
import type { FailureDetail } from "@suitebridge/suite";
import { blue, cyan, green, red } from "./colors.ts";

const TAB_SIZE = 2;

/**
 * Render a result tree as colored, indented lines in declaration order.
 *
 * Passed tests and groups without failures get a green `+`, failed ones a
 * red `-` followed by one line per failure detail. Ignored tests produce
 * no line at all.
 */
export function render(tree: ResultTree): string[] {
  return renderAt(tree, 0);
}

function renderAt(node: ResultTree, depth: number): string[] {
  if (node.type === "suite") {
    let header = hasFailures(node)
      ? failureLabel(node.name, depth)
      : successLabel(node.name, depth);
    return [
      header,
      ...node.children.flatMap((child) => renderAt(child, depth + TAB_SIZE)),
    ];
  }

  switch (node.outcome.type) {
    case "passed":
      return [successLabel(node.name, depth)];
    case "failed":
      return [
        failureLabel(node.name, depth),
        ...node.outcome.details.flatMap((detail) =>
          renderDetail(detail).map((line) => indent(depth + TAB_SIZE, line))
        ),
      ];
    case "ignored":
      return [];
  }
}

export function renderDetail(detail: FailureDetail): string[] {
  if (detail.type === "assertion") {
    let actual = detail.actual.split("\n");
    let last = actual.pop() ?? "";
    let [first = "", ...rest] = detail.expected.split("\n");
    return [
      ...actual.map((line) => blue(line)),
      `${blue(last)} did not satisfy ${cyan(first)}`,
      ...rest.map((line) => cyan(line)),
    ];
  }
  let { name, message } = detail.error;
  let [first, ...rest] = message.split("\n");
  return [
    red(message ? `${name}: ${first}` : name),
    ...rest.map((line) => red(line)),
  ];
}

function successLabel(name: string, depth: number): string {
  return indent(depth, `${green("+")} ${name}`);
}

function failureLabel(name: string, depth: number): string {
  return indent(depth, red(`- ${name}`));
}

function indent(depth: number, line: string): string {
  return `${" ".repeat(depth)}${line}`;
}
