/**
 * How a host recognizes a runnable suite. A subclass fingerprint matches
 * values that derive from `superclassName`; an annotated fingerprint
 * matches values that carry `annotationName`.
 */
export type Fingerprint = SubclassFingerprint | AnnotatedFingerprint;

export interface SubclassFingerprint {
  readonly type: "subclass";
  /**
   * Whether the suite is a module level value rather than something the
   * host has to construct.
   */
  readonly isModule: boolean;
  readonly superclassName: string;
  readonly requireNoArgConstructor: boolean;
}

export interface AnnotatedFingerprint {
  readonly type: "annotated";
  readonly isModule: boolean;
  readonly annotationName: string;
}

/**
 * Picks out part of a suite, either to run it or to name it in an event.
 */
export type Selector =
  | { readonly type: "suite" }
  | { readonly type: "test"; readonly testName: string }
  | { readonly type: "test-wildcard"; readonly testWildcard: string }
  | { readonly type: "nested-suite"; readonly suiteId: string }
  | {
    readonly type: "nested-test";
    readonly suiteId: string;
    readonly testName: string;
  };

export type Status =
  | "Success"
  | "Error"
  | "Failure"
  | "Skipped"
  | "Ignored"
  | "Canceled"
  | "Pending";

/**
 * The report for a single test, as handed to the host.
 */
export interface TestEvent {
  readonly fullyQualifiedName: string;
  readonly selector: Selector;
  readonly status: Status;
  /**
   * Present only for failures.
   */
  readonly throwable?: Error;
  /**
   * Milliseconds, 0 when not measured.
   */
  readonly duration: number;
  readonly fingerprint: Fingerprint;
}

export type EventHandler = (event: TestEvent) => void;

/**
 * A sink for human readable output supplied by the host.
 */
export interface Logger {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
  trace(error: unknown): void;
}

/**
 * What the host asks a runner to build a task for.
 */
export interface TaskDef {
  readonly fullyQualifiedName: string;
  readonly fingerprint: Fingerprint;
  /**
   * True when the user named this suite explicitly rather than it being
   * found by discovery.
   */
  readonly explicitlySpecified: boolean;
  readonly selectors: readonly Selector[];
}
