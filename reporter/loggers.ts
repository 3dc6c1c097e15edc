import { List } from "immutable";
import type { Logger } from "@suitebridge/protocol";

/**
 * A {@link Logger} that keeps every message it receives.
 */
export interface RecordingLogger extends Logger {
  /**
   * A snapshot of what has been logged so far, each entry prefixed with
   * its level, e.g. `info: + passing test`.
   */
  readonly messages: readonly string[];
}

/**
 * Create a logger that records messages instead of printing them. Each
 * write lands whole and in the order it was made, whichever task made it.
 */
export function createRecordingLogger(): RecordingLogger {
  let ref = { current: List<string>() };

  let record = (line: string) => {
    ref.current = ref.current.push(line);
  };

  return {
    error: (message) => record(`error: ${message}`),
    warn: (message) => record(`warn: ${message}`),
    info: (message) => record(`info: ${message}`),
    debug: (message) => record(`debug: ${message}`),
    trace: (error) => record(`trace: ${String(error)}`),
    get messages() {
      return ref.current.toArray();
    },
  };
}

/**
 * A {@link Logger} that writes to the console, sending errors and warnings
 * to stderr.
 */
export function createConsoleLogger(): Logger {
  return {
    error: (message) => console.error(message),
    warn: (message) => console.warn(message),
    info: (message) => console.log(message),
    debug: (message) => console.debug(message),
    trace: (error) => console.trace(error),
  };
}
