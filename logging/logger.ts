import type { Operation } from "effection";
import { createApi } from "@effectionx/context-api";
import type { Logger } from "@suitebridge/protocol";

/**
 * Diagnostics of the adapter itself: what was discovered, which test is
 * running and how long it took. Test results never go through here; they
 * reach the host as events and rendered lines.
 */
export interface Diagnostics {
  debug(message: string): Operation<void>;
}

/**
 * Nobody listens by default, so diagnostics cost nothing until a host asks
 * for them with {@link reportTo}.
 */
const silent: Diagnostics = {
  *debug() {},
};

export const logApi = createApi("suitebridge:diagnostics", silent);
export const log = logApi.operations;

/**
 * Send every diagnostic of the rest of the current scope to the `debug`
 * level of each of the host's `loggers`.
 */
export function* reportTo(loggers: readonly Logger[]): Operation<void> {
  yield* logApi.around({
    *debug([message], next) {
      for (let logger of loggers) {
        logger.debug(message);
      }
      yield* next(message);
    },
  });
}

/**
 * Prefix every diagnostic of the rest of the current scope with `[name]`.
 */
export function* namespace(name: string): Operation<void> {
  yield* logApi.around({
    *debug([message], next) {
      yield* next(`[${name}] ${message}`);
    },
  });
}
