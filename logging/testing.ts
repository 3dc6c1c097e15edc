import type { Operation } from "effection";
import { logApi } from "./logger.ts";

/**
 * Record every diagnostic of the rest of the current scope. The returned
 * array fills up as messages arrive.
 */
export function* captureDiagnostics(): Operation<string[]> {
  let messages: string[] = [];
  yield* logApi.around({
    *debug([message], next) {
      messages.push(message);
      yield* next(message);
    },
  });
  return messages;
}
