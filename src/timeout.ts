import type { Operation } from './operation';
import { useTask } from './context';

/**
 * Runs `body` in the current task with a deadline `seconds` from now,
 * throwing a `TimeoutError` into it if the deadline passes first. The
 * enclosing task only fails if the error is left unhandled.
 *
 * @example
 * ```typescript
 * try {
 *   yield* withTimeout(1, () => sleep(100));
 * } catch (error) {
 *   if (!isTimeoutError(error)) throw error;
 * }
 * ```
 */
export function* withTimeout<R>(seconds: number, body: () => Operation<R>): Operation<R> {
  return yield* useTask().withTimeout(seconds, body);
}
