/**
 * @module
 * Operations are the unit of suspendable code. A task's body is a generator
 * function; every value it yields is a `Suspension` telling the reactor how
 * to wake the task up again. Library operations are written as generator
 * functions so task code composes them with `yield*`:
 *
 * @example
 * ```typescript
 * function* fetchBoth(): Operation<[User, Post[]]> {
 *   const user = yield* awaitPromise(api.user());
 *   yield* sleep(0.5);
 *   const posts = yield* awaitPromise(api.posts(user.id));
 *   return [user, posts];
 * }
 * ```
 */

import { type Result, ok, err } from 'neverthrow';
import type { Task } from './task';
import { useTask } from './context';
import { TaskStateError } from './errors';

/** Wakes the suspended task. Calling it more than once has no effect. */
export type Resume = () => void;

/**
 * Registers interest in some condition and arranges for `resume` to be
 * called when it holds. The returned disposer, if any, is called when the
 * task is interrupted (stopped or timed out) before it was resumed.
 */
export type Suspension = (resume: Resume, task: Task<unknown>) => (() => void) | void;

/**
 * A suspendable computation producing `T`. Resumption never passes a value
 * back through `yield`; operations keep their own result slot and read it
 * once resumed.
 */
export type Operation<T> = Generator<Suspension, T, void>;

/** The raw suspension point. */
export function* suspend(register: Suspension): Operation<void> {
  yield register;
}

/** Suspends the current task for `seconds` on the reactor's clock. */
export function* sleep(seconds: number): Operation<void> {
  yield (resume, task) => {
    const timer = task.host.timers.schedule(task.host.clock.now() + seconds, resume);
    return () => timer.cancel();
  };
}

/** Moves the current task to the back of the ready queue. */
export function* yieldNow(): Operation<void> {
  yield (resume) => resume();
}

/**
 * Suspends until `promise` settles and returns its value or throws its
 * rejection. While pending, the promise counts as an external readiness
 * interest, so the reactor blocks on its selector instead of reporting a
 * deadlock. If the task is interrupted first, the eventual settlement is
 * ignored.
 */
export function* awaitPromise<T>(promise: PromiseLike<T>): Operation<T> {
  const slot: { outcome?: Result<T, unknown> } = {};
  yield (resume, task) => {
    const interest = task.host.interest();
    let active = true;
    const settle = (outcome: Result<T, unknown>): void => {
      if (!active) return;
      active = false;
      slot.outcome = outcome;
      interest.release();
      resume();
    };
    void promise.then(
      (value) => settle(ok(value)),
      (error: unknown) => settle(err(error)),
    );
    return () => {
      if (!active) return;
      active = false;
      interest.release();
    };
  };
  const outcome = slot.outcome;
  if (outcome === undefined) {
    throw new TaskStateError('Resumed before the awaited promise settled');
  }
  if (outcome.isErr()) throw outcome.error;
  return outcome.value;
}

/**
 * Holds stop requests for the current task until `body` exits. See
 * `Task.deferStop`.
 */
export function* deferStop<R>(body: () => Operation<R>): Operation<R> {
  return yield* useTask().deferStop(body);
}
