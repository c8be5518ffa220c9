/**
 * @module
 * The error taxonomy of the runtime. Task code distinguishes three kinds of
 * thrown values: ordinary (recoverable) errors, which are captured into the
 * failing task's result; control-flow signals (`StopSignal`, `TimeoutError`)
 * injected by the reactor at suspension points; and fatal errors, which are
 * never captured and abort the reactor.
 */

import { type Result, ok, err } from 'neverthrow';

// =================================================================
// Section 1: Control-flow signals
// =================================================================

/**
 * The cancellation token delivered into a task's code when the task is
 * stopped. It unwinds the generator like any thrown value, so `finally`
 * blocks run, but it is not a failure: a task that lets it escape ends up
 * `stopped`, not `failed`.
 *
 * Code that catches everything must rethrow it:
 *
 * @example
 * ```typescript
 * try {
 *   yield* sleep(10);
 * } catch (error) {
 *   if (isStopSignal(error)) throw error;
 *   recover(error);
 * }
 * ```
 */
export class StopSignal extends Error {
  public readonly _tag = 'StopSignal' as const;

  constructor(message = 'Task was stopped') {
    super(message);
    this.name = 'StopSignal';
    Object.setPrototypeOf(this, StopSignal.prototype);
  }
}

export function isStopSignal(error: unknown): error is StopSignal {
  return error instanceof StopSignal && error._tag === 'StopSignal';
}

/**
 * Raised inside the body of a `withTimeout` scope when its deadline passes
 * first. It unwinds only that body and can be caught by the scope's caller.
 */
export class TimeoutError extends Error {
  public readonly _tag = 'TimeoutError' as const;
  public readonly seconds: number;

  constructor(seconds: number) {
    super(`Operation timed out after ${seconds}s`);
    this.name = 'TimeoutError';
    this.seconds = seconds;
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

export function isTimeoutError(error: unknown): error is TimeoutError {
  return error instanceof TimeoutError && error._tag === 'TimeoutError';
}

// =================================================================
// Section 2: Runtime errors
// =================================================================

/**
 * Signals that the process or the runtime itself is compromised. It is never
 * captured at a task boundary: it propagates out of the reactor.
 */
export class FatalError extends Error {
  public readonly _tag = 'FatalError' as const;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'FatalError';
    Object.setPrototypeOf(this, FatalError.prototype);
  }
}

export function isFatalError(error: unknown): error is FatalError {
  return error instanceof FatalError && error._tag === 'FatalError';
}

/**
 * Thrown out of the reactor when the root is unfinished but nothing can ever
 * make progress again: no task is ready, no timer is pending and no external
 * interest is registered.
 */
export class DeadlockError extends Error {
  public readonly _tag = 'DeadlockError' as const;
  public readonly blocked: number;

  constructor(blocked: number) {
    super(`Reactor deadlocked with ${blocked} blocked task(s) and nothing left to wake them`);
    this.name = 'DeadlockError';
    this.blocked = blocked;
    Object.setPrototypeOf(this, DeadlockError.prototype);
  }
}

/**
 * Misuse of the task API, such as waiting on yourself or spawning under a
 * parent that has already finished.
 */
export class TaskStateError extends Error {
  public readonly _tag = 'TaskStateError' as const;

  constructor(message: string) {
    super(message);
    this.name = 'TaskStateError';
    Object.setPrototypeOf(this, TaskStateError.prototype);
  }
}

/**
 * The default non-recoverable predicate: explicit `FatalError`s and V8's
 * stack exhaustion, which leaves the interpreter in no state to keep
 * scheduling.
 */
export function defaultIsFatal(error: unknown): boolean {
  if (isFatalError(error)) return true;
  return (
    error instanceof RangeError &&
    error.message.includes('Maximum call stack size exceeded')
  );
}

// =================================================================
// Section 3: Capturing
// =================================================================

/**
 * Runs a synchronous function and captures its outcome as a `Result`
 * instead of letting it throw. The reactor uses it around every resumption
 * of task code.
 */
export function attempt<T>(fn: () => T): Result<T, unknown> {
  try {
    return ok(fn());
  } catch (error) {
    return err(error);
  }
}
