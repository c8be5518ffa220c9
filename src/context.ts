/**
 * @module
 * The ambient "current task". While the reactor resumes a task it installs
 * that task in a synchronous `unctx` context, so code running between two
 * suspension points can find its task without having it passed in. Every
 * block still receives its task explicitly; the ambient lookup only backs
 * the defaults of `spawn`, `Barrier`, `Semaphore`, `Waiter`, `withTimeout`
 * and `deferStop`.
 */

import { createContext } from 'unctx';
import type { Task } from './task';
import { TaskStateError } from './errors';

const taskContext = createContext<Task<unknown>>();

/** The task whose code is running right now, if any. */
export function getCurrentTask(): Task<unknown> | undefined {
  return taskContext.tryUse() ?? undefined;
}

/**
 * The task whose code is running right now.
 * @throws {TaskStateError} When called outside of task code.
 */
export function useTask(): Task<unknown> {
  const task = getCurrentTask();
  if (task === undefined) {
    throw new TaskStateError(
      'No current task. Run this inside runReactor() or pass a parent explicitly.',
    );
  }
  return task;
}

/** @internal Runs `fn` with `task` installed as the current task. */
export function runAsTask<R>(task: Task<unknown>, fn: () => R): R {
  return taskContext.call(task, fn);
}
