/**
 * @module
 * Join-all and stop-all over a group of tasks.
 */

import type { Operation } from './operation';
import type { SpawnOptions, Spawner, Task, TaskBlock } from './task';
import { useTask } from './context';

/**
 * Tracks every task created through it. The tasks are owned by the barrier's
 * parent (by default the task that created the barrier); the barrier only
 * remembers them so they can be joined or stopped together.
 *
 * @example
 * ```typescript
 * const barrier = new Barrier();
 * try {
 *   for (const url of urls) barrier.async(() => fetchPage(url));
 *   yield* barrier.wait();
 * } finally {
 *   barrier.stop();
 * }
 * ```
 */
export class Barrier implements Spawner {
  readonly #parent: Spawner;
  readonly #tasks: Task<unknown>[] = [];

  constructor(parent?: Spawner) {
    this.#parent = parent ?? useTask();
  }

  /** Tracked tasks, in creation order. */
  get tasks(): Task<unknown>[] {
    return [...this.#tasks];
  }

  get size(): number {
    return this.#tasks.length;
  }

  /** True when no tracked task is still alive. */
  get empty(): boolean {
    return this.#tasks.every((task) => task.terminal);
  }

  async<T>(block: TaskBlock<T>, options?: SpawnOptions): Task<T> {
    const task = this.#parent.async(block, options);
    this.#tasks.push(task);
    return task;
  }

  /**
   * Suspends until every tracked task is terminal, including tasks added
   * while waiting. Afterwards rethrows the error of the first failed task in
   * creation order, if any.
   */
  *wait(): Operation<void> {
    for (let i = 0; i < this.#tasks.length; i++) {
      yield* this.#tasks[i].join();
    }
    for (const task of this.#tasks) {
      const outcome = task.outcome();
      if (outcome !== undefined && outcome.isErr()) throw outcome.error;
    }
  }

  /** Stops every tracked task. Tracked tasks stay tracked. */
  stop(): void {
    for (const task of [...this.#tasks]) task.stop();
  }
}
