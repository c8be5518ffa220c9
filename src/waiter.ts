/**
 * @module
 * Join-first-N over a growing set of tasks.
 */

import type { Operation } from './operation';
import type { SpawnOptions, Spawner, Task, TaskBlock } from './task';
import { Condition } from './condition';
import { useTask } from './context';

/**
 * Collects tasks as they reach a terminal state. `wait(n)` hands them out in
 * completion order; tasks that are still running are left alone.
 *
 * @example
 * ```typescript
 * const barrier = new Barrier();
 * const waiter = new Waiter(barrier);
 * for (const mirror of mirrors) waiter.async(() => download(mirror));
 * const [fastest] = yield* waiter.wait(1);
 * barrier.stop();
 * ```
 */
export class Waiter implements Spawner {
  readonly #parent: Spawner;
  readonly #tasks: Task<unknown>[] = [];
  readonly #done: Task<unknown>[] = [];
  readonly #changed = new Condition();
  #returned = 0;

  constructor(parent?: Spawner) {
    this.#parent = parent ?? useTask();
  }

  /** Every task created through the waiter. */
  get tasks(): Task<unknown>[] {
    return [...this.#tasks];
  }

  /** Terminal tasks not yet returned by `wait`. */
  get ready(): number {
    return this.#done.length;
  }

  async<T>(block: TaskBlock<T>, options?: SpawnOptions): Task<T> {
    const task = this.#parent.async(block, options);
    this.#tasks.push(task);
    task.whenTerminal(() => {
      this.#done.push(task);
      this.#changed.signal();
    });
    return task;
  }

  /**
   * Suspends until at least `count` tracked tasks have become terminal since
   * the waiter was created, counting the ones earlier calls already returned.
   * Returns the terminal tasks not handed out before, in completion order, so
   * a task is returned at most once and repeated calls with a growing `count`
   * each resume as the `count`-th task ends.
   */
  *wait(count = 1): Operation<Task<unknown>[]> {
    while (this.#returned + this.#done.length < count) {
      yield* this.#changed.wait();
    }
    const done = this.#done.splice(0);
    this.#returned += done.length;
    return done;
  }
}
