/**
 * @module
 * Bounded fan-out: at most `limit` tracked tasks run at any instant; the rest
 * wait in a FIFO queue, created but not started.
 */

import type { Operation } from './operation';
import type { SpawnOptions, Spawner, Task, TaskBlock } from './task';
import { Barrier } from './barrier';
import { TaskStateError } from './errors';

type Pending =
  | { kind: 'task'; task: Task<unknown> }
  | { kind: 'acquire'; grant: () => void };

/**
 * A queued task that is stopped before its turn is dropped from the queue
 * and never starts; it ends `stopped` straight from `initialized`.
 *
 * @example
 * ```typescript
 * const semaphore = new Semaphore(2);
 * for (const job of jobs) semaphore.async(() => process(job));
 * yield* semaphore.wait();
 * ```
 */
export class Semaphore implements Spawner {
  readonly limit: number;
  readonly #barrier: Barrier;
  readonly #admitted = new Set<Task<unknown>>();
  #queue: Pending[] = [];
  #count = 0;

  constructor(limit: number, parent?: Spawner) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new TaskStateError(`Semaphore limit must be a positive integer, got ${limit}`);
    }
    this.limit = limit;
    this.#barrier = new Barrier(parent);
  }

  /** Slots in use: admitted tasks plus `acquire` holders. */
  get count(): number {
    return this.#count;
  }

  /** Requests queued behind the limit. */
  get waiting(): number {
    return this.#queue.length;
  }

  /** Whether a new request would have to queue. */
  get blocking(): boolean {
    return this.#count >= this.limit || this.#queue.length > 0;
  }

  /** Every task created through the semaphore: running, queued and done. */
  get tasks(): Task<unknown>[] {
    return this.#barrier.tasks;
  }

  /**
   * Creates a task for `block`. It starts right away if a slot is free and
   * nobody is queued ahead of it; otherwise it stays `initialized` until the
   * requests before it have been admitted and a slot frees up.
   */
  async<T>(block: TaskBlock<T>, options?: SpawnOptions): Task<T> {
    const task = this.#barrier.async(block, { ...options, deferred: true });
    const blocking = this.blocking;
    task.whenTerminal(() => this.#settled(task));
    if (blocking) {
      this.#queue.push({ kind: 'task', task });
    } else {
      this.#admit(task);
    }
    return task;
  }

  /**
   * Runs `body` in the current task while holding a slot, waiting in the
   * same FIFO as queued tasks when none is free.
   */
  *acquire<R>(body: () => Operation<R>): Operation<R> {
    if (!this.blocking) {
      this.#count++;
    } else {
      const state = { granted: false };
      try {
        yield (resume) => {
          const entry: Pending = {
            kind: 'acquire',
            grant: () => {
              state.granted = true;
              resume();
            },
          };
          this.#queue.push(entry);
          return () => {
            this.#queue = this.#queue.filter((pending) => pending !== entry);
          };
        };
      } catch (error) {
        if (state.granted) this.#release();
        throw error;
      }
    }
    try {
      return yield* body();
    } finally {
      this.#release();
    }
  }

  /** Joins every task created through the semaphore. */
  *wait(): Operation<void> {
    yield* this.#barrier.wait();
  }

  /** Stops every task created through the semaphore, queued ones included. */
  stop(): void {
    this.#barrier.stop();
  }

  #admit(task: Task<unknown>): void {
    this.#count++;
    this.#admitted.add(task);
    task.start();
  }

  #settled(task: Task<unknown>): void {
    if (this.#admitted.delete(task)) {
      this.#release();
    } else {
      this.#queue = this.#queue.filter(
        (pending) => pending.kind !== 'task' || pending.task !== task,
      );
    }
  }

  #release(): void {
    this.#count--;
    while (this.#count < this.limit) {
      const next = this.#queue.shift();
      if (next === undefined) return;
      if (next.kind === 'acquire') {
        this.#count++;
        next.grant();
      } else if (next.task.status === 'initialized') {
        this.#admit(next.task);
      }
    }
  }
}
