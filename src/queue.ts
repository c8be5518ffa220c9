/**
 * @module
 * A FIFO queue between tasks, optionally bounded. Consumers suspend while it
 * is empty; producers suspend while it is full.
 */

import type { Operation } from './operation';
import { Condition } from './condition';
import { TaskStateError } from './errors';

export interface QueueOptions {
  /** Maximum number of buffered items. Defaults to unbounded. */
  limit?: number;
}

export class Queue<T> {
  readonly limit: number;
  readonly #items: Array<{ value: T }> = [];
  readonly #available = new Condition();
  readonly #space = new Condition();

  constructor(options: QueueOptions = {}) {
    const limit = options.limit ?? Infinity;
    if (!(limit >= 1)) {
      throw new TaskStateError(`Queue limit must be at least 1, got ${limit}`);
    }
    this.limit = limit;
  }

  get size(): number {
    return this.#items.length;
  }

  get empty(): boolean {
    return this.#items.length === 0;
  }

  get full(): boolean {
    return this.#items.length >= this.limit;
  }

  /** Appends `item`, first waiting for space if the queue is full. */
  *push(item: T): Operation<void> {
    while (this.full) yield* this.#space.wait();
    this.#items.push({ value: item });
    this.#available.signal();
  }

  /** Removes and returns the oldest item, waiting for one if empty. */
  *pop(): Operation<T> {
    while (true) {
      const entry = this.#items.shift();
      if (entry !== undefined) {
        this.#space.signal();
        return entry.value;
      }
      yield* this.#available.wait();
    }
  }
}
