/**
 * @module
 * A condition variable for tasks: any number of tasks wait, one call to
 * `signal` releases all of them with the same value.
 */

import type { Operation } from './operation';
import { TaskStateError } from './errors';

export class Condition<T = void> {
  readonly #waiters = new Set<(value: T) => void>();

  /** Number of tasks currently waiting. */
  get waiting(): number {
    return this.#waiters.size;
  }

  /**
   * Suspends until the next `signal` and returns its value. A waiter that is
   * interrupted (stopped or timed out) is removed and receives nothing.
   */
  *wait(): Operation<T> {
    const slot: { received?: { value: T } } = {};
    yield (resume) => {
      const waiter = (value: T): void => {
        slot.received = { value };
        resume();
      };
      this.#waiters.add(waiter);
      return () => this.#waiters.delete(waiter);
    };
    const received = slot.received;
    if (received === undefined) {
      throw new TaskStateError('Condition waiter resumed without a signal');
    }
    return received.value;
  }

  /** Resumes every current waiter, in the order they started waiting. */
  signal(value: T): void {
    const waiters = [...this.#waiters];
    this.#waiters.clear();
    for (const waiter of waiters) waiter(value);
  }
}
