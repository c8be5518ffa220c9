/**
 * @module
 * The deadline timer queue: a binary min-heap of timers ordered by absolute
 * deadline, ties broken by insertion order. Cancelled timers stay in the heap
 * and are discarded lazily when they reach the top.
 */

export type TimerCallback = () => void;

/**
 * A scheduled callback. Cancelling is idempotent and a cancelled timer never
 * fires.
 */
export class Timer {
  readonly deadline: number;
  readonly sequence: number;
  #callback: TimerCallback | undefined;

  constructor(deadline: number, sequence: number, callback: TimerCallback) {
    this.deadline = deadline;
    this.sequence = sequence;
    this.#callback = callback;
  }

  get cancelled(): boolean {
    return this.#callback === undefined;
  }

  cancel(): void {
    this.#callback = undefined;
  }

  /** @internal */
  fire(): void {
    const callback = this.#callback;
    this.#callback = undefined;
    callback?.();
  }
}

function compare(a: Timer, b: Timer): number {
  return a.deadline - b.deadline || a.sequence - b.sequence;
}

export class TimerQueue {
  readonly #heap: Timer[] = [];
  #sequence = 0;

  /** Number of timers in the heap, including cancelled ones not yet swept. */
  get size(): number {
    return this.#heap.length;
  }

  /** Schedules `callback` to fire once `deadline` has been reached. */
  schedule(deadline: number, callback: TimerCallback): Timer {
    const timer = new Timer(deadline, this.#sequence++, callback);
    this.#heap.push(timer);
    this.#bubbleUp(this.#heap.length - 1);
    return timer;
  }

  /** The earliest live deadline, or `undefined` when no timer is pending. */
  nextDeadline(): number | undefined {
    this.#sweep();
    return this.#heap[0]?.deadline;
  }

  /**
   * Fires, in deadline order, every timer whose deadline is at or before
   * `now`. Timers scheduled by the callbacks themselves are only fired by a
   * later call. Returns the number of callbacks run.
   */
  advance(now: number): number {
    const due: Timer[] = [];
    this.#sweep();
    let top = this.#heap[0];
    while (top !== undefined && top.deadline <= now) {
      this.#pop();
      if (!top.cancelled) due.push(top);
      top = this.#heap[0];
    }
    for (const timer of due) timer.fire();
    return due.length;
  }

  #sweep(): void {
    let top = this.#heap[0];
    while (top !== undefined && top.cancelled) {
      this.#pop();
      top = this.#heap[0];
    }
  }

  #pop(): void {
    const last = this.#heap.pop();
    if (last !== undefined && this.#heap.length > 0) {
      this.#heap[0] = last;
      this.#sinkDown(0);
    }
  }

  #bubbleUp(i: number): void {
    const heap = this.#heap;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (compare(heap[i], heap[parent]) >= 0) break;
      [heap[i], heap[parent]] = [heap[parent], heap[i]];
      i = parent;
    }
  }

  #sinkDown(i: number): void {
    const heap = this.#heap;
    const n = heap.length;
    while (true) {
      let smallest = i;
      const left = 2 * i + 1;
      const right = 2 * i + 2;
      if (left < n && compare(heap[left], heap[smallest]) < 0) smallest = left;
      if (right < n && compare(heap[right], heap[smallest]) < 0) smallest = right;
      if (smallest === i) break;
      [heap[i], heap[smallest]] = [heap[smallest], heap[i]];
      i = smallest;
    }
  }
}
