/**
 * @module
 * The readiness source the reactor blocks on when no task is ready. The
 * reactor only needs two things from it: "block until something happens or
 * the timeout elapses" and "something happened" (a wake-up raised from
 * outside the loop, e.g. by a settled promise).
 */

export interface Selector {
  /**
   * Resolves when `wakeup()` has been called since the previous `select`, or
   * once `timeout` seconds have elapsed. `undefined` means no timeout.
   */
  select(timeout: number | undefined): Promise<void>;
  /** Records an external event; a pending or the next `select` resolves. */
  wakeup(): void;
  /** Releases any pending timer. */
  close(): void;
}

/**
 * Largest delay Node timers accept; longer ones fire after 1ms. A clamped
 * select just wakes early and the reactor selects again.
 */
export const MAX_TIMER_DELAY = 2 ** 31 - 1;

/**
 * Selector on top of the Node.js event loop. Waiting is a Node timer raced
 * against wake-ups; a zero timeout still goes through `setImmediate` so that
 * I/O callbacks and settled promises get a chance to run.
 */
export class NodeSelector implements Selector {
  #woken = false;
  #resolve: (() => void) | undefined;
  #timer: ReturnType<typeof setTimeout> | undefined;
  #immediate: ReturnType<typeof setImmediate> | undefined;

  select(timeout: number | undefined): Promise<void> {
    if (this.#woken) {
      this.#woken = false;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.#resolve = resolve;
      if (timeout === undefined) return;
      if (timeout <= 0) {
        this.#immediate = setImmediate(() => this.#settle());
      } else {
        this.#timer = setTimeout(
          () => this.#settle(),
          Math.min(timeout * 1000, MAX_TIMER_DELAY),
        );
      }
    });
  }

  wakeup(): void {
    if (this.#resolve) {
      this.#settle();
    } else {
      this.#woken = true;
    }
  }

  close(): void {
    this.#clear();
    this.#resolve = undefined;
    this.#woken = false;
  }

  #settle(): void {
    this.#clear();
    const resolve = this.#resolve;
    this.#resolve = undefined;
    this.#woken = false;
    resolve?.();
  }

  #clear(): void {
    if (this.#timer !== undefined) clearTimeout(this.#timer);
    if (this.#immediate !== undefined) clearImmediate(this.#immediate);
    this.#timer = undefined;
    this.#immediate = undefined;
  }
}
