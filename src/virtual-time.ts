/**
 * @module
 * Deterministic time for tests and simulations. A `VirtualClock` only moves
 * when told to; a `VirtualSelector` moves it straight to the next deadline
 * instead of sleeping, so a reactor driven by the pair runs sleeps of any
 * length instantly while every deadline is still honoured exactly.
 */

import type { Clock } from './clock';
import type { Selector } from './selector';

export class VirtualClock implements Clock {
  #now: number;

  constructor(start = 0) {
    this.#now = start;
  }

  now(): number {
    return this.#now;
  }

  advance(seconds: number): void {
    if (seconds < 0) {
      throw new RangeError('A virtual clock cannot move backwards');
    }
    this.#now += seconds;
  }
}

/**
 * Jumps the clock by the requested timeout. Before jumping it lets one turn
 * of the host event loop pass, so promises that have already settled (the
 * reactor's external interests) are delivered first; a wake-up during that
 * turn cancels the jump.
 */
export class VirtualSelector implements Selector {
  readonly #clock: VirtualClock;
  #woken = false;
  #resolve: (() => void) | undefined;

  constructor(clock: VirtualClock) {
    this.#clock = clock;
  }

  async select(timeout: number | undefined): Promise<void> {
    if (this.#takeWakeup()) return;
    await new Promise<void>((resolve) => setImmediate(resolve));
    if (this.#takeWakeup()) return;
    if (timeout !== undefined) {
      this.#clock.advance(timeout);
      return;
    }
    await new Promise<void>((resolve) => {
      this.#resolve = resolve;
    });
  }

  wakeup(): void {
    const resolve = this.#resolve;
    if (resolve) {
      this.#resolve = undefined;
      resolve();
    } else {
      this.#woken = true;
    }
  }

  close(): void {
    this.#resolve = undefined;
    this.#woken = false;
  }

  #takeWakeup(): boolean {
    const woken = this.#woken;
    this.#woken = false;
    return woken;
  }
}

export interface VirtualTime {
  clock: VirtualClock;
  selector: VirtualSelector;
}

/**
 * A matching clock/selector pair, ready to spread into `ReactorOptions`.
 *
 * @example
 * ```typescript
 * const time = createVirtualTime();
 * await runReactor(function* () { yield* sleep(60); }, time);
 * time.clock.now(); // 60
 * ```
 */
export function createVirtualTime(start = 0): VirtualTime {
  const clock = new VirtualClock(start);
  return { clock, selector: new VirtualSelector(clock) };
}
