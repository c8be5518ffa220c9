/**
 * @module
 * Monotonic time sources. All durations and deadlines in the runtime are
 * expressed in seconds as floating point numbers.
 */

/**
 * A monotonic clock. `now()` never goes backwards; its origin is arbitrary.
 */
export interface Clock {
  now(): number;
}

/**
 * The process-wide monotonic clock, backed by `performance.now()`.
 */
export const monotonicClock: Clock = {
  now: () => performance.now() / 1000,
};

