/**
 * @module
 * Reactor configuration: the logger contract and the collaborators a
 * reactor can be given (clock, readiness source, fatal-error policy), with
 * their defaults.
 */

import { type Clock, monotonicClock } from './clock';
import { NodeSelector, type Selector } from './selector';
import { defaultIsFatal } from './errors';

/**
 * Logger interface for reactor diagnostics.
 * Compatible with common logging libraries like winston, pino, console, etc.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * A no-op logger that discards all log messages.
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export interface ReactorOptions {
  /** Time source for sleeps and timeouts. Defaults to `monotonicClock`. */
  clock?: Clock;
  /**
   * What the loop blocks on when nothing is ready. Must agree with `clock`:
   * a `NodeSelector` waits in real time, a `VirtualSelector` moves its
   * `VirtualClock`. Defaults to a new `NodeSelector`.
   */
  selector?: Selector;
  /** Defaults to `console`. */
  logger?: Logger;
  /**
   * Decides which thrown values are non-recoverable. Such errors are never
   * stored as a task's result; they abort the reactor.
   */
  isFatal?: (error: unknown) => boolean;
  /** Annotation given to the root task. */
  name?: string;
}

export type ResolvedReactorOptions = Required<ReactorOptions>;

export function resolveReactorOptions(
  options: ReactorOptions = {},
): ResolvedReactorOptions {
  return {
    clock: options.clock ?? monotonicClock,
    selector: options.selector ?? new NodeSelector(),
    logger: options.logger ?? console,
    isFatal: options.isFatal ?? defaultIsFatal,
    name: options.name ?? 'root',
  };
}

/**
 * Options for `runReactor` with the default error-throwing behavior.
 */
export interface RunReactorOptionsThrow extends ReactorOptions {
  throw?: true;
}

/**
 * Options for `runReactor` resolving to a `Result` instead of rejecting
 * when the root task fails.
 */
export interface RunReactorOptionsResult extends ReactorOptions {
  throw: false;
}

export type RunReactorOptions = RunReactorOptionsThrow | RunReactorOptionsResult;
