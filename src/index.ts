/**
 * @module
 * The main entry point for canopy: a cooperative, single-threaded runtime
 * for structured concurrency. Tasks are generator functions run by a
 * reactor; every task is owned by its parent, and stopping a task stops its
 * subtree.
 */

// Reactor and task tree
export * from './reactor';
export { Task } from './task';
export type {
  Interest,
  SpawnOptions,
  Spawner,
  TaskBlock,
  TaskHost,
  TaskStatus,
} from './task';

// Suspendable operations
export { awaitPromise, deferStop, sleep, suspend, yieldNow } from './operation';
export type { Operation, Resume, Suspension } from './operation';
export { withTimeout } from './timeout';

// Grouping primitives
export { Barrier } from './barrier';
export { Semaphore } from './semaphore';
export { Waiter } from './waiter';
export { Condition } from './condition';
export { Queue } from './queue';
export type { QueueOptions } from './queue';

// Context
export { getCurrentTask, useTask } from './context';

// Errors
export * from './errors';

// Configuration and collaborators
export { noopLogger, resolveReactorOptions } from './config';
export type {
  Logger,
  ReactorOptions,
  ResolvedReactorOptions,
  RunReactorOptions,
  RunReactorOptionsResult,
  RunReactorOptionsThrow,
} from './config';
export { monotonicClock } from './clock';
export type { Clock } from './clock';
export { MAX_TIMER_DELAY, NodeSelector } from './selector';
export type { Selector } from './selector';
export { Timer, TimerQueue } from './timers';
export type { TimerCallback } from './timers';
export { VirtualClock, VirtualSelector, createVirtualTime } from './virtual-time';
export type { VirtualTime } from './virtual-time';

// Diagnostics
export { describeTask, formatHierarchy } from './debug';
