/**
 * @module
 * The reactor: a single-threaded loop that owns the root task, drains the
 * ready queue in FIFO order, advances the timer queue and blocks on its
 * selector when nothing is ready, until the root subtree is finished.
 */

import type { Result } from 'neverthrow';
import type { Clock } from './clock';
import {
  type Logger,
  type ReactorOptions,
  type RunReactorOptions,
  type RunReactorOptionsResult,
  type RunReactorOptionsThrow,
  resolveReactorOptions,
} from './config';
import type { Selector } from './selector';
import { TimerQueue } from './timers';
import { ReadyQueue } from './ready-queue';
import {
  Task,
  type Interest,
  type SpawnOptions,
  type Spawner,
  type TaskBlock,
  type TaskHost,
} from './task';
import { useTask } from './context';
import { formatHierarchy } from './debug';
import { DeadlockError, TaskStateError } from './errors';

export class Reactor implements TaskHost {
  readonly clock: Clock;
  readonly timers = new TimerQueue();
  readonly logger: Logger;
  readonly #selector: Selector;
  readonly #isFatal: (error: unknown) => boolean;
  readonly #name: string;
  readonly #ready = new ReadyQueue<Task<unknown>>();
  #interests = 0;
  #nextId = 0;
  #waiting = false;
  #root: Task<unknown> | undefined;

  constructor(options: ReactorOptions = {}) {
    const resolved = resolveReactorOptions(options);
    this.clock = resolved.clock;
    this.logger = resolved.logger;
    this.#selector = resolved.selector;
    this.#isFatal = resolved.isFatal;
    this.#name = resolved.name;
  }

  get root(): Task<unknown> | undefined {
    return this.#root;
  }

  /** Number of external readiness interests currently registered. */
  get interests(): number {
    return this.#interests;
  }

  isFatal(error: unknown): boolean {
    return this.#isFatal(error);
  }

  nextId(): number {
    return ++this.#nextId;
  }

  schedule(task: Task<unknown>): void {
    this.#ready.push(task);
    if (this.#waiting) this.#selector.wakeup();
  }

  interest(): Interest {
    this.#interests++;
    let released = false;
    return {
      release: () => {
        if (released) return;
        released = true;
        this.#interests--;
      },
    };
  }

  /**
   * Creates the root task from `block` and runs the loop until the root
   * subtree is finished. Transient tasks still attached to the root at that
   * point are then stopped and drained. Resolves with the root task; rejects
   * only with non-recoverable errors and `DeadlockError`.
   */
  async run<T>(block: TaskBlock<T>): Promise<Task<T>> {
    if (this.#root !== undefined) {
      throw new TaskStateError('A reactor runs exactly one root task');
    }
    const root = new Task(this, block, undefined, { annotation: this.#name });
    this.#root = root;
    root.start();
    try {
      while (!root.finished()) {
        await this.#iterate(() => root.finished());
      }
      while (root.children.length > 0) {
        for (const child of root.children) child.stop();
        await this.#iterate(() => root.children.length === 0);
      }
    } catch (error) {
      this.logger.error(`Reactor aborted while running ${root}`, error);
      throw error;
    } finally {
      this.#selector.close();
    }
    return root;
  }

  /** Logs the current task tree at `info`. */
  printHierarchy(): void {
    if (this.#root !== undefined) this.logger.info(formatHierarchy(this.#root));
  }

  async #iterate(done: () => boolean): Promise<void> {
    for (let pending = this.#ready.size; pending > 0; pending--) {
      const task = this.#ready.shift();
      if (task === undefined) break;
      task.step();
    }
    this.timers.advance(this.clock.now());
    if (done()) return;

    if (!this.#ready.empty) {
      if (this.#interests > 0) await this.#select(0);
      return;
    }
    const deadline = this.timers.nextDeadline();
    if (deadline === undefined && this.#interests === 0) {
      throw new DeadlockError(this.#countAlive());
    }
    await this.#select(
      deadline === undefined ? undefined : Math.max(0, deadline - this.clock.now()),
    );
  }

  async #select(timeout: number | undefined): Promise<void> {
    this.#waiting = true;
    try {
      await this.#selector.select(timeout);
    } finally {
      this.#waiting = false;
    }
  }

  #countAlive(): number {
    let alive = 0;
    const visit = (task: Task<unknown>): void => {
      if (task.alive) alive++;
      for (const child of task.children) visit(child);
    };
    if (this.#root !== undefined) visit(this.#root);
    return alive;
  }
}

/**
 * Runs `block` as the root task of a new reactor and resolves with its
 * result: the returned value, `undefined` if the root was stopped, or a
 * rejection with the root's error. With `{ throw: false }` the root's
 * outcome is returned as a `Result` instead. Non-recoverable errors always
 * reject.
 *
 * @example
 * ```typescript
 * const total = await runReactor(function* (task) {
 *   const a = task.async(function* () { yield* sleep(1); return 1; });
 *   const b = task.async(function* () { yield* sleep(1); return 2; });
 *   return ((yield* a.wait()) ?? 0) + ((yield* b.wait()) ?? 0);
 * });
 * ```
 */
export function runReactor<T>(
  block: TaskBlock<T>,
  options?: RunReactorOptionsThrow,
): Promise<T | undefined>;
export function runReactor<T>(
  block: TaskBlock<T>,
  options: RunReactorOptionsResult,
): Promise<Result<T | undefined, unknown>>;
export async function runReactor<T>(
  block: TaskBlock<T>,
  options: RunReactorOptions = {},
): Promise<T | undefined | Result<T | undefined, unknown>> {
  const root = await new Reactor(options).run(block);
  const outcome = root.outcome();
  if (outcome === undefined) {
    throw new TaskStateError(`Reactor finished before ${root} reached a terminal state`);
  }
  if (options.throw === false) return outcome;
  if (outcome.isErr()) throw outcome.error;
  return outcome.value;
}

export interface SpawnTaskOptions extends SpawnOptions {
  /** Defaults to the current task. */
  parent?: Spawner;
}

/**
 * Creates a task under `parent`, or under the task whose code is running
 * when no parent is given.
 */
export function spawn<T>(block: TaskBlock<T>, options: SpawnTaskOptions = {}): Task<T> {
  const { parent, ...rest } = options;
  return (parent ?? useTask()).async(block, rest);
}
