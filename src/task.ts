/**
 * @module
 * The task lifecycle state machine and the task tree.
 *
 * A task wraps a generator (its execution context), a parent link, the set of
 * children it owns and a single-assignment result slot. Tasks move through
 * `initialized → running → complete | failed | stopped`, or straight from
 * `initialized` to `stopped`. Terminal states are absorbing.
 */

import { type Result, ok, err } from 'neverthrow';
import type { Clock } from './clock';
import type { Logger } from './config';
import type { TimerQueue } from './timers';
import type { Operation, Suspension } from './operation';
import { getCurrentTask, runAsTask } from './context';
import { describeTask } from './debug';
import {
  StopSignal,
  TaskStateError,
  TimeoutError,
  attempt,
  isStopSignal,
} from './errors';

// =================================================================
// Section 1: Types
// =================================================================

export type TaskStatus = 'initialized' | 'running' | 'complete' | 'failed' | 'stopped';

/** The code of a task. It receives its own task handle. */
export type TaskBlock<T> = (task: Task<T>) => Operation<T>;

export interface SpawnOptions {
  /**
   * Transient tasks never keep their ancestors from finishing, and are
   * promoted to the grandparent instead of being stopped when their parent
   * ends. Fixed for the task's lifetime.
   */
  transient?: boolean;
  /**
   * Create the task without scheduling its first resumption; it stays
   * `initialized` until `start()` is called.
   */
  deferred?: boolean;
  annotation?: string;
}

/**
 * Anything tasks can be created under: a task (which owns the child) or a
 * group primitive that forwards to its own parent and tracks the result.
 */
export interface Spawner {
  async<T>(block: TaskBlock<T>, options?: SpawnOptions): Task<T>;
}

/** A registered external readiness interest. */
export interface Interest {
  release(): void;
}

/**
 * What a task needs from the reactor that owns it.
 */
export interface TaskHost {
  readonly clock: Clock;
  readonly timers: TimerQueue;
  readonly logger: Logger;
  isFatal(error: unknown): boolean;
  nextId(): number;
  /** Appends the task to the ready queue. */
  schedule(task: Task<unknown>): void;
  interest(): Interest;
}

type TaskOutcome<T> =
  | { status: 'complete'; value: T }
  | { status: 'failed'; error: unknown }
  | { status: 'stopped' };

interface Suspended {
  dispose: (() => void) | undefined;
}

interface TimeoutScope {
  readonly seconds: number;
  expired: boolean;
  delivered: boolean;
}

// =================================================================
// Section 2: Task
// =================================================================

export class Task<T = unknown> implements Spawner {
  readonly id: number;
  readonly transient: boolean;
  /** @internal */
  readonly host: TaskHost;

  #block: (() => Operation<T>) | undefined;
  #generator: Operation<T> | undefined;
  #parent: Task<unknown> | undefined;
  readonly #children = new Set<Task<unknown>>();
  #status: TaskStatus = 'initialized';
  #outcome: TaskOutcome<T> | undefined;
  #annotation: string | undefined;

  #started = false;
  #scheduled = false;
  #suspended: Suspended | undefined;
  #injected: { error: unknown } | undefined;
  #stopRequested = false;
  #deferStopDepth = 0;
  #stopDeferred = false;
  #holding = false;
  readonly #timeouts: TimeoutScope[] = [];
  readonly #waiters = new Set<() => void>();
  #observers: Array<() => void> = [];

  constructor(
    host: TaskHost,
    block: TaskBlock<T>,
    parent: Task<unknown> | undefined,
    options: SpawnOptions = {},
  ) {
    this.host = host;
    this.id = host.nextId();
    this.#block = () => block(this);
    this.#parent = parent;
    this.transient = options.transient ?? false;
    this.#annotation = options.annotation;
    parent?.#children.add(this);
  }

  get status(): TaskStatus {
    return this.#status;
  }

  get parent(): Task<unknown> | undefined {
    return this.#parent;
  }

  /** Children that are not yet finished, in creation order. */
  get children(): Task<unknown>[] {
    return [...this.#children];
  }

  get annotation(): string | undefined {
    return this.#annotation;
  }

  /** True until the task's own code reaches a terminal state. */
  get alive(): boolean {
    return !this.terminal;
  }

  get terminal(): boolean {
    return (
      this.#status === 'complete' ||
      this.#status === 'failed' ||
      this.#status === 'stopped'
    );
  }

  /**
   * Whether this subtree is done: the task itself is terminal and so is every
   * non-transient descendant. Transient children are ignored.
   */
  finished(): boolean {
    if (!this.terminal) return false;
    for (const child of this.#children) {
      if (!child.transient && !child.finished()) return false;
    }
    return true;
  }

  /**
   * The result slot as a `Result`: `undefined` while unset, `Ok(value)` when
   * complete, `Ok(undefined)` when stopped, `Err(error)` when failed.
   */
  outcome(): Result<T | undefined, unknown> | undefined {
    const outcome = this.#outcome;
    if (outcome === undefined) return undefined;
    switch (outcome.status) {
      case 'complete':
        return ok(outcome.value);
      case 'failed':
        return err(outcome.error);
      case 'stopped':
        return ok(undefined);
    }
  }

  annotate(annotation: string): this {
    this.#annotation = annotation;
    return this;
  }

  toString(): string {
    return describeTask(this);
  }

  // ---------------------------------------------------------------
  // Tree
  // ---------------------------------------------------------------

  /**
   * Creates a child task owned by this task. The child starts when the
   * reactor next drains its ready queue, i.e. after the spawner yields.
   */
  async<U>(block: TaskBlock<U>, options: SpawnOptions = {}): Task<U> {
    if (this.finished()) {
      throw new TaskStateError(`Cannot create a task under finished ${describeTask(this)}`);
    }
    const child = new Task(this.host, block, this, options);
    if (!options.deferred) child.start();
    return child;
  }

  /** Schedules the first resumption of a deferred task. */
  start(): void {
    if (this.#started || this.#status !== 'initialized') return;
    this.#started = true;
    this.#schedule();
  }

  /**
   * Registers a callback run synchronously on the terminal transition, after
   * waiters have been woken. Runs immediately if the task is already
   * terminal.
   */
  whenTerminal(observer: (task: Task<T>) => void): void {
    if (this.terminal) {
      observer(this);
      return;
    }
    this.#observers.push(() => observer(this));
  }

  // ---------------------------------------------------------------
  // Waiting
  // ---------------------------------------------------------------

  /**
   * Suspends until the task is terminal, then returns its value, rethrows
   * its error, or returns `undefined` if it was stopped.
   */
  *wait(): Operation<T | undefined> {
    yield* this.join();
    const outcome = this.#outcome;
    if (outcome === undefined || outcome.status === 'stopped') return undefined;
    if (outcome.status === 'failed') throw outcome.error;
    return outcome.value;
  }

  /** Suspends until the task is terminal without looking at its result. */
  *join(): Operation<void> {
    if (this.terminal) return;
    if (getCurrentTask() === this) {
      throw new TaskStateError(`${describeTask(this)} cannot wait on itself`);
    }
    yield (resume) => {
      this.#waiters.add(resume);
      return () => this.#waiters.delete(resume);
    };
  }

  // ---------------------------------------------------------------
  // Cancellation
  // ---------------------------------------------------------------

  /**
   * Stops every non-transient child, then delivers a `StopSignal` to this
   * task's code at its next suspension point. The signal is held back until
   * every non-transient child has finished, so a task never ends before its
   * subtree. A task that never ran is stopped on the spot unless children
   * created under it are still unwinding. Idempotent.
   *
   * On a terminal task the cascade still reaches children that have not
   * finished yet.
   */
  stop(): void {
    for (const child of [...this.#children]) {
      if (!child.transient) child.stop();
    }
    if (this.terminal) return;
    if (this.#status === 'initialized') {
      if (this.#hasBlockingChildren()) {
        this.#stopRequested = true;
        this.#started = true;
        this.#schedule();
      } else {
        this.#finish({ status: 'stopped' });
      }
      return;
    }
    if (this.#deferStopDepth > 0) {
      this.#stopDeferred = true;
      return;
    }
    if (this.#stopRequested) return;
    this.#stopRequested = true;
    this.#interrupt();
  }

  /**
   * Runs `body` with stop requests held back: a stop arriving meanwhile is
   * applied when `body` exits. Suspension points inside `body` are not
   * interrupted by stops (timeouts still apply), which lets cleanup code
   * suspend while the task is being unwound.
   */
  *deferStop<R>(body: () => Operation<R>): Operation<R> {
    this.#assertCurrent('deferStop');
    this.#deferStopDepth++;
    try {
      return yield* body();
    } finally {
      this.#deferStopDepth--;
      if (this.#deferStopDepth === 0 && this.#stopDeferred) {
        this.#stopDeferred = false;
        this.stop();
      }
    }
  }

  /**
   * Runs `body` inside this task with a deadline `seconds` from now. If the
   * deadline passes first, a `TimeoutError` is thrown into `body` at its
   * current suspension point. Nested scopes keep their own deadlines; the
   * innermost expired scope is delivered first and each scope raises at most
   * once.
   */
  *withTimeout<R>(seconds: number, body: () => Operation<R>): Operation<R> {
    this.#assertCurrent('withTimeout');
    const scope: TimeoutScope = { seconds, expired: false, delivered: false };
    this.#timeouts.push(scope);
    const timer = this.host.timers.schedule(this.host.clock.now() + seconds, () => {
      scope.expired = true;
      this.#interrupt();
    });
    try {
      return yield* body();
    } finally {
      timer.cancel();
      const index = this.#timeouts.lastIndexOf(scope);
      if (index >= 0) this.#timeouts.splice(index, 1);
    }
  }

  // ---------------------------------------------------------------
  // Execution
  // ---------------------------------------------------------------

  /**
   * Runs the task's code up to its next suspension point. Called by the
   * reactor for each ready-queue entry. Non-recoverable errors propagate out.
   *
   * @internal
   */
  step(): void {
    this.#scheduled = false;
    if (this.terminal || this.#suspended !== undefined) return;
    if (this.#holdForChildren()) return;

    let generator = this.#generator;
    if (generator === undefined) {
      if (this.#stopRequested) {
        this.#finish({ status: 'stopped' });
        return;
      }
      const block = this.#block;
      if (block === undefined) return;
      this.#block = undefined;
      this.#status = 'running';
      this.host.logger.debug(`${describeTask(this)} started`);
      const created = attempt(() => runAsTask(this, block));
      if (created.isErr()) {
        this.#fail(created.error);
        return;
      }
      generator = created.value;
      this.#generator = generator;
    }

    const signal = this.#takeSignal();
    const current = generator;
    const resumed = attempt(() =>
      runAsTask(this, () =>
        signal === undefined ? current.next() : current.throw(signal.error),
      ),
    );
    if (resumed.isErr()) {
      this.#fail(resumed.error);
      return;
    }
    const result = resumed.value;
    if (result.done) {
      this.#finish(
        this.#stopRequested
          ? { status: 'stopped' }
          : { status: 'complete', value: result.value },
      );
      return;
    }
    this.#suspend(result.value);
  }

  #suspend(suspension: Suspension): void {
    if (this.#hasPendingSignal()) {
      this.#schedule();
      return;
    }
    const suspended: Suspended = { dispose: undefined };
    this.#suspended = suspended;
    const resume = (): void => {
      if (this.#suspended !== suspended) return;
      this.#suspended = undefined;
      this.#schedule();
    };
    const registered = attempt(() => suspension(resume, this));
    if (registered.isErr()) {
      if (this.host.isFatal(registered.error)) throw registered.error;
      this.#suspended = undefined;
      this.#injected = { error: registered.error };
      this.#schedule();
      return;
    }
    const dispose = typeof registered.value === 'function' ? registered.value : undefined;
    if (this.#suspended === suspended) {
      suspended.dispose = dispose;
    } else {
      dispose?.();
    }
  }

  #schedule(): void {
    if (this.#scheduled || this.terminal) return;
    this.#scheduled = true;
    this.host.schedule(this);
  }

  /** Wakes a suspended task early so a pending signal can be delivered. */
  #interrupt(): void {
    const suspended = this.#suspended;
    if (suspended === undefined) return;
    this.#suspended = undefined;
    suspended.dispose?.();
    this.#schedule();
  }

  #hasBlockingChildren(): boolean {
    for (const child of this.#children) {
      if (!child.transient) return true;
    }
    return false;
  }

  /**
   * Parks a task whose stop is due while non-transient children are still
   * unwinding. Each detaching child reschedules it.
   */
  #holdForChildren(): boolean {
    this.#holding = false;
    if (!this.#stopRequested || this.#deferStopDepth > 0) return false;
    for (const child of [...this.#children]) {
      if (!child.transient) child.stop();
    }
    this.#holding = this.#hasBlockingChildren();
    return this.#holding;
  }

  #hasPendingSignal(): boolean {
    if (this.#injected !== undefined) return true;
    if (this.#stopRequested && this.#deferStopDepth === 0) return true;
    return this.#timeouts.some((scope) => scope.expired && !scope.delivered);
  }

  #takeSignal(): { error: unknown } | undefined {
    const injected = this.#injected;
    if (injected !== undefined) {
      this.#injected = undefined;
      return injected;
    }
    if (this.#stopRequested && this.#deferStopDepth === 0) {
      return { error: new StopSignal() };
    }
    for (let i = this.#timeouts.length - 1; i >= 0; i--) {
      const scope = this.#timeouts[i];
      if (scope.expired && !scope.delivered) {
        scope.delivered = true;
        return { error: new TimeoutError(scope.seconds) };
      }
    }
    return undefined;
  }

  #fail(error: unknown): void {
    if (this.host.isFatal(error)) throw error;
    if (isStopSignal(error)) {
      this.#finish({ status: 'stopped' });
    } else {
      this.#finish({ status: 'failed', error });
    }
  }

  #assertCurrent(operation: string): void {
    if (getCurrentTask() !== this) {
      throw new TaskStateError(`${operation} must run inside the code of ${describeTask(this)}`);
    }
  }

  // ---------------------------------------------------------------
  // Terminal transition
  // ---------------------------------------------------------------

  #finish(outcome: TaskOutcome<T>): void {
    this.#status = outcome.status;
    this.#outcome = outcome;
    this.#block = undefined;
    this.#generator = undefined;
    this.#suspended?.dispose?.();
    this.#suspended = undefined;
    this.#injected = undefined;
    this.#timeouts.length = 0;
    this.#holding = false;
    this.host.logger.debug(`${describeTask(this)} ${outcome.status}`);

    this.#promoteTransientChildren();

    if (
      outcome.status === 'failed' &&
      this.#parent !== undefined &&
      this.#waiters.size === 0
    ) {
      this.host.logger.warn(
        `${describeTask(this)} failed with an unhandled error`,
        outcome.error,
      );
    }

    const waiters = [...this.#waiters];
    this.#waiters.clear();
    for (const resume of waiters) resume();

    const observers = this.#observers;
    this.#observers = [];
    for (const observer of observers) observer();

    this.#detachIfFinished();
  }

  /** Hands unfinished transient children over to this task's parent. */
  #promoteTransientChildren(): void {
    const parent = this.#parent;
    if (parent === undefined) return;
    for (const child of [...this.#children]) {
      if (child.transient && !child.finished()) {
        this.#children.delete(child);
        child.#parent = parent;
        parent.#children.add(child);
      }
    }
  }

  #detachIfFinished(): void {
    if (!this.finished()) return;
    const parent = this.#parent;
    if (parent === undefined) return;
    this.#promoteTransientChildren();
    parent.#children.delete(this);
    if (parent.#holding) parent.#schedule();
    parent.#detachIfFinished();
  }
}
