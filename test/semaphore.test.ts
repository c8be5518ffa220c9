import { describe, it, expect } from 'vitest';
import { runReactor } from '../src/reactor';
import { Semaphore } from '../src/semaphore';
import { sleep } from '../src/operation';
import { noopLogger } from '../src/config';
import { createVirtualTime } from '../src/virtual-time';
import { TaskStateError } from '../src/errors';

function setup() {
  const time = createVirtualTime();
  return { time, options: { ...time, logger: noopLogger } };
}

describe('Semaphore (semaphore.ts)', () => {
  it('should run five one-unit jobs with a limit of two in three units', async () => {
    const { time, options } = setup();
    const starts: Array<[number, number]> = [];
    let running = 0;
    let peak = 0;

    const result = await runReactor(function* () {
      const semaphore = new Semaphore(2);
      for (let i = 0; i < 5; i++) {
        semaphore.async(function* () {
          starts.push([i, time.clock.now()]);
          running++;
          peak = Math.max(peak, running);
          yield* sleep(1);
          running--;
        });
      }
      const queued = {
        count: semaphore.count,
        waiting: semaphore.waiting,
        blocking: semaphore.blocking,
        statuses: semaphore.tasks.map((task) => task.status),
      };
      yield* semaphore.wait();
      return queued;
    }, options);

    expect(time.clock.now()).toBe(3);
    expect(peak).toBe(2);
    expect(starts).toEqual([
      [0, 0],
      [1, 0],
      [2, 1],
      [3, 1],
      [4, 2],
    ]);
    expect(result).toEqual({
      count: 2,
      waiting: 3,
      blocking: true,
      statuses: ['initialized', 'initialized', 'initialized', 'initialized', 'initialized'],
    });
  });

  it('should drop a queued request that is stopped before its turn', async () => {
    const { time, options } = setup();
    const started: string[] = [];

    const result = await runReactor(function* () {
      const semaphore = new Semaphore(1);
      const tasks = ['first', 'second', 'third'].map((name) =>
        semaphore.async(function* () {
          started.push(name);
          yield* sleep(1);
        }),
      );
      tasks[1].stop();
      const waiting = semaphore.waiting;
      yield* semaphore.wait();
      return { waiting, statuses: tasks.map((task) => task.status), now: time.clock.now() };
    }, options);

    expect(started).toEqual(['first', 'third']);
    expect(result).toEqual({
      waiting: 1,
      statuses: ['complete', 'stopped', 'complete'],
      now: 2,
    });
  });

  it('should queue acquire() behind tasks in the same FIFO', async () => {
    const { time, options } = setup();
    const log: string[] = [];

    const result = await runReactor(function* (root) {
      const semaphore = new Semaphore(1);
      semaphore.async(function* () {
        log.push('task start');
        yield* sleep(1);
        log.push('task end');
      });
      const holder = root.async(function* () {
        return yield* semaphore.acquire(function* () {
          log.push(`acquired at ${time.clock.now()}`);
          yield* sleep(1);
          return 'held';
        });
      });
      const value = yield* holder.wait();
      yield* semaphore.wait();
      return { value, count: semaphore.count, now: time.clock.now() };
    }, options);

    expect(log).toEqual(['task start', 'task end', 'acquired at 1']);
    expect(result).toEqual({ value: 'held', count: 0, now: 2 });
  });

  it('should release a slot when an acquire body throws', async () => {
    const { options } = setup();

    const result = await runReactor(function* () {
      const semaphore = new Semaphore(1);
      try {
        yield* semaphore.acquire(function* () {
          yield* sleep(1);
          throw new Error('inside');
        });
      } catch (error) {
        return { message: error instanceof Error ? error.message : '', count: semaphore.count };
      }
      return undefined;
    }, options);

    expect(result).toEqual({ message: 'inside', count: 0 });
  });

  it('should give up a queued acquire when the waiting task is stopped', async () => {
    const { options } = setup();

    const result = await runReactor(function* (root) {
      const semaphore = new Semaphore(1);
      semaphore.async(function* () {
        yield* sleep(2);
      });
      const blocked = root.async(function* () {
        yield* semaphore.acquire(function* () {
          yield* sleep(1);
        });
      });
      yield* sleep(1);
      const waitingBefore = semaphore.waiting;
      blocked.stop();
      yield* blocked.wait();
      const waitingAfter = semaphore.waiting;
      yield* semaphore.wait();
      return { waitingBefore, waitingAfter, count: semaphore.count, status: blocked.status };
    }, options);

    expect(result).toEqual({ waitingBefore: 1, waitingAfter: 0, count: 0, status: 'stopped' });
  });

  it('should reject a limit below one', () => {
    expect(() => new Semaphore(0)).toThrow(
      new TaskStateError('Semaphore limit must be a positive integer, got 0'),
    );
    expect(() => new Semaphore(1.5)).toThrow(TaskStateError);
  });
});
