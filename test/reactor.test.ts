import { describe, it, expect, vi } from 'vitest';
import { Reactor, runReactor } from '../src/reactor';
import { Condition } from '../src/condition';
import { sleep, yieldNow } from '../src/operation';
import { noopLogger } from '../src/config';
import { createVirtualTime } from '../src/virtual-time';
import { DeadlockError, FatalError, TaskStateError } from '../src/errors';

function setup() {
  const time = createVirtualTime();
  return { time, options: { ...time, logger: noopLogger } };
}

describe('Reactor (reactor.ts)', () => {
  describe('runReactor', () => {
    it('should run sibling sleeps concurrently', async () => {
      const { time, options } = setup();

      const result = await runReactor(function* (root) {
        const children = [1, 2, 3].map((n) =>
          root.async(function* () {
            yield* sleep(1);
            return n;
          }),
        );
        let total = 0;
        for (const child of children) total += (yield* child.wait()) ?? 0;
        return total;
      }, options);

      expect(result).toBe(6);
      expect(time.clock.now()).toBe(1);
    });

    it('should reject with the error of a failed root', async () => {
      const { options } = setup();

      await expect(
        runReactor(function* () {
          yield* sleep(1);
          throw new Error('root failed');
        }, options),
      ).rejects.toThrow('root failed');
    });

    it('should resolve with undefined when the root is stopped', async () => {
      const { options } = setup();

      const result = await runReactor(function* (root) {
        root.stop();
        yield* sleep(1);
        return 'unreachable';
      }, options);

      expect(result).toBeUndefined();
    });

    it('should return a Result with throw: false', async () => {
      const { options } = setup();
      const failure = new Error('nope');

      const failed = await runReactor(function* () {
        throw failure;
      }, { ...options, throw: false });
      const succeeded = await runReactor(function* () {
        return 42;
      }, { ...setup().options, throw: false });

      expect(failed.isErr()).toBe(true);
      if (failed.isErr()) expect(failed.error).toBe(failure);
      expect(succeeded.isOk()).toBe(true);
      expect(succeeded.unwrapOr(0)).toBe(42);
    });

    it('should detect a deadlock', async () => {
      const { options } = setup();

      const run = runReactor(function* () {
        yield* new Condition().wait();
      }, options);

      await expect(run).rejects.toThrow(DeadlockError);
      await expect(run).rejects.toMatchObject({ blocked: 1 });
    });

    it('should abort on a fatal error instead of capturing it', async () => {
      const { options } = setup();

      await expect(
        runReactor(function* (root) {
          root.async(function* () {
            yield* sleep(1);
            throw new FatalError('disk on fire');
          });
          yield* sleep(5);
        }, options),
      ).rejects.toThrow(FatalError);
    });

    it('should use the configured fatal predicate', async () => {
      const { options } = setup();

      await expect(
        runReactor(
          function* (root) {
            root.async(function* () {
              throw new TypeError('treated as fatal');
            });
            yield* sleep(5);
          },
          { ...options, isFatal: (error: unknown) => error instanceof TypeError },
        ),
      ).rejects.toThrow('treated as fatal');
    });

    it('should log a fatal abort at error', async () => {
      const time = createVirtualTime();
      const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

      await expect(
        runReactor(function* () {
          throw new FatalError('stop everything');
        }, { ...time, logger }),
      ).rejects.toThrow('stop everything');

      expect(logger.error).toHaveBeenCalledWith(
        'Reactor aborted while running Task#1 (running): root',
        expect.any(FatalError),
      );
    });

    it('should run on the real clock by default', async () => {
      const result = await runReactor(function* () {
        yield* sleep(0.01);
        return 'slept';
      }, { logger: noopLogger });

      expect(result).toBe('slept');
    });
  });

  describe('Reactor', () => {
    it('should run exactly one root task', async () => {
      const { options } = setup();
      const reactor = new Reactor(options);

      const root = await reactor.run(function* () {
        return 'first';
      });

      expect(root.status).toBe('complete');
      expect(reactor.root).toBe(root);
      await expect(
        reactor.run(function* () {
          return 'second';
        }),
      ).rejects.toThrow(TaskStateError);
    });

    it('should annotate the root with the configured name', async () => {
      const { options } = setup();
      const reactor = new Reactor({ ...options, name: 'importer' });

      const root = await reactor.run(function* () {});

      expect(root.toString()).toBe('Task#1 (complete): importer');
    });

    it('should log the task tree at info', async () => {
      const time = createVirtualTime();
      const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      const reactor = new Reactor({ ...time, logger });

      await reactor.run(function* (root) {
        root.async(function* () {
          yield* sleep(5);
        }, { annotation: 'worker' });
        root.async(function* () {
          yield* sleep(5);
        }, { transient: true, annotation: 'ticker' });
        yield* yieldNow();
        reactor.printHierarchy();
      });

      expect(logger.info).toHaveBeenCalledWith(
        [
          'Task#1 (running): root',
          '  Task#2 (running): worker',
          '  Task#3 (running) transient: ticker',
        ].join('\n'),
      );
    });

    it('should resume tasks in the order they became ready', async () => {
      const { options } = setup();
      const order: string[] = [];

      await runReactor(function* (root) {
        for (const [name, delay] of [['slow', 2], ['fast', 1], ['tied', 1]] as const) {
          root.async(function* () {
            yield* sleep(delay);
            order.push(name);
          });
        }
        yield* sleep(3);
      }, options);

      expect(order).toEqual(['fast', 'tied', 'slow']);
    });
  });
});
