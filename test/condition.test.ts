import { describe, it, expect } from 'vitest';
import { runReactor } from '../src/reactor';
import { Barrier } from '../src/barrier';
import { Condition } from '../src/condition';
import { yieldNow } from '../src/operation';
import { noopLogger } from '../src/config';
import { createVirtualTime } from '../src/virtual-time';

function setup() {
  const time = createVirtualTime();
  return { time, options: { ...time, logger: noopLogger } };
}

describe('Condition (condition.ts)', () => {
  it('should release every waiter with the signalled value', async () => {
    const { options } = setup();

    const result = await runReactor(function* () {
      const condition = new Condition<string>();
      const barrier = new Barrier();
      const received: string[] = [];
      for (const name of ['a', 'b']) {
        barrier.async(function* () {
          const value = yield* condition.wait();
          received.push(`${name}:${value}`);
        });
      }
      yield* yieldNow();
      const waiting = condition.waiting;
      condition.signal('go');
      yield* barrier.wait();
      return { waiting, received, after: condition.waiting };
    }, options);

    expect(result).toEqual({ waiting: 2, received: ['a:go', 'b:go'], after: 0 });
  });

  it('should forget a waiter that is stopped', async () => {
    const { options } = setup();

    const result = await runReactor(function* (root) {
      const condition = new Condition();
      const waiter = root.async(function* () {
        yield* condition.wait();
      });
      yield* yieldNow();
      const before = condition.waiting;
      waiter.stop();
      const after = condition.waiting;
      yield* waiter.wait();
      return { before, after, status: waiter.status };
    }, options);

    expect(result).toEqual({ before: 1, after: 0, status: 'stopped' });
  });

  it('should not remember a signal nobody was waiting for', async () => {
    const { options } = setup();

    const result = await runReactor(function* (root) {
      const condition = new Condition<number>();
      condition.signal(1);
      const waiter = root.async(function* () {
        return yield* condition.wait();
      });
      yield* yieldNow();
      condition.signal(2);
      return yield* waiter.wait();
    }, options);

    expect(result).toBe(2);
  });
});
