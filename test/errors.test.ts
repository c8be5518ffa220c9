import { describe, it, expect } from 'vitest';
import {
  DeadlockError,
  FatalError,
  StopSignal,
  TaskStateError,
  TimeoutError,
  attempt,
  defaultIsFatal,
  isFatalError,
  isStopSignal,
  isTimeoutError,
} from '../src/errors';

describe('Errors (errors.ts)', () => {
  it('should tag the stop signal and recognise it', () => {
    const signal = new StopSignal();
    expect(signal).toBeInstanceOf(Error);
    expect(signal._tag).toBe('StopSignal');
    expect(signal.name).toBe('StopSignal');
    expect(signal.message).toBe('Task was stopped');
    expect(isStopSignal(signal)).toBe(true);
    expect(isStopSignal(new Error('Task was stopped'))).toBe(false);
  });

  it('should describe the timeout that expired', () => {
    const error = new TimeoutError(1.5);
    expect(error.message).toBe('Operation timed out after 1.5s');
    expect(error.seconds).toBe(1.5);
    expect(isTimeoutError(error)).toBe(true);
    expect(isTimeoutError(new StopSignal())).toBe(false);
  });

  it('should report how many tasks a deadlock left blocked', () => {
    const error = new DeadlockError(2);
    expect(error.message).toBe(
      'Reactor deadlocked with 2 blocked task(s) and nothing left to wake them',
    );
    expect(error.blocked).toBe(2);
    expect(error).toBeInstanceOf(DeadlockError);
  });

  it('should keep the cause of a fatal error', () => {
    const cause = new Error('disk gone');
    const error = new FatalError('storage lost', { cause });
    expect(error.cause).toBe(cause);
    expect(isFatalError(error)).toBe(true);
    expect(new TaskStateError('misuse')._tag).toBe('TaskStateError');
  });

  describe('defaultIsFatal', () => {
    it('should treat FatalError and stack exhaustion as fatal', () => {
      expect(defaultIsFatal(new FatalError('boom'))).toBe(true);
      expect(defaultIsFatal(new RangeError('Maximum call stack size exceeded'))).toBe(true);
    });

    it('should treat everything else as recoverable', () => {
      expect(defaultIsFatal(new Error('boom'))).toBe(false);
      expect(defaultIsFatal(new RangeError('Invalid array length'))).toBe(false);
      expect(defaultIsFatal(new StopSignal())).toBe(false);
      expect(defaultIsFatal('a string')).toBe(false);
    });
  });

  describe('attempt', () => {
    it('should capture a returned value as Ok', () => {
      const result = attempt(() => 21 * 2);
      expect(result.isOk()).toBe(true);
      expect(result.unwrapOr(0)).toBe(42);
    });

    it('should capture a thrown value as Err', () => {
      const error = new Error('nope');
      const result = attempt((): number => {
        throw error;
      });
      expect(result.isErr()).toBe(true);
      if (result.isErr()) expect(result.error).toBe(error);
    });
  });
});
