/**
 * Tests for timeout and Circuit Breaker logic
 */

import { CircuitBreaker, createErrorLog, withTimeout } from '../src/utils/retry.js';

describe('withTimeout', () => {
  it('should resolve with the function result', async () => {
    const fn = jest.fn().mockResolvedValue('success');
    await expect(withTimeout(fn, 1000)).resolves.toBe('success');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should pass rejections through unchanged', async () => {
    const fn = jest.fn().mockRejectedValue(new Error('Always fails'));
    await expect(withTimeout(fn, 1000)).rejects.toThrow('Always fails');
  });

  it('should timeout if function takes too long', async () => {
    const fn = () => new Promise<string>((resolve) => setTimeout(() => resolve('slow'), 500));
    await expect(withTimeout(fn, 50, 'slow call')).rejects.toThrow('Timeout after 50ms (slow call)');
  });

  it('should abort the signal handed to the function on timeout', async () => {
    let received: AbortSignal | undefined;
    const fn = (signal: AbortSignal) => {
      received = signal;
      return new Promise<string>((resolve) => setTimeout(() => resolve('slow'), 500));
    };

    await expect(withTimeout(fn, 50)).rejects.toThrow('Timeout after 50ms (request)');
    expect(received?.aborted).toBe(true);
  });

  it('should leave the signal alone when the function finishes in time', async () => {
    let received: AbortSignal | undefined;
    const fn = async (signal: AbortSignal) => {
      received = signal;
      return 'fast';
    };

    await expect(withTimeout(fn, 1000)).resolves.toBe('fast');
    expect(received?.aborted).toBe(false);
  });

  it('should not call the function twice', async () => {
    const fn = jest.fn().mockRejectedValue(new Error('Fail'));
    await expect(withTimeout(fn, 1000)).rejects.toThrow('Fail');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('Circuit Breaker', () => {
  let breaker: CircuitBreaker;
  let clock: number;

  beforeEach(() => {
    clock = 0;
    breaker = new CircuitBreaker(3, 1000, () => clock); // 3 failures to open, 1s timeout
  });

  async function failTimes(count: number): Promise<void> {
    const fn = jest.fn().mockRejectedValue(new Error('Fail'));
    for (let i = 0; i < count; i++) {
      await expect(breaker.execute(fn)).rejects.toThrow();
    }
  }

  describe('States', () => {
    it('should start in closed state', () => {
      expect(breaker.getState()).toBe('closed');
    });

    it('should open after failure threshold', async () => {
      await failTimes(3);
      expect(breaker.getState()).toBe('open');

      // Next call should fail immediately without calling fn
      const fn = jest.fn().mockResolvedValue('ok');
      await expect(breaker.execute(fn)).rejects.toThrow('Circuit breaker is OPEN');
      expect(fn).not.toHaveBeenCalled();
    });

    it('should reset the failure count after a success', async () => {
      await failTimes(2);
      await breaker.execute(jest.fn().mockResolvedValue('ok'));
      await failTimes(2);

      expect(breaker.getState()).toBe('closed');
    });

    it('should transition to half-open after timeout', async () => {
      await failTimes(3);
      clock += 1001;

      await breaker.execute(jest.fn().mockResolvedValue('success'));

      expect(breaker.getState()).toBe('half-open');
    });

    it('should close after successful recovery', async () => {
      await failTimes(3);
      clock += 1001;

      const successFn = jest.fn().mockResolvedValue('ok');
      await breaker.execute(successFn);
      expect(breaker.getState()).toBe('half-open');

      await breaker.execute(successFn);
      expect(breaker.getState()).toBe('closed');
    });

    it('should reopen if fails during half-open', async () => {
      await failTimes(3);
      clock += 1001;

      await expect(breaker.execute(jest.fn().mockRejectedValue(new Error('Fail')))).rejects.toThrow('Fail');

      expect(breaker.getState()).toBe('open');
    });
  });

  describe('Manual Reset', () => {
    it('should reset to closed state', async () => {
      await failTimes(3);
      expect(breaker.getState()).toBe('open');

      breaker.reset();
      expect(breaker.getState()).toBe('closed');

      await expect(breaker.execute(jest.fn().mockResolvedValue('ok'))).resolves.toBe('ok');
    });
  });

  describe('Statistics', () => {
    it('should track statistics', async () => {
      await failTimes(2);

      const stats = breaker.getStats();
      expect(stats.state).toBe('closed'); // Not yet at threshold
      expect(stats.failureCount).toBe(2);
      expect(stats.lastFailureTime).toEqual(new Date(0));
      expect(stats.logs).toEqual([]);
    });
  });
});

describe('createErrorLog', () => {
  it('should build a structured record', () => {
    const log = createErrorLog('RewardEstimator', new Error('boom'), 'X', 'HIGH');
    expect(log).toMatchObject({
      component: 'RewardEstimator',
      instance_id: 'X',
      error: 'boom',
      severity: 'HIGH',
    });
    expect(typeof log.timestamp).toBe('string');
  });

  it('should stringify non-error values', () => {
    expect(createErrorLog('SolveInstances', 'plain reason').error).toBe('plain reason');
  });
});
