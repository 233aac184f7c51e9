/**
 * Tests for the retry executor.
 */

import {
  RetryExecutor,
  createRetryExecutor,
  DEFAULT_RETRY_CONFIG,
  RateLimitedError,
  ServerError,
  NetworkError,
  NotFoundError,
} from '../index.js';

function noSleep(): jest.Mock<Promise<void>, [number]> {
  return jest.fn((_ms: number) => Promise.resolve());
}

describe('RetryExecutor', () => {
  it('should return the first successful result', async () => {
    const sleep = noSleep();
    const executor = new RetryExecutor(DEFAULT_RETRY_CONFIG, {}, { sleep });
    const operation = jest.fn(async (attempt: number) => `ok-${attempt}`);

    await expect(executor.execute(operation)).resolves.toBe('ok-1');
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should retry transient failures with exponential backoff', async () => {
    const sleep = noSleep();
    const executor = new RetryExecutor(DEFAULT_RETRY_CONFIG, {}, { sleep, random: () => 0 });
    const operation = jest.fn(async (attempt: number) => {
      if (attempt < 3) {
        throw new ServerError(502);
      }
      return 'done';
    });

    await expect(executor.execute(operation)).resolves.toBe('done');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });

  it('should wait the server-provided delay after a 429', async () => {
    const sleep = noSleep();
    const executor = new RetryExecutor(DEFAULT_RETRY_CONFIG, {}, { sleep, random: () => 0 });
    const operation = jest.fn(async (attempt: number) => {
      if (attempt === 1) {
        throw new RateLimitedError(2500);
      }
      return 'done';
    });

    await executor.execute(operation);

    expect(sleep).toHaveBeenCalledWith(2500);
  });

  it('should not retry non-retryable errors', async () => {
    const sleep = noSleep();
    const onRetry = jest.fn();
    const executor = new RetryExecutor(DEFAULT_RETRY_CONFIG, { onRetry }, { sleep });
    const operation = jest.fn(async () => {
      throw new NotFoundError('Channel');
    });

    await expect(executor.execute(operation)).rejects.toBeInstanceOf(NotFoundError);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(onRetry).not.toHaveBeenCalled();
  });

  it('should call hooks and give up after maxRetries + 1 attempts', async () => {
    const sleep = noSleep();
    const onRetry = jest.fn();
    const onExhausted = jest.fn();
    const executor = createRetryExecutor(
      { maxRetries: 2 },
      { onRetry, onExhausted },
      { sleep, random: () => 0 }
    );
    const failure = new NetworkError('connection reset');
    const operation = jest.fn(async () => {
      throw failure;
    });

    await expect(executor.execute(operation)).rejects.toBe(failure);
    expect(operation).toHaveBeenCalledTimes(3);
    expect(onRetry.mock.calls).toEqual([
      [1, failure, 1000],
      [2, failure, 2000],
    ]);
    expect(onExhausted).toHaveBeenCalledWith(failure, 3);
  });

  describe('calculateDelay', () => {
    it('should cap the backoff and add jitter', () => {
      const executor = createRetryExecutor(
        { initialBackoffMs: 1000, maxBackoffMs: 5000, backoffMultiplier: 2, jitterFactor: 0.1 },
        {},
        { random: () => 0.5 }
      );
      const error = new ServerError(500);

      expect(executor.calculateDelay(error, 1)).toBe(1050);
      expect(executor.calculateDelay(error, 3)).toBe(4200);
      expect(executor.calculateDelay(error, 10)).toBe(5250);
    });
  });
});
