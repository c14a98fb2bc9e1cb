/**
 * @fileoverview Unit tests for retry, withTimeout and delay
 */

import {
  InitializationCancelledError,
  OperationTimeoutError,
  computeBackoffDelay,
  delay,
  retry,
  withTimeout,
} from '../../../src';

describe('computeBackoffDelay', () => {
  it('should grow exponentially up to the cap', () => {
    const options = { delay: 50, backoffMultiplier: 2, maxDelay: 300 };

    expect([1, 2, 3, 4, 5].map((attempt) => computeBackoffDelay(attempt, options))).toEqual([
      50, 100, 200, 300, 300,
    ]);
  });

  it('should apply jitter within the configured range', () => {
    const options = { delay: 100, jitter: true, jitterRange: 0.2 };

    expect(computeBackoffDelay(1, options, () => 0)).toBe(80);
    expect(computeBackoffDelay(1, options, () => 1)).toBe(120);
  });
});

describe('retry', () => {
  it('should stop at the first success', async () => {
    const operation = jest
      .fn<Promise<string>, [number]>()
      .mockRejectedValueOnce(new Error('first'))
      .mockResolvedValueOnce('done');

    const outcome = await retry(operation, { maxAttempts: 3, delay: 0 });

    expect(outcome).toEqual({
      success: true,
      value: 'done',
      attempts: 2,
      errors: [new Error('first')],
    });
    expect(operation.mock.calls).toEqual([[1], [2]]);
  });

  it('should give up after maxAttempts without throwing', async () => {
    const operation = jest.fn(() => {
      throw new Error('always');
    });

    const outcome = await retry(operation, { maxAttempts: 3, delay: 0 });

    expect(outcome.success).toBe(false);
    expect(outcome.attempts).toBe(3);
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('should report each retry with its delay', async () => {
    const retries: Array<[number, number]> = [];

    await retry(
      () => {
        throw new Error('x');
      },
      {
        maxAttempts: 3,
        delay: 1,
        backoffMultiplier: 3,
        onRetry: (_error, attempt, delayMs) => retries.push([attempt, delayMs]),
      },
    );

    expect(retries).toEqual([
      [1, 1],
      [2, 3],
    ]);
  });

  it('should honour shouldRetry', async () => {
    const outcome = await retry(
      () => {
        throw new Error('fatal');
      },
      { maxAttempts: 5, delay: 0, shouldRetry: () => false },
    );

    expect(outcome.attempts).toBe(1);
  });

  it('should reject with InitializationCancelledError when aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(retry(() => 'never', { signal: controller.signal })).rejects.toThrow(
      InitializationCancelledError,
    );
  });
});

describe('withTimeout', () => {
  it('should resolve with the operation value', async () => {
    await expect(withTimeout(() => Promise.resolve(5), 100, 'fast')).resolves.toBe(5);
  });

  it('should reject with OperationTimeoutError when the operation is slow', async () => {
    const slow = () => new Promise<void>((resolve) => setTimeout(resolve, 500).unref());

    await expect(withTimeout(slow, 10, 'slow op')).rejects.toThrow('slow op timed out after 10ms');
    await expect(withTimeout(slow, 10, 'slow op')).rejects.toThrow(OperationTimeoutError);
  });

  it('should abort the signal handed to the operation on timeout', async () => {
    let seen: AbortSignal | undefined;
    const slow = (signal: AbortSignal) => {
      seen = signal;
      return new Promise<void>((resolve) => setTimeout(resolve, 500).unref());
    };

    await expect(withTimeout(slow, 10, 'slow op')).rejects.toThrow(OperationTimeoutError);
    expect(seen?.aborted).toBe(true);
  });

  it('should not time out when no timeout is given', async () => {
    const value = await withTimeout(
      () => new Promise<string>((resolve) => setTimeout(() => resolve('late'), 20)),
      undefined,
      'untimed',
    );

    expect(value).toBe('late');
  });

  it('should reject when the outer signal aborts', async () => {
    const controller = new AbortController();
    const pending = withTimeout(
      () => new Promise<void>((resolve) => setTimeout(resolve, 500).unref()),
      undefined,
      'cancellable',
      controller.signal,
    );

    controller.abort('shutting down');

    await expect(pending).rejects.toThrow('Initialization cancelled: shutting down');
  });
});

describe('delay', () => {
  it('should reject early when aborted', async () => {
    const controller = new AbortController();
    const waiting = delay(10_000, controller.signal);

    controller.abort();

    await expect(waiting).rejects.toThrow(InitializationCancelledError);
  });
});
