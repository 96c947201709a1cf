import { describe, it, expect, jest } from '@jest/globals';
import { calculateDelay, isSafetyBlockError, isTransientError, withRetry } from '@/shared/retry-utils.js';

function httpError(message: string, status: number): Error {
  return Object.assign(new Error(message), { status });
}

describe('isTransientError', () => {
  it('recognises retryable statuses and network codes', () => {
    expect(isTransientError(httpError('Too Many Requests', 429))).toBe(true);
    expect(isTransientError(httpError('Bad Gateway', 502))).toBe(true);
    expect(isTransientError(Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' }))).toBe(true);
    expect(isTransientError(new Error('Connection terminated unexpectedly'))).toBe(true);
  });

  it('does not retry client errors', () => {
    expect(isTransientError(httpError('Bad Request', 400))).toBe(false);
    expect(isTransientError('plain string')).toBe(false);
    expect(isTransientError(null)).toBe(false);
  });
});

describe('isSafetyBlockError', () => {
  it('detects moderation rejections', () => {
    expect(isSafetyBlockError(new Error('Your request was rejected as a result of our safety system.'))).toBe(true);
    expect(isSafetyBlockError(Object.assign(new Error('blocked'), { code: 'content_policy_violation' }))).toBe(true);
    expect(isSafetyBlockError(httpError('Unprocessable', 422))).toBe(true);
    expect(isSafetyBlockError(new Error('quota exceeded'))).toBe(false);
  });
});

describe('calculateDelay', () => {
  it('doubles per attempt up to the cap', () => {
    expect(calculateDelay(1, 4000, 10000, 0)).toBe(4000);
    expect(calculateDelay(2, 4000, 10000, 0)).toBe(8000);
    expect(calculateDelay(3, 4000, 10000, 0)).toBe(10000);
  });
});

describe('withRetry', () => {
  it('retries transient failures until the call succeeds', async () => {
    const sleep = jest.fn(async (_ms: number) => undefined);
    const fn = jest
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(httpError('Service Unavailable', 503))
      .mockRejectedValueOnce(httpError('Service Unavailable', 503))
      .mockResolvedValue('ok');

    await expect(withRetry(fn, { sleep, jitterMs: 0 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([4000, 8000]);
  });

  it('rethrows non-transient errors without retrying', async () => {
    const sleep = jest.fn(async (_ms: number) => undefined);
    const fn = jest.fn<() => Promise<string>>().mockRejectedValue(httpError('Bad Request', 400));

    await expect(withRetry(fn, { sleep })).rejects.toThrow('Bad Request');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('gives up after the configured attempts', async () => {
    const onRetry = jest.fn<(attempt: number, error: unknown) => void>();
    const fn = jest.fn<() => Promise<string>>().mockRejectedValue(httpError('Gateway Timeout', 504));

    await expect(withRetry(fn, { maxAttempts: 2, sleep: async () => undefined, onRetry })).rejects.toThrow(
      'Gateway Timeout',
    );
    expect(fn).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledTimes(1);
  });
});
