/**
 * Retry Utility Tests
 */

import { isRetryableError, retryWithBackoff, toError } from '../../../src/utils/retry';

function codedError(code: string): Error {
  return Object.assign(new Error(`${code}: operation failed`), { code });
}

describe('retryWithBackoff', () => {
  it('should return the first successful result', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(codedError('EBUSY'))
      .mockResolvedValueOnce('content');
    const onRetry = vi.fn();

    await expect(retryWithBackoff(fn, { initialDelay: 0, onRetry })).resolves.toBe('content');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledWith(1, expect.objectContaining({ code: 'EBUSY' }));
  });

  it('should give up after the last retry', async () => {
    const fn = vi.fn().mockRejectedValue(codedError('EAGAIN'));

    await expect(retryWithBackoff(fn, { maxRetries: 2, initialDelay: 0 })).rejects.toThrow('EAGAIN: operation failed');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should rethrow errors that are not retryable at once', async () => {
    const fn = vi.fn().mockRejectedValue(codedError('ENOENT'));

    await expect(retryWithBackoff(fn, { initialDelay: 0, shouldRetry: isRetryableError })).rejects.toThrow('ENOENT');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should back off exponentially up to the maximum delay', async () => {
    vi.useFakeTimers();
    try {
      const fn = vi.fn()
        .mockRejectedValueOnce(new Error('first'))
        .mockRejectedValueOnce(new Error('second'))
        .mockRejectedValueOnce(new Error('third'))
        .mockResolvedValueOnce('done');

      const result = retryWithBackoff(fn, { maxRetries: 3, initialDelay: 100, maxDelay: 250 });

      await vi.advanceTimersByTimeAsync(99);
      expect(fn).toHaveBeenCalledTimes(1);
      await vi.advanceTimersByTimeAsync(1);
      expect(fn).toHaveBeenCalledTimes(2);
      await vi.advanceTimersByTimeAsync(200);
      expect(fn).toHaveBeenCalledTimes(3);
      await vi.advanceTimersByTimeAsync(250);
      await expect(result).resolves.toBe('done');
      expect(fn).toHaveBeenCalledTimes(4);
    } finally {
      vi.useRealTimers();
    }
  });
});

describe('isRetryableError', () => {
  it('should retry transient file errors and truncated JSON', () => {
    expect(isRetryableError(codedError('EBUSY'))).toBe(true);
    expect(isRetryableError(codedError('EMFILE'))).toBe(true);
    expect(isRetryableError(new SyntaxError('Unexpected end of JSON input'))).toBe(true);
  });

  it('should not retry other errors', () => {
    expect(isRetryableError(codedError('ENOENT'))).toBe(false);
    expect(isRetryableError(new Error('boom'))).toBe(false);
    expect(isRetryableError('EBUSY')).toBe(false);
  });
});

describe('toError', () => {
  it('should wrap non-error values', () => {
    const error = new Error('kept');

    expect(toError(error)).toBe(error);
    expect(toError('text')).toEqual(new Error('text'));
  });
});
