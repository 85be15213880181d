import { calculateBackoffDelay, isTransient, withRetry } from './retry';
import { ApiError, PermissionDeniedError, RateLimitedError, TransportError } from './errors';

describe('withRetry', () => {
  it('should return the first successful result without retrying', async () => {
    const fn = jest.fn().mockResolvedValue('ok');
    await expect(withRetry(fn, { baseDelay: 1 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should retry transport errors up to maxRetries', async () => {
    const fn = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new TransportError('connection reset'))
      .mockRejectedValueOnce(new RateLimitedError('slow down'))
      .mockResolvedValue('ok');
    const onRetry = jest.fn();

    await expect(withRetry(fn, { maxRetries: 2, baseDelay: 1, onRetry })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(onRetry).toHaveBeenNthCalledWith(1, 1, expect.any(TransportError), 1);
    expect(onRetry).toHaveBeenNthCalledWith(2, 2, expect.any(RateLimitedError), 2);
  });

  it('should give up after maxRetries and rethrow the last error', async () => {
    const error = new TransportError('down');
    const fn = jest.fn().mockRejectedValue(error);

    await expect(withRetry(fn, { maxRetries: 2, baseDelay: 1 })).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should not retry domain errors', async () => {
    const fn = jest.fn().mockRejectedValue(new PermissionDeniedError('no'));

    await expect(withRetry(fn, { baseDelay: 1 })).rejects.toBeInstanceOf(PermissionDeniedError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should not retry at all when maxRetries is 0', async () => {
    const fn = jest.fn().mockRejectedValue(new TransportError('down'));

    await expect(withRetry(fn, { maxRetries: 0 })).rejects.toBeInstanceOf(TransportError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should not retry a request whose signal was aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const error = new TransportError('GET api/system/status failed: This operation was aborted');
    const fn = jest.fn().mockRejectedValue(error);

    await expect(withRetry(fn, { maxRetries: 2, baseDelay: 1, signal: controller.signal })).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should stop waiting for the next attempt once the signal is aborted', async () => {
    const controller = new AbortController();
    const fn = jest.fn().mockRejectedValue(new TransportError('down'));

    await expect(
      withRetry(fn, { maxRetries: 2, baseDelay: 60000, signal: controller.signal, onRetry: () => controller.abort() })
    ).rejects.toBeInstanceOf(TransportError);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('calculateBackoffDelay', () => {
  it('should double the delay on each attempt', () => {
    expect(calculateBackoffDelay(0, 500, 10000)).toBe(500);
    expect(calculateBackoffDelay(1, 500, 10000)).toBe(1000);
    expect(calculateBackoffDelay(3, 500, 10000)).toBe(4000);
  });

  it('should cap the delay', () => {
    expect(calculateBackoffDelay(10, 500, 10000)).toBe(10000);
  });
});

describe('isTransient', () => {
  it('should accept transport and rate limit errors only', () => {
    expect(isTransient(new TransportError('x'))).toBe(true);
    expect(isTransient(new RateLimitedError('x'))).toBe(true);
    expect(isTransient(new ApiError(500, 'x'))).toBe(false);
    expect(isTransient(new Error('x'))).toBe(false);
  });
});
