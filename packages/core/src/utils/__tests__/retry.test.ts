import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { backoffDelay, withRetry } from '../retry.js';
import { ApiError, PackwrightError, ErrorCode } from '../../errors.js';

describe('withRetry', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns the first successful result', async () => {
    const operation = vi.fn().mockResolvedValue('ok');
    await expect(withRetry(operation)).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('retries recoverable failures until one succeeds', async () => {
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new ApiError('bad gateway', 502))
      .mockResolvedValueOnce('bytes');
    const onRetry = vi.fn();

    const promise = withRetry(operation, { retries: 2, onRetry });
    await vi.runAllTimersAsync();

    await expect(promise).resolves.toBe('bytes');
    expect(operation).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0]?.[0]).toBe(1);
  });

  it('gives up after the configured retries with the last error', async () => {
    const operation = vi.fn().mockRejectedValue(new ApiError('unavailable', 503));

    const promise = withRetry(operation, { retries: 2 });
    const assertion = expect(promise).rejects.toMatchObject({ code: ErrorCode.HTTP_ERROR });
    await vi.runAllTimersAsync();
    await assertion;
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('does not retry non-recoverable errors', async () => {
    const error = new PackwrightError('gone', ErrorCode.HTTP_ERROR, undefined, {}, false);
    const operation = vi.fn().mockRejectedValue(error);

    await expect(withRetry(operation, { retries: 3 })).rejects.toBe(error);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('lets shouldRetry decide', async () => {
    const operation = vi.fn().mockRejectedValue(new Error('nope'));
    await expect(withRetry(operation, { retries: 3, shouldRetry: () => false })).rejects.toThrow(
      'nope'
    );
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('does not wait when retries is zero', async () => {
    const operation = vi.fn().mockRejectedValue(new ApiError('reset', undefined));
    await expect(withRetry(operation, { retries: 0 })).rejects.toMatchObject({
      code: ErrorCode.SOURCE_UNREACHABLE,
    });
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('stops waiting when the signal aborts', async () => {
    const controller = new AbortController();
    const operation = vi.fn().mockRejectedValue(new ApiError('unavailable', 503));

    const promise = withRetry(operation, { retries: 3, signal: controller.signal });
    const assertion = expect(promise).rejects.toMatchObject({
      code: ErrorCode.DOWNLOAD_CANCELLED,
    });
    await vi.advanceTimersByTimeAsync(0);
    controller.abort();

    await assertion;
    expect(operation).toHaveBeenCalledTimes(1);
  });
});

describe('backoffDelay', () => {
  it('doubles per attempt between half and the full ceiling', () => {
    expect(backoffDelay(1, 500, 15_000, () => 0)).toBe(250);
    expect(backoffDelay(3, 500, 15_000, () => 1)).toBe(2000);
  });

  it('caps the ceiling', () => {
    expect(backoffDelay(10, 500, 15_000, () => 1)).toBe(15_000);
  });
});
