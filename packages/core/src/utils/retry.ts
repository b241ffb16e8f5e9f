import { PackwrightError, ErrorCode } from '../errors.js';

export interface RetryPolicy {
  /** Attempts after the first one. */
  retries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Replaces the default test: anything but a non-recoverable PackwrightError is retried. */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
  /** Aborting ends the current wait and any further attempt. */
  signal?: AbortSignal;
}

const DEFAULT_POLICY: RetryPolicy = {
  retries: 2,
  baseDelayMs: 500,
  maxDelayMs: 15_000,
};

function isRecoverable(error: unknown): boolean {
  return !(error instanceof PackwrightError) || error.recoverable;
}

/** Between half and all of `base * 2^(attempt - 1)`, capped at `max`. */
export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  random: () => number = Math.random
): number {
  const ceiling = Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
  return ceiling * (0.5 + random() * 0.5);
}

function waitCancelled(): PackwrightError {
  return new PackwrightError(
    'Retry wait aborted',
    ErrorCode.DOWNLOAD_CANCELLED,
    'The download was cancelled'
  );
}

function pause(ms: number, signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(waitCancelled());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(waitCancelled());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export async function withRetry<T>(
  operation: () => Promise<T>,
  options: Partial<RetryPolicy> = {}
): Promise<T> {
  const policy: RetryPolicy = { ...DEFAULT_POLICY, ...options };
  const retryable = policy.shouldRetry ?? isRecoverable;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (attempt > policy.retries || policy.signal?.aborted || !retryable(error)) {
        throw error;
      }
      const delay = backoffDelay(attempt, policy.baseDelayMs, policy.maxDelayMs);
      policy.onRetry?.(attempt, delay, error);
      await pause(delay, policy.signal);
    }
  }
}
