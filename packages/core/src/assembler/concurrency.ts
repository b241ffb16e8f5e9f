import { resolve } from 'node:path';

export type Limiter = <T>(task: () => Promise<T>) => Promise<T>;

/** Run at most `limit` tasks at once; the rest wait in FIFO order. */
export function createLimiter(limit: number): Limiter {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Concurrency limit must be a positive integer, got ${String(limit)}`);
  }
  let active = 0;
  const waiting: (() => void)[] = [];

  const release = (): void => {
    active--;
    const next = waiting.shift();
    if (next) {
      active++;
      next();
    }
  };

  return async <T>(task: () => Promise<T>): Promise<T> => {
    if (active < limit) {
      active++;
    } else {
      await new Promise<void>((wake) => waiting.push(wake));
    }
    try {
      return await task();
    } finally {
      release();
    }
  };
}

const rootLocks = new Map<string, Promise<void>>();

/**
 * Serialize work against one target root. Callers on the same resolved root
 * run one after another; different roots do not block each other. Not
 * re-entrant: do not call it again from inside `task` for the same root.
 */
export async function withRootLock<T>(root: string, task: () => Promise<T>): Promise<T> {
  const key = resolve(root);
  const previous = rootLocks.get(key) ?? Promise.resolve();
  let unlock = (): void => undefined;
  const current = new Promise<void>((done) => {
    unlock = done;
  });
  const tail = previous.then(() => current);
  rootLocks.set(key, tail);

  await previous;
  try {
    return await task();
  } finally {
    unlock();
    if (rootLocks.get(key) === tail) {
      rootLocks.delete(key);
    }
  }
}
