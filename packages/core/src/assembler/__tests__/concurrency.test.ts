import { describe, it, expect } from 'vitest';
import { createLimiter, withRootLock } from '../concurrency.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = (): void => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

const tick = (): Promise<void> => new Promise((done) => setImmediate(done));

describe('createLimiter', () => {
  it('rejects limits that are not positive integers', () => {
    expect(() => createLimiter(0)).toThrow(RangeError);
    expect(() => createLimiter(1.5)).toThrow(RangeError);
  });

  it('never runs more than the limit at once and starts waiters in order', async () => {
    const limit = createLimiter(2);
    const gates = [deferred(), deferred(), deferred(), deferred()];
    const started: number[] = [];
    let active = 0;
    let peak = 0;

    const runs = gates.map((gate, i) =>
      limit(async () => {
        started.push(i);
        active++;
        peak = Math.max(peak, active);
        await gate.promise;
        active--;
        return i;
      })
    );

    await tick();
    expect(started).toEqual([0, 1]);
    gates[1]?.resolve();
    await tick();
    expect(started).toEqual([0, 1, 2]);
    gates.forEach((gate) => gate.resolve());

    await expect(Promise.all(runs)).resolves.toEqual([0, 1, 2, 3]);
    expect(started).toEqual([0, 1, 2, 3]);
    expect(peak).toBe(2);
  });

  it('frees the slot when a task fails', async () => {
    const limit = createLimiter(1);
    await expect(limit(() => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(limit(() => Promise.resolve('next'))).resolves.toBe('next');
  });
});

describe('withRootLock', () => {
  it('runs tasks on the same root one after another', async () => {
    const events: string[] = [];
    const gate = deferred();

    const first = withRootLock('/tmp/sd-lock', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = withRootLock('/tmp/sd-lock/', async () => {
      events.push('second:start');
      return Promise.resolve();
    });

    await tick();
    expect(events).toEqual(['first:start']);
    gate.resolve();
    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('does not block other roots', async () => {
    const gate = deferred();
    const blocked = withRootLock('/tmp/sd-a', () => gate.promise);
    await expect(withRootLock('/tmp/sd-b', () => Promise.resolve('free'))).resolves.toBe('free');
    gate.resolve();
    await blocked;
  });

  it('releases the lock after a failure', async () => {
    await expect(withRootLock('/tmp/sd-fail', () => Promise.reject(new Error('x')))).rejects.toThrow(
      'x'
    );
    await expect(withRootLock('/tmp/sd-fail', () => Promise.resolve(1))).resolves.toBe(1);
  });
});
