import { describe, expect, it } from 'vitest';

import { AsyncLock } from '../lock.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

describe('AsyncLock', () => {
  it('runs tasks one at a time in arrival order', async () => {
    const lock = new AsyncLock();
    const gate = deferred();
    const events: string[] = [];

    const first = lock.runExclusive(async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
      return 1;
    });
    const second = lock.runExclusive(() => {
      events.push('second:start');
      return Promise.resolve(2);
    });

    await Promise.resolve();
    await Promise.resolve();
    expect(events).toEqual(['first:start']);

    gate.resolve();
    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('releases the lock when the holder rejects', async () => {
    const lock = new AsyncLock();

    const failing = lock.runExclusive(() => Promise.reject(new Error('holder failed')));
    const next = lock.runExclusive(() => Promise.resolve('next ran'));

    await expect(failing).rejects.toThrow('holder failed');
    await expect(next).resolves.toBe('next ran');
  });
});
