import { describe, expect, it } from 'vitest';
import { StoreLock } from '../../../src/services/StoreLock.js';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('StoreLock', () => {
  it('runs holders one at a time in call order', async () => {
    const lock = new StoreLock();
    const gate = deferred();
    const order: string[] = [];

    const first = lock.runExclusive(async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = lock.runExclusive(() => {
      order.push('second');
    });

    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(lock.isLocked()).toBe(true);
    expect(order).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(lock.isLocked()).toBe(false);
  });

  it('releases after a holder throws', async () => {
    const lock = new StoreLock();

    await expect(
      lock.runExclusive(() => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(lock.runExclusive(() => 42)).resolves.toBe(42);
  });
});
