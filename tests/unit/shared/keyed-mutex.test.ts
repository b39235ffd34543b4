import { describe, it, expect } from 'vitest';
import { KeyedMutex } from '../../../src/shared/concurrency/keyed-mutex.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('KeyedMutex', () => {
  it('should run tasks for one key in submission order', async () => {
    const mutex = new KeyedMutex<number>();
    const order: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive(1, async () => {
      await gate.promise;
      order.push('first');
    });
    const second = mutex.runExclusive(1, async () => {
      order.push('second');
    });

    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first', 'second']);
  });

  it('should not hold other keys', async () => {
    const mutex = new KeyedMutex<number>();
    const gate = deferred();

    const blocked = mutex.runExclusive(1, () => gate.promise);
    const result = await mutex.runExclusive(2, async () => 'done');

    expect(result).toBe('done');
    gate.resolve();
    await blocked;
  });

  it('should release the key when a task throws', async () => {
    const mutex = new KeyedMutex<string>();

    await expect(
      mutex.runExclusive('a', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(await mutex.runExclusive('a', async () => 5)).toBe(5);
    expect(mutex.activeKeys).toBe(0);
  });
});
