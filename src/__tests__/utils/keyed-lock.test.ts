import { describe, expect, test } from 'vitest';
import { KeyedLock } from '../../utils/keyed-lock.js';

const tick = (): Promise<void> => new Promise(resolve => setTimeout(resolve, 1));

describe('KeyedLock', () => {
  test('should run work on one key in call order', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];

    await Promise.all([
      lock.runExclusive('a', async () => {
        await tick();
        order.push('first');
      }),
      lock.runExclusive('a', async () => {
        order.push('second');
      })
    ]);

    expect(order).toEqual(['first', 'second']);
    expect(lock.size).toBe(0);
  });

  test('should not block other keys', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];

    await Promise.all([
      lock.runExclusive('a', async () => {
        await tick();
        order.push('a');
      }),
      lock.runExclusive('b', async () => {
        order.push('b');
      })
    ]);

    expect(order).toEqual(['b', 'a']);
  });

  test('should release the key when the work throws', async () => {
    const lock = new KeyedLock();

    await expect(lock.runExclusive('a', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(await lock.runExclusive('a', async () => 'next')).toBe('next');
  });
});
