import { describe, expect, it } from 'vitest';
import { KeyedMutex } from '../src/utils/keyed-mutex.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('KeyedMutex', () => {
  it('runs tasks for the same key one at a time in arrival order', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    await Promise.all([
      mutex.runExclusive('p1', async () => {
        order.push('a:start');
        await delay(20);
        order.push('a:end');
      }),
      mutex.runExclusive('p1', async () => {
        order.push('b:start');
        order.push('b:end');
      }),
    ]);

    expect(order).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
    expect(mutex.isLocked('p1')).toBe(false);
  });

  it('lets different keys interleave', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    await Promise.all([
      mutex.runExclusive('p1', async () => {
        order.push('p1:start');
        await delay(20);
        order.push('p1:end');
      }),
      mutex.runExclusive('p2', async () => {
        order.push('p2');
      }),
    ]);

    expect(order).toEqual(['p1:start', 'p2', 'p1:end']);
  });

  it('releases the key when a task throws', async () => {
    const mutex = new KeyedMutex();
    await expect(
      mutex.runExclusive('p1', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    await expect(mutex.runExclusive('p1', async () => 7)).resolves.toBe(7);
  });
});
