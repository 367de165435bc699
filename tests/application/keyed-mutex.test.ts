import { describe, it, expect } from 'vitest';
import { KeyedMutex } from '../../src/application/keyed-mutex.js';
import { deferred } from '../helpers.js';

describe('KeyedMutex', () => {
  it('runs tasks under one key in call order', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred<void>();
    const order: string[] = [];

    const first = mutex.runExclusive('a', async () => {
      await gate.promise;
      order.push('first');
    });
    const second = mutex.runExclusive('a', async () => {
      order.push('second');
    });

    await Promise.resolve();
    expect(order).toEqual([]);
    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first', 'second']);
  });

  it('does not block other keys', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred<void>();
    const blocked = mutex.runExclusive('a', () => gate.promise);

    await expect(mutex.runExclusive('b', async () => 'done')).resolves.toBe('done');
    gate.resolve();
    await blocked;
  });

  it('keeps the chain going after a failed task', async () => {
    const mutex = new KeyedMutex();
    const failing = mutex.runExclusive('a', async () => {
      throw new Error('boom');
    });
    const next = mutex.runExclusive('a', async () => 42);

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe(42);
  });

  it('forgets keys once their work is done', async () => {
    const mutex = new KeyedMutex();
    await mutex.runExclusive('a', async () => undefined);
    await Promise.resolve();
    expect(mutex.size).toBe(0);
  });
});
