import { describe, expect, it } from 'vitest';
import { KeyedMutex } from '../../src/core/keyedMutex.js';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('KeyedMutex', () => {
  it('runs tasks for one key one at a time, in arrival order', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const task = (id: string, delayMs: number) => async () => {
      events.push(`start ${id}`);
      await sleep(delayMs);
      events.push(`end ${id}`);
      return id;
    };

    const results = await Promise.all([
      mutex.runExclusive('BTCUSDT', task('a', 20)),
      mutex.runExclusive('BTCUSDT', task('b', 1)),
      mutex.runExclusive('BTCUSDT', task('c', 5))
    ]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['start a', 'end a', 'start b', 'end b', 'start c', 'end c']);
  });

  it('lets different keys proceed independently', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    await Promise.all([
      mutex.runExclusive('BTCUSDT', async () => {
        events.push('btc start');
        await sleep(20);
        events.push('btc end');
      }),
      mutex.runExclusive('ETHUSDT', async () => {
        events.push('eth start');
        await sleep(1);
        events.push('eth end');
      })
    ]);

    expect(events).toEqual(['btc start', 'eth start', 'eth end', 'btc end']);
  });

  it('releases the key when a task throws', async () => {
    const mutex = new KeyedMutex();
    await expect(
      mutex.runExclusive('BTCUSDT', () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(await mutex.runExclusive('BTCUSDT', () => 42)).toBe(42);
    expect(mutex.pendingKeys).toBe(0);
  });

  it('forgets idle keys', async () => {
    const mutex = new KeyedMutex();
    await mutex.runExclusive('BTCUSDT', () => 'done');
    expect(mutex.pendingKeys).toBe(0);
  });
});
