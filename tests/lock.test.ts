import { describe, expect, it } from 'vitest';
import { KeyedMutex } from '../src/lock';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

describe('keyed mutex', () => {
  it('runs tasks on the same key one at a time', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    let releaseFirst: () => void = () => undefined;

    const first = mutex.runExclusive('day:2026-03-10', async () => {
      order.push('first:start');
      await new Promise<void>((resolve) => {
        releaseFirst = resolve;
      });
      order.push('first:end');
    });
    const second = mutex.runExclusive(['shields', 'day:2026-03-10'], async () => {
      order.push('second');
    });

    await tick();
    expect(order).toEqual(['first:start']);
    expect(mutex.isLocked('day:2026-03-10')).toBe(true);

    releaseFirst();
    await Promise.all([first, second]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(mutex.isLocked('day:2026-03-10')).toBe(false);
    expect(mutex.isLocked('shields')).toBe(false);
  });

  it('does not block unrelated keys', async () => {
    const mutex = new KeyedMutex();
    let releaseFirst: () => void = () => undefined;
    const first = mutex.runExclusive('streak', () => new Promise<void>((resolve) => {
      releaseFirst = resolve;
    }));

    await expect(mutex.runExclusive('shields', async () => 'done')).resolves.toBe('done');
    await tick();
    expect(mutex.isLocked('streak')).toBe(true);
    releaseFirst();
    await first;
  });

  it('releases the key when the task throws', async () => {
    const mutex = new KeyedMutex();
    await expect(
      mutex.runExclusive('streak', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(mutex.isLocked('streak')).toBe(false);
  });
});
