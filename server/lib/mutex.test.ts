import { describe, expect, it } from 'vitest';
import { KeyedMutex, Mutex } from './mutex';

const nextTurn = () => new Promise<void>(resolve => setTimeout(resolve, 0));

describe('Mutex', () => {
  it('runs critical sections one at a time in arrival order', async () => {
    const mutex = new Mutex();
    const order: string[] = [];

    const a = mutex.runExclusive(async () => {
      order.push('a:start');
      await nextTurn();
      order.push('a:end');
    });
    const b = mutex.runExclusive(() => {
      order.push('b');
    });

    await Promise.all([a, b]);
    expect(order).toEqual(['a:start', 'a:end', 'b']);
  });

  it('reports whether it is held', async () => {
    const mutex = new Mutex();
    expect(mutex.locked).toBe(false);

    const release = await mutex.acquire();
    expect(mutex.locked).toBe(true);
    release();
    release();
    expect(mutex.locked).toBe(false);
  });

  it('releases the lock when the section throws', async () => {
    const mutex = new Mutex();
    await expect(mutex.runExclusive(() => { throw new Error('boom'); })).rejects.toThrow('boom');
    await expect(mutex.runExclusive(() => 42)).resolves.toBe(42);
    expect(mutex.locked).toBe(false);
  });
});

describe('KeyedMutex', () => {
  it('lets different keys proceed independently', async () => {
    const locks = new KeyedMutex();
    const order: string[] = [];
    let releaseA: () => void = () => undefined;
    const gate = new Promise<void>(resolve => { releaseA = resolve; });

    const a = locks.runExclusive('a', async () => {
      await gate;
      order.push('a');
    });
    await locks.runExclusive('b', () => {
      order.push('b');
    });
    expect(locks.isLocked('a')).toBe(true);
    expect(locks.isLocked('b')).toBe(false);

    releaseA();
    await a;
    expect(order).toEqual(['b', 'a']);
    expect(locks.isLocked('a')).toBe(false);
  });

  it('holds every key for runExclusiveMany', async () => {
    const locks = new KeyedMutex();
    const seen: boolean[] = [];

    await locks.runExclusiveMany(['x', 'y', 'x'], () => {
      seen.push(locks.isLocked('x'), locks.isLocked('y'));
    });

    expect(seen).toEqual([true, true]);
    expect(locks.isLocked('x')).toBe(false);
    expect(locks.isLocked('y')).toBe(false);
  });

  it('queues a multi-key section behind a single-key holder', async () => {
    const locks = new KeyedMutex();
    const order: string[] = [];

    const single = locks.runExclusive('y', async () => {
      await nextTurn();
      order.push('single');
    });
    const many = locks.runExclusiveMany(['x', 'y'], () => {
      order.push('many');
    });

    await Promise.all([single, many]);
    expect(order).toEqual(['single', 'many']);
  });
});
