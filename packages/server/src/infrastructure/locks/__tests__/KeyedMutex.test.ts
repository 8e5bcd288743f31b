import { describe, it, expect } from 'vitest';
import { KeyedMutex } from '../KeyedMutex.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedMutex', () => {
  it('runs tasks for the same key one at a time in arrival order', async () => {
    const mutex = new KeyedMutex<number>();
    const events: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive(1, async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = mutex.runExclusive(1, async () => {
      events.push('second:start');
      events.push('second:end');
    });

    await Promise.resolve();
    await Promise.resolve();
    expect(events).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);

    expect(events).toEqual(['first:start', 'first:end', 'second:start', 'second:end']);
  });

  it('does not make different keys wait for each other', async () => {
    const mutex = new KeyedMutex<number>();
    const gate = deferred();
    const events: string[] = [];

    const blocked = mutex.runExclusive(1, async () => {
      await gate.promise;
      events.push('key1');
    });
    await mutex.runExclusive(2, async () => {
      events.push('key2');
    });

    expect(events).toEqual(['key2']);

    gate.resolve();
    await blocked;
    expect(events).toEqual(['key2', 'key1']);
  });

  it('releases the key when a task rejects', async () => {
    const mutex = new KeyedMutex<string>();

    await expect(
      mutex.runExclusive('video', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(mutex.runExclusive('video', async () => 'next')).resolves.toBe('next');
  });
});
