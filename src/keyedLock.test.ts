import { describe, expect, it } from 'vitest';
import { KeyedLock } from './keyedLock';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('KeyedLock', () => {
  it('runs sections on the same key one at a time', async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const events: string[] = [];

    const first = lock.run('a', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = lock.run('a', async () => {
      events.push('second');
    });

    await tick();
    expect(events).toEqual(['first:start']);
    gate.resolve();
    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
    expect(lock.size).toBe(0);
  });

  it('does not block other keys', async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const blocked = lock.run('a', () => gate.promise);

    await expect(lock.run('b', async () => 'b done')).resolves.toBe('b done');
    gate.resolve();
    await blocked;
  });

  it('releases the key when a section throws', async () => {
    const lock = new KeyedLock();
    await expect(
      lock.run('a', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    await expect(lock.run('a', async () => 'ok')).resolves.toBe('ok');
    expect(lock.size).toBe(0);
  });
});
