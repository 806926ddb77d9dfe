import { describe, expect, it } from 'vitest';
import { CancelledError, SessionBusyError } from '../errors.js';
import { RedisSessionStore } from '../session/redis-store.js';
import { SessionRegistry } from '../session/registry.js';
import { MemoryBackend } from './helpers.js';

function deferred(): { promise: Promise<void>; resolve(): void } {
  let resolve = (): void => undefined;
  const promise = new Promise<void>(done => {
    resolve = done;
  });
  return { promise, resolve };
}

function setup(lockWaitMs: number) {
  const backend = new MemoryBackend();
  const store = new RedisSessionStore(backend, 'test');
  let now = 0;
  const sleeps: number[] = [];
  const registry = new SessionRegistry(store, {
    lockWaitMs,
    lockTtlMs: 60_000,
    now: () => now,
    sleep: async ms => {
      sleeps.push(ms);
      now += ms;
    },
  });
  return { backend, store, registry, sleeps };
}

describe('SessionRegistry', () => {
  it('fails a second caller at once when it may not wait', async () => {
    const { registry } = setup(0);
    const started = deferred();
    const gate = deferred();
    const first = registry.withSession('default', '/work/app', async () => {
      started.resolve();
      await gate.promise;
      return 'first';
    });
    await started.promise;

    expect(registry.isHeld('default', '/work/app')).toBe(true);
    await expect(registry.withSession('default', '/work/app', async () => 'second')).rejects.toBeInstanceOf(SessionBusyError);
    expect(await registry.withSession('other', '/work/app', async () => 'other')).toBe('other');

    gate.resolve();
    expect(await first).toBe('first');
    expect(registry.isHeld('default', '/work/app')).toBe(false);
  });

  it('serves waiting callers in arrival order', async () => {
    const { registry } = setup(5_000);
    const order: string[] = [];
    const started = deferred();
    const gate = deferred();

    const first = registry.withSession('default', '/work/app', async () => {
      order.push('first');
      started.resolve();
      await gate.promise;
    });
    await started.promise;
    const second = registry.withSession('default', '/work/app', async () => { order.push('second'); });
    const third = registry.withSession('default', '/work/app', async () => { order.push('third'); });

    gate.resolve();
    await Promise.all([first, second, third]);
    expect(order).toEqual(['first', 'second', 'third']);
  });

  it('releases the session when the work throws', async () => {
    const { registry } = setup(0);
    await expect(registry.withSession('default', '/work/app', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
    expect(await registry.withSession('default', '/work/app', async () => 'again')).toBe('again');
  });

  it('polls a lock held by another process until the deadline', async () => {
    const { store, registry, sleeps } = setup(100);
    const foreign = await store.tryLock('default', '/work/app', 60_000);
    expect(foreign).not.toBeNull();

    await expect(registry.withSession('default', '/work/app', async () => 'never')).rejects.toBeInstanceOf(SessionBusyError);
    expect(sleeps).toEqual([50, 50]);
    await foreign?.();
  });

  it('gets the store lock once the other process lets go', async () => {
    const backend = new MemoryBackend();
    const store = new RedisSessionStore(backend, 'test');
    const foreign = await store.tryLock('default', '/work/app', 60_000);
    const registry = new SessionRegistry(store, {
      lockWaitMs: 1_000,
      lockTtlMs: 60_000,
      sleep: async () => {
        await foreign?.();
      },
    });
    expect(await registry.withSession('default', '/work/app', async () => 'done')).toBe('done');
  });

  it('cancels queued callers and closes the store on close', async () => {
    const { backend, registry } = setup(5_000);
    const started = deferred();
    const gate = deferred();
    const first = registry.withSession('default', '/work/app', async () => {
      started.resolve();
      await gate.promise;
      return 'finished';
    });
    await started.promise;
    const queued = registry.withSession('default', '/work/app', async () => 'queued').catch((error: unknown) => error);

    const closing = registry.close();
    expect(await queued).toBeInstanceOf(CancelledError);
    gate.resolve();
    await closing;

    expect(await first).toBe('finished');
    expect(backend.closed).toBe(true);
    await expect(registry.withSession('default', '/work/app', async () => 'late')).rejects.toBeInstanceOf(CancelledError);
  });
});
