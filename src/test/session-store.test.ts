import { access, readFile, rm, utimes, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { NotFoundError, SessionVersionError } from '../errors.js';
import { FileSessionStore, encodeSessionName } from '../session/file-store.js';
import { RedisSessionStore } from '../session/redis-store.js';
import { createSession, projectKey, serializeSession } from '../session/record.js';
import type { Session, SessionStore } from '../session/types.js';
import { MemoryBackend, createTempDir } from './helpers.js';

interface StoreFixture {
  store: SessionStore;
  /** Put a raw record where the store would keep `name`. */
  writeRaw(name: string, projectRoot: string, text: string): Promise<void>;
  cleanup(): Promise<void>;
}

function session(name: string, projectRoot: string, lastUpdated: string, iterationCount = 1): Session {
  return {
    ...createSession(name, projectRoot, new Date('2026-01-01T00:00:00.000Z')),
    lastUpdated,
    iterationCount,
  };
}

const fixtures: Array<[string, () => Promise<StoreFixture>]> = [
  ['FileSessionStore', async () => {
    const directory = await createTempDir('rn-sessions-');
    return {
      store: new FileSessionStore(directory),
      writeRaw: (name, projectRoot, text) =>
        writeFile(join(directory, projectKey(projectRoot), `${encodeSessionName(name)}.json`), text),
      cleanup: () => rm(directory, { recursive: true, force: true }),
    };
  }],
  ['RedisSessionStore', async () => {
    const backend = new MemoryBackend();
    return {
      store: new RedisSessionStore(backend, 'test'),
      writeRaw: (name, projectRoot, text) => backend.set(`test:session:${projectKey(projectRoot)}:${name}`, text),
      cleanup: async () => undefined,
    };
  }],
];

describe.each(fixtures)('%s', (_label, createFixture) => {
  let fixture: StoreFixture;

  beforeEach(async () => {
    fixture = await createFixture();
  });

  afterEach(async () => {
    await fixture.store.close();
    await fixture.cleanup();
  });

  it('saves and loads a session unchanged', async () => {
    const original = session('default', '/work/app', '2026-01-02T00:00:00.000Z');
    await fixture.store.save(original);
    expect(await fixture.store.load('default', '/work/app')).toEqual(original);
  });

  it('keeps sessions of different projects apart', async () => {
    await fixture.store.save(session('default', '/work/app', '2026-01-02T00:00:00.000Z', 1));
    await fixture.store.save(session('default', '/work/other', '2026-01-03T00:00:00.000Z', 7));
    expect((await fixture.store.load('default', '/work/app')).iterationCount).toBe(1);
    expect((await fixture.store.load('default', '/work/other')).iterationCount).toBe(7);
  });

  it('reports a missing session as NotFound', async () => {
    await expect(fixture.store.load('missing', '/work/app')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('lists, filters, sorts and limits', async () => {
    await fixture.store.save(session('one', '/work/app', '2026-01-02T00:00:00.000Z', 3));
    await fixture.store.save(session('two', '/work/app', '2026-01-04T00:00:00.000Z', 1));
    await fixture.store.save(session('three', '/work/other', '2026-01-03T00:00:00.000Z', 2));

    const names = async (options?: Parameters<SessionStore['list']>[0]): Promise<string[]> =>
      (await fixture.store.list(options)).map(item => item.name);

    expect(await names()).toEqual(['two', 'three', 'one']);
    expect(await names({ sortBy: 'iterations' })).toEqual(['one', 'three', 'two']);
    expect(await names({ sortBy: 'name', limit: 2 })).toEqual(['one', 'three']);
    expect(await names({ projectRoot: '/work/app' })).toEqual(['two', 'one']);
    expect(await names({ projectRoot: '/work/none' })).toEqual([]);
  });

  it('skips records of another version when listing but refuses to load them', async () => {
    await fixture.store.save(session('current', '/work/app', '2026-01-02T00:00:00.000Z'));
    const future = serializeSession(session('future', '/work/app', '2026-01-03T00:00:00.000Z'))
      .replace('"version": 1', '"version": 2');
    await fixture.writeRaw('future', '/work/app', future);

    expect((await fixture.store.list()).map(item => item.name)).toEqual(['current']);
    await expect(fixture.store.load('future', '/work/app')).rejects.toBeInstanceOf(SessionVersionError);
  });

  it('deletes sessions', async () => {
    await fixture.store.save(session('default', '/work/app', '2026-01-02T00:00:00.000Z'));
    expect(await fixture.store.delete('default', '/work/app')).toBe(true);
    expect(await fixture.store.delete('default', '/work/app')).toBe(false);
    await expect(fixture.store.load('default', '/work/app')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('grants the lock to one holder at a time', async () => {
    const release = await fixture.store.tryLock('default', '/work/app', 60_000);
    expect(release).not.toBeNull();
    expect(await fixture.store.tryLock('default', '/work/app', 60_000)).toBeNull();
    expect(await fixture.store.tryLock('other', '/work/app', 60_000)).not.toBeNull();

    await release?.();
    await release?.();
    const again = await fixture.store.tryLock('default', '/work/app', 60_000);
    expect(again).not.toBeNull();
    await again?.();
  });
});

describe('FileSessionStore specifics', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await createTempDir('rn-sessions-');
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('encodes session names into safe file names', async () => {
    expect(encodeSessionName('feature/x..y')).toBe('feature%2Fx%2E%2Ey');
    const store = new FileSessionStore(directory);
    await store.save(session('feature/x..y', '/work/app', '2026-01-02T00:00:00.000Z'));
    const path = join(directory, projectKey('/work/app'), 'feature%2Fx%2E%2Ey.json');
    await expect(access(path)).resolves.toBeUndefined();
    expect((await readFile(path, 'utf-8')).endsWith('"version": 1\n}\n')).toBe(true);
  });

  it('takes over a lock whose holder let it expire', async () => {
    const store = new FileSessionStore(directory);
    const first = await store.tryLock('default', '/work/app', 60_000);
    expect(first).not.toBeNull();
    const lockPath = join(directory, projectKey('/work/app'), 'default.json.lock');
    await writeFile(lockPath, JSON.stringify({ pid: 1, expiresAt: Date.now() - 1000 }));

    const second = await store.tryLock('default', '/work/app', 60_000);
    expect(second).not.toBeNull();
    await second?.();
  });

  it('keeps a taken-over lock when the expired holder releases late', async () => {
    const store = new FileSessionStore(directory);
    const expired = await store.tryLock('default', '/work/app', 1);
    expect(expired).not.toBeNull();
    await new Promise(resolve => setTimeout(resolve, 20));

    const taker = await store.tryLock('default', '/work/app', 60_000);
    expect(taker).not.toBeNull();
    await expired?.();

    expect(await store.tryLock('default', '/work/app', 60_000)).toBeNull();
    await taker?.();
    const next = await store.tryLock('default', '/work/app', 60_000);
    expect(next).not.toBeNull();
    await next?.();
  });

  it('hands a stale lock to exactly one of several concurrent takers', async () => {
    const store = new FileSessionStore(directory);
    expect(await store.tryLock('default', '/work/app', 1)).not.toBeNull();
    await new Promise(resolve => setTimeout(resolve, 20));

    const attempts = await Promise.all([1, 2, 3, 4].map(() => store.tryLock('default', '/work/app', 60_000)));
    expect(attempts.filter(release => release !== null)).toHaveLength(1);
  });

  it('clears a guard left behind by a crashed process', async () => {
    const store = new FileSessionStore(directory);
    expect(await store.tryLock('default', '/work/app', 1)).not.toBeNull();
    const guardPath = join(directory, projectKey('/work/app'), 'default.json.lock.guard');
    await writeFile(guardPath, '1');
    const past = new Date(Date.now() - 60_000);
    await utimes(guardPath, past, past);
    await new Promise(resolve => setTimeout(resolve, 20));

    const release = await store.tryLock('default', '/work/app', 60_000);
    expect(release).not.toBeNull();
    await release?.();
    await expect(access(guardPath)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('lists nothing from an empty directory', async () => {
    const store = new FileSessionStore(join(directory, 'not-created'));
    expect(await store.list()).toEqual([]);
  });
});

describe('RedisSessionStore specifics', () => {
  it('keeps records and locks under separate namespaces', async () => {
    const backend = new MemoryBackend();
    const store = new RedisSessionStore(backend, 'rn');
    await store.save(session('default', '/work/app', '2026-01-02T00:00:00.000Z'));
    const release = await store.tryLock('default', '/work/app', 1000);
    const key = projectKey('/work/app');
    expect([...backend.data.keys()].sort()).toEqual([`rn:lock:${key}:default`, `rn:session:${key}:default`]);
    await release?.();
    expect([...backend.data.keys()]).toEqual([`rn:session:${key}:default`]);
  });

  it('lets a lock expire after its ttl', async () => {
    let now = 0;
    const store = new RedisSessionStore(new MemoryBackend(() => now), 'rn');
    expect(await store.tryLock('default', '/work/app', 1000)).not.toBeNull();
    now = 999;
    expect(await store.tryLock('default', '/work/app', 1000)).toBeNull();
    now = 1000;
    expect(await store.tryLock('default', '/work/app', 1000)).not.toBeNull();
  });

  it('closes its backend', async () => {
    const backend = new MemoryBackend();
    await new RedisSessionStore(backend, 'rn').close();
    expect(backend.closed).toBe(true);
  });
});
