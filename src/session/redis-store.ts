import { randomUUID } from 'node:crypto';
import { Redis } from 'ioredis';
import { NotFoundError, SessionVersionError, describeError } from '../errors.js';
import { logger } from '../utils/logger.js';
import {
  createSession,
  deserializeSession,
  projectKey,
  selectSummaries,
  serializeSession,
  summarize,
} from './record.js';
import type { ListSessionsOptions, ReleaseLock, Session, SessionStore, SessionSummary } from './types.js';

const log = logger.child('sessions:redis');

/**
 * The handful of key-value operations the session store needs. Kept narrow
 * so tests can run the store against an in-memory map.
 */
export interface KeyValueBackend {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
  /** SET NX PX: true when the key was created. */
  setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean>;
  /** Delete only if the current value equals `value`. */
  deleteIfEquals(key: string, value: string): Promise<boolean>;
  delete(key: string): Promise<boolean>;
  /** Keys starting with `prefix`, in any order. */
  keysWithPrefix(prefix: string): Promise<string[]>;
  close(): Promise<void>;
}

// Only the holder's token may release a lock.
const RELEASE_SCRIPT = `
  if redis.call('GET', KEYS[1]) == ARGV[1] then
    return redis.call('DEL', KEYS[1])
  end
  return 0
`;

const escapeGlob = (text: string): string => text.replace(/[*?[\]\\]/g, '\\$&');

export class IORedisBackend implements KeyValueBackend {
  private readonly redis: Redis;
  private connected: Promise<void> | undefined;

  constructor(url: string) {
    this.redis = new Redis(url, {
      enableReadyCheck: true,
      maxRetriesPerRequest: 5,
      lazyConnect: true,
    });
    this.redis.on('error', (error: Error) => {
      log.error(`Redis connection error: ${error.message}`);
    });
  }

  private async ready(): Promise<Redis> {
    if (!this.connected) {
      this.connected = this.redis.connect().then(() => {
        log.info('Connected to Redis');
      });
    }
    await this.connected;
    return this.redis;
  }

  async get(key: string): Promise<string | null> {
    return (await this.ready()).get(key);
  }

  async set(key: string, value: string): Promise<void> {
    await (await this.ready()).set(key, value);
  }

  async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    const reply = await (await this.ready()).set(key, value, 'PX', ttlMs, 'NX');
    return reply === 'OK';
  }

  async deleteIfEquals(key: string, value: string): Promise<boolean> {
    const reply = await (await this.ready()).eval(RELEASE_SCRIPT, 1, key, value);
    return reply === 1;
  }

  async delete(key: string): Promise<boolean> {
    return (await (await this.ready()).del(key)) > 0;
  }

  async keysWithPrefix(prefix: string): Promise<string[]> {
    const redis = await this.ready();
    const keys: string[] = [];
    let cursor = '0';
    do {
      const [next, batch] = await redis.scan(cursor, 'MATCH', `${escapeGlob(prefix)}*`, 'COUNT', 200);
      keys.push(...batch);
      cursor = next;
    } while (cursor !== '0');
    return keys;
  }

  async close(): Promise<void> {
    if (this.connected) {
      await this.redis.quit();
    } else {
      this.redis.disconnect();
    }
  }
}

/**
 * Sessions stored as one string value per session under
 * `<prefix>:session:<hash of project root>:<name>`. Locks live under
 * `<prefix>:lock:` and expire on their own if the holder dies.
 */
export class RedisSessionStore implements SessionStore {
  constructor(
    private readonly backend: KeyValueBackend,
    private readonly keyPrefix: string,
  ) {}

  create(name: string, projectRoot: string): Session {
    return createSession(name, projectRoot);
  }

  async load(name: string, projectRoot: string): Promise<Session> {
    const text = await this.backend.get(this.recordKey(name, projectRoot));
    if (text === null) {
      throw new NotFoundError(`Session '${name}' not found for ${projectRoot}`);
    }
    return deserializeSession(text);
  }

  async save(session: Session): Promise<void> {
    await this.backend.set(this.recordKey(session.name, session.projectRoot), serializeSession(session));
  }

  async list(options: ListSessionsOptions = {}): Promise<SessionSummary[]> {
    const prefix = options.projectRoot === undefined
      ? `${this.keyPrefix}:session:`
      : `${this.keyPrefix}:session:${projectKey(options.projectRoot)}:`;

    const keys = (await this.backend.keysWithPrefix(prefix)).sort();

    const summaries: SessionSummary[] = [];
    const now = new Date();
    for (const key of keys) {
      const text = await this.backend.get(key);
      if (text === null) continue;
      try {
        summaries.push(summarize(deserializeSession(text), now));
      } catch (error) {
        if (error instanceof SessionVersionError) {
          log.debug(`Skipping ${key}: ${error.message}`);
        } else {
          log.warn(`Skipping unreadable session record ${key}: ${describeError(error)}`);
        }
      }
    }
    return selectSummaries(summaries, options);
  }

  async delete(name: string, projectRoot: string): Promise<boolean> {
    return this.backend.delete(this.recordKey(name, projectRoot));
  }

  async tryLock(name: string, projectRoot: string, ttlMs: number): Promise<ReleaseLock | null> {
    const key = `${this.keyPrefix}:lock:${projectKey(projectRoot)}:${name}`;
    const token = randomUUID();
    if (!(await this.backend.setIfAbsent(key, token, ttlMs))) {
      return null;
    }
    let released = false;
    return async () => {
      if (released) return;
      released = true;
      if (!(await this.backend.deleteIfEquals(key, token))) {
        log.warn(`Lock for session '${name}' expired before release`);
      }
    };
  }

  async close(): Promise<void> {
    await this.backend.close();
  }

  private recordKey(name: string, projectRoot: string): string {
    return `${this.keyPrefix}:session:${projectKey(projectRoot)}:${name}`;
  }
}
