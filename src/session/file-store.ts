import { open, mkdir, readFile, readdir, rename, rm, stat, writeFile } from 'node:fs/promises';
import { randomUUID } from 'node:crypto';
import { join } from 'node:path';
import { NotFoundError, SessionVersionError, describeError, isNodeError } from '../errors.js';
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

const log = logger.child('sessions:file');

const RECORD_SUFFIX = '.json';
const LOCK_SUFFIX = '.lock';
const GUARD_SUFFIX = '.guard';
const GUARD_TTL_MS = 10_000;
const UNREADABLE_LOCK_TTL_MS = 60_000;

interface LockRecord {
  token: string;
  pid: number;
  expiresAt: number;
}

interface LockState {
  /** Absent for lock files written without one. */
  token?: string;
  expiresAt: number;
}

const isExpired = (lock: LockState): boolean => lock.expiresAt <= Date.now();

/** Session names become file names, so anything path-like is encoded. */
export function encodeSessionName(name: string): string {
  return encodeURIComponent(name).replace(/\./g, '%2E');
}

/**
 * One JSON file per session under `<directory>/<hash of project root>/`.
 * Writes go to a temporary file first and are renamed into place, so a
 * reader never sees half a record.
 */
export class FileSessionStore implements SessionStore {
  private writeCounter = 0;

  constructor(private readonly directory: string) {}

  create(name: string, projectRoot: string): Session {
    return createSession(name, projectRoot);
  }

  async load(name: string, projectRoot: string): Promise<Session> {
    let text: string;
    try {
      text = await readFile(this.recordPath(name, projectRoot), 'utf-8');
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        throw new NotFoundError(`Session '${name}' not found for ${projectRoot}`);
      }
      throw error;
    }
    return deserializeSession(text);
  }

  async save(session: Session): Promise<void> {
    const dir = this.projectDir(session.projectRoot);
    await mkdir(dir, { recursive: true });

    const target = this.recordPath(session.name, session.projectRoot);
    const temp = `${target}.${process.pid}.${++this.writeCounter}.tmp`;
    try {
      await writeFile(temp, serializeSession(session), 'utf-8');
      await rename(temp, target);
    } catch (error) {
      await rm(temp, { force: true });
      throw error;
    }
  }

  async list(options: ListSessionsOptions = {}): Promise<SessionSummary[]> {
    const projectDirs = options.projectRoot === undefined
      ? await this.subdirectories()
      : [this.projectDir(options.projectRoot)];

    const summaries: SessionSummary[] = [];
    const now = new Date();
    for (const dir of projectDirs) {
      for (const file of await this.recordFiles(dir)) {
        const session = await this.readRecord(join(dir, file));
        if (session) summaries.push(summarize(session, now));
      }
    }
    return selectSummaries(summaries, options);
  }

  async delete(name: string, projectRoot: string): Promise<boolean> {
    const target = this.recordPath(name, projectRoot);
    try {
      await rm(target);
      return true;
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') return false;
      throw error;
    }
  }

  /**
   * Exclusive lock file holding the owner's token and expiry time. A lock
   * whose expiry has passed belongs to a crashed holder and is taken over;
   * takeover and release both run under a short-lived guard file, and a
   * holder only ever removes a lock file that still carries its own token.
   */
  async tryLock(name: string, projectRoot: string, ttlMs: number): Promise<ReleaseLock | null> {
    await mkdir(this.projectDir(projectRoot), { recursive: true });
    const lockPath = `${this.recordPath(name, projectRoot)}${LOCK_SUFFIX}`;
    const token = randomUUID();

    if (await this.createLockFile(lockPath, token, ttlMs)) {
      return this.releaser(lockPath, token);
    }

    const held = await this.readLock(lockPath);
    if (held !== null && !isExpired(held)) return null;

    const taken = await this.guarded(lockPath, async () => {
      const current = await this.readLock(lockPath);
      if (current !== null) {
        // a fresh lock appeared, or another taker already replaced the stale one
        if (!isExpired(current) || current.token !== held?.token) return false;
        log.warn(`Taking over stale lock for session '${name}'`);
        await rm(lockPath, { force: true });
      }
      return this.createLockFile(lockPath, token, ttlMs);
    });
    return taken === true ? this.releaser(lockPath, token) : null;
  }

  async close(): Promise<void> {
    // nothing held open between calls
  }

  private projectDir(projectRoot: string): string {
    return join(this.directory, projectKey(projectRoot));
  }

  private recordPath(name: string, projectRoot: string): string {
    return join(this.projectDir(projectRoot), `${encodeSessionName(name)}${RECORD_SUFFIX}`);
  }

  private async createLockFile(lockPath: string, token: string, ttlMs: number): Promise<boolean> {
    try {
      const handle = await open(lockPath, 'wx');
      try {
        const record: LockRecord = { token, pid: process.pid, expiresAt: Date.now() + ttlMs };
        await handle.writeFile(JSON.stringify(record));
      } finally {
        await handle.close();
      }
      return true;
    } catch (error) {
      if (isNodeError(error) && error.code === 'EEXIST') return false;
      throw error;
    }
  }

  /** Current lock owner, or null when there is no lock file. */
  private async readLock(lockPath: string): Promise<LockState | null> {
    let text: string;
    try {
      text = await readFile(lockPath, 'utf-8');
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') return null;
      throw error;
    }
    try {
      const parsed: unknown = JSON.parse(text);
      if (parsed !== null && typeof parsed === 'object' && 'expiresAt' in parsed && typeof parsed.expiresAt === 'number') {
        const token = 'token' in parsed && typeof parsed.token === 'string' ? parsed.token : undefined;
        return { token, expiresAt: parsed.expiresAt };
      }
    } catch (error) {
      log.debug(`Unreadable lock file ${lockPath}: ${describeError(error)}`);
    }
    // a lock with no readable expiry is judged by its age alone
    try {
      const info = await stat(lockPath);
      return { expiresAt: info.mtimeMs + UNREADABLE_LOCK_TTL_MS };
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') return null;
      throw error;
    }
  }

  /**
   * Run `fn` while holding `<lock>.guard`. Resolves undefined without running
   * it when another process holds the guard.
   */
  private async guarded<T>(lockPath: string, fn: () => Promise<T>): Promise<T | undefined> {
    const guardPath = `${lockPath}${GUARD_SUFFIX}`;
    if (!(await this.createGuard(guardPath))) {
      if (!(await this.guardIsAbandoned(guardPath))) return undefined;
      log.warn(`Removing abandoned lock guard ${guardPath}`);
      await rm(guardPath, { force: true });
      if (!(await this.createGuard(guardPath))) return undefined;
    }
    try {
      return await fn();
    } finally {
      await rm(guardPath, { force: true });
    }
  }

  private async createGuard(guardPath: string): Promise<boolean> {
    try {
      await writeFile(guardPath, String(process.pid), { flag: 'wx' });
      return true;
    } catch (error) {
      if (isNodeError(error) && error.code === 'EEXIST') return false;
      throw error;
    }
  }

  private async guardIsAbandoned(guardPath: string): Promise<boolean> {
    try {
      return Date.now() - (await stat(guardPath)).mtimeMs > GUARD_TTL_MS;
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') return true;
      throw error;
    }
  }

  private releaser(lockPath: string, token: string): ReleaseLock {
    let released = false;
    return async () => {
      if (released) return;
      released = true;
      const outcome = await this.guarded(lockPath, async () => {
        const current = await this.readLock(lockPath);
        if (current?.token !== token) {
          log.warn(`Lock ${lockPath} was taken over before release`);
          return false;
        }
        await rm(lockPath, { force: true });
        return true;
      });
      // a taker holds the guard, so our expired lock is already being replaced
      if (outcome === undefined) log.debug(`Lock ${lockPath} is being taken over; leaving it`);
    };
  }

  private async subdirectories(): Promise<string[]> {
    try {
      const entries = await readdir(this.directory, { withFileTypes: true });
      return entries
        .filter(entry => entry.isDirectory())
        .map(entry => join(this.directory, entry.name))
        .sort();
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') return [];
      throw error;
    }
  }

  private async recordFiles(dir: string): Promise<string[]> {
    try {
      const entries = await readdir(dir);
      return entries.filter(file => file.endsWith(RECORD_SUFFIX)).sort();
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') return [];
      throw error;
    }
  }

  private async readRecord(path: string): Promise<Session | null> {
    try {
      return deserializeSession(await readFile(path, 'utf-8'));
    } catch (error) {
      if (error instanceof SessionVersionError) {
        log.debug(`Skipping ${path}: ${error.message}`);
      } else {
        log.warn(`Skipping unreadable session record ${path}: ${describeError(error)}`);
      }
      return null;
    }
  }
}
