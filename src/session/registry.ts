import { CancelledError, SessionBusyError } from '../errors.js';
import { defaultSleep, type Sleep } from '../ratelimit/token-bucket.js';
import { logger } from '../utils/logger.js';
import { sessionKey } from './record.js';
import type { ReleaseLock, SessionStore } from './types.js';

const log = logger.child('sessions');

const STORE_LOCK_POLL_MS = 50;

export interface SessionRegistryOptions {
  /** How long a review waits for a busy session before SessionBusy; 0 fails at once. */
  lockWaitMs: number;
  /** Expiry of the store lock, so a crashed holder cannot block forever. */
  lockTtlMs: number;
  sleep?: Sleep;
  now?: () => number;
}

interface Waiter {
  grant(): void;
  timer?: NodeJS.Timeout;
}

interface KeyState {
  held: boolean;
  waiters: Waiter[];
}

/**
 * Serializes reviews of the same session. Inside one process a FIFO queue per
 * `(projectRoot, name)` orders callers; the store lock then keeps other
 * processes out. Constructed once at startup and closed at shutdown.
 */
export class SessionRegistry {
  private readonly keys = new Map<string, KeyState>();
  private readonly active = new Set<Promise<unknown>>();
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private closed = false;

  constructor(
    readonly store: SessionStore,
    private readonly options: SessionRegistryOptions,
  ) {
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  /**
   * Run `fn` while holding the session. Both locks are released however
   * `fn` exits.
   */
  withSession<T>(name: string, projectRoot: string, fn: () => Promise<T>): Promise<T> {
    if (this.closed) {
      return Promise.reject(new CancelledError('Session registry is closed'));
    }
    const run = this.runExclusive(name, projectRoot, fn);
    this.active.add(run);
    const forget = (): void => { this.active.delete(run); };
    run.then(forget, forget);
    return run;
  }

  isHeld(name: string, projectRoot: string): boolean {
    return this.keys.get(sessionKey(name, projectRoot))?.held ?? false;
  }

  /** Refuse new work, fail queued callers, wait for running ones, close the store. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    for (const state of this.keys.values()) {
      for (const waiter of state.waiters.splice(0)) {
        clearTimeout(waiter.timer);
        waiter.grant();
      }
    }
    await Promise.allSettled([...this.active]);
    await this.store.close();
  }

  private async runExclusive<T>(name: string, projectRoot: string, fn: () => Promise<T>): Promise<T> {
    const key = sessionKey(name, projectRoot);
    const deadline = this.now() + this.options.lockWaitMs;

    await this.acquireLocal(key, name, projectRoot);
    try {
      const releaseStore = await this.acquireStore(name, projectRoot, deadline);
      try {
        return await fn();
      } finally {
        await releaseStore();
      }
    } finally {
      this.releaseLocal(key);
    }
  }

  private acquireLocal(key: string, name: string, projectRoot: string): Promise<void> {
    let state = this.keys.get(key);
    if (!state) {
      state = { held: false, waiters: [] };
      this.keys.set(key, state);
    }
    if (!state.held) {
      state.held = true;
      return Promise.resolve();
    }
    if (this.options.lockWaitMs <= 0) {
      return Promise.reject(new SessionBusyError(name, projectRoot));
    }

    const current = state;
    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = {
        grant: () => {
          if (this.closed) {
            reject(new CancelledError('Session registry is closed'));
          } else {
            resolve();
          }
        },
      };
      waiter.timer = setTimeout(() => {
        const position = current.waiters.indexOf(waiter);
        if (position >= 0) current.waiters.splice(position, 1);
        reject(new SessionBusyError(name, projectRoot));
      }, this.options.lockWaitMs);
      current.waiters.push(waiter);
    });
  }

  /** Hand the key to the next waiter, or free it. */
  private releaseLocal(key: string): void {
    const state = this.keys.get(key);
    if (!state) return;
    const next = state.waiters.shift();
    if (next) {
      clearTimeout(next.timer);
      next.grant();
      return;
    }
    state.held = false;
    this.keys.delete(key);
  }

  private async acquireStore(name: string, projectRoot: string, deadline: number): Promise<ReleaseLock> {
    for (;;) {
      const release = await this.store.tryLock(name, projectRoot, this.options.lockTtlMs);
      if (release) return release;

      const remaining = deadline - this.now();
      if (remaining <= 0) {
        log.info(`Session '${name}' is locked by another process`);
        throw new SessionBusyError(name, projectRoot);
      }
      await this.sleep(Math.min(STORE_LOCK_POLL_MS, remaining));
    }
  }
}
