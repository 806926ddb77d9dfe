import type { ChatMessage } from '../engine/types.js';
import type { NavigationTraceEntry } from '../tools/types.js';

/**
 * Persisted review conversation for one `(name, projectRoot)` pair.
 * Timestamps are ISO-8601 strings so the record round-trips through JSON
 * unchanged.
 */
export interface Session {
  id: string;
  name: string;
  projectRoot: string;
  createdAt: string;
  lastUpdated: string;
  messageHistory: ChatMessage[];
  /** Trace of the most recent review. */
  navigationState: NavigationTraceEntry[];
  iterationCount: number;
  cumulativeTokenEstimate: number;
  /** Issue markers counted in the last answer; null before the first review. */
  lastIssuesCount: number | null;
}

export type SessionSortKey = 'created' | 'last_reviewed' | 'name' | 'iterations';

export const SESSION_SORT_KEYS: readonly SessionSortKey[] = ['created', 'last_reviewed', 'name', 'iterations'];

export interface SessionSummary {
  name: string;
  projectRoot: string;
  createdAt: string;
  lastUpdated: string;
  iterationCount: number;
  messageCount: number;
  cumulativeTokenEstimate: number;
  /** Human-readable age of `lastUpdated`, e.g. `3 hours ago`. */
  lastReviewedAgo: string;
}

export interface ListSessionsOptions {
  /** Only sessions whose project root equals this path. */
  projectRoot?: string;
  limit?: number;
  sortBy?: SessionSortKey;
}

export type ReleaseLock = () => Promise<void>;

/**
 * Durable session storage. Implementations own the on-disk format and the
 * cross-process lock; SessionRegistry adds in-process ordering on top.
 */
export interface SessionStore {
  /** New, unsaved session with iteration 0. */
  create(name: string, projectRoot: string): Session;
  /** Throws NotFoundError if absent, SessionVersionError if the record is too new. */
  load(name: string, projectRoot: string): Promise<Session>;
  save(session: Session): Promise<void>;
  list(options?: ListSessionsOptions): Promise<SessionSummary[]>;
  /** Returns false when there was nothing to delete. */
  delete(name: string, projectRoot: string): Promise<boolean>;
  /** Returns a release function, or null if someone else holds the lock. */
  tryLock(name: string, projectRoot: string, ttlMs: number): Promise<ReleaseLock | null>;
  close(): Promise<void>;
}
