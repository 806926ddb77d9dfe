export { FileSessionStore, encodeSessionName } from './file-store.js';
export { IORedisBackend, RedisSessionStore, type KeyValueBackend } from './redis-store.js';
export { SessionRegistry, type SessionRegistryOptions } from './registry.js';
export {
  DEFAULT_LIST_LIMIT,
  SESSION_RECORD_VERSION,
  countIssueMarkers,
  createSession,
  deserializeSession,
  formatTimeAgo,
  projectKey,
  selectSummaries,
  serializeSession,
  summarize,
} from './record.js';
export { SESSION_SORT_KEYS } from './types.js';
export type {
  ListSessionsOptions,
  ReleaseLock,
  Session,
  SessionSortKey,
  SessionStore,
  SessionSummary,
} from './types.js';
