export { loadConfig, parseConfig, expandHome, DEFAULT_CONFIG_PATH } from './config.js';
export type {
  Config,
  EngineConfig,
  ExplorationBounds,
  IndexerConfig,
  NavigationConfig,
  RateLimitConfig,
  SessionConfig,
} from './config.js';
export * from './errors.js';
export { logger, type LogLevel } from './utils/logger.js';

export { build, update, normalizeChangedPath, DEFAULT_INDEXER_OPTIONS } from './indexer/index.js';
export { buildFileTree, renderFileTree } from './indexer/file-tree.js';
export { dependentsOf } from './indexer/import-resolver.js';
export { ProjectWatcher } from './indexer/watcher.js';
export type { BuildStats, FileEntry, FileTreeNode, ImportEdge, Index, IndexResult, IndexerOptions } from './indexer/types.js';
export type { SymbolEntry, SymbolKind } from './parsers/base.js';

export { FileAccessor, resolveInSandbox } from './sandbox/file-accessor.js';
export * from './tools/index.js';

export { TokenBucket, systemClock, type Clock, type RateBucket, type Sleep } from './ratelimit/token-bucket.js';
export { RateLimiter, DEFAULT_CATEGORY_KEY } from './ratelimit/rate-limiter.js';

export * from './session/index.js';
export * from './engine/index.js';
export * from './orchestrator/index.js';
export * from './service/index.js';
export { createMcpServer, createMcpTools, callMcpTool } from './server.js';
