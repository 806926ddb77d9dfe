import { expandHome, type Config } from '../config.js';
import { InvalidArgumentError } from '../errors.js';
import { OpenAiCompatibleEngine } from '../engine/openai-compatible.js';
import { DEFAULT_SESSION_NAME, ReviewOrchestrator } from '../orchestrator/loop.js';
import { RateLimiter } from '../ratelimit/rate-limiter.js';
import { FileSessionStore } from '../session/file-store.js';
import { IORedisBackend, RedisSessionStore } from '../session/redis-store.js';
import { SessionRegistry } from '../session/registry.js';
import { logger } from '../utils/logger.js';
import { IndexCache, canonicalProjectRoot } from './index-cache.js';
import type { ReasoningEngine } from '../engine/types.js';
import type { IndexResult } from '../indexer/types.js';
import type { ReviewRequest, ReviewResult } from '../orchestrator/types.js';
import type { RateBucket } from '../ratelimit/token-bucket.js';
import type { ListSessionsOptions, Session, SessionStore, SessionSummary } from '../session/types.js';

const log = logger.child('service');

const SESSION_NAME_PATTERN = /^[\w.@-]{1,128}$/;

/** Parts that tests (or embedders) may supply instead of building from config. */
export interface ReviewServiceOverrides {
  engine?: ReasoningEngine;
  store?: SessionStore;
  rateLimiter?: RateLimiter;
  now?: () => number;
}

export function createSessionStore(config: Config): SessionStore {
  if (config.sessions.backend === 'redis') {
    return new RedisSessionStore(new IORedisBackend(config.redis.url), config.redis.keyPrefix);
  }
  return new FileSessionStore(expandHome(config.sessions.directory));
}

export function createEngine(config: Config): ReasoningEngine {
  const apiKey = process.env[config.engine.apiKeyEnv];
  if (!apiKey) {
    log.warn(`${config.engine.apiKeyEnv} is not set; engine requests will be sent without credentials`);
  }
  return new OpenAiCompatibleEngine({
    model: config.engine.model,
    baseUrl: config.engine.baseUrl,
    apiKey,
    timeoutMs: config.engine.timeoutMs,
    maxRetries: config.engine.maxRetries,
    temperature: config.engine.temperature,
  });
}

function validateSessionName(name: string): string {
  if (!SESSION_NAME_PATTERN.test(name)) {
    throw new InvalidArgumentError(`Invalid session name '${name}': use letters, digits, '.', '_', '@' or '-'`);
  }
  return name;
}

/**
 * Programmatic surface shared by the HTTP API and the MCP server. Owns the
 * long-lived pieces: session registry, rate limiter, engine and the index
 * cache. Construct once, `close()` on shutdown.
 */
export class ReviewService {
  readonly registry: SessionRegistry;
  readonly rateLimiter: RateLimiter;
  readonly indexes: IndexCache;
  private readonly orchestrator: ReviewOrchestrator;
  private closed = false;

  constructor(readonly config: Config, overrides: ReviewServiceOverrides = {}) {
    this.registry = new SessionRegistry(overrides.store ?? createSessionStore(config), {
      lockWaitMs: config.sessions.lockWaitMs,
      lockTtlMs: config.sessions.lockTtlMs,
      now: overrides.now,
    });
    this.rateLimiter = overrides.rateLimiter ?? new RateLimiter(config.rateLimits);
    this.indexes = new IndexCache(config);
    this.orchestrator = new ReviewOrchestrator({
      engine: overrides.engine ?? createEngine(config),
      rateLimiter: this.rateLimiter,
      registry: this.registry,
      indexes: this.indexes,
      bounds: config.exploration,
      navigation: config.navigation,
      now: overrides.now,
    });
  }

  async review(request: ReviewRequest, signal?: AbortSignal): Promise<ReviewResult> {
    const projectRoot = await this.indexes.canonicalRoot(request.projectRoot);
    const sessionName = validateSessionName(request.sessionName ?? DEFAULT_SESSION_NAME);
    return this.orchestrator.review({ ...request, projectRoot, sessionName }, signal);
  }

  async indexProject(projectRoot: string): Promise<IndexResult> {
    return this.indexes.rebuild(projectRoot);
  }

  async listSessions(options: ListSessionsOptions = {}): Promise<SessionSummary[]> {
    const projectRoot = options.projectRoot === undefined
      ? undefined
      : await canonicalProjectRoot(options.projectRoot, false);
    return this.registry.store.list({ ...options, projectRoot });
  }

  async getSession(name: string, projectRoot: string): Promise<Session> {
    return this.registry.store.load(validateSessionName(name), await canonicalProjectRoot(projectRoot, false));
  }

  /** Delete a stored session; a review holding it must finish first. */
  async deleteSession(name: string, projectRoot: string): Promise<boolean> {
    const root = await canonicalProjectRoot(projectRoot, false);
    const sessionName = validateSessionName(name);
    return this.registry.withSession(sessionName, root, () => this.registry.store.delete(sessionName, root));
  }

  rateLimitSnapshot(): Record<string, RateBucket> {
    return this.rateLimiter.snapshot();
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.registry.close();
    await this.indexes.close();
    log.info('Review service closed');
  }
}
