import { readFileSync } from 'node:fs';
import { homedir, tmpdir } from 'node:os';
import { resolve, dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError, describeError } from './errors.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const BucketSchema = z.object({
  requestsPerMinute: z.number().positive(),
  burst: z.number().int().positive().optional(),
});

const ConfigSchema = z.object({
  indexer: z.object({
    ignore: z.array(z.string()).default(['node_modules', '.git', 'dist', 'build']),
    respectGitignore: z.boolean().default(true),
    maxFileSize: z.number().int().positive().default(1024 * 1024),
  }).default({}),
  navigation: z.object({
    maxReadBytes: z.number().int().positive().default(100_000),
    maxSearchResults: z.number().int().positive().default(100),
  }).default({}),
  exploration: z.object({
    maxToolCalls: z.number().int().nonnegative().default(40),
    maxDurationMs: z.number().int().positive().default(300_000),
    maxDistinctFiles: z.number().int().nonnegative().default(30),
    maxHistoryMessages: z.number().int().nonnegative().default(60),
  }).default({}),
  rateLimits: z.object({
    tier: z.string().default('tier1'),
    maxWaitMs: z.number().int().nonnegative().default(30_000),
    default: BucketSchema.default({ requestsPerMinute: 100 }),
    tiers: z.record(z.record(BucketSchema)).default({}),
  }).default({}),
  sessions: z.object({
    backend: z.enum(['file', 'redis']).default('file'),
    directory: z.string().default('~/.review-navigator/sessions'),
    lockWaitMs: z.number().int().nonnegative().default(0),
    lockTtlMs: z.number().int().positive().default(15 * 60 * 1000),
  }).default({}),
  redis: z.object({
    url: z.string().default('redis://localhost:6379'),
    keyPrefix: z.string().default('review-navigator'),
  }).default({}),
  watcher: z.object({
    enabled: z.boolean().default(true),
    debounceMs: z.number().int().nonnegative().default(200),
  }).default({}),
  engine: z.object({
    baseUrl: z.string().url().optional(),
    model: z.string().default('gemini-2.5-pro'),
    apiKeyEnv: z.string().default('REVIEW_NAVIGATOR_API_KEY'),
    timeoutMs: z.number().int().positive().default(120_000),
    maxRetries: z.number().int().nonnegative().default(2),
    temperature: z.number().min(0).max(2).optional(),
  }).default({}),
  service: z.object({
    host: z.string().default('127.0.0.1'),
    port: z.number().int().min(0).max(65535).default(8765),
    /** Directories a project root must lie in; defaults to the home and temp directories. */
    allowedRoots: z.array(z.string().min(1)).min(1).optional(),
  }).default({}),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  }).default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type IndexerConfig = Config['indexer'];
export type NavigationConfig = Config['navigation'];
export type ExplorationBounds = Config['exploration'];
export type RateLimitConfig = Config['rateLimits'];
export type SessionConfig = Config['sessions'];
export type EngineConfig = Config['engine'];

export const DEFAULT_CONFIG_PATH = resolve(__dirname, '../review-navigator.config.json');

/**
 * Validate a raw config object, filling defaults for anything omitted.
 */
export function parseConfig(raw: unknown): Config {
  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  return result.data;
}

export function loadConfig(configPath?: string): Config {
  const path = configPath || process.env.REVIEW_NAVIGATOR_CONFIG || DEFAULT_CONFIG_PATH;

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Failed to load config from ${path}: ${describeError(error)}`, { cause: error });
  }

  const config = parseConfig(parsed);
  return applyEnvOverrides(config);
}

function applyEnvOverrides(config: Config): Config {
  const env = process.env;
  const port = env.REVIEW_NAVIGATOR_PORT ? Number(env.REVIEW_NAVIGATOR_PORT) : undefined;
  return {
    ...config,
    service: {
      ...config.service,
      host: env.REVIEW_NAVIGATOR_HOST || config.service.host,
      port: port !== undefined && Number.isInteger(port) ? port : config.service.port,
    },
    redis: {
      ...config.redis,
      url: env.REVIEW_NAVIGATOR_REDIS_URL || config.redis.url,
    },
    engine: {
      ...config.engine,
      model: env.REVIEW_NAVIGATOR_MODEL || config.engine.model,
    },
  };
}

export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

/** Directories that may contain a reviewed project, `~` expanded. */
export function allowedProjectRoots(config: Pick<Config, 'service'>): string[] {
  const configured = config.service.allowedRoots;
  return configured ? configured.map(root => resolve(expandHome(root))) : [homedir(), tmpdir()];
}
