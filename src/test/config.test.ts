import { writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_CONFIG_PATH, expandHome, loadConfig, parseConfig } from '../config.js';
import { ConfigError } from '../errors.js';
import { createProject, type TempProject } from './helpers.js';

describe('parseConfig', () => {
  it('fills every section with defaults', () => {
    const config = parseConfig({});
    expect(config.navigation).toEqual({ maxReadBytes: 100_000, maxSearchResults: 100 });
    expect(config.exploration).toEqual({ maxToolCalls: 40, maxDurationMs: 300_000, maxDistinctFiles: 30, maxHistoryMessages: 60 });
    expect(config.rateLimits).toEqual({ tier: 'tier1', maxWaitMs: 30_000, default: { requestsPerMinute: 100 }, tiers: {} });
    expect(config.sessions.backend).toBe('file');
    expect(config.service).toEqual({ host: '127.0.0.1', port: 8765 });
  });

  it('treats a missing document as empty', () => {
    expect(parseConfig(undefined).engine.model).toBe('gemini-2.5-pro');
  });

  it('reports invalid fields by path', () => {
    expect(() => parseConfig({ exploration: { maxToolCalls: -1 }, sessions: { backend: 'sqlite' } })).toThrow(ConfigError);
    expect(() => parseConfig({ service: { port: 70000 } })).toThrow(/^Invalid configuration: service\.port: /);
    const thrown = (() => {
      try {
        return parseConfig({ logging: { level: 'loud' } });
      } catch (error) {
        return error;
      }
    })();
    expect(thrown).toMatchObject({ code: 'ConfigInvalid' });
  });
});

describe('loadConfig', () => {
  let project: TempProject;

  afterEach(async () => {
    vi.unstubAllEnvs();
    await project.cleanup();
  });

  it('reads a file and applies environment overrides', async () => {
    project = await createProject({}, 'rn-config-');
    const path = join(project.root, 'config.json');
    await writeFile(path, JSON.stringify({ service: { port: 9000 }, engine: { model: 'gemini-2.5-flash' } }));
    vi.stubEnv('REVIEW_NAVIGATOR_PORT', '9100');
    vi.stubEnv('REVIEW_NAVIGATOR_MODEL', '');

    const config = loadConfig(path);
    expect(config.service).toEqual({ host: '127.0.0.1', port: 9100 });
    expect(config.engine.model).toBe('gemini-2.5-flash');
  });

  it('ignores a non-numeric port override', async () => {
    project = await createProject({ 'config.json': '{}' }, 'rn-config-');
    vi.stubEnv('REVIEW_NAVIGATOR_PORT', 'eighty');
    expect(loadConfig(join(project.root, 'config.json')).service.port).toBe(8765);
  });

  it('wraps unreadable files in ConfigError', async () => {
    project = await createProject({ 'broken.json': '{ not json' }, 'rn-config-');
    expect(() => loadConfig(join(project.root, 'missing.json'))).toThrow(ConfigError);
    expect(() => loadConfig(join(project.root, 'broken.json'))).toThrow(/^Failed to load config from /);
  });

  it('ships a default config that validates', () => {
    const config = loadConfig(DEFAULT_CONFIG_PATH);
    expect(config.rateLimits.tiers.tier1['gemini-2.5-pro']).toEqual({ requestsPerMinute: 150 });
  });
});

describe('expandHome', () => {
  it('expands a leading tilde only', () => {
    expect(expandHome('~')).toBe(homedir());
    expect(expandHome('~/sessions')).toBe(join(homedir(), 'sessions'));
    expect(expandHome('/var/~/x')).toBe('/var/~/x');
  });
});
