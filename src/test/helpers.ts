import { mkdir, mkdtemp, realpath, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { parseConfig, type Config } from '../config.js';
import type { EngineRequest, EngineResponse, ReasoningEngine } from '../engine/types.js';
import type { KeyValueBackend } from '../session/redis-store.js';

export interface TempProject {
  root: string;
  write(path: string, content: string): Promise<void>;
  remove(path: string): Promise<void>;
  cleanup(): Promise<void>;
}

/** Temporary directory populated with `files`; the root is canonical. */
export async function createProject(files: Record<string, string> = {}, prefix = 'rn-project-'): Promise<TempProject> {
  const root = await realpath(await mkdtemp(join(tmpdir(), prefix)));
  const write = async (path: string, content: string): Promise<void> => {
    const target = join(root, path);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content, 'utf-8');
  };
  for (const [path, content] of Object.entries(files)) {
    await write(path, content);
  }
  return {
    root,
    write,
    remove: path => rm(join(root, path), { recursive: true, force: true }),
    cleanup: () => rm(root, { recursive: true, force: true }),
  };
}

export async function createTempDir(prefix = 'rn-tmp-'): Promise<string> {
  return realpath(await mkdtemp(join(tmpdir(), prefix)));
}

export function testConfig(overrides: Record<string, unknown> = {}): Config {
  return parseConfig({
    watcher: { enabled: false, debounceMs: 20 },
    ...overrides,
  });
}

type Step = EngineResponse | Error | ((request: EngineRequest) => EngineResponse | Promise<EngineResponse>);

/**
 * Engine that replays a fixed script of responses and records every request
 * it receives. Running past the end of the script is a test error.
 */
export class ScriptedEngine implements ReasoningEngine {
  readonly requests: EngineRequest[] = [];
  private position = 0;

  constructor(private readonly steps: Step[], readonly category = 'scripted-model') {}

  async respond(request: EngineRequest): Promise<EngineResponse> {
    this.requests.push({ ...request, messages: request.messages.map(message => ({ ...message })) });
    const step = this.steps[this.position++];
    if (step === undefined) {
      throw new Error(`ScriptedEngine ran out of responses at request ${this.position}`);
    }
    if (step instanceof Error) throw step;
    return typeof step === 'function' ? step(request) : step;
  }
}

export function toolCall(id: string, name: string, args: Record<string, unknown>): EngineResponse {
  return { type: 'tool_calls', calls: [{ id, name, arguments: args }] };
}

export function answer(text: string): EngineResponse {
  return { type: 'answer', text };
}

/** In-process stand-in for Redis with the semantics the session store relies on. */
export class MemoryBackend implements KeyValueBackend {
  readonly data = new Map<string, { value: string; expiresAt?: number }>();
  closed = false;

  constructor(private readonly now: () => number = Date.now) {}

  private live(key: string): string | null {
    const item = this.data.get(key);
    if (!item) return null;
    if (item.expiresAt !== undefined && item.expiresAt <= this.now()) {
      this.data.delete(key);
      return null;
    }
    return item.value;
  }

  async get(key: string): Promise<string | null> {
    return this.live(key);
  }

  async set(key: string, value: string): Promise<void> {
    this.data.set(key, { value });
  }

  async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    if (this.live(key) !== null) return false;
    this.data.set(key, { value, expiresAt: this.now() + ttlMs });
    return true;
  }

  async deleteIfEquals(key: string, value: string): Promise<boolean> {
    if (this.live(key) !== value) return false;
    this.data.delete(key);
    return true;
  }

  async delete(key: string): Promise<boolean> {
    const existed = this.live(key) !== null;
    this.data.delete(key);
    return existed;
  }

  async keysWithPrefix(prefix: string): Promise<string[]> {
    return [...this.data.keys()].filter(key => key.startsWith(prefix) && this.live(key) !== null);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
