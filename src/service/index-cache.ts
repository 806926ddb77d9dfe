import { realpath, stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { InvalidArgumentError, describeError } from '../errors.js';
import { build, update } from '../indexer/index.js';
import { FileScanner } from '../indexer/file-scanner.js';
import { ProjectWatcher } from '../indexer/watcher.js';
import { logger } from '../utils/logger.js';
import { allowedProjectRoots, type Config } from '../config.js';
import { isWithin } from '../sandbox/file-accessor.js';
import type { Index, IndexResult, IndexerOptions } from '../indexer/types.js';
import type { IndexProvider } from '../orchestrator/types.js';

const log = logger.child('index-cache');

/**
 * Canonical form of a project root. Reviews require the directory to exist
 * and, when `allowedRoots` is given, to lie inside one of them; lookups of
 * stored sessions fall back to the plain resolved path when it has since
 * been removed.
 */
export async function canonicalProjectRoot(
  projectRoot: string,
  mustExist = true,
  allowedRoots?: string[],
): Promise<string> {
  if (!projectRoot.trim()) {
    throw new InvalidArgumentError('projectRoot must not be empty');
  }
  try {
    const root = await realpath(resolve(projectRoot));
    if (!(await stat(root)).isDirectory()) {
      throw new InvalidArgumentError(`projectRoot is not a directory: ${projectRoot}`);
    }
    if (mustExist && allowedRoots && !(await isAllowedRoot(root, allowedRoots))) {
      throw new InvalidArgumentError(
        `projectRoot ${projectRoot} is outside the allowed roots: ${allowedRoots.join(', ')}`,
      );
    }
    return root;
  } catch (error) {
    if (error instanceof InvalidArgumentError) throw error;
    if (!mustExist) return resolve(projectRoot);
    throw new InvalidArgumentError(`Invalid projectRoot ${projectRoot}: ${describeError(error)}`);
  }
}

async function isAllowedRoot(root: string, allowedRoots: string[]): Promise<boolean> {
  for (const allowed of allowedRoots) {
    const canonical = await realpath(allowed).catch(() => resolve(allowed));
    if (isWithin(canonical, root)) return true;
  }
  return false;
}

interface CachedProject {
  index: Index;
  watcher: ProjectWatcher | null;
}

/**
 * One index per project root, built on first use and afterwards refreshed
 * from the watcher's dirty paths plus the caller's changed files. Work on
 * the same root is serialized.
 */
export class IndexCache implements IndexProvider {
  private readonly projects = new Map<string, CachedProject>();
  private readonly queues = new Map<string, Promise<unknown>>();
  private readonly options: IndexerOptions;
  readonly allowedRoots: string[];

  constructor(private readonly config: Pick<Config, 'indexer' | 'watcher' | 'service'>) {
    this.options = { ...config.indexer };
    this.allowedRoots = allowedProjectRoots(config);
  }

  /** Canonical root of a project this cache may index. */
  canonicalRoot(projectRoot: string): Promise<string> {
    return canonicalProjectRoot(projectRoot, true, this.allowedRoots);
  }

  async indexFor(projectRoot: string, changedFiles: string[]): Promise<Index> {
    const root = await this.canonicalRoot(projectRoot);
    return this.serialized(root, async () => {
      const cached = this.projects.get(root);
      if (!cached) {
        return (await this.buildProject(root)).index;
      }

      const dirty = cached.watcher ? await cached.watcher.drain() : [];
      const changes = [...new Set([...dirty, ...changedFiles])];
      if (changes.length === 0) return cached.index;

      const { index, stats } = await update(cached.index, changes, this.options.ignore, this.options);
      log.debug(`Refreshed ${root}: ${changes.length} changed paths, ${stats.files} files`);
      cached.index = index;
      return index;
    });
  }

  /** Build from scratch, replacing whatever was cached. */
  async rebuild(projectRoot: string): Promise<IndexResult> {
    const root = await this.canonicalRoot(projectRoot);
    return this.serialized(root, () => this.buildProject(root));
  }

  async close(): Promise<void> {
    await Promise.allSettled([...this.queues.values()]);
    const watchers = [...this.projects.values()].flatMap(project => (project.watcher ? [project.watcher] : []));
    this.projects.clear();
    await Promise.all(watchers.map(watcher => watcher.stop()));
  }

  private async buildProject(root: string): Promise<IndexResult> {
    const existing = this.projects.get(root);
    if (existing) {
      // a fresh build already reflects everything the watcher saw so far
      await existing.watcher?.drain();
      const result = await build(root, this.options.ignore, this.options);
      existing.index = result.index;
      return result;
    }

    // watch first so edits made while building are picked up next time
    let watcher: ProjectWatcher | null = null;
    if (this.config.watcher.enabled) {
      const scanner = await FileScanner.create(root, this.options);
      watcher = new ProjectWatcher(root, scanner, this.config.watcher.debounceMs);
      await watcher.start();
    }
    try {
      const result = await build(root, this.options.ignore, this.options);
      this.projects.set(root, { index: result.index, watcher });
      return result;
    } catch (error) {
      await watcher?.stop();
      throw error;
    }
  }

  private serialized<T>(root: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(root) ?? Promise.resolve();
    const next = previous.then(task, task);
    const settled = next.then(() => undefined, () => undefined);
    this.queues.set(root, settled);
    void settled.then(() => {
      if (this.queues.get(root) === settled) this.queues.delete(root);
    });
    return next;
  }
}
