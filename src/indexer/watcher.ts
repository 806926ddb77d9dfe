import { watch, FSWatcher } from 'chokidar';
import { relative, sep } from 'node:path';
import { logger } from '../utils/logger.js';
import type { FileScanner } from './file-scanner.js';

const log = logger.child('watcher');

/**
 * Collects paths that changed under one project root. Nothing is re-indexed
 * here: the owner drains the dirty set and applies it with `update` when it
 * next needs the index, so a running review keeps its snapshot. A burst of
 * events is only handed out once the tree has been quiet for `debounceMs`.
 */
export class ProjectWatcher {
  private watcher: FSWatcher | null = null;
  private dirty: Set<string> = new Set();
  private quietTimer: NodeJS.Timeout | null = null;
  private quiet: Promise<void> = Promise.resolve();
  private markQuiet: (() => void) | null = null;

  constructor(
    private readonly root: string,
    private readonly scanner: FileScanner,
    private readonly debounceMs: number,
  ) {}

  start(): Promise<void> {
    if (this.watcher) return Promise.resolve();

    const watcher = watch(this.root, {
      ignored: (path: string) => {
        const rel = relative(this.root, path).split(sep).join('/');
        return rel !== '' && this.scanner.isIgnored(rel);
      },
      persistent: true,
      ignoreInitial: true,
      followSymlinks: false,
    });
    this.watcher = watcher;

    watcher
      .on('change', (filepath: string) => this.handleFileChange(filepath))
      .on('add', (filepath: string) => this.handleFileChange(filepath))
      .on('unlink', (filepath: string) => this.handleFileChange(filepath))
      .on('unlinkDir', (filepath: string) => this.handleFileChange(filepath))
      .on('error', (error: unknown) => log.warn(`Watcher error for ${this.root}:`, error));

    log.debug(`Watching ${this.root}`);
    return new Promise(resolve => watcher.once('ready', () => resolve()));
  }

  async stop(): Promise<void> {
    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }
    this.settle();
  }

  /** Changed paths since the last drain, absolute, once the current burst has settled. */
  async drain(): Promise<string[]> {
    await this.quiet;
    const paths = [...this.dirty].sort();
    this.dirty.clear();
    return paths;
  }

  private handleFileChange(filepath: string): void {
    this.dirty.add(filepath);
    if (!this.markQuiet) {
      this.quiet = new Promise(resolve => {
        this.markQuiet = resolve;
      });
    }
    if (this.quietTimer) clearTimeout(this.quietTimer);
    this.quietTimer = setTimeout(() => this.settle(), this.debounceMs);
  }

  private settle(): void {
    if (this.quietTimer) {
      clearTimeout(this.quietTimer);
      this.quietTimer = null;
    }
    const markQuiet = this.markQuiet;
    this.markQuiet = null;
    markQuiet?.();
  }
}
