import fastGlob from 'fast-glob';
const { glob } = fastGlob;
import { lstat, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import micromatch from 'micromatch';
import { isNodeError } from '../errors.js';
import { logger } from '../utils/logger.js';
import type { IndexerOptions } from './types.js';

const log = logger.child('scanner');

export interface ScannedFile {
  /** project-relative, forward slashes */
  path: string;
  absolutePath: string;
  size: number;
}

/**
 * Turn gitignore-style patterns into micromatch globs. A pattern without an
 * inner slash matches at any depth; a leading slash anchors it to the root.
 * Negations are not supported and are dropped.
 */
export function toIgnoreGlobs(patterns: string[]): string[] {
  const globs: string[] = [];
  for (const raw of patterns) {
    let pattern = raw.trim();
    if (!pattern || pattern.startsWith('#') || pattern.startsWith('!')) continue;

    const dirOnly = pattern.endsWith('/');
    pattern = pattern.replace(/\/+$/, '');
    const anchored = pattern.startsWith('/') || pattern.includes('/');
    pattern = pattern.replace(/^\/+/, '');
    if (!pattern) continue;

    const base = anchored || pattern.startsWith('**/') ? pattern : `**/${pattern}`;
    if (!dirOnly) globs.push(base);
    globs.push(`${base}/**`);
  }
  return Array.from(new Set(globs));
}

export async function readGitignore(root: string): Promise<string[]> {
  try {
    const content = await readFile(join(root, '.gitignore'), 'utf-8');
    return content.split(/\r?\n/);
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') return [];
    throw error;
  }
}

export class FileScanner {
  private globs: string[];

  private constructor(private readonly options: IndexerOptions, globs: string[]) {
    this.globs = globs;
  }

  static async create(root: string, options: IndexerOptions): Promise<FileScanner> {
    const patterns = [...options.ignore];
    if (options.respectGitignore) {
      patterns.push(...await readGitignore(root));
    }
    return new FileScanner(options, toIgnoreGlobs(patterns));
  }

  isIgnored(relativePath: string): boolean {
    return this.globs.length > 0 && micromatch.isMatch(relativePath, this.globs, { dot: true });
  }

  /** All indexable files under root (or one directory of it), sorted by path. */
  async scan(root: string, within?: string): Promise<ScannedFile[]> {
    if (within && this.isIgnored(within)) return [];
    const pattern = within ? `${fastGlob.escapePath(within)}/**/*` : '**/*';
    const entries = await glob(pattern, {
      cwd: root,
      dot: true,
      onlyFiles: true,
      followSymbolicLinks: false,
      ignore: this.globs,
    });

    entries.sort();
    const files: ScannedFile[] = [];
    const concurrency = 50;

    for (let i = 0; i < entries.length; i += concurrency) {
      const chunk = entries.slice(i, i + concurrency);
      const results = await Promise.all(chunk.map(path => this.statFile(root, path)));
      for (const result of results) {
        if (result) files.push(result);
      }
    }

    return files;
  }

  /**
   * Describe one project-relative path, or null when it is missing, ignored,
   * too large or not a regular file. Symbolic links are never indexed.
   */
  async statFile(root: string, relativePath: string): Promise<ScannedFile | null> {
    if (this.isIgnored(relativePath)) return null;

    const absolutePath = join(root, relativePath);
    try {
      const info = await lstat(absolutePath);
      if (!info.isFile()) return null;
      if (info.size > this.options.maxFileSize) {
        log.debug(`Skipping ${relativePath}: ${info.size} bytes exceeds maxFileSize`);
        return null;
      }
      return { path: relativePath, absolutePath, size: info.size };
    } catch (error) {
      if (isNodeError(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
        return null;
      }
      throw error;
    }
  }
}
