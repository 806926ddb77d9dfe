import { realpath } from 'node:fs/promises';
import { isAbsolute, resolve } from 'node:path';
import { FileScanner, ScannedFile } from './file-scanner.js';
import { SymbolExtractor } from './symbol-extractor.js';
import { resolveEdges } from './import-resolver.js';
import { buildTestMapping } from './test-mapper.js';
import { isWithin, toProjectPath } from '../sandbox/file-accessor.js';
import { NotFoundError, describeError } from '../errors.js';
import { logger } from '../utils/logger.js';
import type { SymbolEntry } from '../parsers/base.js';
import type { BuildStats, FileEntry, Index, IndexResult, IndexerOptions } from './types.js';

export type { BuildStats, FileEntry, FileTreeNode, ImportEdge, Index, IndexResult, IndexerOptions } from './types.js';

const log = logger.child('indexer');

export const DEFAULT_INDEXER_OPTIONS: IndexerOptions = {
  ignore: ['node_modules', '.git', 'dist', 'build', '__pycache__'],
  respectGitignore: true,
  maxFileSize: 1024 * 1024,
};

const EXTRACT_CONCURRENCY = 16;

export type BuildOptions = Partial<Omit<IndexerOptions, 'ignore'>> & {
  /** Parses the files; defaults to one over the shared parser factory. */
  extractor?: SymbolExtractor;
};

async function canonicalRoot(projectRoot: string): Promise<string> {
  try {
    return await realpath(resolve(projectRoot));
  } catch (error) {
    throw new NotFoundError(`Project root not found: ${projectRoot} (${describeError(error)})`);
  }
}

interface Extracted {
  file: ScannedFile;
  /** null when the file vanished after it was scanned */
  entry: FileEntry | null;
  failed: boolean;
}

async function extractAll(
  extractor: SymbolExtractor,
  files: ScannedFile[],
  previous: (path: string) => FileEntry | undefined = () => undefined,
): Promise<Extracted[]> {
  const results: Extracted[] = [];
  for (let i = 0; i < files.length; i += EXTRACT_CONCURRENCY) {
    const chunk = files.slice(i, i + EXTRACT_CONCURRENCY);
    const extracted = await Promise.all(chunk.map(async (file): Promise<Extracted> => {
      const extraction = await extractor.extract(file, previous(file.path));
      return extraction ? { file, ...extraction } : { file, entry: null, failed: false };
    }));
    results.push(...extracted);
  }
  return results;
}

/**
 * Derive everything that depends on the whole file set: sorted file order,
 * resolved import edges, the symbol table and the test mapping.
 */
function assemble(root: string, files: Record<string, FileEntry>, unparsed: Iterable<string>): Index {
  const sorted: Record<string, FileEntry> = {};
  for (const path of Object.keys(files).sort()) {
    sorted[path] = files[path];
  }
  const resolvedFiles = resolveEdges(sorted);

  // a Map first: names such as `constructor` or `__proto__` are ordinary keys here
  const table = new Map<string, SymbolEntry[]>();
  for (const entry of Object.values(resolvedFiles)) {
    for (const symbol of entry.symbols) {
      const bucket = table.get(symbol.name);
      if (bucket) bucket.push(symbol);
      else table.set(symbol.name, [symbol]);
    }
  }
  const symbols: Record<string, SymbolEntry[]> = Object.fromEntries(table);

  return {
    root,
    files: resolvedFiles,
    symbols,
    testMapping: buildTestMapping(resolvedFiles),
    unparsed: [...new Set(unparsed)].filter(path => path in resolvedFiles).sort(),
  };
}

export function computeStats(index: Index, startedAt: number): BuildStats {
  let parsedFiles = 0;
  let symbols = 0;
  let imports = 0;
  for (const entry of Object.values(index.files)) {
    if (entry.language) parsedFiles++;
    symbols += entry.symbols.length;
    imports += entry.imports.length;
  }
  return {
    files: Object.keys(index.files).length,
    parsedFiles: parsedFiles - index.unparsed.length,
    symbols,
    imports,
    unparsed: index.unparsed.length,
    durationMs: Date.now() - startedAt,
  };
}

/**
 * Index every non-ignored file under `projectRoot`.
 */
export async function build(
  projectRoot: string,
  ignorePatterns: string[] = DEFAULT_INDEXER_OPTIONS.ignore,
  options: BuildOptions = {},
): Promise<IndexResult> {
  const startedAt = Date.now();
  const root = await canonicalRoot(projectRoot);
  const { extractor = new SymbolExtractor(), ...rest } = options;
  const resolvedOptions: IndexerOptions = { ...DEFAULT_INDEXER_OPTIONS, ...rest, ignore: ignorePatterns };

  const scanner = await FileScanner.create(root, resolvedOptions);
  const scanned = await scanner.scan(root);

  const files: Record<string, FileEntry> = {};
  const unparsed: string[] = [];
  for (const { file, entry, failed } of await extractAll(extractor, scanned)) {
    if (!entry) continue;
    files[file.path] = entry;
    if (failed) unparsed.push(file.path);
  }

  const index = assemble(root, files, unparsed);
  const stats = computeStats(index, startedAt);
  log.info(
    `Indexed ${stats.files} files (${stats.symbols} symbols, ${stats.unparsed} unparsed) in ${stats.durationMs}ms: ${root}`,
  );
  return { index, stats };
}

/**
 * Project-relative form of a changed path, or null if it lies outside the
 * index root.
 */
export function normalizeChangedPath(root: string, changedPath: string): string | null {
  const absolute = isAbsolute(changedPath) ? resolve(changedPath) : resolve(root, changedPath);
  if (!isWithin(root, absolute) || absolute === root) return null;
  return toProjectPath(root, absolute);
}

/**
 * Re-parse only `changedPaths`. Paths that no longer exist (or are now
 * ignored) are dropped with all their symbols and edges; other entries are
 * reused as they are.
 */
export async function update(
  index: Index,
  changedPaths: string[],
  ignorePatterns: string[] = DEFAULT_INDEXER_OPTIONS.ignore,
  options: BuildOptions = {},
): Promise<IndexResult> {
  const startedAt = Date.now();
  const { extractor = new SymbolExtractor(), ...rest } = options;
  const resolvedOptions: IndexerOptions = { ...DEFAULT_INDEXER_OPTIONS, ...rest, ignore: ignorePatterns };
  const files: Record<string, FileEntry> = { ...index.files };
  const unparsed = new Set(index.unparsed);
  // entries that parsed cleanly last time may be reused when their content is unchanged
  const reusable = (path: string): FileEntry | undefined =>
    index.unparsed.includes(path) || !Object.hasOwn(index.files, path) ? undefined : index.files[path];

  const relativePaths = new Set<string>();
  for (const changed of changedPaths) {
    const relativePath = normalizeChangedPath(index.root, changed);
    if (relativePath === null) {
      log.warn(`Ignoring changed path outside ${index.root}: ${changed}`);
      continue;
    }
    relativePaths.add(relativePath);
  }

  if (relativePaths.size > 0) {
    const scanner = await FileScanner.create(index.root, resolvedOptions);
    const present: ScannedFile[] = [];

    for (const relativePath of [...relativePaths].sort()) {
      unparsed.delete(relativePath);
      const scanned = await scanner.statFile(index.root, relativePath);
      if (scanned) {
        present.push(scanned);
        continue;
      }
      delete files[relativePath];

      // a directory path stands for everything beneath it
      const beneath = await scanner.scan(index.root, relativePath);
      const kept = new Set(beneath.map(file => file.path));
      for (const path of Object.keys(files)) {
        if (path.startsWith(`${relativePath}/`) && !kept.has(path)) {
          delete files[path];
          unparsed.delete(path);
        }
      }
      for (const file of beneath) {
        unparsed.delete(file.path);
        present.push(file);
      }
    }

    for (const { file, entry, failed } of await extractAll(extractor, present, reusable)) {
      if (!entry) {
        delete files[file.path];
        continue;
      }
      files[file.path] = entry;
      if (failed) unparsed.add(file.path);
    }
  }

  const next = assemble(index.root, files, unparsed);
  const stats = computeStats(next, startedAt);
  log.debug(`Updated ${relativePaths.size} paths in ${stats.durationMs}ms: ${index.root}`);
  return { index: next, stats };
}
