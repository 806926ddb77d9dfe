import { posix } from 'node:path';
import type { FileEntry, ImportEdge, Index } from './types.js';

const SCRIPT_EXTENSIONS = ['.ts', '.tsx', '.d.ts', '.js', '.jsx', '.mjs', '.cjs', '.mts', '.cts'];

// NodeNext-style sources import `./x.js` while the file on disk is `./x.ts`
const EMITTED_TO_SOURCE: Record<string, string[]> = {
  '.js': ['.ts', '.tsx'],
  '.jsx': ['.tsx'],
  '.mjs': ['.mts'],
  '.cjs': ['.cts'],
};

/**
 * Lookup over the project's current file set. Resolution only ever answers
 * with paths from this set, so edges to deleted files disappear on rebuild.
 */
export class FileLookup {
  private readonly paths: Set<string>;
  private readonly byBasename = new Map<string, string[]>();

  constructor(paths: Iterable<string>) {
    this.paths = new Set(paths);
    for (const path of [...this.paths].sort()) {
      const name = posix.basename(path);
      const bucket = this.byBasename.get(name);
      if (bucket) bucket.push(path);
      else this.byBasename.set(name, [path]);
    }
  }

  has(path: string): boolean {
    return this.paths.has(path);
  }

  /** First path (in sorted order) equal to or ending in `/${suffix}`. */
  findBySuffix(suffix: string): string | undefined {
    const candidates = this.byBasename.get(posix.basename(suffix)) ?? [];
    return candidates.find(path => path === suffix || path.endsWith(`/${suffix}`));
  }
}

export function resolveImport(
  importer: string,
  specifier: string,
  language: string | null,
  files: FileLookup,
): string | undefined {
  switch (language) {
    case 'python':
      return resolvePython(importer, specifier, files);
    case 'typescript':
    case 'javascript':
      return resolveScript(importer, specifier, files);
    case 'java':
      return resolveJava(specifier, files);
    default:
      // Go packages and C# namespaces name directories or assemblies, not files
      return undefined;
  }
}

function firstExisting(candidates: string[], files: FileLookup): string | undefined {
  return candidates.find(candidate => !candidate.startsWith('../') && files.has(candidate));
}

function pythonCandidates(base: string, modulePath: string): string[] {
  const joined = modulePath ? posix.join(base, modulePath) : base;
  const normalized = joined === '.' ? '' : joined;
  if (!normalized) return ['__init__.py'];
  return modulePath
    ? [`${normalized}.py`, `${normalized}/__init__.py`]
    : [`${normalized}/__init__.py`];
}

function resolvePython(importer: string, specifier: string, files: FileLookup): string | undefined {
  const dots = /^\.*/.exec(specifier)?.[0].length ?? 0;
  const modulePath = specifier.slice(dots).split('.').filter(Boolean).join('/');

  if (dots > 0) {
    let base = posix.dirname(importer);
    for (let i = 1; i < dots; i++) {
      if (base === '.') return undefined;
      base = posix.dirname(base);
    }
    return firstExisting(pythonCandidates(base, modulePath), files);
  }

  if (!modulePath) return undefined;

  // nearest enclosing directory first, then up to the project root
  let base = posix.dirname(importer);
  for (;;) {
    const found = firstExisting(pythonCandidates(base, modulePath), files);
    if (found) return found;
    if (base === '.') break;
    base = posix.dirname(base);
  }

  // src/ layouts: the package root is not an ancestor of the importer
  return files.findBySuffix(`${modulePath}.py`) ?? files.findBySuffix(`${modulePath}/__init__.py`);
}

function resolveScript(importer: string, specifier: string, files: FileLookup): string | undefined {
  if (!specifier.startsWith('./') && !specifier.startsWith('../') && specifier !== '.' && specifier !== '..') {
    return undefined;
  }

  const target = posix.normalize(posix.join(posix.dirname(importer), specifier));
  if (target === '..' || target.startsWith('../')) return undefined;

  const candidates: string[] = [target];
  const extension = posix.extname(target);
  const sourceExtensions = EMITTED_TO_SOURCE[extension];
  if (sourceExtensions) {
    const stem = target.slice(0, -extension.length);
    candidates.push(...sourceExtensions.map(ext => `${stem}${ext}`));
  }
  candidates.push(...SCRIPT_EXTENSIONS.map(ext => `${target}${ext}`));
  candidates.push(...SCRIPT_EXTENSIONS.map(ext => posix.join(target, `index${ext}`)));

  return firstExisting(candidates, files);
}

function resolveJava(specifier: string, files: FileLookup): string | undefined {
  if (specifier.endsWith('.*')) return undefined;
  const parts = specifier.split('.');
  const asType = files.findBySuffix(`${parts.join('/')}.java`);
  if (asType) return asType;
  // static import of a member: a.b.Type.member
  return parts.length > 1 ? files.findBySuffix(`${parts.slice(0, -1).join('/')}.java`) : undefined;
}

/**
 * Recompute every import edge against the given file set, returning fresh
 * entries. Self-imports are left unresolved.
 */
export function resolveEdges(files: Record<string, FileEntry>): Record<string, FileEntry> {
  const lookup = new FileLookup(Object.keys(files));
  const result: Record<string, FileEntry> = {};

  for (const [path, entry] of Object.entries(files)) {
    const imports: ImportEdge[] = entry.imports.map(edge => {
      const resolved = resolveImport(path, edge.specifier, entry.language, lookup);
      return resolved && resolved !== path
        ? { specifier: edge.specifier, resolved }
        : { specifier: edge.specifier };
    });
    result[path] = { ...entry, imports };
  }

  return result;
}

/** Files whose resolved imports include `path`. Derived on every call. */
export function dependentsOf(index: Index, path: string): string[] {
  const dependents: string[] = [];
  for (const [file, entry] of Object.entries(index.files)) {
    if (entry.imports.some(edge => edge.resolved === path)) {
      dependents.push(file);
    }
  }
  return dependents;
}
