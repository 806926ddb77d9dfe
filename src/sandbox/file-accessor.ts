import { lstat, readFile, realpath, stat } from 'node:fs/promises';
import { basename, dirname, isAbsolute, join, relative, resolve, sep } from 'node:path';
import {
  InvalidArgumentError,
  NotFoundError,
  OutsideSandboxError,
  describeError,
  isNodeError,
} from '../errors.js';

/**
 * Resolve `requestedPath` against `projectRoot` and return its canonical
 * absolute path, or throw OutsideSandboxError.
 *
 * Symlinks and `..` segments are resolved before the containment check. A
 * path that does not exist yet is resolved through its deepest existing
 * ancestor. Anything that cannot be resolved unambiguously (symlink loops,
 * dangling links, permission errors) is rejected.
 */
export async function resolveInSandbox(requestedPath: string, projectRoot: string): Promise<string> {
  if (requestedPath.includes('\0')) {
    throw new OutsideSandboxError(requestedPath, 'invalid character');
  }

  let rootReal: string;
  try {
    rootReal = await realpath(resolve(projectRoot));
  } catch (error) {
    throw new OutsideSandboxError(requestedPath, `project root unresolvable: ${describeError(error)}`);
  }

  const candidate = isAbsolute(requestedPath) ? resolve(requestedPath) : resolve(rootReal, requestedPath);
  const canonical = await canonicalize(candidate, requestedPath);

  if (!isWithin(rootReal, canonical)) {
    throw new OutsideSandboxError(requestedPath);
  }
  return canonical;
}

async function canonicalize(candidate: string, requestedPath: string): Promise<string> {
  const missing: string[] = [];
  let current = candidate;

  for (;;) {
    try {
      const real = await realpath(current);
      return missing.length > 0 ? join(real, ...missing.reverse()) : real;
    } catch (error) {
      if (!isNodeError(error) || (error.code !== 'ENOENT' && error.code !== 'ENOTDIR')) {
        const code = isNodeError(error) ? error.code : undefined;
        throw new OutsideSandboxError(requestedPath, code === 'ELOOP' ? 'symbolic link loop' : describeError(error));
      }
    }

    // realpath failed on a link whose target is missing
    if (await isSymlink(current)) {
      throw new OutsideSandboxError(requestedPath, 'dangling symbolic link');
    }

    const parent = dirname(current);
    if (parent === current) {
      throw new OutsideSandboxError(requestedPath, 'no existing ancestor');
    }
    missing.push(basename(current));
    current = parent;
  }
}

async function isSymlink(path: string): Promise<boolean> {
  try {
    return (await lstat(path)).isSymbolicLink();
  } catch (error) {
    if (isNodeError(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return false;
    }
    throw new OutsideSandboxError(path, describeError(error));
  }
}

export function isWithin(root: string, target: string): boolean {
  const rel = relative(root, target);
  if (rel === '') return true;
  return rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

/** Project-relative path with forward slashes. */
export function toProjectPath(root: string, absolutePath: string): string {
  return relative(root, absolutePath).split(sep).join('/');
}

/**
 * Read-only filesystem view confined to one project root.
 */
export class FileAccessor {
  private rootReal: string | undefined;

  constructor(readonly projectRoot: string) {}

  async root(): Promise<string> {
    if (!this.rootReal) {
      try {
        this.rootReal = await realpath(resolve(this.projectRoot));
      } catch (error) {
        throw new NotFoundError(`Project root not found: ${this.projectRoot} (${describeError(error)})`);
      }
    }
    return this.rootReal;
  }

  resolve(requestedPath: string): Promise<string> {
    return resolveInSandbox(requestedPath, this.projectRoot);
  }

  /** Resolve and return the project-relative form, e.g. for index lookups. */
  async projectPath(requestedPath: string): Promise<string> {
    const absolute = await this.resolve(requestedPath);
    return toProjectPath(await this.root(), absolute);
  }

  async readText(requestedPath: string): Promise<string> {
    const absolute = await this.resolve(requestedPath);
    try {
      const info = await stat(absolute);
      if (info.isDirectory()) {
        throw new InvalidArgumentError(`${requestedPath} is a directory`);
      }
      return await readFile(absolute, 'utf-8');
    } catch (error) {
      if (isNodeError(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
        throw new NotFoundError(`File not found: ${requestedPath}`);
      }
      throw error;
    }
  }

  async exists(requestedPath: string): Promise<boolean> {
    try {
      await stat(await this.resolve(requestedPath));
      return true;
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') return false;
      throw error;
    }
  }

  /** True only for an existing regular file inside the root. */
  async isFile(requestedPath: string): Promise<boolean> {
    try {
      return (await stat(await this.resolve(requestedPath))).isFile();
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') return false;
      throw error;
    }
  }
}
