import { readFile } from './read-file.js';
import { searchSymbol } from './search-symbol.js';
import { findUsages } from './find-usages.js';
import { getImports } from './get-imports.js';
import { getFileTree } from './get-file-tree.js';
import { searchText } from './search-text.js';
import { canonicalArguments, parseNavigationCall } from './arguments.js';
import { NavigatorError, describeError, isNodeError, toErrorDescriptor } from '../errors.js';
import { FileAccessor } from '../sandbox/file-accessor.js';
import { logger } from '../utils/logger.js';
import type { NavigationConfig } from '../config.js';
import type { Index } from '../indexer/types.js';
import type {
  NavigationCall,
  NavigationTraceEntry,
  ToolContext,
  ToolExecutionResult,
  ToolOutcome,
} from './types.js';

const log = logger.child('navigation');

function assertNever(value: never): never {
  throw new Error(`Unhandled navigation call: ${JSON.stringify(value)}`);
}

/**
 * Navigation state for a single review: the index snapshot taken when the
 * review started, a result cache and the trace of calls. Never shared
 * between reviews, so cached results cannot leak across projects.
 *
 * Files are read once and kept, which means a review does not observe edits
 * made to the working tree while it runs.
 */
export class NavigationSession {
  private readonly cache = new Map<string, ToolOutcome>();
  private readonly contents = new Map<string, string | null>();
  private readonly trace: NavigationTraceEntry[] = [];
  private readonly filesRead = new Set<string>();
  private readonly context: ToolContext;

  constructor(
    readonly index: Index,
    limits: NavigationConfig,
    accessor: FileAccessor = new FileAccessor(index.root),
  ) {
    this.context = {
      index,
      accessor,
      limits,
      readIndexed: path => this.readIndexed(path),
    };
  }

  /**
   * Validate and run one engine-issued call. Never throws: failures come
   * back as an error result the engine can react to.
   */
  async execute(name: string, rawArgs: unknown): Promise<ToolExecutionResult> {
    let call: NavigationCall;
    try {
      call = parseNavigationCall(name, rawArgs);
    } catch (error) {
      return this.failure(name, error);
    }

    const key = `${call.op}:${canonicalArguments(call.args)}`;
    const cached = this.cache.get(key);
    if (cached) {
      this.record(call, cached, 'cached');
      return { ok: true, ...cached };
    }

    try {
      const outcome = await this.dispatch(call);
      this.cache.set(key, outcome);
      this.record(call, outcome, 'fresh');
      return { ok: true, ...outcome };
    } catch (error) {
      return this.failure(name, error);
    }
  }

  /**
   * Whether a call would read a file not read before in this review. Used to
   * enforce the distinct-files bound before dispatching; a path that is not
   * a readable file fails on its own and does not count.
   */
  async wouldReadNewFile(name: string, rawArgs: unknown): Promise<boolean> {
    if (name !== 'read_file') return false;
    try {
      const call = parseNavigationCall(name, rawArgs);
      if (call.op !== 'read_file') return false;
      const path = await this.context.accessor.projectPath(call.args.path);
      if (this.filesRead.has(path)) return false;
      return await this.context.accessor.isFile(path);
    } catch {
      // the call itself will fail and be reported when dispatched
      return false;
    }
  }

  getTrace(): NavigationTraceEntry[] {
    return this.trace.map(entry => ({ ...entry, arguments: { ...entry.arguments } }));
  }

  getFilesRead(): string[] {
    return [...this.filesRead];
  }

  summary(): { calls: number; cachedCalls: number; filesRead: string[]; tokenEstimate: number } {
    const bytes = this.trace.reduce((sum, entry) => sum + entry.resultSize, 0);
    return {
      calls: this.trace.length,
      cachedCalls: this.trace.filter(entry => entry.reason === 'cached').length,
      filesRead: this.getFilesRead(),
      tokenEstimate: Math.ceil(bytes / 4),
    };
  }

  private dispatch(call: NavigationCall): Promise<ToolOutcome> {
    switch (call.op) {
      case 'read_file':
        return readFile(this.context, call.args);
      case 'search_symbol':
        return searchSymbol(this.context, call.args);
      case 'find_usages':
        return findUsages(this.context, call.args);
      case 'get_imports':
        return getImports(this.context, call.args);
      case 'get_file_tree':
        return getFileTree(this.context);
      case 'search_text':
        return searchText(this.context, call.args);
      default:
        return assertNever(call);
    }
  }

  private record(call: NavigationCall, outcome: ToolOutcome, reason: NavigationTraceEntry['reason']): void {
    if (call.op === 'read_file' && isReadResult(outcome.data)) {
      this.filesRead.add(outcome.data.path);
    }
    this.trace.push({
      tool: call.op,
      arguments: { ...call.args },
      resultSize: outcome.output.length,
      reason,
    });
  }

  private failure(name: string, error: unknown): ToolExecutionResult {
    const descriptor = toErrorDescriptor(error);
    if (error instanceof NavigatorError) {
      log.debug(`${name} failed: ${descriptor.code}: ${descriptor.message}`);
    } else {
      log.warn(`${name} failed unexpectedly:`, error);
    }
    return {
      ok: false,
      output: `Error (${descriptor.code}): ${descriptor.message}`,
      data: null,
      error: descriptor,
    };
  }

  private async readIndexed(path: string): Promise<string | null> {
    if (this.contents.has(path)) {
      return this.contents.get(path) ?? null;
    }
    if (!Object.hasOwn(this.index.files, path)) {
      return null;
    }
    let content: string | null;
    try {
      content = await this.context.accessor.readText(path);
    } catch (error) {
      if (!(error instanceof NavigatorError) && !isNodeError(error)) throw error;
      log.debug(`Skipping unreadable file ${path}: ${describeError(error)}`);
      content = null;
    }
    this.contents.set(path, content);
    return content;
  }
}

function isReadResult(data: unknown): data is { path: string } {
  return typeof data === 'object' && data !== null && 'path' in data && typeof data.path === 'string';
}
