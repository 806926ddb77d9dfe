import type { ErrorDescriptor } from '../errors.js';
import type { Index } from '../indexer/types.js';
import type { FileAccessor } from '../sandbox/file-accessor.js';
import type { NavigationConfig } from '../config.js';

export type NavigationOperation =
  | 'read_file'
  | 'search_symbol'
  | 'find_usages'
  | 'get_imports'
  | 'get_file_tree'
  | 'search_text';

/**
 * Closed set of calls the reasoning engine may make. Adding an operation
 * means adding a variant here, which the dispatcher's exhaustive switch
 * then refuses to compile without.
 */
export type NavigationCall =
  | { op: 'read_file'; args: { path: string } }
  | { op: 'search_symbol'; args: { name: string } }
  | { op: 'find_usages'; args: { name: string } }
  | { op: 'get_imports'; args: { path: string } }
  | { op: 'get_file_tree'; args: Record<string, never> }
  | { op: 'search_text'; args: { pattern: string; scope?: string } };

export interface ToolDefinition {
  name: NavigationOperation;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, { type: string; description: string }>;
    required: string[];
  };
}

export interface SymbolLocation {
  name: string;
  kind: string;
  file: string;
  line: number;
  parent?: string;
}

export interface LineMatch {
  file: string;
  line: number;
  text: string;
}

export interface ToolOutcome {
  /** Text handed back to the engine. */
  output: string;
  /** Structured form of the same result. */
  data: unknown;
}

export interface ToolExecutionResult extends ToolOutcome {
  ok: boolean;
  error?: ErrorDescriptor;
}

export type TraceReason = 'fresh' | 'cached';

export interface NavigationTraceEntry {
  tool: NavigationOperation;
  arguments: Record<string, unknown>;
  resultSize: number;
  reason: TraceReason;
}

/**
 * What an operation may touch: the index snapshot, the sandboxed
 * filesystem, and a per-review content cache.
 */
export interface ToolContext {
  index: Index;
  accessor: FileAccessor;
  limits: NavigationConfig;
  /** Content of an indexed file, read at most once per review. */
  readIndexed(path: string): Promise<string | null>;
}
