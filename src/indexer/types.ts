import type { SymbolEntry } from '../parsers/base.js';

export interface ImportEdge {
  /** Specifier exactly as written in the source. */
  specifier: string;
  /** Project-relative file the specifier resolves to, when it is part of the index. */
  resolved?: string;
}

export interface FileEntry {
  /** Parser language, or null for files that are listed but not parsed. */
  language: string | null;
  size: number;
  hash: string;
  symbols: SymbolEntry[];
  imports: ImportEdge[];
}

/**
 * Structural snapshot of one project. Keys of `files` are project-relative
 * paths with forward slashes, kept in sorted order. Nothing time-dependent
 * is stored so that equal inputs give equal indexes.
 */
export interface Index {
  root: string;
  files: Record<string, FileEntry>;
  /** name → every definition site, ordered by file then source order */
  symbols: Record<string, SymbolEntry[]>;
  /** test file → source files it likely exercises */
  testMapping: Record<string, string[]>;
  /** Files whose parse failed; they contribute no symbols or imports. */
  unparsed: string[];
}

export interface BuildStats {
  files: number;
  parsedFiles: number;
  symbols: number;
  imports: number;
  unparsed: number;
  durationMs: number;
}

export interface IndexResult {
  index: Index;
  stats: BuildStats;
}

export interface FileTreeNode {
  name: string;
  path: string;
  type: 'file' | 'directory';
  size?: number;
  children?: FileTreeNode[];
}

export interface IndexerOptions {
  ignore: string[];
  respectGitignore: boolean;
  maxFileSize: number;
}
