export type SymbolKind =
  | 'class'
  | 'interface'
  | 'struct'
  | 'type'
  | 'enum'
  | 'function'
  | 'method'
  | 'property'
  | 'namespace';

/**
 * One definition site. A name may have many entries across the project;
 * `file` is always project-relative with forward slashes.
 */
export interface SymbolEntry {
  name: string;
  kind: SymbolKind;
  file: string;
  line: number;
  parent?: string;
}

export interface ParseResult {
  symbols: SymbolEntry[];
  /** Module specifiers in source order, duplicates removed. */
  imports: string[];
  language: string;
}

export abstract class Parser {
  abstract parse(filepath: string, content: string): ParseResult;
  abstract getSupportedExtensions(): string[];
  abstract getLanguage(): string;
}

export function pushImport(imports: string[], specifier: string): void {
  const trimmed = specifier.trim();
  if (trimmed && !imports.includes(trimmed)) {
    imports.push(trimmed);
  }
}
