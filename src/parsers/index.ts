import { extname } from 'node:path';
import { Parser } from './base.js';
import { TypeScriptParser } from './languages/typescript.js';
import { PythonParser } from './languages/python.js';
import { GoParser } from './languages/go.js';
import { JavaParser } from './languages/java.js';
import { CSharpParser } from './languages/csharp.js';

export type { Parser, ParseResult, SymbolEntry, SymbolKind } from './base.js';
export { TypeScriptParser, PythonParser, GoParser, JavaParser, CSharpParser };

export class ParserFactory {
  private byExtension: Map<string, Parser> = new Map();

  constructor() {
    // TypeScriptParser switches grammar per file, so one instance serves all JS/TS extensions
    const parsers: Parser[] = [
      new TypeScriptParser(),
      new PythonParser(),
      new GoParser(),
      new JavaParser(),
      new CSharpParser(),
    ];
    for (const parser of parsers) {
      for (const extension of parser.getSupportedExtensions()) {
        this.byExtension.set(extension, parser);
      }
    }
  }

  getParserForFile(filepath: string): Parser | undefined {
    return this.byExtension.get(extname(filepath).toLowerCase());
  }

  getSupportedExtensions(): string[] {
    return Array.from(this.byExtension.keys()).sort();
  }
}

let shared: ParserFactory | undefined;

/** Grammars are loaded once per process, on first use. */
export function getParserFactory(): ParserFactory {
  if (!shared) {
    shared = new ParserFactory();
  }
  return shared;
}
