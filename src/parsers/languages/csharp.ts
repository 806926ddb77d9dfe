import { Parser as BaseParser, ParseResult, SymbolEntry, SymbolKind, pushImport } from '../base.js';

/**
 * C# has no grammar in the parser stack, so declarations are picked out line
 * by line with regular expressions. Good enough for navigation; generic
 * constraints and multi-line signatures are only partially understood.
 */

const MODIFIERS = String.raw`(?:(?:public|private|protected|internal|static|abstract|sealed|partial|virtual|override|async|readonly|unsafe|extern|new)\s+)*`;

const USING_PATTERN = /^\s*(?:global\s+)?using\s+(?:static\s+)?(?:\w+\s*=\s*)?([\w.]+)\s*;/;
const NAMESPACE_PATTERN = /^\s*namespace\s+([\w.]+)/;
const TYPE_PATTERN = new RegExp(`^\\s*${MODIFIERS}(class|record|struct|interface|enum)\\s+(\\w+)`);
const METHOD_PATTERN = new RegExp(`^\\s*${MODIFIERS}(?:[\\w<>\\[\\],.?]+\\s+)?(\\w+)\\s*(?:<[^>]*>)?\\s*\\([^)]*\\)?\\s*(?:\\{|=>|:|$)`);
const PROPERTY_PATTERN = new RegExp(`^\\s*${MODIFIERS}[\\w<>\\[\\],.?]+\\s+(\\w+)\\s*\\{\\s*(?:get|set|init)`);

const KEYWORDS = new Set([
  'if', 'while', 'for', 'foreach', 'switch', 'catch', 'using', 'new', 'return',
  'lock', 'fixed', 'nameof', 'typeof', 'sizeof', 'when', 'await', 'throw', 'else',
]);

const TYPE_KINDS: Record<string, SymbolKind> = {
  class: 'class',
  record: 'class',
  struct: 'struct',
  interface: 'interface',
  enum: 'enum',
};

export class CSharpParser extends BaseParser {
  parse(filepath: string, content: string): ParseResult {
    const symbols: SymbolEntry[] = [];
    const imports: string[] = [];
    const typeStack: Array<{ name: string; depth: number; opened: boolean }> = [];
    let depth = 0;

    const lines = content.split(/\r?\n/);
    lines.forEach((text, index) => {
      const line = index + 1;
      const stripped = text.replace(/\/\/.*$/, '');

      while (typeStack.length > 0 && typeStack[typeStack.length - 1].opened && depth <= typeStack[typeStack.length - 1].depth) {
        typeStack.pop();
      }
      const top = typeStack.length > 0 ? typeStack[typeStack.length - 1] : undefined;
      const enclosing = top?.name;
      // members sit exactly one brace level inside their type
      const atMemberLevel = top !== undefined && depth === top.depth + 1;

      const using = USING_PATTERN.exec(stripped);
      if (using && !stripped.includes('(')) {
        pushImport(imports, using[1]);
      } else if (NAMESPACE_PATTERN.test(stripped)) {
        const match = NAMESPACE_PATTERN.exec(stripped);
        if (match) symbols.push({ name: match[1], kind: 'namespace', file: filepath, line });
      } else {
        const typeMatch = TYPE_PATTERN.exec(stripped);
        if (typeMatch) {
          symbols.push({
            name: typeMatch[2],
            kind: TYPE_KINDS[typeMatch[1]],
            file: filepath,
            line,
            ...(enclosing ? { parent: enclosing } : {}),
          });
          // `record Point(int X, int Y);` has no body
          if (!stripped.trimEnd().endsWith(';')) {
            typeStack.push({ name: typeMatch[2], depth, opened: false });
          }
        } else if (enclosing && atMemberLevel) {
          const property = PROPERTY_PATTERN.exec(stripped);
          const method = property ? null : METHOD_PATTERN.exec(stripped);
          if (property) {
            symbols.push({ name: property[1], kind: 'property', file: filepath, line, parent: enclosing });
          } else if (method && !KEYWORDS.has(method[1]) && !stripped.trimEnd().endsWith(';')) {
            symbols.push({ name: method[1], kind: 'method', file: filepath, line, parent: enclosing });
          }
        }
      }

      for (const char of stripped) {
        if (char === '{') depth++;
        else if (char === '}') depth--;
      }
      const innermost = typeStack[typeStack.length - 1];
      if (innermost && depth > innermost.depth) {
        innermost.opened = true;
      }
    });

    return { symbols, imports, language: this.getLanguage() };
  }

  getSupportedExtensions(): string[] {
    return ['.cs'];
  }

  getLanguage(): string {
    return 'csharp';
  }
}
