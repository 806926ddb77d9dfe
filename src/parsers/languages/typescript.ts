import tsModule from 'tree-sitter-typescript';
import Parser from 'tree-sitter';
import { extname } from 'node:path';
import { Parser as BaseParser, ParseResult, SymbolEntry, SymbolKind, pushImport } from '../base.js';
import { fieldText, lineOf, parseSource, unquote } from '../utils.js';

interface SymbolContext {
  filepath: string;
  symbols: SymbolEntry[];
  imports: string[];
}

const DECLARATION_KINDS: Record<string, SymbolKind> = {
  class_declaration: 'class',
  abstract_class_declaration: 'class',
  class: 'class',
  interface_declaration: 'interface',
  type_alias_declaration: 'type',
  enum_declaration: 'enum',
  function_declaration: 'function',
  generator_function_declaration: 'function',
  internal_module: 'namespace',
};

const FUNCTION_VALUES = new Set(['arrow_function', 'function_expression', 'function', 'generator_function']);

export class TypeScriptParser extends BaseParser {
  private parser: Parser;
  private currentLanguage: string = 'typescript';

  constructor() {
    super();
    this.parser = new Parser();
    this.parser.setLanguage(tsModule.typescript);
  }

  parse(filepath: string, content: string): ParseResult {
    const extension = extname(filepath).toLowerCase();
    const isTSX = extension === '.tsx' || extension === '.jsx';
    const isJavaScript = ['.js', '.jsx', '.mjs', '.cjs'].includes(extension);
    this.currentLanguage = isJavaScript ? 'javascript' : 'typescript';

    this.parser.setLanguage(isTSX ? tsModule.tsx : tsModule.typescript);

    const tree = parseSource(this.parser, content);
    const context: SymbolContext = { filepath, symbols: [], imports: [] };

    this.walkNode(tree.rootNode, context, undefined);

    return {
      symbols: context.symbols,
      imports: context.imports,
      language: this.getLanguage(),
    };
  }

  private walkNode(node: Parser.SyntaxNode, context: SymbolContext, enclosingClass: string | undefined): void {
    for (const child of node.namedChildren) {
      const declarationKind = DECLARATION_KINDS[child.type];
      if (declarationKind) {
        const name = fieldText(child, 'name');
        if (name) {
          context.symbols.push({ name, kind: declarationKind, file: context.filepath, line: lineOf(child) });
        }
        const isClass = declarationKind === 'class';
        this.walkNode(child, context, isClass ? name ?? enclosingClass : undefined);
        continue;
      }

      switch (child.type) {
        case 'method_definition':
        case 'abstract_method_signature': {
          const name = fieldText(child, 'name');
          if (name && enclosingClass) {
            context.symbols.push({
              name,
              kind: 'method',
              file: context.filepath,
              line: lineOf(child),
              parent: enclosingClass,
            });
          }
          this.walkNode(child, context, undefined);
          break;
        }

        case 'public_field_definition': {
          const name = fieldText(child, 'name');
          const value = child.childForFieldName('value');
          if (name && enclosingClass && value && FUNCTION_VALUES.has(value.type)) {
            context.symbols.push({
              name,
              kind: 'method',
              file: context.filepath,
              line: lineOf(child),
              parent: enclosingClass,
            });
          }
          this.walkNode(child, context, undefined);
          break;
        }

        case 'variable_declarator': {
          const name = child.childForFieldName('name');
          const value = child.childForFieldName('value');
          if (name?.type === 'identifier' && value && FUNCTION_VALUES.has(value.type)) {
            context.symbols.push({ name: name.text, kind: 'function', file: context.filepath, line: lineOf(child) });
          }
          this.walkNode(child, context, undefined);
          break;
        }

        case 'import_statement':
        case 'export_statement': {
          const source = child.childForFieldName('source');
          if (source) pushImport(context.imports, unquote(source.text));
          this.walkNode(child, context, enclosingClass);
          break;
        }

        case 'call_expression':
          this.extractCallImport(child, context);
          this.walkNode(child, context, enclosingClass);
          break;

        default:
          this.walkNode(child, context, enclosingClass);
      }
    }
  }

  /** `require('x')` and `import('x')` with a literal argument. */
  private extractCallImport(node: Parser.SyntaxNode, context: SymbolContext): void {
    const callee = node.childForFieldName('function');
    if (!callee) return;
    const isRequire = callee.type === 'identifier' && callee.text === 'require';
    if (!isRequire && callee.type !== 'import') return;

    const args = node.childForFieldName('arguments');
    const first = args?.namedChildren[0];
    if (first && (first.type === 'string' || first.type === 'template_string') && !first.text.includes('${')) {
      pushImport(context.imports, unquote(first.text));
    }
  }

  getSupportedExtensions(): string[] {
    return ['.ts', '.tsx', '.js', '.jsx', '.mjs', '.cjs'];
  }

  getLanguage(): string {
    return this.currentLanguage;
  }
}
