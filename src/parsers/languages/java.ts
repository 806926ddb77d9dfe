import Parser from 'tree-sitter';
import javaModule from 'tree-sitter-java';
import { Parser as BaseParser, ParseResult, SymbolEntry, SymbolKind, pushImport } from '../base.js';
import { fieldText, lineOf, parseSource } from '../utils.js';

interface SymbolContext {
  filepath: string;
  symbols: SymbolEntry[];
  imports: string[];
}

const TYPE_KINDS: Record<string, SymbolKind> = {
  class_declaration: 'class',
  record_declaration: 'class',
  interface_declaration: 'interface',
  annotation_type_declaration: 'interface',
  enum_declaration: 'enum',
};

export class JavaParser extends BaseParser {
  private parser: Parser;

  constructor() {
    super();
    this.parser = new Parser();
    this.parser.setLanguage(javaModule);
  }

  parse(filepath: string, content: string): ParseResult {
    const tree = parseSource(this.parser, content);
    const context: SymbolContext = { filepath, symbols: [], imports: [] };

    this.walkNode(tree.rootNode, context, undefined);

    return {
      symbols: context.symbols,
      imports: context.imports,
      language: this.getLanguage(),
    };
  }

  private walkNode(node: Parser.SyntaxNode, context: SymbolContext, enclosingType: string | undefined): void {
    for (const child of node.namedChildren) {
      const typeKind = TYPE_KINDS[child.type];
      if (typeKind) {
        const name = fieldText(child, 'name');
        if (name) {
          context.symbols.push({
            name,
            kind: typeKind,
            file: context.filepath,
            line: lineOf(child),
            ...(enclosingType ? { parent: enclosingType } : {}),
          });
        }
        const body = child.childForFieldName('body');
        if (body) this.walkNode(body, context, name ?? enclosingType);
        continue;
      }

      switch (child.type) {
        case 'method_declaration':
        case 'constructor_declaration': {
          const name = fieldText(child, 'name');
          if (name) {
            context.symbols.push({
              name,
              kind: 'method',
              file: context.filepath,
              line: lineOf(child),
              ...(enclosingType ? { parent: enclosingType } : {}),
            });
          }
          // anonymous and local classes
          const body = child.childForFieldName('body');
          if (body) this.walkNode(body, context, enclosingType);
          break;
        }

        case 'import_declaration':
          this.extractImport(child, context);
          break;

        case 'package_declaration':
          break;

        default:
          this.walkNode(child, context, enclosingType);
      }
    }
  }

  private extractImport(node: Parser.SyntaxNode, context: SymbolContext): void {
    const target = node.namedChildren.find(child =>
      child.type === 'scoped_identifier' || child.type === 'identifier',
    );
    if (!target) return;
    const wildcard = node.namedChildren.some(child => child.type === 'asterisk');
    pushImport(context.imports, wildcard ? `${target.text}.*` : target.text);
  }

  getSupportedExtensions(): string[] {
    return ['.java'];
  }

  getLanguage(): string {
    return 'java';
  }
}
