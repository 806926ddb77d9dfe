import Parser from 'tree-sitter';
import goModule from 'tree-sitter-go';
import { Parser as BaseParser, ParseResult, SymbolEntry, SymbolKind, pushImport } from '../base.js';
import { fieldText, lineOf, parseSource, unquote } from '../utils.js';

interface SymbolContext {
  filepath: string;
  symbols: SymbolEntry[];
  imports: string[];
}

export class GoParser extends BaseParser {
  private parser: Parser;

  constructor() {
    super();
    this.parser = new Parser();
    this.parser.setLanguage(goModule);
  }

  parse(filepath: string, content: string): ParseResult {
    const tree = parseSource(this.parser, content);
    const context: SymbolContext = { filepath, symbols: [], imports: [] };

    for (const child of tree.rootNode.namedChildren) {
      switch (child.type) {
        case 'type_declaration':
          for (const spec of child.namedChildren) {
            if (spec.type === 'type_spec' || spec.type === 'type_alias') {
              this.extractType(spec, context);
            }
          }
          break;

        case 'function_declaration': {
          const name = fieldText(child, 'name');
          if (name) context.symbols.push({ name, kind: 'function', file: filepath, line: lineOf(child) });
          break;
        }

        case 'method_declaration':
          this.extractMethod(child, context);
          break;

        case 'import_declaration':
          this.extractImports(child, context);
          break;
      }
    }

    return {
      symbols: context.symbols,
      imports: context.imports,
      language: this.getLanguage(),
    };
  }

  private extractType(spec: Parser.SyntaxNode, context: SymbolContext): void {
    const name = fieldText(spec, 'name');
    if (!name) return;

    const typeNode = spec.childForFieldName('type');
    const kind: SymbolKind = typeNode?.type === 'struct_type' ? 'struct'
      : typeNode?.type === 'interface_type' ? 'interface'
      : 'type';

    context.symbols.push({ name, kind, file: context.filepath, line: lineOf(spec) });
  }

  private extractMethod(node: Parser.SyntaxNode, context: SymbolContext): void {
    const name = fieldText(node, 'name');
    if (!name) return;

    const receiverType = this.receiverTypeName(node);
    context.symbols.push({
      name,
      kind: 'method',
      file: context.filepath,
      line: lineOf(node),
      ...(receiverType ? { parent: receiverType } : {}),
    });
  }

  /** `func (s *Server) Start()` → `Server` */
  private receiverTypeName(node: Parser.SyntaxNode): string | undefined {
    const receiver = node.childForFieldName('receiver');
    const param = receiver?.namedChildren.find(child => child.type === 'parameter_declaration');
    let typeNode = param?.childForFieldName('type') ?? null;
    while (typeNode && typeNode.type !== 'type_identifier') {
      typeNode = typeNode.namedChildren.find(child =>
        child.type === 'type_identifier' || child.type === 'pointer_type' || child.type === 'generic_type',
      ) ?? null;
    }
    return typeNode?.text;
  }

  private extractImports(node: Parser.SyntaxNode, context: SymbolContext): void {
    for (const child of node.namedChildren) {
      const specs = child.type === 'import_spec_list'
        ? child.namedChildren.filter(spec => spec.type === 'import_spec')
        : child.type === 'import_spec' ? [child] : [];
      for (const spec of specs) {
        const path = fieldText(spec, 'path');
        if (path) pushImport(context.imports, unquote(path));
      }
    }
  }

  getSupportedExtensions(): string[] {
    return ['.go'];
  }

  getLanguage(): string {
    return 'go';
  }
}
