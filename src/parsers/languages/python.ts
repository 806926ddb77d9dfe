import Parser from 'tree-sitter';
import python from 'tree-sitter-python';
import { Parser as BaseParser, ParseResult, SymbolEntry, pushImport } from '../base.js';
import { fieldText, lineOf, parseSource } from '../utils.js';

interface SymbolContext {
  filepath: string;
  symbols: SymbolEntry[];
  imports: string[];
}

export class PythonParser extends BaseParser {
  private parser: Parser;

  constructor() {
    super();
    this.parser = new Parser();
    this.parser.setLanguage(python);
  }

  parse(filepath: string, content: string): ParseResult {
    const tree = parseSource(this.parser, content);
    const context: SymbolContext = { filepath, symbols: [], imports: [] };

    this.walkNode(tree.rootNode, context, undefined, false);

    return {
      symbols: context.symbols,
      imports: context.imports,
      language: this.getLanguage(),
    };
  }

  private walkNode(
    node: Parser.SyntaxNode,
    context: SymbolContext,
    enclosingClass: string | undefined,
    directlyInClass: boolean,
  ): void {
    for (const child of node.namedChildren) {
      switch (child.type) {
        case 'class_definition': {
          const name = fieldText(child, 'name');
          if (name) {
            context.symbols.push({
              name,
              kind: 'class',
              file: context.filepath,
              line: lineOf(child),
              ...(directlyInClass && enclosingClass ? { parent: enclosingClass } : {}),
            });
          }
          const body = child.childForFieldName('body');
          if (body) this.walkNode(body, context, name ?? enclosingClass, true);
          break;
        }

        case 'function_definition': {
          const name = fieldText(child, 'name');
          if (name) {
            const isMethod = directlyInClass && enclosingClass !== undefined;
            context.symbols.push({
              name,
              kind: isMethod ? 'method' : 'function',
              file: context.filepath,
              line: lineOf(child),
              ...(isMethod ? { parent: enclosingClass } : {}),
            });
          }
          const body = child.childForFieldName('body');
          if (body) this.walkNode(body, context, undefined, false);
          break;
        }

        case 'import_statement':
          for (const nameNode of child.childrenForFieldName('name')) {
            const target = nameNode.type === 'aliased_import' ? nameNode.childForFieldName('name') : nameNode;
            if (target) pushImport(context.imports, target.text);
          }
          break;

        case 'import_from_statement':
          this.extractFromImport(child, context);
          break;

        default:
          // decorated_definition, if/try blocks and the like keep the class scope
          this.walkNode(child, context, enclosingClass, directlyInClass);
      }
    }
  }

  private extractFromImport(node: Parser.SyntaxNode, context: SymbolContext): void {
    const moduleName = fieldText(node, 'module_name');
    if (!moduleName) return;

    // `from . import helpers` names a sibling module, not the package itself
    if (/^\.+$/.test(moduleName)) {
      const names = node.childrenForFieldName('name');
      if (names.length === 0) {
        pushImport(context.imports, moduleName);
      }
      for (const nameNode of names) {
        const target = nameNode.type === 'aliased_import' ? nameNode.childForFieldName('name') : nameNode;
        if (target) pushImport(context.imports, `${moduleName}${target.text}`);
      }
      return;
    }

    pushImport(context.imports, moduleName);
  }

  getSupportedExtensions(): string[] {
    return ['.py'];
  }

  getLanguage(): string {
    return 'python';
  }
}
