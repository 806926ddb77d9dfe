import Parser from 'tree-sitter';

/**
 * Helpers shared by the tree-sitter backed parsers.
 */

// node-tree-sitter rejects string inputs above its default 32KiB buffer
const MIN_BUFFER_SIZE = 32 * 1024;

export function parseSource(parser: Parser, content: string): Parser.Tree {
  return parser.parse(content, undefined, {
    bufferSize: Math.max(MIN_BUFFER_SIZE, content.length * 2 + 1),
  });
}

export function fieldText(node: Parser.SyntaxNode, fieldName: string): string | null {
  const child = node.childForFieldName(fieldName);
  return child ? child.text : null;
}

/** 1-based line of the node's first character. */
export function lineOf(node: Parser.SyntaxNode): number {
  return node.startPosition.row + 1;
}

export function childrenOfType(node: Parser.SyntaxNode, type: string): Parser.SyntaxNode[] {
  return node.namedChildren.filter(child => child.type === type);
}

export function unquote(text: string): string {
  return text.replace(/^['"`]|['"`]$/g, '');
}
