/**
 * @arch testsmith.infra.parser-support
 *
 * Tree-sitter traversal helpers for the Python parser.
 */
import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';

/**
 * Creates a Python parser instance.
 */
export function createPythonParser(): Parser {
  const parser = new Parser();
  parser.setLanguage(Python);
  return parser;
}

/**
 * Gets the source text of a syntax node.
 */
export function getNodeText(node: Parser.SyntaxNode, sourceCode: string): string {
  return sourceCode.slice(node.startIndex, node.endIndex);
}

/**
 * 1-based line of a node's first character.
 */
export function getNodeLine(node: Parser.SyntaxNode): number {
  return node.startPosition.row + 1;
}

/**
 * Walks the AST depth-first, calling the callback for each node.
 * Returning `false` from the callback skips the node's children.
 */
export function walkTree(
  node: Parser.SyntaxNode,
  callback: (node: Parser.SyntaxNode) => boolean | void
): void {
  if (callback(node) === false) return;
  for (const child of node.children) {
    walkTree(child, callback);
  }
}

/**
 * First ERROR or MISSING node in document order, if the tree has one.
 */
export function findFirstErrorNode(root: Parser.SyntaxNode): Parser.SyntaxNode | undefined {
  if (!root.hasError) return undefined;

  let found: Parser.SyntaxNode | undefined;
  walkTree(root, (node) => {
    if (found) return false;
    if (node.type === 'ERROR' || node.isMissing) {
      found = node;
      return false;
    }
    return node.hasError;
  });
  return found ?? root;
}
