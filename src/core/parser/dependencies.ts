/**
 * @arch testsmith.infra.parser-support
 *
 * Dependency token detection over a function body.
 */
import type Parser from 'tree-sitter';
import { isDependencyToken } from '../dependencies/vocabulary.js';
import { getNodeText, walkTree } from './tree-sitter-utils.js';

const RECEIVERS = new Set(['self', 'cls']);

/**
 * Collect vocabulary tokens from call targets and attribute-access roots.
 *
 * - `open(path)` -> `open`
 * - `requests.get(url)` -> `requests`
 * - `self.db.query()` -> `db` (the receiver is stripped)
 *
 * Returns a sorted, duplicate-free list.
 */
export function collectDependencyTokens(
  node: Parser.SyntaxNode,
  sourceCode: string
): string[] {
  const tokens = new Set<string>();
  const add = (token: string): void => {
    if (isDependencyToken(token)) tokens.add(token);
  };

  walkTree(node, (current) => {
    if (current.type === 'call') {
      const fn = current.childForFieldName('function');
      if (fn?.type === 'identifier') add(getNodeText(fn, sourceCode));
      return;
    }

    if (current.type === 'attribute') {
      const object = current.childForFieldName('object');
      if (object?.type !== 'identifier') return;

      const root = getNodeText(object, sourceCode);
      if (!RECEIVERS.has(root)) {
        add(root);
        return;
      }
      const attribute = current.childForFieldName('attribute');
      if (attribute) add(getNodeText(attribute, sourceCode));
    }
  });

  return [...tokens].sort();
}

/**
 * Sorted union of several token lists.
 */
export function mergeTokens(lists: string[][]): string[] {
  return [...new Set(lists.flat())].sort();
}
