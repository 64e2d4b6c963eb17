/**
 * @arch testsmith.infra.parser-support
 *
 * Reads parameters, decorators and docstrings off Python declaration nodes.
 */
import type Parser from 'tree-sitter';
import type { ParameterKind, ParameterModel } from '../model/types.js';
import { getNodeText } from './tree-sitter-utils.js';

/** Python tree-sitter node types for parameters */
const PyParameterNodes = {
  IDENTIFIER: 'identifier',
  TYPED_PARAMETER: 'typed_parameter',
  DEFAULT_PARAMETER: 'default_parameter',
  TYPED_DEFAULT_PARAMETER: 'typed_default_parameter',
  LIST_SPLAT_PATTERN: 'list_splat_pattern',
  DICTIONARY_SPLAT_PATTERN: 'dictionary_splat_pattern',
  KEYWORD_SEPARATOR: 'keyword_separator',
} as const;

/**
 * Extract the parameter list in declaration order.
 * Parameters after a bare `*` or `*args` are keyword-only.
 */
export function extractParameters(
  paramsNode: Parser.SyntaxNode,
  sourceCode: string
): ParameterModel[] {
  const parameters: ParameterModel[] = [];
  let keywordOnly = false;

  for (const child of paramsNode.namedChildren) {
    if (child.type === PyParameterNodes.KEYWORD_SEPARATOR) {
      keywordOnly = true;
      continue;
    }

    const parameter = readParameter(child, sourceCode);
    if (!parameter) continue;

    if (parameter.kind === 'varargs') {
      keywordOnly = true;
    } else if (parameter.kind === 'positional' && keywordOnly) {
      parameter.kind = 'keyword';
    }
    parameters.push(parameter);
  }

  return parameters;
}

function readParameter(
  node: Parser.SyntaxNode,
  sourceCode: string
): ParameterModel | undefined {
  let target: Parser.SyntaxNode | null;
  switch (node.type) {
    case PyParameterNodes.IDENTIFIER:
    case PyParameterNodes.LIST_SPLAT_PATTERN:
    case PyParameterNodes.DICTIONARY_SPLAT_PATTERN:
      target = node;
      break;
    case PyParameterNodes.TYPED_PARAMETER:
      // name (or splat) comes before the ':' and the type
      target = node.namedChildren[0] ?? null;
      break;
    case PyParameterNodes.DEFAULT_PARAMETER:
    case PyParameterNodes.TYPED_DEFAULT_PARAMETER:
      target = node.childForFieldName('name');
      break;
    default:
      return undefined;
  }
  if (!target) return undefined;

  let kind: ParameterKind = 'positional';
  let name = getNodeText(target, sourceCode);
  if (target.type === PyParameterNodes.LIST_SPLAT_PATTERN) {
    kind = 'varargs';
    name = name.replace(/^\*/, '').trim();
  } else if (target.type === PyParameterNodes.DICTIONARY_SPLAT_PATTERN) {
    kind = 'kwargs';
    name = name.replace(/^\*\*/, '').trim();
  } else if (target.type !== PyParameterNodes.IDENTIFIER) {
    return undefined;
  }

  const typeNode = node.childForFieldName('type');
  const valueNode = node.childForFieldName('value');
  return {
    name,
    kind,
    ...(typeNode ? { declaredType: getNodeText(typeNode, sourceCode) } : {}),
    ...(valueNode ? { defaultValue: getNodeText(valueNode, sourceCode) } : {}),
  };
}

/**
 * Decorator names in source order, without the `@` or call arguments.
 * `@app.route("/x")` -> `app.route`.
 */
export function extractDecoratorNames(
  decoratorNodes: Parser.SyntaxNode[],
  sourceCode: string
): string[] {
  const names: string[] = [];
  for (const node of decoratorNodes) {
    const match = getNodeText(node, sourceCode).match(/^@\s*([\w.]+)/);
    if (match) names.push(match[1]);
  }
  return names;
}

/** Last dotted segment: `functools.cached_property` -> `cached_property`. */
export function decoratorBaseName(name: string): string {
  return name.slice(name.lastIndexOf('.') + 1);
}

/**
 * Docstring of a function or class body, cleaned of quotes and common indentation.
 */
export function extractDocstring(
  bodyNode: Parser.SyntaxNode | null,
  sourceCode: string
): string | undefined {
  const first = bodyNode?.namedChildren[0];
  if (!first || first.type !== 'expression_statement') return undefined;
  const expr = first.namedChildren[0];
  if (!expr || expr.type !== 'string') return undefined;
  return cleanDocstring(getNodeText(expr, sourceCode));
}

/**
 * Strip string quotes and prefix, dedent continuation lines, drop blank edges.
 */
export function cleanDocstring(literal: string): string | undefined {
  const match = /^[rRuU]?("""|'''|"|')([\s\S]*)\1$/.exec(literal);
  if (!match) return undefined;

  const [firstLine, ...rest] = match[2].replace(/\r\n/g, '\n').split('\n');
  const indents = rest
    .filter((line) => line.trim().length > 0)
    .map((line) => line.length - line.trimStart().length);
  const indent = indents.length > 0 ? Math.min(...indents) : 0;

  const lines = [firstLine.trim(), ...rest.map((line) => line.slice(indent).trimEnd())];
  while (lines.length > 0 && lines[0] === '') lines.shift();
  while (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();

  return lines.length > 0 ? lines.join('\n') : undefined;
}
