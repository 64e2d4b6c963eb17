/**
 * @arch testsmith.core.domain
 *
 * Maps parameter annotations and default literals onto the base types the
 * value tables are keyed by.
 */
import type { ParameterModel } from '../model/types.js';

export type BaseType = 'integer' | 'float' | 'string' | 'boolean' | 'sequence' | 'mapping' | 'unknown';

/** Parameter shapes that get a dedicated data fixture. */
export type ComplexShape = 'mapping' | 'sequence' | 'tabular';

const TYPE_NAMES: Record<string, Exclude<BaseType, 'unknown'>> = {
  int: 'integer',
  float: 'float',
  str: 'string',
  bool: 'boolean',
  list: 'sequence',
  tuple: 'sequence',
  set: 'sequence',
  frozenset: 'sequence',
  sequence: 'sequence',
  mutablesequence: 'sequence',
  iterable: 'sequence',
  collection: 'sequence',
  abstractset: 'sequence',
  deque: 'sequence',
  dict: 'mapping',
  mapping: 'mapping',
  mutablemapping: 'mapping',
  ordereddict: 'mapping',
  defaultdict: 'mapping',
  counter: 'mapping',
};

/** Array-like containers that are not plain Python sequences. */
const SHAPE_ONLY_TYPES: Record<string, ComplexShape> = {
  dataframe: 'tabular',
  series: 'sequence',
  ndarray: 'sequence',
};

/**
 * Split on a separator at bracket depth zero.
 */
function splitTopLevel(text: string, separator: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '[' || ch === '(' || ch === '{') depth++;
    else if (ch === ']' || ch === ')' || ch === '}') depth--;
    else if (ch === separator && depth === 0) {
      parts.push(text.slice(start, i).trim());
      start = i + 1;
    }
  }
  parts.push(text.slice(start).trim());
  return parts;
}

/**
 * Remove string quoting, `Optional[...]` and `None` union members.
 */
export function unwrapOptional(annotation: string): { inner: string; optional: boolean } {
  let text = annotation.trim();
  const quoted = /^(['"])(.*)\1$/s.exec(text);
  if (quoted) text = quoted[2].trim();

  const optional = /^(?:typing\.)?Optional\[(.*)\]$/s.exec(text);
  if (optional) {
    return { inner: unwrapOptional(optional[1]).inner, optional: true };
  }

  const union = /^(?:typing\.)?Union\[(.*)\]$/s.exec(text);
  const members = union ? splitTopLevel(union[1], ',') : splitTopLevel(text, '|');
  if (members.length === 1) return { inner: text, optional: false };

  const present = members.filter((member) => member !== 'None');
  if (present.length === 1) {
    return { inner: present[0], optional: present.length < members.length };
  }
  return { inner: text, optional: present.length < members.length };
}

/**
 * Lowercase outer type name: `typing.List[int]` -> `list`.
 */
export function annotationHead(annotation: string): string {
  const outer = annotation.split('[')[0].trim();
  return outer.slice(outer.lastIndexOf('.') + 1).toLowerCase();
}

export function baseTypeFromAnnotation(annotation: string): BaseType {
  const { inner } = unwrapOptional(annotation);
  return TYPE_NAMES[annotationHead(inner)] ?? 'unknown';
}

/**
 * Infer a base type from a default-value literal.
 */
export function baseTypeFromDefault(literal: string): BaseType {
  const value = literal.trim();
  if (value === 'True' || value === 'False') return 'boolean';
  if (/^[+-]?\d[\d_]*$/.test(value)) return 'integer';
  if (/^[+-]?(\d[\d_]*\.\d*|\.\d+)([eE][+-]?\d+)?$|^[+-]?\d+[eE][+-]?\d+$/.test(value)) return 'float';
  if (/^[rRbBuUfF]{0,2}['"]/.test(value)) return 'string';
  if (value.startsWith('[') || value.startsWith('(')) return 'sequence';
  if (value.startsWith('{')) {
    return value === '{}' || value.includes(':') ? 'mapping' : 'sequence';
  }
  return 'unknown';
}

/**
 * Annotation first, then the default literal, otherwise unknown.
 */
export function resolveBaseType(parameter: ParameterModel): BaseType {
  if (parameter.declaredType) {
    const fromAnnotation = baseTypeFromAnnotation(parameter.declaredType);
    if (fromAnnotation !== 'unknown') return fromAnnotation;
  }
  if (parameter.defaultValue !== undefined) {
    return baseTypeFromDefault(parameter.defaultValue);
  }
  return 'unknown';
}

/**
 * Complex shape of a declared parameter type, if any.
 */
export function resolveComplexShape(parameter: ParameterModel): ComplexShape | undefined {
  if (!parameter.declaredType) return undefined;
  const head = annotationHead(unwrapOptional(parameter.declaredType).inner);
  const shapeOnly = SHAPE_ONLY_TYPES[head];
  if (shapeOnly) return shapeOnly;

  const base = TYPE_NAMES[head];
  return base === 'mapping' || base === 'sequence' ? base : undefined;
}
