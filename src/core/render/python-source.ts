/**
 * @arch testsmith.util
 *
 * Small text helpers for emitting Python source.
 */
import { splitIdentifierWords } from '../dependencies/vocabulary.js';

const INDENT = '    ';

/**
 * Indent each non-blank line by `level` steps of four spaces.
 */
export function indent(lines: string[], level = 1): string[] {
  const prefix = INDENT.repeat(level);
  return lines.map((line) => (line === '' ? line : `${prefix}${line}`));
}

/**
 * Number of newline characters; generated text always ends in one.
 */
export function countLines(text: string): number {
  let count = 0;
  for (const ch of text) {
    if (ch === '\n') count++;
  }
  return count;
}

/**
 * Double-quoted string literal for identifiers, ids and dotted paths.
 */
export function pyString(value: string): string {
  return JSON.stringify(value);
}

export function toSnakeCase(identifier: string): string {
  return splitIdentifierWords(identifier).join('_');
}

/**
 * Block of top-level definitions, each preceded by two blank lines.
 */
export function joinDefinitions(definitions: string[]): string {
  return definitions.map((definition) => `\n\n${definition}\n`).join('');
}
