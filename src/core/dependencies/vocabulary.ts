/**
 * @arch testsmith.core.domain
 *
 * Dependency vocabulary shared by the parser (which tokens to record)
 * and the enrichment resolver (which fixture or mock a token gets).
 *
 * A token matches a category when its lowercase form is one of the
 * category's module names, or when one of its snake/camel-case words
 * equals a keyword. Keywords ending in `*` match as word prefixes.
 */
import { z } from 'zod';
import { parseDataFile } from '../data/loader.js';
import vocabularyData from '../data/dependency-categories.json' with { type: 'json' };

export const DependencyCategorySchema = z.enum([
  'storage',
  'network',
  'session',
  'filesystem',
  'data',
  'serialization',
  'time',
  'randomness',
]);

export type DependencyCategory = z.infer<typeof DependencyCategorySchema>;

const CategoryRuleSchema = z.object({
  category: DependencyCategorySchema,
  modules: z.array(z.string()),
  keywords: z.array(z.string()),
  mockReturn: z.string().min(1),
});

export type CategoryRule = z.infer<typeof CategoryRuleSchema>;

const VocabularySchema = z.object({
  version: z.literal(1),
  categories: z.array(CategoryRuleSchema).min(1),
});

let rules: readonly CategoryRule[] | undefined;

/**
 * Ordered category rules; the first matching rule wins.
 */
export function getCategoryRules(): readonly CategoryRule[] {
  rules ??= parseDataFile('dependency-categories.json', vocabularyData, VocabularySchema).categories;
  return rules;
}

/**
 * Split an identifier into lowercase words on underscores and case changes.
 * `DBSession` -> ['db', 'session'], `database_session` -> ['database', 'session'].
 */
export function splitIdentifierWords(identifier: string): string[] {
  return identifier
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((word) => word.length > 0);
}

function keywordMatches(keyword: string, words: string[]): boolean {
  if (keyword.endsWith('*')) {
    const prefix = keyword.slice(0, -1);
    return words.some((word) => word.startsWith(prefix));
  }
  return words.includes(keyword);
}

/**
 * Find the first category rule a token matches.
 */
export function categorizeToken(token: string): CategoryRule | undefined {
  const lower = token.toLowerCase();
  const words = splitIdentifierWords(token);
  return getCategoryRules().find(
    (rule) =>
      rule.modules.includes(lower) ||
      rule.keywords.some((keyword) => keywordMatches(keyword, words))
  );
}

export function isDependencyToken(token: string): boolean {
  return categorizeToken(token) !== undefined;
}
