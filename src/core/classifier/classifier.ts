/**
 * @arch testsmith.core.engine
 *
 * Candidate classifier: decides which functions and methods get generated tests.
 *
 * Rules, first match wins:
 * 1. `__init__` is always included.
 * 2. Dunder names are excluded.
 * 3. Names already starting with the test-name prefix are excluded.
 * 4. Names starting with `_` are excluded unless private names are requested.
 * 5. Everything else is included.
 */
import type { FunctionModel, ModuleModel } from '../model/types.js';

export const CONSTRUCTOR_NAME = '__init__';

export type ExclusionReason = 'dunder' | 'test-function' | 'private';

export interface ClassificationEntry {
  symbol: FunctionModel;
  included: boolean;
  reason?: ExclusionReason;
}

const EXCLUSION_MESSAGES: Record<ExclusionReason, string> = {
  dunder: 'special method',
  'test-function': 'already a test',
  private: 'private name',
};

export function describeExclusion(reason: ExclusionReason): string {
  return EXCLUSION_MESSAGES[reason];
}

export function isDunder(name: string): boolean {
  return name.length > 4 && name.startsWith('__') && name.endsWith('__');
}

function exclusionReason(
  name: string,
  includePrivate: boolean,
  testNamePrefix: string
): ExclusionReason | undefined {
  if (name === CONSTRUCTOR_NAME) return undefined;
  if (isDunder(name)) return 'dunder';
  if (name.startsWith(testNamePrefix)) return 'test-function';
  if (!includePrivate && name.startsWith('_')) return 'private';
  return undefined;
}

/**
 * Free functions and methods merged in source order.
 */
export function declarationsInSourceOrder(module: ModuleModel): FunctionModel[] {
  return [...module.functions, ...module.classes.flatMap((cls) => cls.methods)].sort(
    (a, b) => a.line - b.line
  );
}

/**
 * Classify every declaration and keep the exclusion reason.
 */
export function explainClassification(
  module: ModuleModel,
  includePrivate: boolean,
  testNamePrefix = 'test_'
): ClassificationEntry[] {
  return declarationsInSourceOrder(module).map((symbol) => {
    const reason = exclusionReason(symbol.name, includePrivate, testNamePrefix);
    return reason ? { symbol, included: false, reason } : { symbol, included: true };
  });
}

/**
 * Testable candidates in source declaration order.
 */
export function classify(
  module: ModuleModel,
  includePrivate: boolean,
  testNamePrefix = 'test_'
): FunctionModel[] {
  return explainClassification(module, includePrivate, testNamePrefix)
    .filter((entry) => entry.included)
    .map((entry) => entry.symbol);
}
