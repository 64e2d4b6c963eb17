/**
 * @arch testsmith.core.engine
 *
 * Test case synthesizer: tiered value tables per parameter plus a small,
 * fixed set of cross-parameter combinations.
 */
import type { CoverageLevel } from '../config/schema.js';
import type {
  FunctionModel,
  ParameterModel,
  ParametrizeSpec,
  TestCase,
  Tier,
} from '../model/types.js';
import { resolveBaseType } from './type-resolver.js';
import { getValueTables, representativeValue, tierValues } from './value-tables.js';

/** Tiers are cumulative: each level adds to the one before it. */
export const COVERAGE_TIERS: Record<CoverageLevel, readonly Tier[]> = {
  happyPath: ['happy'],
  comprehensive: ['happy', 'edge', 'error'],
  full: ['happy', 'edge', 'error', 'boundary'],
};

const TIER_LABELS: Record<Tier, string> = {
  happy: 'Representative',
  edge: 'Edge-case',
  error: 'Wrong-type',
  boundary: 'Boundary',
};

export function tiersFor(level: CoverageLevel): readonly Tier[] {
  return COVERAGE_TIERS[level];
}

/**
 * `*args` and `**kwargs` get no value tables.
 */
export function isSynthesizable(parameter: ParameterModel): boolean {
  return parameter.kind === 'positional' || parameter.kind === 'keyword';
}

function tierCases(parameter: ParameterModel, tiers: readonly Tier[]): TestCase[] {
  const baseType = resolveBaseType(parameter);
  const { expectedError } = getValueTables();

  return tiers.flatMap((tier) =>
    tierValues(tier, baseType).map((value, index): TestCase => ({
      name: `${tier}_${index}`,
      values: { [parameter.name]: value },
      ...(tier === 'error' ? { expectedError } : {}),
      description: `${TIER_LABELS[tier]} value for ${parameter.name}`,
    }))
  );
}

/**
 * Cross-parameter rows. Two parameters give happy x happy, happy x edge and
 * edge x happy; three or more give one all-happy row.
 */
function combinationRows(
  parameters: ParameterModel[],
  tiers: readonly Tier[]
): Array<Record<string, string>> {
  const happy = (p: ParameterModel): string => representativeValue(resolveBaseType(p));
  const allHappy = Object.fromEntries(parameters.map((p) => [p.name, happy(p)]));

  if (parameters.length !== 2) return [allHappy];

  const rows = [allHappy];
  if (!tiers.includes('edge')) return rows;

  const [first, second] = parameters;
  const secondEdge = tierValues('edge', resolveBaseType(second)).at(0);
  if (secondEdge !== undefined) {
    rows.push({ [first.name]: happy(first), [second.name]: secondEdge });
  }
  const firstEdge = tierValues('edge', resolveBaseType(first)).at(0);
  if (firstEdge !== undefined) {
    rows.push({ [first.name]: firstEdge, [second.name]: happy(second) });
  }
  return rows;
}

/**
 * One ParametrizeSpec per synthesizable parameter, followed by the
 * combination spec when there are two or more.
 */
export function synthesizeCases(
  candidate: FunctionModel,
  coverageLevel: CoverageLevel
): ParametrizeSpec[] {
  const tiers = tiersFor(coverageLevel);
  const parameters = candidate.parameters.filter(isSynthesizable);

  const specs = parameters.map((parameter): ParametrizeSpec => {
    const cases = tierCases(parameter, tiers);
    return {
      parameterName: parameter.name,
      parameters: [parameter.name],
      kind: 'tier',
      cases,
      ids: cases.map((c) => c.name),
    };
  });

  if (parameters.length >= 2) {
    const names = parameters.map((p) => p.name);
    const cases = combinationRows(parameters, tiers).map(
      (values, index): TestCase => ({
        name: `combined_${index}`,
        values,
        description: `Combined inputs for ${names.join(', ')}`,
      })
    );
    specs.push({
      parameterName: names.join(', '),
      parameters: names,
      kind: 'combined',
      cases,
      ids: cases.map((c) => c.name),
    });
  }

  return specs;
}
