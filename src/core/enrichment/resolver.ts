/**
 * @arch testsmith.core.engine
 *
 * Dependency enrichment: candidate -> fixtures and mocks.
 *
 * Fixtures are interned per module, so every candidate that needs the same
 * category receives the same FixtureSpec instance.
 */
import type { FixtureSpec, FunctionModel, MockSpec, ModuleModel } from '../model/types.js';
import { categorizeToken } from '../dependencies/vocabulary.js';
import { isSynthesizable } from '../synthesis/synthesizer.js';
import { resolveComplexShape, type ComplexShape } from '../synthesis/type-resolver.js';
import { categoryFixture, isFixtureCategory, parameterDataFixture } from './fixtures.js';

/** Names resolved from builtins rather than module attributes. */
const BUILTIN_TOKENS = new Set(['open', 'file']);

const DEFAULT_MOCK_RETURN = 'MagicMock()';

export interface Enrichment {
  fixtures: FixtureSpec[];
  mocks: MockSpec[];
}

export interface EnrichmentOptions {
  generateFixtures: boolean;
}

/**
 * Mock for one dependency token, patched where the module under test looks it up.
 */
export function buildMock(token: string, moduleName: string): MockSpec {
  const rule = categorizeToken(token);
  const lower = token.toLowerCase();
  const isModuleAttribute = rule !== undefined && rule.modules.includes(lower) && !BUILTIN_TOKENS.has(lower);
  return {
    target: token,
    patchPath: `${moduleName}.${token}`,
    returnValue: rule?.mockReturn ?? DEFAULT_MOCK_RETURN,
    variable: `mock_${token}`,
    create: !isModuleAttribute,
  };
}

export class EnrichmentResolver {
  private readonly interned = new Map<string, FixtureSpec>();
  /** First shape seen for each data parameter name */
  private readonly dataShapes = new Map<string, ComplexShape>();

  constructor(
    private readonly module: ModuleModel,
    private readonly options: EnrichmentOptions
  ) {}

  /**
   * Fixtures and mocks for one candidate. Fixtures keep first-seen order.
   */
  resolve(candidate: FunctionModel): Enrichment {
    const fixtures: FixtureSpec[] = [];
    const attach = (spec: FixtureSpec): void => {
      const shared = this.intern(spec);
      if (!fixtures.includes(shared)) fixtures.push(shared);
    };

    if (this.options.generateFixtures) {
      for (const token of candidate.dependencies) {
        const category = categorizeToken(token)?.category;
        if (category && isFixtureCategory(category)) {
          attach(categoryFixture(category));
        }
      }
      for (const parameter of candidate.parameters.filter(isSynthesizable)) {
        const shape = resolveComplexShape(parameter);
        if (shape) {
          attach(parameterDataFixture(parameter.name, shape, this.dataFixtureName(parameter.name, shape)));
        }
      }
    }

    return {
      fixtures,
      mocks: candidate.dependencies.map((token) => buildMock(token, this.module.moduleName)),
    };
  }

  /**
   * Every fixture resolved so far across the module, in first-seen order.
   */
  get moduleFixtures(): FixtureSpec[] {
    return [...this.interned.values()];
  }

  /**
   * `<param>_data` for the first shape seen under a parameter name,
   * `<param>_<shape>_data` for any other shape.
   */
  private dataFixtureName(parameterName: string, shape: ComplexShape): string {
    const first = this.dataShapes.get(parameterName);
    if (first === undefined) this.dataShapes.set(parameterName, shape);
    return first === undefined || first === shape
      ? `${parameterName}_data`
      : `${parameterName}_${shape}_data`;
  }

  private intern(spec: FixtureSpec): FixtureSpec {
    const existing = this.interned.get(spec.name);
    if (existing) return existing;
    this.interned.set(spec.name, spec);
    return spec;
  }
}

export function createEnrichmentResolver(
  module: ModuleModel,
  options: EnrichmentOptions
): EnrichmentResolver {
  return new EnrichmentResolver(module, options);
}
