/**
 * @arch testsmith.core.engine
 *
 * Template renderer: candidate + attached specs -> pytest source text.
 *
 * Output depends only on the inputs; the same candidate and specs always
 * render to the same bytes.
 */
import type {
  ClassModel,
  FixtureSpec,
  FunctionModel,
  GeneratedTestUnit,
  MockSpec,
  ParameterModel,
  ParametrizeSpec,
} from '../model/types.js';
import { RenderError } from '../../utils/errors.js';
import { isSynthesizable } from '../synthesis/synthesizer.js';
import { annotationHead, resolveBaseType, unwrapOptional } from '../synthesis/type-resolver.js';
import { representativeValue } from '../synthesis/value-tables.js';
import { countLines, indent, joinDefinitions, pyString, toSnakeCase } from './python-source.js';

export const PYTEST_IMPORT = 'import pytest';
export const MOCK_IMPORT = 'from unittest.mock import MagicMock, patch';
const ASYNCIO_IMPORT = 'import asyncio';

/** isinstance targets for return annotations */
const RETURN_CHECKS: Record<string, string> = {
  int: 'int',
  float: '(int, float)',
  str: 'str',
  bool: 'bool',
  bytes: 'bytes',
  list: 'list',
  tuple: 'tuple',
  set: 'set',
  frozenset: 'frozenset',
  dict: 'dict',
};

export interface RenderContext {
  /** Dotted import path of the module under test */
  moduleName: string;
  testNamePrefix: string;
  /** Classes of the module, for building instances */
  classes: readonly ClassModel[];
  /** Names already taken in the module; without it names are used as generated */
  names?: TestNameRegistry;
}

/**
 * Test function names handed out within one module. A taken name gets the
 * first free `_2`, `_3`, ... suffix, so the order of claims decides who keeps it.
 */
export class TestNameRegistry {
  private readonly used = new Set<string>();

  claim(name: string): string {
    let unique = name;
    for (let n = 2; this.used.has(unique); n++) unique = `${name}_${n}`;
    this.used.add(unique);
    return unique;
  }
}

export interface UnitAttachments {
  fixtures: FixtureSpec[];
  mocks: MockSpec[];
  parametrize: ParametrizeSpec[];
}

type ValueSource = (parameter: ParameterModel) => string;

/**
 * Name of the base test for a candidate: `test_add`, `test_repository_save`.
 */
export function testFunctionName(candidate: FunctionModel, testNamePrefix: string): string {
  const symbol = candidate.role === 'Constructor' ? 'init' : candidate.name;
  return candidate.owner
    ? `${testNamePrefix}${toSnakeCase(candidate.owner)}_${symbol}`
    : `${testNamePrefix}${symbol}`;
}

function argumentList(parameters: ParameterModel[], valueOf: ValueSource): string {
  return parameters
    .filter(isSynthesizable)
    .map((p) => (p.kind === 'keyword' ? `${p.name}=${valueOf(p)}` : valueOf(p)))
    .join(', ');
}

const literalValue: ValueSource = (p) => representativeValue(resolveBaseType(p));

/**
 * Assertions on `result` derived from the return annotation.
 */
export function returnAssertions(returnType: string | undefined): string[] {
  if (returnType === undefined) return [];
  if (returnType.trim() === 'None') return ['assert result is None'];

  const { inner, optional } = unwrapOptional(returnType);
  const check = RETURN_CHECKS[annotationHead(inner)];
  if (optional) {
    return check ? [`assert result is None or isinstance(result, ${check})`] : [];
  }
  return check ? [`assert isinstance(result, ${check})`] : ['assert result is not None'];
}

/**
 * Statements that exercise the candidate once, given how each argument is produced.
 */
class CallTemplate {
  constructor(
    private readonly candidate: FunctionModel,
    private readonly context: RenderContext
  ) {}

  /** Lines that must run before the call (instance construction). */
  preamble(): string[] {
    const { candidate } = this;
    if (!candidate.owner || candidate.role !== 'Plain') return [];
    return [`instance = ${candidate.owner}(${this.constructorArguments()})`];
  }

  /** Expression that invokes the candidate. */
  expression(valueOf: ValueSource): string {
    const { candidate } = this;
    const args = argumentList(candidate.parameters, valueOf);
    let expr: string;
    switch (candidate.role) {
      case 'Constructor':
        expr = `${this.owner()}(${args})`;
        break;
      case 'ClassMethod':
      case 'StaticMethod':
        expr = `${this.owner()}.${candidate.name}(${args})`;
        break;
      default:
        if (candidate.owner && candidate.isProperty) return `instance.${candidate.name}`;
        expr = candidate.owner ? `instance.${candidate.name}(${args})` : `${candidate.name}(${args})`;
    }
    return candidate.isAsync ? `asyncio.run(${expr})` : expr;
  }

  /** Statements producing and checking the outcome. */
  outcome(valueOf: ValueSource): string[] {
    if (this.candidate.role === 'Constructor') {
      const owner = this.owner();
      return [`instance = ${this.expression(valueOf)}`, `assert isinstance(instance, ${owner})`];
    }
    return [
      `result = ${this.expression(valueOf)}`,
      ...returnAssertions(this.candidate.returnType),
    ];
  }

  private owner(): string {
    if (!this.candidate.owner) {
      throw new RenderError(
        this.candidate.qualifiedName,
        `${this.candidate.role} ${this.candidate.qualifiedName} has no enclosing class`
      );
    }
    return this.candidate.owner;
  }

  private constructorArguments(): string {
    const owner = this.owner();
    const cls = this.context.classes.find((c) => c.name === owner);
    if (!cls) {
      throw new RenderError(
        this.candidate.qualifiedName,
        `Class ${owner} of ${this.candidate.qualifiedName} is not in the module`
      );
    }
    const constructor = cls.methods.find((m) => m.role === 'Constructor');
    if (!constructor) return '';
    const required = constructor.parameters.filter((p) => p.defaultValue === undefined);
    return argumentList(required, literalValue);
  }
}

function wrapWithMocks(lines: string[], mocks: MockSpec[]): string[] {
  if (mocks.length === 0) return lines;
  const managers = mocks
    .map((m) => `patch(${pyString(m.patchPath)}${m.create ? ', create=True' : ''}) as ${m.variable}`)
    .join(', ');
  return [
    `with ${managers}:`,
    ...indent([...mocks.map((m) => `${m.variable}.return_value = ${m.returnValue}`), ...lines]),
  ];
}

function renderFunction(
  decorator: string[],
  name: string,
  args: string[],
  docstring: string,
  statements: string[]
): string {
  return [
    ...decorator,
    `def ${name}(${args.join(', ')}):`,
    ...indent([`"""${docstring}"""`, ...statements]),
  ].join('\n');
}

function parametrizeDecorator(argNames: string, rows: string[], ids: string[]): string[] {
  return [
    '@pytest.mark.parametrize(',
    `    ${pyString(argNames)},`,
    '    [',
    ...rows.map((row) => `        ${row},`),
    '    ],',
    `    ids=[${ids.map(pyString).join(', ')}],`,
    ')',
  ];
}

function renderTierTest(
  spec: ParametrizeSpec,
  name: string,
  template: CallTemplate,
  mocks: MockSpec[]
): string {
  const parameter = spec.parameterName;
  const valueOf: ValueSource = (p) => (p.name === parameter ? p.name : literalValue(p));
  const rows = spec.cases.map(
    (c) => `(${c.values[parameter]}, ${c.expectedError ?? 'None'})`
  );
  const statements = [
    ...template.preamble(),
    'if expected_error is not None:',
    '    with pytest.raises(expected_error):',
    `        ${template.expression(valueOf)}`,
    '    return',
    ...template.outcome(valueOf),
  ];
  return renderFunction(
    parametrizeDecorator(`${parameter}, expected_error`, rows, spec.ids ?? spec.cases.map((c) => c.name)),
    name,
    [parameter, 'expected_error'],
    `Tiered inputs for ${parameter}.`,
    wrapWithMocks(statements, mocks)
  );
}

function renderCombinedTest(
  spec: ParametrizeSpec,
  name: string,
  template: CallTemplate,
  mocks: MockSpec[]
): string {
  const covered = new Set(spec.parameters);
  const valueOf: ValueSource = (p) => (covered.has(p.name) ? p.name : literalValue(p));
  const rows = spec.cases.map((c) => `(${spec.parameters.map((name) => c.values[name]).join(', ')})`);
  return renderFunction(
    parametrizeDecorator(spec.parameterName, rows, spec.ids ?? spec.cases.map((c) => c.name)),
    name,
    spec.parameters,
    `Combined inputs for ${spec.parameterName}.`,
    wrapWithMocks([...template.preamble(), ...template.outcome(valueOf)], mocks)
  );
}

/**
 * Render one candidate into a unit of pytest functions.
 */
export function renderTestUnit(
  candidate: FunctionModel,
  attachments: UnitAttachments,
  context: RenderContext
): GeneratedTestUnit {
  const claim = (name: string): string => context.names?.claim(name) ?? name;
  const baseName = claim(testFunctionName(candidate, context.testNamePrefix));
  const template = new CallTemplate(candidate, context);
  const { fixtures, mocks, parametrize } = attachments;

  const dataFixtures = new Map<string, string>();
  for (const fixture of fixtures) {
    if (fixture.origin === 'parameter' && fixture.parameter) dataFixtures.set(fixture.parameter, fixture.name);
  }
  const baseValue: ValueSource = (p) => dataFixtures.get(p.name) ?? literalValue(p);

  const definitions = [
    renderFunction(
      [],
      baseName,
      fixtures.map((f) => f.name),
      `Test ${candidate.qualifiedName} with representative inputs.`,
      wrapWithMocks([...template.preamble(), ...template.outcome(baseValue)], mocks)
    ),
    ...parametrize.map((spec) =>
      spec.kind === 'combined'
        ? renderCombinedTest(spec, claim(`${baseName}_combined`), template, mocks)
        : renderTierTest(spec, claim(`${baseName}_${spec.parameterName}`), template, mocks)
    ),
  ];

  const imports = new Set<string>([
    PYTEST_IMPORT,
    `from ${context.moduleName} import ${candidate.owner ?? candidate.name}`,
  ]);
  for (const fixture of fixtures) {
    for (const dependency of fixture.dependencies) imports.add(`import ${dependency}`);
  }
  if (mocks.length > 0) imports.add(MOCK_IMPORT);
  if (candidate.isAsync) imports.add(ASYNCIO_IMPORT);

  const body = joinDefinitions(definitions);
  return {
    name: baseName,
    candidate: candidate.qualifiedName,
    body,
    imports: [...imports].sort(),
    fixtures,
    mocks,
    parametrize,
    lineCount: countLines(body),
  };
}

/**
 * Render a fixture definition. Fixtures with teardown yield their value.
 */
export function renderFixture(fixture: FixtureSpec): string {
  const decorator = fixture.scope === 'function'
    ? '@pytest.fixture'
    : `@pytest.fixture(scope=${pyString(fixture.scope)})`;
  const handoff = fixture.teardown.length > 0
    ? [`yield ${fixture.value}`, ...fixture.teardown]
    : [`return ${fixture.value}`];
  return renderFunction(
    [decorator],
    fixture.name,
    [],
    fixture.docstring,
    [...fixture.setup, ...handoff]
  );
}
