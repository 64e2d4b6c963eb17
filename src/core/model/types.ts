/**
 * @arch testsmith.core.types
 *
 * Records passed between pipeline stages. Every stage builds new values;
 * nothing here is mutated after construction.
 */

/** Role tag resolved once from decorators and the method name. */
export type FunctionRole = 'Plain' | 'ClassMethod' | 'StaticMethod' | 'Constructor';

/**
 * How an argument binds at a call site.
 * `positional` covers every parameter declared before a bare `*` or `*args`.
 */
export type ParameterKind = 'positional' | 'keyword' | 'varargs' | 'kwargs';

export interface ParameterModel {
  name: string;
  /** Annotation text as written */
  declaredType?: string;
  /** Default value source text */
  defaultValue?: string;
  kind: ParameterKind;
}

export interface FunctionModel {
  name: string;
  /** `Class.method` for methods, the bare name for free functions */
  qualifiedName: string;
  /** Declared parameters, without the implicit receiver */
  parameters: ParameterModel[];
  returnType?: string;
  docstring?: string;
  role: FunctionRole;
  isAsync: boolean;
  isProperty: boolean;
  decorators: string[];
  /** Sorted, unique dependency tokens */
  dependencies: string[];
  /** 1-based source line of the `def` */
  line: number;
  /** Enclosing class name, for methods */
  owner?: string;
}

export interface ClassModel {
  name: string;
  methods: FunctionModel[];
  bases: string[];
  decorators: string[];
  /** Union of the methods' dependency tokens */
  dependencies: string[];
  line: number;
  docstring?: string;
}

/** A declaration left out of the model, with the reason. */
export interface SkippedSymbol {
  name: string;
  line: number;
  reason: string;
  code: string;
}

export interface ModuleModel {
  sourcePath: string;
  /** Dotted import path of the analyzed module */
  moduleName: string;
  functions: FunctionModel[];
  classes: ClassModel[];
  dependencies: string[];
  skipped: SkippedSymbol[];
}

export type FixtureScope = 'function' | 'class' | 'module' | 'session';

export interface FixtureSpec {
  name: string;
  scope: FixtureScope;
  setup: string[];
  /** Expression handed to the test (returned, or yielded when there is teardown) */
  value: string;
  teardown: string[];
  /** Modules the setup code imports */
  dependencies: string[];
  docstring: string;
  origin: 'category' | 'parameter';
  /** Parameter a `parameter` fixture stands in for */
  parameter?: string;
}

export interface MockSpec {
  /** Dependency token being replaced */
  target: string;
  patchPath: string;
  /** Python expression assigned to the mock's return value */
  returnValue: string;
  /** Name bound by `with patch(...) as <variable>` */
  variable: string;
  /** Patch with `create=True`; the target may not be a module attribute */
  create: boolean;
}

export type Tier = 'happy' | 'edge' | 'error' | 'boundary';

export interface TestCase {
  name: string;
  /** Parameter name -> Python literal */
  values: Record<string, string>;
  expectedResult?: string;
  /** Exception name the call must raise */
  expectedError?: string;
  description: string;
}

export interface ParametrizeSpec {
  /** Comma-separated argument names as written in the decorator */
  parameterName: string;
  parameters: string[];
  kind: 'tier' | 'combined';
  cases: TestCase[];
  ids?: string[];
}

export interface GeneratedTestUnit {
  name: string;
  /** Qualified name of the candidate under test */
  candidate: string;
  body: string;
  imports: string[];
  fixtures: FixtureSpec[];
  mocks: MockSpec[];
  parametrize: ParametrizeSpec[];
  lineCount: number;
}

export interface OutputFile {
  path: string;
  units: GeneratedTestUnit[];
  fixtures: FixtureSpec[];
  /** Sorted, unique import lines */
  imports: string[];
  content: string;
  headerLineCount: number;
  lineCount: number;
}
