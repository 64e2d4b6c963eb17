/**
 * @arch testsmith.test.helpers
 *
 * Builders for pipeline records used across unit tests.
 */
import type {
  ClassModel,
  FunctionModel,
  ModuleModel,
  ParameterModel,
} from '../../src/core/model/types.js';

export function param(name: string, declaredType?: string, defaultValue?: string): ParameterModel {
  return {
    name,
    kind: 'positional',
    ...(declaredType !== undefined ? { declaredType } : {}),
    ...(defaultValue !== undefined ? { defaultValue } : {}),
  };
}

export function fn(name: string, overrides: Partial<FunctionModel> = {}): FunctionModel {
  const owner = overrides.owner;
  return {
    name,
    qualifiedName: owner ? `${owner}.${name}` : name,
    parameters: [],
    role: 'Plain',
    isAsync: false,
    isProperty: false,
    decorators: [],
    dependencies: [],
    line: 1,
    ...overrides,
  };
}

export function cls(name: string, methods: FunctionModel[], line = 1): ClassModel {
  return {
    name,
    methods,
    bases: [],
    decorators: [],
    dependencies: [...new Set(methods.flatMap((m) => m.dependencies))].sort(),
    line,
  };
}

export function moduleOf(
  functions: FunctionModel[],
  classes: ClassModel[] = [],
  moduleName = 'calc'
): ModuleModel {
  return {
    sourcePath: `${moduleName.split('.').join('/')}.py`,
    moduleName,
    functions,
    classes,
    dependencies: [
      ...new Set([...functions, ...classes].flatMap((d) => d.dependencies)),
    ].sort(),
    skipped: [],
  };
}
