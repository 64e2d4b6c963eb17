/**
 * @arch testsmith.core.engine
 *
 * Structural parser: Python source text -> ModuleModel.
 *
 * Declarations are recorded in source order. Shapes the pipeline cannot
 * handle are skipped per symbol and listed in `ModuleModel.skipped`.
 */
import type Parser from 'tree-sitter';
import type {
  ClassModel,
  FunctionModel,
  FunctionRole,
  ModuleModel,
  SkippedSymbol,
} from '../model/types.js';
import {
  SyntaxAnalysisError,
  UnsupportedConstructError,
  getErrorMessage,
} from '../../utils/errors.js';
import { logger as rootLogger } from '../../utils/logger.js';
import {
  createPythonParser,
  findFirstErrorNode,
  getNodeLine,
  getNodeText,
  walkTree,
} from './tree-sitter-utils.js';
import {
  decoratorBaseName,
  extractDecoratorNames,
  extractDocstring,
  extractParameters,
} from './declarations.js';
import { collectDependencyTokens, mergeTokens } from './dependencies.js';
import { toModuleName } from './module-name.js';

const log = rootLogger.child('parser');

/** Python tree-sitter node types for definitions */
const PyDefinitionNodes = {
  CLASS_DEFINITION: 'class_definition',
  FUNCTION_DEFINITION: 'function_definition',
  DECORATED_DEFINITION: 'decorated_definition',
  DECORATOR: 'decorator',
} as const;

/** Compound statements whose bodies only run conditionally or repeatedly */
const CONDITIONAL_BLOCKS: Record<string, string> = {
  if_statement: 'if',
  try_statement: 'try',
  with_statement: 'with',
  for_statement: 'for',
  while_statement: 'while',
  match_statement: 'match',
};

const PROPERTY_DECORATORS = new Set(['property', 'cached_property']);

interface Definition {
  node: Parser.SyntaxNode;
  decorators: Parser.SyntaxNode[];
}

let sharedParser: Parser | undefined;

function getParser(): Parser {
  sharedParser ??= createPythonParser();
  return sharedParser;
}

/**
 * Parse one source unit. Malformed input is returned as a SyntaxAnalysisError, never thrown.
 */
export function analyze(sourceText: string, logicalPath: string): ModuleModel | SyntaxAnalysisError {
  let tree: Parser.Tree;
  try {
    // The binding rejects input longer than its read buffer, so size it to the source
    tree = getParser().parse(sourceText, undefined, { bufferSize: sourceText.length * 2 + 1 });
  } catch (error) {
    return new SyntaxAnalysisError(
      logicalPath,
      1,
      1,
      `Failed to parse ${logicalPath}: ${getErrorMessage(error)}`
    );
  }

  const errorNode = findFirstErrorNode(tree.rootNode);
  if (errorNode) {
    const line = errorNode.startPosition.row + 1;
    const column = errorNode.startPosition.column + 1;
    log.debug(`Syntax error in ${logicalPath} at ${line}:${column}`);
    return new SyntaxAnalysisError(logicalPath, line, column);
  }

  const collector = new ModuleCollector(sourceText);
  for (const statement of tree.rootNode.namedChildren) {
    collector.visitStatement(statement);
  }

  const { functions, classes, skipped } = collector;
  log.debug(`Analyzed ${logicalPath}`, {
    functions: functions.length,
    classes: classes.length,
    skipped: skipped.length,
  });

  return {
    sourcePath: logicalPath,
    moduleName: toModuleName(logicalPath),
    functions,
    classes,
    dependencies: mergeTokens([
      ...functions.map((fn) => fn.dependencies),
      ...classes.map((cls) => cls.dependencies),
    ]),
    skipped,
  };
}

/**
 * Type guard separating the two outcomes of `analyze`.
 */
export function isSyntaxAnalysisError(
  result: ModuleModel | SyntaxAnalysisError
): result is SyntaxAnalysisError {
  return result instanceof SyntaxAnalysisError;
}

function unwrapDefinition(node: Parser.SyntaxNode): Definition | undefined {
  if (node.type === PyDefinitionNodes.DECORATED_DEFINITION) {
    const definition = node.childForFieldName('definition');
    if (!definition) return undefined;
    return {
      node: definition,
      decorators: node.namedChildren.filter((c) => c.type === PyDefinitionNodes.DECORATOR),
    };
  }
  if (
    node.type === PyDefinitionNodes.FUNCTION_DEFINITION ||
    node.type === PyDefinitionNodes.CLASS_DEFINITION
  ) {
    return { node, decorators: [] };
  }
  return undefined;
}

/** Outermost function/class definitions nested anywhere inside a statement. */
function findNestedDefinitions(statement: Parser.SyntaxNode): Parser.SyntaxNode[] {
  const found: Parser.SyntaxNode[] = [];
  walkTree(statement, (node) => {
    if (
      node.type === PyDefinitionNodes.FUNCTION_DEFINITION ||
      node.type === PyDefinitionNodes.CLASS_DEFINITION
    ) {
      found.push(node);
      return false;
    }
    return true;
  });
  return found;
}

class ModuleCollector {
  readonly functions: FunctionModel[] = [];
  readonly classes: ClassModel[] = [];
  readonly skipped: SkippedSymbol[] = [];

  constructor(private readonly sourceCode: string) {}

  visitStatement(statement: Parser.SyntaxNode): void {
    const definition = unwrapDefinition(statement);
    if (!definition) {
      this.skipConditionalDefinitions(statement, undefined);
      return;
    }

    try {
      if (definition.node.type === PyDefinitionNodes.CLASS_DEFINITION) {
        this.declare(this.readClass(definition));
      } else {
        this.declare(this.readFunction(definition, undefined));
      }
    } catch (error) {
      this.recordSkip(error);
    }
  }

  private recordSkip(error: unknown): void {
    if (!(error instanceof UnsupportedConstructError)) throw error;
    log.debug(`Skipping ${error.symbol}: ${error.message}`);
    this.skipped.push({
      name: error.symbol,
      line: error.line,
      reason: error.message,
      code: error.code,
    });
  }

  /** Functions and classes share the module namespace; a later definition replaces an earlier one. */
  private declare(symbol: FunctionModel | ClassModel): void {
    const fnIndex = this.functions.findIndex((fn) => fn.name === symbol.name);
    const clsIndex = this.classes.findIndex((cls) => cls.name === symbol.name);
    const shadowed = fnIndex >= 0 ? this.functions[fnIndex] : clsIndex >= 0 ? this.classes[clsIndex] : undefined;
    if (shadowed) {
      if (fnIndex >= 0) this.functions.splice(fnIndex, 1);
      if (clsIndex >= 0) this.classes.splice(clsIndex, 1);
      this.recordSkip(
        new UnsupportedConstructError(
          shadowed.name,
          shadowed.line,
          `redefined at line ${symbol.line}`
        )
      );
    }

    if ('methods' in symbol) {
      this.classes.push(symbol);
    } else {
      this.functions.push(symbol);
    }
  }

  private skipConditionalDefinitions(statement: Parser.SyntaxNode, owner: string | undefined): void {
    const block = CONDITIONAL_BLOCKS[statement.type];
    if (!block) return;

    for (const node of findNestedDefinitions(statement)) {
      const nameNode = node.childForFieldName('name');
      if (!nameNode) continue;
      const name = getNodeText(nameNode, this.sourceCode);
      this.recordSkip(
        new UnsupportedConstructError(
          owner ? `${owner}.${name}` : name,
          getNodeLine(node),
          `conditional definition inside ${block} block`
        )
      );
    }
  }

  private readFunction(definition: Definition, owner: string | undefined): FunctionModel {
    const { node } = definition;
    const nameNode = node.childForFieldName('name');
    const name = nameNode ? getNodeText(nameNode, this.sourceCode) : '<anonymous>';
    const qualifiedName = owner ? `${owner}.${name}` : name;
    const line = getNodeLine(node);

    const decorators = extractDecoratorNames(definition.decorators, this.sourceCode);
    const baseNames = decorators.map(decoratorBaseName);

    if (baseNames.includes('overload')) {
      throw new UnsupportedConstructError(qualifiedName, line, 'overload stub');
    }
    const accessor = decorators.find((d) => /\.(setter|deleter)$/.test(d));
    if (accessor) {
      throw new UnsupportedConstructError(
        qualifiedName,
        line,
        `property ${decoratorBaseName(accessor)}`
      );
    }

    const role = resolveRole(name, baseNames, owner);
    const paramsNode = node.childForFieldName('parameters');
    let parameters = paramsNode ? extractParameters(paramsNode, this.sourceCode) : [];
    if (owner && role !== 'StaticMethod' && parameters[0]?.kind === 'positional') {
      parameters = parameters.slice(1);
    }

    const returnTypeNode = node.childForFieldName('return_type');
    const body = node.childForFieldName('body');
    const docstring = extractDocstring(body, this.sourceCode);

    return {
      name,
      qualifiedName,
      parameters,
      ...(returnTypeNode ? { returnType: getNodeText(returnTypeNode, this.sourceCode) } : {}),
      ...(docstring !== undefined ? { docstring } : {}),
      role,
      isAsync: getNodeText(node, this.sourceCode).startsWith('async'),
      isProperty: owner !== undefined && baseNames.some((d) => PROPERTY_DECORATORS.has(d)),
      decorators,
      dependencies: body ? collectDependencyTokens(body, this.sourceCode) : [],
      line,
      ...(owner ? { owner } : {}),
    };
  }

  private readClass(definition: Definition): ClassModel {
    const { node } = definition;
    const nameNode = node.childForFieldName('name');
    const name = nameNode ? getNodeText(nameNode, this.sourceCode) : '<anonymous>';
    const body = node.childForFieldName('body');

    const methods: FunctionModel[] = [];
    for (const statement of body?.namedChildren ?? []) {
      const member = unwrapDefinition(statement);
      if (!member) {
        this.skipConditionalDefinitions(statement, name);
        continue;
      }

      try {
        if (member.node.type === PyDefinitionNodes.CLASS_DEFINITION) {
          const innerName = member.node.childForFieldName('name');
          throw new UnsupportedConstructError(
            `${name}.${innerName ? getNodeText(innerName, this.sourceCode) : '<anonymous>'}`,
            getNodeLine(member.node),
            'nested class'
          );
        }
        const method = this.readFunction(member, name);
        const previous = methods.findIndex((m) => m.name === method.name);
        if (previous >= 0) {
          const [shadowed] = methods.splice(previous, 1);
          this.recordSkip(
            new UnsupportedConstructError(
              shadowed.qualifiedName,
              shadowed.line,
              `redefined at line ${method.line}`
            )
          );
        }
        methods.push(method);
      } catch (error) {
        this.recordSkip(error);
      }
    }

    const docstring = extractDocstring(body, this.sourceCode);
    return {
      name,
      methods,
      bases: this.readBases(node),
      decorators: extractDecoratorNames(definition.decorators, this.sourceCode),
      dependencies: mergeTokens(methods.map((m) => m.dependencies)),
      line: getNodeLine(node),
      ...(docstring !== undefined ? { docstring } : {}),
    };
  }

  private readBases(classNode: Parser.SyntaxNode): string[] {
    const superclasses = classNode.childForFieldName('superclasses');
    if (!superclasses) return [];
    return superclasses.namedChildren
      .filter((c) => c.type === 'identifier' || c.type === 'attribute' || c.type === 'subscript')
      .map((c) => getNodeText(c, this.sourceCode))
      .filter((base) => base !== 'object');
  }
}

function resolveRole(name: string, decorators: string[], owner: string | undefined): FunctionRole {
  if (!owner) return 'Plain';
  if (name === '__init__') return 'Constructor';
  if (decorators.includes('classmethod')) return 'ClassMethod';
  if (decorators.includes('staticmethod')) return 'StaticMethod';
  return 'Plain';
}
