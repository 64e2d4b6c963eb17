/**
 * @arch testsmith.test.unit
 */
import { describe, it, expect } from 'vitest';
import {
  annotationHead,
  baseTypeFromAnnotation,
  baseTypeFromDefault,
  resolveBaseType,
  resolveComplexShape,
  unwrapOptional,
} from '../../../../src/core/synthesis/type-resolver.js';
import { param } from '../../../helpers/builders.js';

describe('unwrapOptional', () => {
  it('should unwrap Optional and None unions', () => {
    expect(unwrapOptional('Optional[int]')).toEqual({ inner: 'int', optional: true });
    expect(unwrapOptional('str | None')).toEqual({ inner: 'str', optional: true });
    expect(unwrapOptional('Union[None, dict[str, int]]')).toEqual({ inner: 'dict[str, int]', optional: true });
  });

  it('should strip string annotations', () => {
    expect(unwrapOptional("'Optional[float]'")).toEqual({ inner: 'float', optional: true });
  });

  it('should leave real unions alone', () => {
    expect(unwrapOptional('int | str')).toEqual({ inner: 'int | str', optional: false });
  });

  it('should not split inside brackets', () => {
    expect(unwrapOptional('dict[str, int | None]')).toEqual({ inner: 'dict[str, int | None]', optional: false });
  });
});

describe('annotationHead', () => {
  it('should lowercase the outer name without module prefix', () => {
    expect(annotationHead('typing.List[int]')).toBe('list');
    expect(annotationHead('pd.DataFrame')).toBe('dataframe');
  });
});

describe('baseTypeFromAnnotation', () => {
  it('should map builtin and typing names', () => {
    expect(baseTypeFromAnnotation('int')).toBe('integer');
    expect(baseTypeFromAnnotation('Optional[float]')).toBe('float');
    expect(baseTypeFromAnnotation('typing.Sequence[str]')).toBe('sequence');
    expect(baseTypeFromAnnotation('Mapping[str, int]')).toBe('mapping');
    expect(baseTypeFromAnnotation('bool')).toBe('boolean');
  });

  it('should return unknown for other types', () => {
    expect(baseTypeFromAnnotation('User')).toBe('unknown');
    expect(baseTypeFromAnnotation('int | str')).toBe('unknown');
  });
});

describe('baseTypeFromDefault', () => {
  it.each([
    ['True', 'boolean'],
    ['10', 'integer'],
    ['-1_000', 'integer'],
    ['0.5', 'float'],
    ['1e3', 'float'],
    ["'text'", 'string'],
    ['f"{x}"', 'string'],
    ['[]', 'sequence'],
    ['(1, 2)', 'sequence'],
    ['{}', 'mapping'],
    ["{'a': 1}", 'mapping'],
    ['{1, 2}', 'sequence'],
    ['None', 'unknown'],
  ])('should read %s as %s', (literal, expected) => {
    expect(baseTypeFromDefault(literal)).toBe(expected);
  });
});

describe('resolveBaseType', () => {
  it('should prefer the annotation', () => {
    expect(resolveBaseType(param('x', 'str', '0'))).toBe('string');
  });

  it('should fall back to the default when the annotation is unknown', () => {
    expect(resolveBaseType(param('x', 'Amount', '0'))).toBe('integer');
  });

  it('should be unknown without annotation or default', () => {
    expect(resolveBaseType(param('x'))).toBe('unknown');
  });
});

describe('resolveComplexShape', () => {
  it('should report container and array shapes', () => {
    expect(resolveComplexShape(param('rows', 'list[int]'))).toBe('sequence');
    expect(resolveComplexShape(param('opts', 'Optional[Dict[str, str]]'))).toBe('mapping');
    expect(resolveComplexShape(param('frame', 'pd.DataFrame'))).toBe('tabular');
    expect(resolveComplexShape(param('arr', 'np.ndarray'))).toBe('sequence');
  });

  it('should ignore scalars and unannotated parameters', () => {
    expect(resolveComplexShape(param('n', 'int'))).toBeUndefined();
    expect(resolveComplexShape(param('items', undefined, '[]'))).toBeUndefined();
  });
});
