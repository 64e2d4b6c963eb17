/**
 * @arch testsmith.test.unit
 */
import { describe, it, expect } from 'vitest';
import { moduleBaseName, toModuleName } from '../../../../src/core/parser/module-name.js';

describe('toModuleName', () => {
  it('should turn a relative path into a dotted name', () => {
    expect(toModuleName('pkg/services/user.py')).toBe('pkg.services.user');
  });

  it('should map a package init to the package', () => {
    expect(toModuleName('pkg/__init__.py')).toBe('pkg');
  });

  it('should keep a top-level init as is', () => {
    expect(toModuleName('__init__.py')).toBe('__init__');
  });

  it('should use only the file name of an absolute path', () => {
    expect(toModuleName('/srv/app/pkg/calc.py')).toBe('calc');
    expect(toModuleName('C:\\work\\calc.py')).toBe('calc');
  });

  it('should drop relative segments and stub extensions', () => {
    expect(toModuleName('./src/../calc.pyi')).toBe('src.calc');
  });

  it('should sanitise non-identifier characters', () => {
    expect(toModuleName('my-tools/2fa.py')).toBe('my_tools._2fa');
  });

  it('should fall back for empty paths', () => {
    expect(toModuleName('')).toBe('module');
  });
});

describe('moduleBaseName', () => {
  it('should return the last segment', () => {
    expect(moduleBaseName('pkg.services.user')).toBe('user');
    expect(moduleBaseName('calc')).toBe('calc');
  });
});
