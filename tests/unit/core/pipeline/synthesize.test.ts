/**
 * @arch testsmith.test.unit
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { analyze, isSyntaxAnalysisError } from '../../../../src/core/parser/analyzer.js';
import { synthesize, synthesizeWithReport } from '../../../../src/core/pipeline/synthesize.js';
import { createConfiguration } from '../../../../src/core/config/loader.js';
import type { ModuleModel } from '../../../../src/core/model/types.js';
import { ConfigurationError } from '../../../../src/utils/errors.js';
import { fn, moduleOf } from '../../../helpers/builders.js';

function parse(source: string, path = 'calc.py'): ModuleModel {
  const result = analyze(source, path);
  if (isSyntaxAnalysisError(result)) throw result;
  return result;
}

const calcSource = [
  'def add(a: int, b: int) -> int:',
  '    return a + b',
  '',
  '',
  'def _internal():',
  '    return None',
  '',
].join('\n');

const repositorySource = [
  'class Repository:',
  '    def save(self, item):',
  '        self.database_session.add(item)',
  '',
  '    def load(self, key):',
  '        return self.database_session.get(key)',
  '',
].join('\n');

describe('synthesize', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('should test public functions only (scenario A)', () => {
    const config = createConfiguration({ includePrivate: false, coverageLevel: 'happyPath', maxLinesPerFile: 50 });

    const report = synthesizeWithReport(parse(calcSource), config);

    expect(report.tested).toEqual(['add']);
    expect(report.files).toHaveLength(1);
    const [file] = report.files;
    expect(file.path).toBe('test_calc.py');
    expect(file.units.map((u) => u.candidate)).toEqual(['add']);

    const tierSpecs = file.units[0].parametrize.filter((s) => s.kind === 'tier');
    expect(tierSpecs.map((s) => s.parameterName)).toEqual(['a', 'b']);
    for (const spec of tierSpecs) {
      expect(spec.cases.filter((c) => c.name.startsWith('happy_')).length).toBeGreaterThanOrEqual(1);
    }
    expect(file.content).not.toContain('def test__internal');
  });

  it('should record excluded private helpers as skipped', () => {
    const report = synthesizeWithReport(parse(calcSource), createConfiguration());

    expect(report.skipped).toEqual([
      { symbol: '_internal', line: 5, reason: 'excluded: private name' },
    ]);
  });

  it('should share one fixture between methods with the same dependency (scenario B)', () => {
    const config = createConfiguration({ maxLinesPerFile: 1000 });

    const [file, ...rest] = synthesize(parse(repositorySource, 'repo.py'), config);

    expect(rest).toEqual([]);
    expect(file.fixtures.map((f) => f.name)).toEqual(['database_fixture']);
    expect(file.content.split('def database_fixture():')).toHaveLength(2);
    expect(file.content).toContain('def test_repository_save(database_fixture):\n');
    expect(file.content).toContain('def test_repository_load(database_fixture):\n');
    expect(file.content).toContain('    instance = Repository()\n');
  });

  it('should produce every tier and at most three combined cases at full coverage (scenario C)', () => {
    const config = createConfiguration({ coverageLevel: 'full', maxLinesPerFile: 1000 });

    const [file] = synthesize(parse('def f(x: int, y: str):\n    return x\n', 'mod.py'), config);
    const specs = file.units[0].parametrize;

    for (const name of ['x', 'y']) {
      const spec = specs.find((s) => s.kind === 'tier' && s.parameterName === name);
      const tiers = new Set(spec?.cases.map((c) => c.name.split('_')[0]));
      expect([...tiers]).toEqual(['happy', 'edge', 'error', 'boundary']);
    }
    const combined = specs.filter((s) => s.kind === 'combined');
    expect(combined).toHaveLength(1);
    const names = combined[0].cases.map((c) => c.name);
    expect(names.length).toBeLessThanOrEqual(3);
    expect(new Set(names).size).toBe(names.length);
  });

  it('should be idempotent', () => {
    const module = parse(repositorySource, 'repo.py');
    const config = createConfiguration({ coverageLevel: 'full', maxLinesPerFile: 60 });

    const first = synthesize(module, config);
    const second = synthesize(module, config);

    expect(second.map((f) => [f.path, f.content])).toEqual(first.map((f) => [f.path, f.content]));
  });

  it('should respect the line budget and line-count identity', () => {
    const source = Array.from(
      { length: 8 },
      (_, i) => `def step_${i}(value: int, label: str) -> int:\n    return value\n\n`
    ).join('');
    const config = createConfiguration({ coverageLevel: 'comprehensive', maxLinesPerFile: 200 });

    const files = synthesize(parse(source, 'steps.py'), config);

    expect(files.map((f) => f.units.length)).toEqual([2, 2, 2, 2]);
    expect(files.flatMap((f) => f.units.map((u) => u.candidate))).toEqual(
      Array.from({ length: 8 }, (_, i) => `step_${i}`)
    );
    for (const file of files) {
      expect(file.lineCount).toBeLessThanOrEqual(200);
      const unitLines = file.units.reduce((sum, u) => sum + u.lineCount, 0);
      expect(file.lineCount).toBe(file.headerLineCount + unitLines);
    }
  });

  it('should emit only base tests when parametrization is off', () => {
    const config = createConfiguration({ generateParametrize: false });

    const [file] = synthesize(parse(calcSource), config);

    expect(file.units[0].parametrize).toEqual([]);
    expect(file.content).not.toContain('@pytest.mark.parametrize');
    expect(file.content).toContain('    result = add(42, 42)\n');
  });

  it('should use the configured prefix for files and tests', () => {
    const [file] = synthesize(parse(calcSource), createConfiguration({ testNamePrefix: 'check_' }));

    expect(file.path).toBe('check_calc.py');
    expect(file.content).toContain('def check_add():\n');
  });

  it('should give every generated test a distinct name within the module', () => {
    const source = [
      'class Cart:',
      '    def total(self):',
      '        return 0',
      '',
      '',
      'def cart_total():',
      '    return 0',
      '',
      '',
      'def add(a: int, b: int) -> int:',
      '    return a + b',
      '',
      '',
      'def add_a(x: int) -> int:',
      '    return x',
      '',
    ].join('\n');

    const files = synthesize(parse(source), createConfiguration());
    const names = files.flatMap((file) => [...file.content.matchAll(/^def (test_\w+)\(/gm)].map((m) => m[1]));

    expect(names).toEqual([
      'test_cart_total',
      'test_cart_total_2',
      'test_add',
      'test_add_a',
      'test_add_b',
      'test_add_combined',
      'test_add_a_2',
      'test_add_a_2_x',
    ]);
  });

  it('should return no files for a module without candidates', () => {
    expect(synthesize(parse('X = 1\n'), createConfiguration())).toEqual([]);
  });

  it('should skip a symbol that cannot be rendered and keep the rest', () => {
    const module = moduleOf([fn('ok', { line: 1 }), fn('run', { owner: 'Ghost', line: 3 })]);

    const report = synthesizeWithReport(module, createConfiguration());

    expect(report.tested).toEqual(['ok']);
    expect(report.skipped).toEqual([
      {
        symbol: 'Ghost.run',
        line: 3,
        reason: 'Class Ghost of Ghost.run is not in the module',
        code: 'P003',
      },
    ]);
  });

  it('should reject an invalid configuration before doing any work', () => {
    const config = { ...createConfiguration(), maxLinesPerFile: 0 };

    expect(() => synthesize(parse(calcSource), config)).toThrow(ConfigurationError);
  });
});
