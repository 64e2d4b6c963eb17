/**
 * @arch testsmith.test.unit
 */
import { describe, it, expect } from 'vitest';
import { HumanFormatter } from '../../../../src/cli/formatters/human.js';
import { JsonFormatter } from '../../../../src/cli/formatters/json.js';
import { createFormatter } from '../../../../src/cli/formatters/index.js';
import type { GenerationReport, ModuleReport } from '../../../../src/cli/formatters/types.js';
import { fn, moduleOf, param } from '../../../helpers/builders.js';

const report: GenerationReport = {
  batch: {
    results: [
      {
        status: 'processed',
        path: 'pkg/calc.py',
        files: [],
        tested: ['add'],
        symbolSkips: [{ symbol: '_hidden', line: 5, reason: 'excluded: private name' }],
      },
      { status: 'skipped', path: 'pkg/broken.py', reason: 'Syntax error in pkg/broken.py at line 1, column 11', code: 'P001' },
    ],
    summary: { filesProcessed: 1, filesSkipped: 1, symbolsTested: 1, symbolsSkipped: 1 },
    skips: [
      { path: 'pkg/calc.py::_hidden', reason: 'excluded: private name' },
      { path: 'pkg/broken.py', reason: 'Syntax error in pkg/broken.py at line 1, column 11' },
    ],
  },
  writes: { written: ['tests/generated/pkg/test_calc.py'], skipped: [] },
  dryRun: false,
};

describe('HumanFormatter', () => {
  it('should summarize a batch and list file-level skips', () => {
    const output = new HumanFormatter({ colors: false }).formatGeneration(report);

    expect(output).toBe(
      [
        'Generation summary',
        '  Files processed:  1',
        '  Files skipped:    1',
        '  Symbols tested:   1',
        '  Symbols skipped:  1',
        '',
        'Wrote 1 test file(s)',
        '  tests/generated/pkg/test_calc.py',
        '',
        'Skipped:',
        '  pkg/broken.py: Syntax error in pkg/broken.py at line 1, column 11',
      ].join('\n')
    );
  });

  it('should list symbol skips in verbose mode', () => {
    const output = new HumanFormatter({ colors: false, verbose: true }).formatGeneration(report);

    expect(output).toContain('  pkg/calc.py::_hidden: excluded: private name');
  });

  it('should mention kept files and dry runs', () => {
    const output = new HumanFormatter({ colors: false }).formatGeneration({
      ...report,
      writes: { written: [], skipped: ['tests/generated/pkg/test_calc.py'] },
      dryRun: true,
    });

    expect(output).toContain('Would write 0 test file(s)');
    expect(output).toContain('Kept 1 existing file(s) (use --overwrite)\n  tests/generated/pkg/test_calc.py');
  });

  it('should describe a module', () => {
    const module = {
      ...moduleOf([
        fn('fetch', { isAsync: true, parameters: [param('url', 'str'), { name: 'opts', kind: 'kwargs' }], returnType: 'bytes', dependencies: ['requests'] }),
      ]),
      skipped: [{ name: 'Outer.Inner', line: 9, reason: 'nested class', code: 'P002' }],
    };
    const moduleReport: ModuleReport = {
      module,
      classification: [{ symbol: module.functions[0], included: true }],
    };

    expect(new HumanFormatter({ colors: false }).formatModule(moduleReport)).toBe(
      [
        'calc (calc.py)',
        '  Dependencies: requests',
        '',
        '  ✓ async fetch(url: str, **opts) -> bytes',
        '',
        'Unsupported:',
        '  line 9 Outer.Inner: nested class',
      ].join('\n')
    );
  });
});

describe('JsonFormatter', () => {
  it('should report outputs without file content', () => {
    const parsed = JSON.parse(new JsonFormatter().formatGeneration(report));

    expect(parsed.files).toEqual([
      { path: 'pkg/calc.py', status: 'processed', outputs: [], tested: ['add'] },
      { path: 'pkg/broken.py', status: 'skipped', reason: 'Syntax error in pkg/broken.py at line 1, column 11' },
    ]);
    expect(parsed.written).toEqual(['tests/generated/pkg/test_calc.py']);
    expect(parsed.dryRun).toBe(false);
  });
});

describe('createFormatter', () => {
  it('should pick the formatter for the output mode', () => {
    expect(createFormatter(true)).toBeInstanceOf(JsonFormatter);
    expect(createFormatter(false)).toBeInstanceOf(HumanFormatter);
  });
});
