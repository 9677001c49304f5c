import { parseCoverageJson } from '../../data/coverageData';
import { displayPercent, formatLineRanges, percentCovered, summarize } from '../coverageSummary';
import { reportToText } from '../textReport';
import { reportToMarkdown } from '../markdownReport';

function sampleSummary(precision = 0) {
  const data = parseCoverageJson(
    {
      files: {
        'b.py': { executed_lines: [1, 6], missing_lines: [2, 5] },
        'a.py': { executed_lines: [1, 2, 4, 5], missing_lines: [3] },
      },
    },
    '/proj/coverage.json',
  );
  return summarize(data.files, precision);
}

describe('coverage numbers', () => {
  test('percentCovered treats an empty file as fully covered', () => {
    expect(percentCovered({ statements: 0, missing: 0 })).toBe(100);
    expect(percentCovered({ statements: 4, missing: 1 })).toBe(75);
  });

  test('displayPercent only shows 0 and 100 when exact', () => {
    expect(displayPercent(0)).toBe('0');
    expect(displayPercent(0.2)).toBe('1');
    expect(displayPercent(99.9)).toBe('99');
    expect(displayPercent(100)).toBe('100');
    expect(displayPercent((2 / 3) * 100)).toBe('67');
    expect(displayPercent(99.95, 1)).toBe('99.9');
  });

  test('formatLineRanges bridges lines that are not statements', () => {
    expect(formatLineRanges([1, 2, 5, 6], [2, 5])).toBe('2-5');
    expect(formatLineRanges([1, 2, 3, 4, 9, 10], [2, 3, 4, 10])).toBe('2-4, 10');
    expect(formatLineRanges([1, 2], [])).toBe('');
  });

  test('summarize totals the rows', () => {
    const summary = sampleSummary();
    expect(summary.files.map((f) => [f.name, f.statements, f.missing, f.missingLines])).toEqual([
      ['a.py', 5, 1, '3'],
      ['b.py', 4, 2, '2-5'],
    ]);
    expect(summary.total).toEqual({ statements: 9, missing: 3 });
  });
});

describe('text report', () => {
  test('renders the table with missing lines and a total', () => {
    expect(reportToText(sampleSummary(), { showMissing: true })).toBe(
      [
        'Name    Stmts   Miss  Cover   Missing',
        '-------------------------------------',
        'a.py        5      1    80%   3',
        'b.py        4      2    50%   2-5',
        '-------------------------------------',
        'TOTAL       9      3    67%',
        '',
      ].join('\n'),
    );
  });

  test('a single file has no total row', () => {
    const summary = sampleSummary();
    summary.files = summary.files.slice(0, 1);
    expect(reportToText(summary)).toBe(['Name    Stmts   Miss  Cover', '---------------------------', 'a.py        5      1    80%', ''].join('\n'));
  });
});

describe('markdown report', () => {
  test('renders a pipe table with a bold total', () => {
    expect(reportToMarkdown(sampleSummary())).toBe(
      [
        '| Name | Stmts | Miss | Cover |',
        '|---|---:|---:|---:|',
        '| a.py | 5 | 1 | 80% |',
        '| b.py | 4 | 2 | 50% |',
        '| **TOTAL** | **9** | **3** | **67%** |',
        '',
      ].join('\n'),
    );
  });

  test('escapes pipes in file names', () => {
    const summary = sampleSummary();
    summary.files = [{ name: 'a|b.py', statements: 1, missing: 0, missingLines: '' }];
    expect(reportToMarkdown(summary).split('\n')[2]).toBe('| a\\|b.py | 1 | 0 | 100% |');
  });
});
