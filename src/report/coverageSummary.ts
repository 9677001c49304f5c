import type { FileCoverage } from '../data/coverageData';

export type CoverageCounts = {
  statements: number;
  missing: number;
};

export type FileSummary = CoverageCounts & {
  name: string;
  /** Missed statements as ranges, e.g. `2-4, 9`. */
  missingLines: string;
};

export type CoverageSummary = {
  files: FileSummary[];
  total: CoverageCounts;
  precision: number;
};

export function percentCovered(counts: CoverageCounts): number {
  if (counts.statements === 0) return 100;
  return ((counts.statements - counts.missing) * 100) / counts.statements;
}

/**
 * Percent as text. Only an exact 0 or 100 shows as such: anything short of 100 shows at
 * most 100 minus the smallest step, and anything above 0 at least the smallest step.
 */
export function displayPercent(pc: number, precision: number = 0): string {
  const near0 = 1 / 10 ** precision;
  let shown = pc;
  if (pc > 0 && pc < near0) shown = near0;
  else if (pc > 100 - near0 && pc < 100) shown = 100 - near0;
  return shown.toFixed(precision);
}

/**
 * Collapse missed statements into ranges. Lines that are not statements do not break a
 * range, so `statements=[1,2,5,6]` with `missing=[2,5]` gives `2-5`.
 */
export function formatLineRanges(statements: number[], missing: number[]): string {
  const missed = new Set(missing);
  const ranges: Array<[number, number]> = [];
  let start: number | undefined;
  let end = 0;
  for (const line of statements) {
    if (missed.has(line)) {
      start ??= line;
      end = line;
    } else if (start !== undefined) {
      ranges.push([start, end]);
      start = undefined;
    }
  }
  if (start !== undefined) ranges.push([start, end]);
  return ranges.map(([a, b]) => (a === b ? String(a) : `${a}-${b}`)).join(', ');
}

export function summarize(files: FileCoverage[], precision: number = 0): CoverageSummary {
  const rows = files.map((f) => ({
    name: f.relativePath,
    statements: f.statements.length,
    missing: f.missing.length,
    missingLines: formatLineRanges(f.statements, f.missing),
  }));
  const total = rows.reduce(
    (acc, r) => ({ statements: acc.statements + r.statements, missing: acc.missing + r.missing }),
    { statements: 0, missing: 0 },
  );
  return { files: rows, total, precision };
}
