import { displayPercent, percentCovered, type CoverageCounts, type CoverageSummary } from './coverageSummary';

export type TextReportOptions = {
  showMissing?: boolean;
};

/**
 * Fixed-width table:
 *
 *     Name    Stmts   Miss  Cover   Missing
 *     -------------------------------------
 *     a.py        4      1    75%   3
 *
 * A TOTAL row follows when there is more than one file.
 */
export function reportToText(summary: CoverageSummary, opts: TextReportOptions = {}): string {
  const nameWidth = Math.max('Name'.length, 'TOTAL'.length, ...summary.files.map((f) => f.name.length));
  const coverWidth = Math.max('Cover'.length, 4 + (summary.precision > 0 ? summary.precision + 1 : 0));

  const row = (name: string, stmts: string, miss: string, cover: string, missing?: string): string => {
    let line = `${name.padEnd(nameWidth)}   ${stmts.padStart(5)}  ${miss.padStart(5)}  ${cover.padStart(coverWidth)}`;
    if (opts.showMissing) line += `   ${missing ?? ''}`;
    return line.trimEnd();
  };
  const pct = (c: CoverageCounts): string => `${displayPercent(percentCovered(c), summary.precision)}%`;

  const header = row('Name', 'Stmts', 'Miss', 'Cover', 'Missing');
  const rule = '-'.repeat(header.length);
  const lines = [header, rule];
  for (const f of summary.files) {
    lines.push(row(f.name, String(f.statements), String(f.missing), pct(f), f.missingLines));
  }
  if (summary.files.length > 1) {
    lines.push(rule);
    lines.push(row('TOTAL', String(summary.total.statements), String(summary.total.missing), pct(summary.total)));
  }
  return lines.join('\n') + '\n';
}
