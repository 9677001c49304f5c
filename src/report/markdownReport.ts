import { displayPercent, percentCovered, type CoverageSummary } from './coverageSummary';
import type { TextReportOptions } from './textReport';

function esc(s: string): string {
  return s.replace(/\|/g, '\\|');
}

export function reportToMarkdown(summary: CoverageSummary, opts: TextReportOptions = {}): string {
  const lines: string[] = [];
  const withMissing = Boolean(opts.showMissing);

  lines.push(withMissing ? '| Name | Stmts | Miss | Cover | Missing |' : '| Name | Stmts | Miss | Cover |');
  lines.push(withMissing ? '|---|---:|---:|---:|---|' : '|---|---:|---:|---:|');
  for (const f of summary.files) {
    const cells = [esc(f.name), String(f.statements), String(f.missing), `${displayPercent(percentCovered(f), summary.precision)}%`];
    if (withMissing) cells.push(f.missingLines);
    lines.push(`| ${cells.join(' | ')} |`);
  }
  if (summary.files.length > 1) {
    const t = summary.total;
    const cells = ['**TOTAL**', `**${t.statements}**`, `**${t.missing}**`, `**${displayPercent(percentCovered(t), summary.precision)}%**`];
    if (withMissing) cells.push('');
    lines.push(`| ${cells.join(' | ')} |`);
  }
  return lines.join('\n') + '\n';
}
