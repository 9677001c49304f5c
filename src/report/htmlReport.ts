import fs from 'node:fs/promises';
import path from 'node:path';

import type { FileCoverage } from '../data/coverageData';
import { NoSourceError, errorMessage } from '../errors';
import { noDebug, type DebugControl } from '../debug/debugControl';
import { splitLinesKeepEnds } from '../annotate/annotator';
import { displayPercent, percentCovered, type CoverageCounts } from './coverageSummary';

export type HtmlReportOptions = {
  /** Output directory, created when missing. */
  directory: string;
  title: string;
  precision?: number;
  ignoreErrors?: boolean;
  debug?: DebugControl;
};

export type HtmlReportResult = {
  index: string;
  pages: Array<{ source: string; output: string }>;
  skipped: Array<{ source: string; reason: string }>;
};

export type LineClass = 'run' | 'mis' | 'exc' | '';

const STYLE = `body { font-family: sans-serif; font-size: 14px; margin: 1em 2em; }
table.index { border-collapse: collapse; }
table.index th, table.index td { padding: 0.2em 0.8em; text-align: right; }
table.index .name { text-align: left; }
table.index tfoot td { font-weight: bold; border-top: 1px solid #888; }
.source p { margin: 0; font-family: monospace; white-space: pre; }
.source .n { display: inline-block; width: 4em; padding-right: 1em; text-align: right; color: #999; }
.source .n a { color: inherit; text-decoration: none; }
.source .run { background: #dfd; }
.source .mis { background: #fdd; }
.source .exc { color: #888; }
`;

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

/** `pkg/mod.py` -> `pkg_mod_py.html` */
export function htmlPageName(relativePath: string): string {
  return `${relativePath.replace(/[\\/.:]/g, '_')}.html`;
}

export function lineClass(lineno: number, file: Pick<FileCoverage, 'statements' | 'missing' | 'excluded'>): LineClass {
  if (file.excluded.includes(lineno)) return 'exc';
  if (file.missing.includes(lineno)) return 'mis';
  if (file.statements.includes(lineno)) return 'run';
  return '';
}

function page(title: string, body: string[]): string {
  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="UTF-8">',
    `<title>${escapeHtml(title)}</title>`,
    `<style>\n${STYLE}</style>`,
    '</head>',
    '<body>',
    ...body,
    '</body>',
    '</html>',
    '',
  ].join('\n');
}

function counts(file: FileCoverage): CoverageCounts {
  return { statements: file.statements.length, missing: file.missing.length };
}

export function renderFilePage(file: FileCoverage, source: string, opts: { title: string; precision?: number }): string {
  const pc = displayPercent(percentCovered(counts(file)), opts.precision);
  const run = file.statements.length - file.missing.length;
  const lines = splitLinesKeepEnds(source).map((line, index) => {
    const lineno = index + 1;
    const cls = lineClass(lineno, file);
    const attr = cls ? ` class="${cls}"` : '';
    const text = escapeHtml(line.replace(/(?:\r\n|\r|\n)$/, ''));
    return `<p${attr} id="t${lineno}"><span class="n"><a href="#t${lineno}">${lineno}</a></span><span class="t">${text}</span></p>`;
  });
  return page(`${opts.title}: ${file.relativePath}`, [
    `<h1>Coverage for <b>${escapeHtml(file.relativePath)}</b>: ${pc}%</h1>`,
    `<p class="stats">${file.statements.length} statements, ${run} run, ${file.missing.length} missing, ${file.excluded.length} excluded</p>`,
    '<p class="nav"><a href="index.html">Index</a></p>',
    '<div class="source">',
    ...lines,
    '</div>',
  ]);
}

function indexRow(cells: string[], rowClass: string): string {
  return `<tr class="${rowClass}">${cells.map((c, i) => (i === 0 ? `<td class="name">${c}</td>` : `<td>${c}</td>`)).join('')}</tr>`;
}

export function renderIndexPage(files: FileCoverage[], opts: { title: string; precision?: number }): string {
  const total = files.reduce(
    (acc, f) => ({
      statements: acc.statements + f.statements.length,
      missing: acc.missing + f.missing.length,
      excluded: acc.excluded + f.excluded.length,
    }),
    { statements: 0, missing: 0, excluded: 0 },
  );
  const totalPc = displayPercent(percentCovered(total), opts.precision);
  const rows = files.map((f) =>
    indexRow(
      [
        `<a href="${htmlPageName(f.relativePath)}">${escapeHtml(f.relativePath)}</a>`,
        String(f.statements.length),
        String(f.missing.length),
        String(f.excluded.length),
        `${displayPercent(percentCovered(counts(f)), opts.precision)}%`,
      ],
      'file',
    ),
  );
  return page(opts.title, [
    `<h1>${escapeHtml(opts.title)}: ${totalPc}%</h1>`,
    '<table class="index">',
    '<thead><tr><th class="name">Module</th><th>statements</th><th>missing</th><th>excluded</th><th>coverage</th></tr></thead>',
    '<tbody>',
    ...rows,
    '</tbody>',
    `<tfoot>${indexRow(['Total', String(total.statements), String(total.missing), String(total.excluded), `${totalPc}%`], 'total')}</tfoot>`,
    '</table>',
  ]);
}

/**
 * Write one page per source plus `index.html` into the output directory.
 * A source that cannot be read aborts the run unless `ignoreErrors` is set; skipped
 * sources are left out of the index.
 */
export async function writeHtmlReport(files: FileCoverage[], opts: HtmlReportOptions): Promise<HtmlReportResult> {
  const debug = opts.debug ?? noDebug();
  const result: HtmlReportResult = { index: path.join(opts.directory, 'index.html'), pages: [], skipped: [] };
  await fs.mkdir(opts.directory, { recursive: true });

  const reported: FileCoverage[] = [];
  for (const file of files) {
    let source: string;
    try {
      source = await fs.readFile(file.absolutePath, 'utf8');
    } catch (e) {
      if (!opts.ignoreErrors) throw new NoSourceError(file.absolutePath, e);
      const reason = errorMessage(e);
      debug.write('files', `Skipping ${file.relativePath}: ${reason}`);
      result.skipped.push({ source: file.absolutePath, reason });
      continue;
    }
    const output = path.join(opts.directory, htmlPageName(file.relativePath));
    await fs.writeFile(output, renderFilePage(file, source, opts), 'utf8');
    debug.write('files', `Wrote ${file.relativePath} -> ${output}`);
    result.pages.push({ source: file.absolutePath, output });
    reported.push(file);
  }

  await fs.writeFile(result.index, renderIndexPage(reported, opts), 'utf8');
  return result;
}
