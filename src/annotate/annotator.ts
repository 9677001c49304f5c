import fs from 'node:fs/promises';
import path from 'node:path';

import type { FileCoverage } from '../data/coverageData';
import { NoSourceError, errorMessage } from '../errors';
import { noDebug, type DebugControl } from '../debug/debugControl';

export type LineMarker = '> ' | '! ' | '- ' | '  ';

export type AnnotateOptions = {
  /** Write annotated copies here instead of beside each source. */
  directory?: string;
  ignoreErrors?: boolean;
  debug?: DebugControl;
};

export type AnnotateResult = {
  written: Array<{ source: string; output: string }>;
  skipped: Array<{ source: string; reason: string }>;
};

const BLANK_RE = /^\s*(#|$)/;
const ELSE_RE = /^\s*else\s*:\s*(#|$)/;

/** Split text into lines, each keeping its own terminator. */
export function splitLinesKeepEnds(text: string): string[] {
  return text.match(/[^\r\n]*(?:\r\n|\r|\n)|[^\r\n]+$/g) ?? [];
}

function stripEol(line: string): string {
  return line.replace(/(?:\r\n|\r|\n)$/, '');
}

/**
 * A lone `else:` is not a statement: it takes the marker of the statement it leads to.
 * Past the last statement and the last missed line it counts as missed.
 */
function elseMarker(statements: number[], missing: number[], i: number, j: number): LineMarker {
  if (i >= statements.length && j >= missing.length) return '! ';
  if (i >= statements.length || j >= missing.length) return '> ';
  return statements[i] === missing[j] ? '! ' : '> ';
}

/**
 * Prefix every source line with its marker.
 *
 * "Covered" is decided at each statement line and carries over to the lines after it
 * until the next statement, so continuation lines of a statement share its marker.
 */
export function annotateSource(source: string, coverage: Pick<FileCoverage, 'statements' | 'missing' | 'excluded'>): string {
  const { statements, missing } = coverage;
  const excluded = new Set(coverage.excluded);
  let i = 0;
  let j = 0;
  let covered = true;
  const out: string[] = [];

  splitLinesKeepEnds(source).forEach((line, index) => {
    const lineno = index + 1;
    while (i < statements.length && statements[i] < lineno) i++;
    while (j < missing.length && missing[j] < lineno) j++;
    if (i < statements.length && statements[i] === lineno) {
      covered = j >= missing.length || missing[j] > lineno;
    }

    const text = stripEol(line);
    let marker: LineMarker;
    if (BLANK_RE.test(text)) {
      marker = '  ';
    } else if (ELSE_RE.test(text)) {
      marker = elseMarker(statements, missing, i, j);
    } else if (excluded.has(lineno)) {
      marker = '- ';
    } else {
      marker = covered ? '> ' : '! ';
    }
    out.push(marker + line);
  });

  return out.join('');
}

/**
 * Name used for a source inside an output directory: the relative path with its
 * separators flattened, e.g. `pkg/sub/mod.py` -> `pkg_sub_mod.py`.
 */
export function flatName(relativePath: string): string {
  const ext = path.posix.extname(relativePath);
  const root = relativePath.slice(0, relativePath.length - ext.length);
  return root.replace(/[\\/.:]/g, '_') + ext;
}

export function annotationPath(file: Pick<FileCoverage, 'relativePath' | 'absolutePath'>, directory?: string): string {
  if (directory) return path.join(directory, `${flatName(file.relativePath)},cover`);
  return `${file.absolutePath},cover`;
}

/**
 * Write an annotated copy of each file. A source that cannot be read aborts the run
 * unless `ignoreErrors` is set, in which case it is skipped.
 */
export async function annotateFiles(files: FileCoverage[], opts: AnnotateOptions = {}): Promise<AnnotateResult> {
  const debug = opts.debug ?? noDebug();
  const result: AnnotateResult = { written: [], skipped: [] };
  if (opts.directory) await fs.mkdir(opts.directory, { recursive: true });

  for (const file of files) {
    // latin1 maps each byte to one char and back, so any source encoding survives.
    let source: string;
    try {
      source = await fs.readFile(file.absolutePath, 'latin1');
    } catch (e) {
      if (!opts.ignoreErrors) throw new NoSourceError(file.absolutePath, e);
      const reason = errorMessage(e);
      debug.write('files', `Skipping ${file.relativePath}: ${reason}`);
      result.skipped.push({ source: file.absolutePath, reason });
      continue;
    }

    const output = annotationPath(file, opts.directory);
    await fs.writeFile(output, annotateSource(source, file), 'latin1');
    debug.write('files', `Annotated ${file.relativePath} -> ${output}`);
    result.written.push({ source: file.absolutePath, output });
  }
  return result;
}
