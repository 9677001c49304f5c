import path from 'node:path';
import micromatch from 'micromatch';

import type { CoverageData, FileCoverage } from '../data/coverageData';
import { toPosix } from '../data/coverageData';
import { CoverageError, NoDataError } from '../errors';
import { noDebug, type DebugControl } from '../debug/debugControl';

export type FileSelectionOptions = {
  cwd: string;
  /** Files named on the command line; when non-empty only these are selected. */
  modules?: string[];
  include?: string[];
  omit?: string[];
  debug?: DebugControl;
};

// `bash` makes a single `*` cross directory separators, as shell-style patterns do.
const MATCH_OPTIONS: micromatch.Options = { bash: true, dot: true };

/**
 * Make patterns comparable with absolute file names: anything not starting with a
 * wildcard is anchored at `cwd`.
 */
export function prepPatterns(patterns: string[], cwd: string): string[] {
  return patterns
    .map((p) => p.trim())
    .filter((p) => p !== '')
    .map((p) => (p.startsWith('*') ? toPosix(p) : toPosix(path.resolve(cwd, p))));
}

export function matchesAny(file: string, patterns: string[]): boolean {
  return patterns.length > 0 && micromatch.isMatch(toPosix(file), patterns, MATCH_OPTIONS);
}

/**
 * Choose the measured files an operation works on. Returns them sorted by relative name.
 */
export function selectFiles(data: CoverageData, opts: FileSelectionOptions): FileCoverage[] {
  const debug = opts.debug ?? noDebug();
  const include = prepPatterns(opts.include ?? [], opts.cwd);
  const omit = prepPatterns(opts.omit ?? [], opts.cwd);

  let candidates = data.files;
  const modules = opts.modules ?? [];
  if (modules.length > 0) {
    const byPath = new Map(data.files.map((f) => [f.absolutePath, f]));
    candidates = modules.map((m) => {
      const found = byPath.get(path.resolve(opts.cwd, m));
      if (!found) throw new CoverageError(`No data collected for file: '${m}'`);
      return found;
    });
  }

  const selected: FileCoverage[] = [];
  const seen = new Set<string>();
  for (const file of candidates) {
    if (seen.has(file.absolutePath)) continue;
    seen.add(file.absolutePath);
    if (include.length > 0 && !matchesAny(file.absolutePath, include)) {
      debug.write('files', `Not included: ${file.relativePath}`);
      continue;
    }
    if (matchesAny(file.absolutePath, omit)) {
      debug.write('files', `Omitted: ${file.relativePath}`);
      continue;
    }
    selected.push(file);
  }

  if (selected.length === 0) throw new NoDataError();
  selected.sort((a, b) => a.relativePath.localeCompare(b.relativePath));
  return selected;
}
