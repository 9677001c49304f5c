import fs from 'node:fs/promises';

import type { FileCoverage } from '../data/coverageData';
import { NoSourceError, errorMessage } from '../errors';
import { noDebug, type DebugControl } from '../debug/debugControl';

/**
 * Keep the files whose source can still be read. An unreadable source is fatal unless
 * `ignoreErrors` is set.
 */
export async function filterReadableSources(
  files: FileCoverage[],
  opts: { ignoreErrors?: boolean; debug?: DebugControl } = {},
): Promise<FileCoverage[]> {
  const debug = opts.debug ?? noDebug();
  const out: FileCoverage[] = [];
  for (const file of files) {
    try {
      await fs.access(file.absolutePath, fs.constants.R_OK);
      out.push(file);
    } catch (e) {
      if (!opts.ignoreErrors) throw new NoSourceError(file.absolutePath, e);
      debug.write('files', `Skipping ${file.relativePath}: ${errorMessage(e)}`);
    }
  }
  return out;
}
