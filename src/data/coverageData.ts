import fs from 'node:fs/promises';
import path from 'node:path';
import Ajv from 'ajv/dist/2020';
import type { ValidateFunction } from 'ajv';

import coverageJsonSchema from './schema/coverage-json-v1.json';
import { DataError, NoDataError, errorMessage } from '../errors';
import { noDebug, type DebugControl } from '../debug/debugControl';

export type CoverageJsonFile = {
  executed_lines: number[];
  missing_lines: number[];
  excluded_lines?: number[];
};

/** The subset of a `coverage json` document this tool reads. */
export type CoverageJson = {
  meta?: { version?: string; timestamp?: string; branch_coverage?: boolean };
  files: Record<string, CoverageJsonFile>;
};

export type FileCoverage = {
  /** Name as recorded in the data file, with `/` separators. */
  relativePath: string;
  absolutePath: string;
  /** Sorted union of executed and missing lines. */
  statements: number[];
  executed: number[];
  missing: number[];
  excluded: number[];
};

export type CoverageData = {
  dataFile: string;
  version?: string;
  files: FileCoverage[];
};

let validator: ValidateFunction<CoverageJson> | undefined;

function getValidator(): ValidateFunction<CoverageJson> {
  if (!validator) {
    const ajv = new Ajv({ allErrors: true, strict: false });
    validator = ajv.compile<CoverageJson>(coverageJsonSchema);
  }
  return validator;
}

function sortedUnique(lines: Iterable<number>): number[] {
  return [...new Set(lines)].sort((a, b) => a - b);
}

export function toPosix(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * Validate a parsed document and normalize its file entries.
 * `baseDir` anchors relative file names; entries come back sorted by name.
 */
export function parseCoverageJson(doc: unknown, dataFile: string, baseDir: string = path.dirname(dataFile)): CoverageData {
  const validate = getValidator();
  if (!validate(doc)) {
    const details = (validate.errors ?? [])
      .map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`)
      .join('; ');
    throw new DataError(`Couldn't use data file '${dataFile}': ${details}`);
  }

  const files: FileCoverage[] = Object.entries(doc.files).map(([name, entry]) => {
    const executed = sortedUnique(entry.executed_lines);
    const missing = sortedUnique(entry.missing_lines);
    return {
      relativePath: toPosix(name),
      absolutePath: path.resolve(baseDir, name),
      statements: sortedUnique([...executed, ...missing]),
      executed,
      missing,
      excluded: sortedUnique(entry.excluded_lines ?? []),
    };
  });
  files.sort((a, b) => a.relativePath.localeCompare(b.relativePath));

  return { dataFile, version: doc.meta?.version, files };
}

export async function readCoverageData(dataFile: string, debug: DebugControl = noDebug()): Promise<CoverageData> {
  debug.write('dataio', `Reading data from '${dataFile}'`);
  let text: string;
  try {
    text = await fs.readFile(dataFile, 'utf8');
  } catch (e) {
    debug.write('dataio', `No data file: ${errorMessage(e)}`);
    throw new NoDataError();
  }

  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch (e) {
    throw new DataError(`Couldn't use data file '${dataFile}': ${errorMessage(e)}`);
  }

  const data = parseCoverageJson(doc, dataFile);
  debug.write('dataio', `Data file '${dataFile}' has ${data.files.length} file(s)`);
  return data;
}
