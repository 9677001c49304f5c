import path from 'node:path';
import { ConfigError } from '../errors';
import { parseDebugOptions } from '../debug/debugControl';
import { findRcFile, type ConfigSections, type ConfigValue, type RcFile } from './rcfile';

export type CoverageConfig = {
  /** The config file that was read, if any. */
  configFile?: string;
  /** Absolute path of the coverage JSON data. */
  dataFile: string;
  debug: string[];
  include: string[];
  omit: string[];
  ignoreErrors: boolean;
  showMissing: boolean;
  precision: number;
  /** `[html] directory`, absolute. */
  htmlDirectory: string;
  htmlTitle: string;
  /** Config lines that set nothing; shown with `--debug=config`. */
  ignoredLines: string[];
};

/** Values given on the command line; undefined means "not given". */
export type ConfigOverrides = {
  debug?: string[];
  include?: string[];
  omit?: string[];
  ignoreErrors?: boolean;
  showMissing?: boolean;
  htmlDirectory?: string;
  htmlTitle?: string;
};

export const DEFAULT_DATA_FILE = 'coverage.json';
export const DEFAULT_HTML_DIRECTORY = 'htmlcov';
export const DEFAULT_HTML_TITLE = 'Coverage report';

const MAX_PRECISION = 10;

/** Split a list setting on commas and newlines, dropping blanks. */
export function toList(value: ConfigValue): string[] {
  const parts = Array.isArray(value) ? value : String(value).split(/[,\n]/);
  return parts.map((s) => s.trim()).filter((s) => s !== '');
}

export function toBoolean(value: ConfigValue, where: string): boolean {
  if (typeof value === 'boolean') return value;
  const s = String(value).trim().toLowerCase();
  if (['1', 'yes', 'true', 'on'].includes(s)) return true;
  if (['0', 'no', 'false', 'off'].includes(s)) return false;
  throw new ConfigError(`${where} must be a boolean, got '${String(value)}'`);
}

export function toInteger(value: ConfigValue, where: string): number {
  const n = typeof value === 'number' ? value : Number(String(value).trim());
  if (typeof value === 'boolean' || Array.isArray(value) || !Number.isInteger(n)) {
    throw new ConfigError(`${where} must be an integer, got '${String(value)}'`);
  }
  return n;
}

/** Typed access to the sections of one config file. */
export class ConfigReader {
  constructor(
    private readonly sections: ConfigSections,
    private readonly fileName: string,
  ) {}

  private raw(section: string, option: string): ConfigValue | undefined {
    return this.sections.get(section)?.get(option);
  }

  private where(section: string, option: string): string {
    return `[${section}] ${option} in ${this.fileName}`;
  }

  getList(section: string, option: string): string[] | undefined {
    const v = this.raw(section, option);
    return v === undefined ? undefined : toList(v);
  }

  getBoolean(section: string, option: string): boolean | undefined {
    const v = this.raw(section, option);
    return v === undefined ? undefined : toBoolean(v, this.where(section, option));
  }

  getInteger(section: string, option: string): number | undefined {
    const v = this.raw(section, option);
    return v === undefined ? undefined : toInteger(v, this.where(section, option));
  }

  getString(section: string, option: string): string | undefined {
    const v = this.raw(section, option);
    if (v === undefined) return undefined;
    return Array.isArray(v) ? v.join(',') : String(v).trim();
  }
}

/**
 * Assemble the effective settings: command line over environment over config file over defaults.
 * Debug options are additive across all three.
 */
export function resolveCoverageConfig(args: {
  rcFile?: RcFile;
  cwd: string;
  env: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}): CoverageConfig {
  const { rcFile, cwd, env, overrides = {} } = args;
  const reader = new ConfigReader(rcFile?.sections ?? new Map(), rcFile?.name ?? '<defaults>');

  const precision = reader.getInteger('report', 'precision') ?? 0;
  if (precision < 0 || precision > MAX_PRECISION) {
    throw new ConfigError(`[report] precision must be between 0 and ${MAX_PRECISION}, got ${precision}`);
  }

  const dataName = reader.getString('json', 'output') || DEFAULT_DATA_FILE;

  const debug = [
    ...(reader.getList('run', 'debug') ?? []),
    ...parseDebugOptions(env.COVERAGE_DEBUG),
    ...(overrides.debug ?? []),
  ];

  return {
    configFile: rcFile?.path,
    dataFile: path.resolve(cwd, dataName),
    debug: [...new Set(debug)],
    include: overrides.include ?? reader.getList('report', 'include') ?? [],
    omit: overrides.omit ?? reader.getList('report', 'omit') ?? [],
    ignoreErrors: overrides.ignoreErrors ?? reader.getBoolean('report', 'ignore_errors') ?? false,
    showMissing: overrides.showMissing ?? reader.getBoolean('report', 'show_missing') ?? false,
    precision,
    htmlDirectory: path.resolve(cwd, overrides.htmlDirectory ?? (reader.getString('html', 'directory') || DEFAULT_HTML_DIRECTORY)),
    htmlTitle: overrides.htmlTitle ?? (reader.getString('html', 'title') || DEFAULT_HTML_TITLE),
    ignoredLines: rcFile?.ignoredLines ?? [],
  };
}

export async function loadCoverageConfig(args: {
  rcfile?: string;
  cwd: string;
  env: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}): Promise<CoverageConfig> {
  const rcFile = await findRcFile({ rcfile: args.rcfile, cwd: args.cwd, env: args.env });
  return resolveCoverageConfig({ rcFile, cwd: args.cwd, env: args.env, overrides: args.overrides });
}
