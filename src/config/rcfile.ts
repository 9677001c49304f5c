import fs from 'node:fs/promises';
import path from 'node:path';
import { parse as parseIni } from 'ini';
import { parse as parseToml } from '@iarna/toml';
import { ConfigError, errorMessage } from '../errors';

export type ConfigValue = string | number | boolean | string[];

/** Section name (without any `coverage:` / `tool.coverage.` prefix) -> option -> value. */
export type ConfigSections = Map<string, Map<string, ConfigValue>>;

export type RcFile = {
  /** Path as it was named or discovered, relative paths kept relative. */
  name: string;
  path: string;
  sections: ConfigSections;
  /** Lines in coverage sections that set nothing, as `file:line: text`. */
  ignoredLines: string[];
};

export type ConfigCandidate = {
  name: string;
  /** Our own file: plain `[run]` sections count as well as prefixed ones. */
  ourFile: boolean;
  /** Named by the user, so a missing file is an error. */
  specified: boolean;
};

export const DEFAULT_RCFILE = '.coveragerc';

/**
 * The files tried, in order, when looking for settings.
 * `rcfile` is the `--rcfile` value; the environment only applies when it is absent.
 */
export function configFilesToTry(rcfile: string | undefined, env: NodeJS.ProcessEnv): ConfigCandidate[] {
  let name = rcfile;
  let specified = name !== undefined && name !== '';
  if (!specified) {
    const fromEnv = env.COVERAGE_RCFILE;
    if (fromEnv) {
      name = fromEnv;
      specified = true;
    }
  }
  return [
    { name: specified && name ? name : DEFAULT_RCFILE, ourFile: true, specified },
    { name: 'setup.cfg', ourFile: false, specified: false },
    { name: 'tox.ini', ourFile: false, specified: false },
    { name: 'pyproject.toml', ourFile: false, specified: false },
  ];
}

/**
 * Find and read the first file that carries coverage settings.
 * Returns undefined when none of the candidates has any.
 */
export async function findRcFile(args: {
  rcfile?: string;
  cwd: string;
  env: NodeJS.ProcessEnv;
}): Promise<RcFile | undefined> {
  for (const candidate of configFilesToTry(args.rcfile, args.env)) {
    const abs = path.resolve(args.cwd, candidate.name);
    let text: string;
    try {
      text = await fs.readFile(abs, 'utf8');
    } catch (e) {
      if (candidate.specified) {
        throw new ConfigError(`Couldn't read '${candidate.name}' as a config file`);
      }
      if (isNotFound(e)) continue;
      throw new ConfigError(`Couldn't read config file ${candidate.name}: ${errorMessage(e)}`);
    }

    const sections = parseConfigText(text, candidate.name, candidate.ourFile, args.env);
    if (sections.size > 0 || candidate.specified) {
      const ignoredLines = candidate.name.endsWith('.toml') ? [] : findIgnoredLines(text, candidate.name, candidate.ourFile);
      return { name: candidate.name, path: abs, sections, ignoredLines };
    }
  }
  return undefined;
}

export function parseConfigText(
  text: string,
  fileName: string,
  ourFile: boolean,
  env: NodeJS.ProcessEnv,
): ConfigSections {
  const sections = fileName.endsWith('.toml') ? readTomlSections(text, fileName) : readIniSections(text, ourFile);
  for (const options of sections.values()) {
    for (const [key, value] of options) {
      options.set(key, substituteValue(value, env));
    }
  }
  return sections;
}

function readIniSections(text: string, ourFile: boolean): ConfigSections {
  const prefixes = ourFile ? ['', 'coverage:'] : ['coverage:'];
  const parsed: unknown = parseIni(foldContinuationLines(text));
  const out: ConfigSections = new Map();
  if (!isRecord(parsed)) return out;

  for (const prefix of prefixes) {
    for (const [sectionName, body] of Object.entries(parsed)) {
      if (!isRecord(body)) continue;
      if (prefix === '' && sectionName.startsWith('coverage:')) continue;
      if (!sectionName.startsWith(prefix)) continue;
      const name = sectionName.slice(prefix.length);
      const options = out.get(name) ?? new Map<string, ConfigValue>();
      for (const [key, raw] of Object.entries(body)) {
        const option = key.toLowerCase();
        const value = toConfigValue(raw);
        // The first prefix that sets an option wins.
        if (value !== undefined && !options.has(option)) options.set(option, value);
      }
      out.set(name, options);
    }
  }
  return out;
}

function readTomlSections(text: string, fileName: string): ConfigSections {
  let parsed: unknown;
  try {
    parsed = parseToml(text);
  } catch (e) {
    throw new ConfigError(`Couldn't read config file ${fileName}: ${errorMessage(e)}`);
  }
  const out: ConfigSections = new Map();
  const tool = isRecord(parsed) ? parsed.tool : undefined;
  const coverage = isRecord(tool) ? tool.coverage : undefined;
  if (!isRecord(coverage)) return out;

  for (const [sectionName, body] of Object.entries(coverage)) {
    if (!isRecord(body)) continue;
    const options = new Map<string, ConfigValue>();
    for (const [key, raw] of Object.entries(body)) {
      const value = toConfigValue(raw);
      if (value === undefined) {
        throw new ConfigError(`Invalid value for [tool.coverage.${sectionName}] ${key} in ${fileName}`);
      }
      options.set(key.toLowerCase(), value);
    }
    out.set(sectionName, options);
  }
  return out;
}

/**
 * Fold indented continuation lines into the option they continue, comma separated,
 * so a line-oriented INI parser sees one `key = a,b,c` line.
 */
export function foldContinuationLines(text: string): string {
  const out: string[] = [];
  let current = -1;
  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (/^\s/.test(line) && trimmed !== '' && current >= 0) {
      if (trimmed.startsWith('#') || trimmed.startsWith(';')) continue;
      out[current] += /=\s*$/.test(out[current]) ? trimmed : `,${trimmed}`;
      continue;
    }
    out.push(line);
    if (trimmed.startsWith('[')) current = -1;
    else if (/^[^\s#;][^=]*=/.test(line)) current = out.length - 1;
  }
  return out.join('\n');
}

/**
 * Lines of a coverage section that are not `name = value` pairs. The INI reader only
 * splits on `=`, so a `name: value` line would otherwise vanish without a trace.
 */
export function findIgnoredLines(text: string, fileName: string, ourFile: boolean): string[] {
  const out: string[] = [];
  let inCoverage = false;
  text.split(/\r?\n/).forEach((line, index) => {
    const trimmed = line.trim();
    const header = /^\[(.*)\]$/.exec(trimmed);
    if (header) {
      inCoverage = header[1].startsWith('coverage:') || (ourFile && !header[1].includes(':'));
      return;
    }
    if (!inCoverage || trimmed === '' || /^[#;]/.test(trimmed) || /^\s/.test(line)) return;
    if (!line.includes('=')) out.push(`${fileName}:${index + 1}: ${trimmed}`);
  });
  return out;
}

/** Expand `$VAR`, `${VAR}` and `${VAR-default}`; `$$` is a literal dollar sign. */
export function substituteVariables(text: string, env: NodeJS.ProcessEnv): string {
  return text.replace(
    /\$(?:(\$)|(\w+)|\{(\w+)(?:-([^}]*))?\})/g,
    (_m, dollar: string | undefined, bare: string | undefined, braced: string | undefined, fallback: string | undefined) => {
      if (dollar) return '$';
      const name = bare ?? braced ?? '';
      return env[name] ?? fallback ?? '';
    },
  );
}

function substituteValue(value: ConfigValue, env: NodeJS.ProcessEnv): ConfigValue {
  if (typeof value === 'string') return substituteVariables(value, env);
  if (Array.isArray(value)) return value.map((v) => substituteVariables(v, env));
  return value;
}

function toConfigValue(raw: unknown): ConfigValue | undefined {
  if (typeof raw === 'string' || typeof raw === 'number' || typeof raw === 'boolean') return raw;
  if (Array.isArray(raw) && raw.every((v): v is string => typeof v === 'string')) return raw;
  return undefined;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isNotFound(e: unknown): boolean {
  return isRecord(e) && (e.code === 'ENOENT' || e.code === 'ENOTDIR' || e.code === 'EISDIR');
}
