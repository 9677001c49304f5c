import { Command, Option } from 'commander';

export type OptionKind = 'flag' | 'value' | 'list' | 'help';

export type OptionSpec = {
  /** Property name in the parsed options. */
  attr: string;
  short?: string;
  long: string;
  /** Placeholder shown in help, e.g. `DIR`. */
  metavar?: string;
  help: string;
  /** Environment variable consulted when the option is absent. */
  env?: string;
  kind: OptionKind;
  choices?: string[];
};

export type CommandSpec = {
  name: string;
  usage: string;
  description: string;
  /** One-line summary for the top-level command list. */
  summary: string;
  options: OptionSpec[];
};

const PATTERN_HELP = 'Accepts shell-style wildcards, which must be quoted.';

const OPTS = {
  directory: {
    attr: 'directory',
    short: '-d',
    long: '--directory',
    metavar: 'DIR',
    help: 'Write the output files to DIR.',
    kind: 'value',
  },
  ignoreErrors: {
    attr: 'ignoreErrors',
    short: '-i',
    long: '--ignore-errors',
    help: 'Ignore errors while reading source files.',
    kind: 'flag',
  },
  include: {
    attr: 'include',
    long: '--include',
    metavar: 'PAT1,PAT2,...',
    help: `Include only files whose paths match one of these patterns. ${PATTERN_HELP}`,
    kind: 'list',
  },
  omit: {
    attr: 'omit',
    long: '--omit',
    metavar: 'PAT1,PAT2,...',
    help: `Omit files whose paths match one of these patterns. ${PATTERN_HELP}`,
    kind: 'list',
  },
  showMissing: {
    attr: 'showMissing',
    short: '-m',
    long: '--show-missing',
    help: "Show line numbers of statements in each module that weren't executed.",
    kind: 'flag',
  },
  format: {
    attr: 'format',
    long: '--format',
    metavar: 'FORMAT',
    help: 'Output format, either text (default) or markdown.',
    kind: 'value',
    choices: ['text', 'markdown'],
  },
  title: {
    attr: 'title',
    long: '--title',
    metavar: 'TITLE',
    help: 'A text string to use as the title on the HTML.',
    kind: 'value',
  },
  debug: {
    attr: 'debug',
    long: '--debug',
    metavar: 'OPTS',
    help: 'Debug options, separated by commas.',
    env: 'COVERAGE_DEBUG',
    kind: 'list',
  },
  help: {
    attr: 'help',
    short: '-h',
    long: '--help',
    help: 'Get help on this command.',
    kind: 'help',
  },
  rcfile: {
    attr: 'rcfile',
    long: '--rcfile',
    metavar: 'RCFILE',
    help: "Specify configuration file. By default '.coveragerc', 'setup.cfg', 'tox.ini', and 'pyproject.toml' are tried.",
    env: 'COVERAGE_RCFILE',
    kind: 'value',
  },
} satisfies Record<string, OptionSpec>;

export const ANNOTATE_COMMAND: CommandSpec = {
  name: 'annotate',
  usage: 'annotate [options] [modules]',
  description:
    'Make annotated copies of the given files, marking statements that are executed with > and statements that are missed with !.',
  summary: 'Annotate source files with execution information.',
  options: [OPTS.directory, OPTS.ignoreErrors, OPTS.include, OPTS.omit, OPTS.debug, OPTS.help, OPTS.rcfile],
};

export const HTML_COMMAND: CommandSpec = {
  name: 'html',
  usage: 'html [options] [modules]',
  description:
    'Create an HTML report of the coverage of the files. Each file gets its own page, with the source decorated to show executed, excluded, and missed lines.',
  summary: 'Create an HTML report.',
  options: [
    { ...OPTS.directory, help: "Write the output files to DIR. Defaults to 'htmlcov'." },
    OPTS.ignoreErrors,
    OPTS.include,
    OPTS.omit,
    OPTS.title,
    OPTS.debug,
    OPTS.help,
    OPTS.rcfile,
  ],
};

export const REPORT_COMMAND: CommandSpec = {
  name: 'report',
  usage: 'report [options] [modules]',
  description: 'Report coverage statistics on modules.',
  summary: 'Report coverage stats on modules.',
  options: [
    OPTS.ignoreErrors,
    OPTS.include,
    OPTS.omit,
    OPTS.showMissing,
    OPTS.format,
    OPTS.debug,
    OPTS.help,
    OPTS.rcfile,
  ],
};

/** Split comma-separated option values; repeated options accumulate. */
export function collectCommaList(value: string, previous: string[] | undefined): string[] {
  const items = value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s !== '');
  return [...(previous ?? []), ...items];
}

function commanderFlags(spec: OptionSpec): string {
  const long = spec.metavar ? `${spec.long} <${spec.attr}>` : spec.long;
  return spec.short ? `${spec.short}, ${long}` : long;
}

/** Register a command's options with commander. The help option is commander's own. */
export function applyOptions(cmd: Command, spec: CommandSpec): Command {
  for (const opt of spec.options) {
    if (opt.kind === 'help') {
      cmd.helpOption(commanderFlags(opt), opt.help);
      continue;
    }
    const option = new Option(commanderFlags(opt), opt.help);
    if (opt.kind === 'list') option.argParser(collectCommaList);
    if (opt.choices) option.choices(opt.choices);
    cmd.addOption(option);
  }
  return cmd;
}
