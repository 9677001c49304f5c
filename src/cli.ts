#!/usr/bin/env node

import path from 'node:path';
import { Command, CommanderError } from 'commander';
import { VERSION } from './version';
import { processIo, type CliIo } from './cli/io';
import { ANNOTATE_COMMAND, HTML_COMMAND, REPORT_COMMAND, applyOptions } from './cli/options';
import { NO_COMMAND_MESSAGE, PROGRAM_NAME, formatCommandHelp, formatTopLevelHelp } from './cli/help';
import { loadCoverageConfig, type ConfigOverrides, type CoverageConfig } from './config/coverageConfig';
import { DebugControl } from './debug/debugControl';
import { writeDebugInfo } from './debug/debugInfo';
import { readCoverageData } from './data/coverageData';
import { selectFiles } from './select/fileSelector';
import { filterReadableSources } from './select/sourceAccess';
import { annotateFiles } from './annotate/annotator';
import { summarize } from './report/coverageSummary';
import { reportToText } from './report/textReport';
import { reportToMarkdown } from './report/markdownReport';
import { writeHtmlReport } from './report/htmlReport';
import { CoverageError, errorMessage } from './errors';

export type ReportFormat = 'text' | 'markdown';

type CommonCommandOptions = {
  /** Files named on the command line. */
  modules: string[];
  ignoreErrors?: boolean;
  include?: string[];
  omit?: string[];
  debug?: string[];
  rcfile?: string;
  io?: CliIo;
};

export type AnnotateCommandOptions = CommonCommandOptions & {
  directory?: string;
};

export type HtmlCommandOptions = CommonCommandOptions & {
  directory?: string;
  title?: string;
};

export type ReportCommandOptions = CommonCommandOptions & {
  showMissing?: boolean;
  format?: ReportFormat;
};

async function prepare(opts: CommonCommandOptions, overrides: ConfigOverrides) {
  const io = opts.io ?? processIo();
  const config: CoverageConfig = await loadCoverageConfig({ rcfile: opts.rcfile, cwd: io.cwd, env: io.env, overrides });
  const debug = new DebugControl(config.debug, io.stderr, io.pid);
  writeDebugInfo(debug, config, { version: VERSION, cwd: io.cwd });

  const data = await readCoverageData(config.dataFile, debug);
  const files = selectFiles(data, {
    cwd: io.cwd,
    modules: opts.modules,
    include: config.include,
    omit: config.omit,
    debug,
  });
  return { io, config, debug, files };
}

function commonOverrides(opts: CommonCommandOptions): ConfigOverrides {
  return { debug: opts.debug, include: opts.include, omit: opts.omit, ignoreErrors: opts.ignoreErrors };
}

/**
 * `coverage annotate`: write a marked-up copy of each selected source.
 * Failures surface as CoverageError; the return value is the exit code.
 */
export async function runAnnotate(opts: AnnotateCommandOptions): Promise<number> {
  const { io, config, debug, files } = await prepare(opts, commonOverrides(opts));
  const directory = opts.directory ? path.resolve(io.cwd, opts.directory) : undefined;
  await annotateFiles(files, { directory, ignoreErrors: config.ignoreErrors, debug });
  return 0;
}

/** `coverage report`: print a per-file statement summary to stdout. */
export async function runReport(opts: ReportCommandOptions): Promise<number> {
  const { io, config, debug, files } = await prepare(opts, {
    ...commonOverrides(opts),
    showMissing: opts.showMissing,
  });
  const readable = await filterReadableSources(files, { ignoreErrors: config.ignoreErrors, debug });
  const summary = summarize(readable, config.precision);
  const render = opts.format === 'markdown' ? reportToMarkdown : reportToText;
  io.stdout(render(summary, { showMissing: config.showMissing }));
  return 0;
}

/** `coverage html`: write an index page and one page per selected source. */
export async function runHtml(opts: HtmlCommandOptions): Promise<number> {
  const { config, debug, files } = await prepare(opts, {
    ...commonOverrides(opts),
    htmlDirectory: opts.directory,
    htmlTitle: opts.title,
  });
  await writeHtmlReport(files, {
    directory: config.htmlDirectory,
    title: config.htmlTitle,
    precision: config.precision,
    ignoreErrors: config.ignoreErrors,
    debug,
  });
  return 0;
}

type RawCommonOptions = {
  ignoreErrors?: boolean;
  include?: string[];
  omit?: string[];
  debug?: string[];
  rcfile?: string;
};

export async function main(argv: string[], io: CliIo = processIo()): Promise<number> {
  let exitCode = 0;
  const program = new Command();

  program
    .name(PROGRAM_NAME)
    .version(VERSION, '--version', 'Display version information and exit.')
    .argument('[command]')
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr })
    .configureHelp({ formatHelp: () => formatTopLevelHelp([ANNOTATE_COMMAND, HTML_COMMAND, REPORT_COMMAND], VERSION) })
    .helpCommand('help [command]', `Get help on using ${PROGRAM_NAME}.`)
    .action((command: string | undefined) => {
      if (command === undefined) {
        io.stdout(`${NO_COMMAND_MESSAGE}\n`);
        return;
      }
      io.stderr(`Unknown command: '${command}'\n${NO_COMMAND_MESSAGE}\n`);
      exitCode = 1;
    });

  const annotate = program
    .command(ANNOTATE_COMMAND.name)
    .description(ANNOTATE_COMMAND.summary)
    .argument('[modules...]')
    .configureHelp({ formatHelp: () => formatCommandHelp(ANNOTATE_COMMAND) });
  applyOptions(annotate, ANNOTATE_COMMAND).action(async (modules: string[], _opts: unknown, cmd: Command) => {
    const raw = cmd.opts<RawCommonOptions & { directory?: string }>();
    exitCode = await runAnnotate({ ...raw, modules, io });
  });

  const html = program
    .command(HTML_COMMAND.name)
    .description(HTML_COMMAND.summary)
    .argument('[modules...]')
    .configureHelp({ formatHelp: () => formatCommandHelp(HTML_COMMAND) });
  applyOptions(html, HTML_COMMAND).action(async (modules: string[], _opts: unknown, cmd: Command) => {
    const raw = cmd.opts<RawCommonOptions & { directory?: string; title?: string }>();
    exitCode = await runHtml({ ...raw, modules, io });
  });

  const report = program
    .command(REPORT_COMMAND.name)
    .description(REPORT_COMMAND.summary)
    .argument('[modules...]')
    .configureHelp({ formatHelp: () => formatCommandHelp(REPORT_COMMAND) });
  applyOptions(report, REPORT_COMMAND).action(async (modules: string[], _opts: unknown, cmd: Command) => {
    const raw = cmd.opts<RawCommonOptions & { showMissing?: boolean; format?: string }>();
    const format: ReportFormat = raw.format === 'markdown' ? 'markdown' : 'text';
    exitCode = await runReport({ ...raw, format, modules, io });
  });

  try {
    await program.parseAsync(argv);
    return exitCode;
  } catch (e) {
    // Help, version and usage errors: commander has already written its output.
    if (e instanceof CommanderError) return e.exitCode;
    if (e instanceof CoverageError) {
      io.stderr(`${e.message}\n`);
      return e.exitCode;
    }
    io.stderr(`${errorMessage(e)}\n`);
    return 2;
  }
}

// Run CLI only when executed directly (not when imported in tests)
if (require.main === module) {
  main(process.argv).then(
    (code) => {
      process.exitCode = code;
    },
    (e: unknown) => {
      process.stderr.write(`${errorMessage(e)}\n`);
      process.exitCode = 2;
    },
  );
}
