import type { CommandSpec, OptionSpec } from './options';

export const PROGRAM_NAME = 'coverage';

const HELP_WIDTH = 78;
const INDENT = 2;
const MAX_HELP_POSITION = 24;

/** Greedy word wrap; a word longer than the width sits on its own line. */
export function wrapText(text: string, width: number): string[] {
  const words = text.split(/\s+/).filter((w) => w !== '');
  const lines: string[] = [];
  let current = '';
  for (const word of words) {
    if (current === '') current = word;
    else if (current.length + 1 + word.length <= width) current += ` ${word}`;
    else {
      lines.push(current);
      current = word;
    }
  }
  if (current !== '') lines.push(current);
  return lines;
}

/** `-d DIR, --directory=DIR` */
export function optionTerm(opt: OptionSpec): string {
  const parts: string[] = [];
  if (opt.short) parts.push(opt.metavar ? `${opt.short} ${opt.metavar}` : opt.short);
  parts.push(opt.metavar ? `${opt.long}=${opt.metavar}` : opt.long);
  return parts.join(', ');
}

function optionHelp(opt: OptionSpec): string {
  return opt.env ? `${opt.help} [env: ${opt.env}]` : opt.help;
}

/**
 * Two-column option table. Help text starts at a fixed column; a term too wide for
 * the first column gets a line of its own.
 */
export function formatOptionTable(options: OptionSpec[], width: number = HELP_WIDTH): string[] {
  const terms = options.map(optionTerm);
  const maxLen = Math.max(0, ...terms.map((t) => t.length + INDENT));
  const helpPosition = Math.min(maxLen + 2, MAX_HELP_POSITION);
  const helpWidth = Math.max(width - helpPosition, 11);
  const termWidth = helpPosition - INDENT - 2;
  const pad = ' '.repeat(helpPosition);

  const lines: string[] = [];
  options.forEach((opt, idx) => {
    const term = terms[idx];
    const helpLines = wrapText(optionHelp(opt), helpWidth);
    let first: string;
    if (term.length > termWidth) {
      lines.push(' '.repeat(INDENT) + term);
      first = pad;
    } else {
      first = ' '.repeat(INDENT) + term.padEnd(termWidth) + '  ';
    }
    if (helpLines.length === 0) {
      lines.push(first.trimEnd());
      return;
    }
    lines.push(first + helpLines[0]);
    for (const rest of helpLines.slice(1)) lines.push(pad + rest);
  });
  return lines;
}

export function formatCommandHelp(spec: CommandSpec): string {
  const lines = [
    `Usage: ${PROGRAM_NAME} ${spec.usage}`,
    '',
    ...wrapText(spec.description, HELP_WIDTH),
    '',
    'Options:',
    ...formatOptionTable(spec.options),
  ];
  return lines.join('\n') + '\n';
}

export function formatTopLevelHelp(commands: CommandSpec[], version: string): string {
  const entries = [
    ...commands.map((c) => ({ name: c.name, summary: c.summary })),
    { name: 'help', summary: `Get help on using ${PROGRAM_NAME}.` },
  ].sort((a, b) => a.name.localeCompare(b.name));
  const nameWidth = Math.max(...entries.map((e) => e.name.length));

  const lines = [
    `Coverage annotation and reporting, version ${version}`,
    'Annotate source files and report on measured code coverage data.',
    '',
    `Usage: ${PROGRAM_NAME} <command> [options] [args]`,
    '',
    'Commands:',
    ...entries.map((e) => `    ${e.name.padEnd(nameWidth)}    ${e.summary}`),
    '',
    `Use "${PROGRAM_NAME} help <command>" for detailed help on any command.`,
  ];
  return lines.join('\n') + '\n';
}

export const NO_COMMAND_MESSAGE = `Code coverage for Python.  Use '${PROGRAM_NAME} help' for help.`;
