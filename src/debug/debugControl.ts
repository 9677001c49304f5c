import type { Writer } from '../cli/io';

export type DebugOption = 'config' | 'dataio' | 'files' | 'pid' | 'sys' | (string & {});

/** Parse a comma-separated debug option list; blanks are dropped. */
export function parseDebugOptions(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s !== '');
}

/**
 * Gate for `--debug` output. Unknown option names are kept but never consulted.
 */
export class DebugControl {
  private readonly options: ReadonlySet<string>;

  constructor(
    options: Iterable<string>,
    private readonly out: Writer,
    private readonly pid: number = process.pid,
  ) {
    this.options = new Set(options);
  }

  get enabled(): string[] {
    return [...this.options].sort();
  }

  should(option: DebugOption): boolean {
    return this.options.has(option);
  }

  write(option: DebugOption, message: string): void {
    if (!this.should(option)) return;
    const prefix = this.should('pid') ? `pid ${this.pid}: ` : '';
    for (const line of message.replace(/\n$/, '').split('\n')) {
      this.out(`${prefix}${option}: ${line}\n`);
    }
  }
}

/** A control that never writes. */
export function noDebug(): DebugControl {
  return new DebugControl([], () => undefined);
}
