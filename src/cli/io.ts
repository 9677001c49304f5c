export type Writer = (text: string) => void;

/**
 * Everything the CLI touches outside of the file system. Tests pass their own to capture output.
 */
export type CliIo = {
  stdout: Writer;
  stderr: Writer;
  env: NodeJS.ProcessEnv;
  cwd: string;
  pid: number;
};

export function processIo(): CliIo {
  return {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    env: process.env,
    cwd: process.cwd(),
    pid: process.pid,
  };
}

/** In-memory io for tests and embedding. */
export function bufferedIo(overrides: Partial<Omit<CliIo, 'stdout' | 'stderr'>> = {}): CliIo & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
    env: overrides.env ?? {},
    cwd: overrides.cwd ?? process.cwd(),
    pid: overrides.pid ?? 0,
    out,
    err,
  };
}
