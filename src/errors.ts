/**
 * Error types surfaced by the command line. Each carries the exit code `main` returns.
 */
export class CoverageError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = 1,
  ) {
    super(message);
    this.name = 'CoverageError';
  }
}

/** A configuration file could not be read or holds an invalid value. */
export class ConfigError extends CoverageError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** There is no measured data to work from. */
export class NoDataError extends CoverageError {
  constructor(message = 'No data to report.') {
    super(message);
    this.name = 'NoDataError';
  }
}

/** A measured source file could not be read. */
export class NoSourceError extends CoverageError {
  constructor(public readonly filename: string, cause?: unknown) {
    super(`No source for code: '${filename}'.`);
    this.name = 'NoSourceError';
    if (cause !== undefined) this.cause = cause;
  }
}

/** The data file exists but is not usable coverage JSON. */
export class DataError extends CoverageError {
  constructor(message: string) {
    super(message);
    this.name = 'DataError';
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
