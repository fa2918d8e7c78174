/**
 * Logger port and implementations
 *
 * The pipeline only talks to the port; the CLI picks the implementation.
 */

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Only shown in verbose mode */
  debug(message: string): void;
}

export interface LoggerOptions {
  /** Show debug messages */
  verbose?: boolean;
}

/**
 * Console logger; debug output is dropped unless verbose
 */
export class ConsoleLogger implements Logger {
  private verbose: boolean;

  constructor(options?: LoggerOptions) {
    this.verbose = options?.verbose ?? false;
  }

  info(message: string): void {
    console.log(message);
  }

  warn(message: string): void {
    console.warn(message);
  }

  error(message: string): void {
    console.error(message);
  }

  debug(message: string): void {
    if (this.verbose) {
      console.log(message);
    }
  }
}

/**
 * Logger that produces no output, for library use and tests
 */
export class SilentLogger implements Logger {
  info(): void {}
  warn(): void {}
  error(): void {}
  debug(): void {}
}

export function createLogger(options?: LoggerOptions & { quiet?: boolean }): Logger {
  return options?.quiet ? new SilentLogger() : new ConsoleLogger(options);
}
