import chalk, { Chalk, type ChalkInstance } from 'chalk';

export enum Verbosity {
  Quiet = 0,
  Normal = 1,
  Verbose = 2,
}

export interface Logger {
  readonly verbosity: Verbosity;
  error: (message: string) => void;
  warn: (message: string) => void;
  info: (message: string) => void;
  success: (message: string) => void;
  verbose: (message: string) => void;
  /** Unprefixed, unindented output at normal verbosity */
  plain: (message: string) => void;
}

export interface LoggerOptions {
  verbosity?: Verbosity;
  /** Set to false for plain text (tests, piped output) */
  color?: boolean;
  write?: (line: string) => void;
}

/**
 * Create a console logger in the CLI's indented, colored style
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const verbosity = options.verbosity ?? Verbosity.Normal;
  const paint: ChalkInstance = options.color === false ? new Chalk({ level: 0 }) : chalk;
  const write = options.write ?? ((line: string) => console.log(line));

  const emit = (level: Verbosity, line: string) => {
    if (verbosity >= level) {
      write(line);
    }
  };

  return {
    verbosity,
    error: (message) => write(paint.red(`  ✗ ${message}`)),
    warn: (message) => emit(Verbosity.Normal, paint.yellow(`  ! ${message}`)),
    info: (message) => emit(Verbosity.Normal, `  ${message}`),
    success: (message) => emit(Verbosity.Normal, paint.green(`  ✓ ${message}`)),
    verbose: (message) => emit(Verbosity.Verbose, paint.gray(`  ${message}`)),
    plain: (message) => emit(Verbosity.Normal, message),
  };
}

/**
 * Map --quiet / --verbose flags to a verbosity level. Quiet wins.
 */
export function resolveVerbosity(flags: { quiet?: boolean; verbose?: boolean }): Verbosity {
  if (flags.quiet) return Verbosity.Quiet;
  if (flags.verbose) return Verbosity.Verbose;
  return Verbosity.Normal;
}
