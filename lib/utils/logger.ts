// CONSOLE LOGGER - Level-filtered, scope-prefixed console output
// Services receive a Logger instead of writing to the console themselves

export type LogLevel = 'debug' | 'info' | 'normal' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: -2,
  info: -1,
  normal: 0,
  warn: 1,
  error: 2,
  silent: 3
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  /** Regular progress output, shown unless the run is quiet */
  log(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  child(scope: string): Logger;
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  scope?: string;
  console?: Pick<Console, 'debug' | 'info' | 'log' | 'warn' | 'error'>;
}

class ConsoleLogger implements Logger {
  private readonly threshold: number;

  constructor(
    private readonly level: LogLevel,
    private readonly scope: string | undefined,
    private readonly out: Pick<Console, 'debug' | 'info' | 'log' | 'warn' | 'error'>
  ) {
    this.threshold = LEVEL_ORDER[level];
  }

  debug(message: string, ...details: unknown[]): void {
    if (this.enabled('debug')) this.out.debug(this.format('DEBUG', message), ...details);
  }

  info(message: string, ...details: unknown[]): void {
    if (this.enabled('info')) this.out.info(this.format('INFO', message), ...details);
  }

  log(message: string, ...details: unknown[]): void {
    if (this.enabled('normal')) this.out.log(message, ...details);
  }

  warn(message: string, ...details: unknown[]): void {
    if (this.enabled('warn')) this.out.warn(this.format('WARN', message), ...details);
  }

  error(message: string, ...details: unknown[]): void {
    if (this.enabled('error')) this.out.error(this.format('ERROR', message), ...details);
  }

  child(scope: string): Logger {
    return new ConsoleLogger(this.level, scope, this.out);
  }

  private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] >= this.threshold;
  }

  private format(tag: string, message: string): string {
    return this.scope ? `[${tag}] [${this.scope}] ${message}` : `[${tag}] ${message}`;
  }
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  return new ConsoleLogger(options.level ?? 'normal', options.scope, options.console ?? console);
}

export const silentLogger: Logger = createConsoleLogger({ level: 'silent' });

/**
 * Map CLI verbosity flags to a level: -q shows errors only, each -v lowers the level one step
 */
export function levelFromVerbosity(verbose: number, quiet: boolean): LogLevel {
  if (quiet) return 'error';
  if (verbose >= 2) return 'debug';
  if (verbose === 1) return 'info';
  return 'normal';
}
