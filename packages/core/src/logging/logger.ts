/**
 * Logger - Leveled logging to a pluggable sink
 *
 * The library logs through this interface only; the CLI decides where
 * lines go and how they look.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

/**
 * Receives fully formatted lines
 */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  minLevel?: LogLevel;
  sink?: LogSink;
  /** Included in every line, e.g. the module name */
  scope?: string;
  /** Clock override for tests */
  now?: () => Date;
}

const stderrSink: LogSink = (_level, line) => {
  process.stderr.write(`${line}\n`);
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export class Logger {
  private readonly minLevel: LogLevel;
  private readonly sink: LogSink;
  private readonly scope: string | undefined;
  private readonly now: () => Date;

  constructor(options: LoggerOptions = {}) {
    this.minLevel = options.minLevel ?? 'info';
    this.sink = options.sink ?? stderrSink;
    this.scope = options.scope;
    this.now = options.now ?? (() => new Date());
  }

  error(message: string, ...args: unknown[]): void {
    this.log('error', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log('warn', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log('info', message, args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.log('debug', message, args);
  }

  /**
   * A logger with the same level and sink, tagged with a scope
   */
  child(scope: string): Logger {
    return new Logger({
      minLevel: this.minLevel,
      sink: this.sink,
      scope: this.scope ? `${this.scope}:${scope}` : scope,
      now: this.now,
    });
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[this.minLevel];
  }

  private log(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const timestamp = this.now().toISOString();
    const scope = this.scope ? ` [${this.scope}]` : '';
    let formattedMessage = `[${timestamp}] [${level.toUpperCase()}]${scope} ${message}`;

    if (args.length > 0) {
      const argsStr = args
        .map(arg => {
          if (arg instanceof Error) {
            return `${arg.message}\n${arg.stack ?? ''}`;
          }
          if (typeof arg === 'object' && arg !== null) {
            try {
              return JSON.stringify(arg, null, 2);
            } catch {
              return String(arg);
            }
          }
          return String(arg);
        })
        .join(' ');
      formattedMessage += ` ${argsStr}`;
    }

    this.sink(level, formattedMessage);
  }
}

/**
 * Factory function for creating loggers
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}

/**
 * Discards everything; the default for library entry points
 */
export function createSilentLogger(): Logger {
  return new Logger({ minLevel: 'error', sink: () => undefined });
}
