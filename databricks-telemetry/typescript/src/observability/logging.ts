/**
 * Logging for the telemetry pipeline
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export interface ConsoleLoggerOptions {
  /** Lowest level written (default: 'info') */
  level?: LogLevel;
  /** One JSON object per line instead of text */
  json?: boolean;
  /** Prefix lines with an ISO timestamp (default: true) */
  timestamps?: boolean;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * Writes one line per entry to the console, for hosts without a logger of their own
 */
export class ConsoleLogger implements Logger {
  private readonly minRank: number;
  private readonly json: boolean;
  private readonly timestamps: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.minRank = LEVEL_RANK[options.level ?? 'info'];
    this.json = options.json ?? false;
    this.timestamps = options.timestamps ?? true;
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.write('trace', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write('error', message, context);
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LEVEL_RANK[level] < this.minRank) {
      return;
    }

    const time = this.timestamps ? new Date().toISOString() : undefined;
    if (this.json) {
      console.log(JSON.stringify({ time, level, message, ...context }));
      return;
    }

    const prefix = time ? `${time} ` : '';
    const suffix = context ? ` ${JSON.stringify(context)}` : '';
    console.log(`${prefix}[${level.toUpperCase()}] ${message}${suffix}`);
  }
}

/**
 * Discards everything; the default, so telemetry stays silent unless the host injects a logger
 */
export class NoopLogger implements Logger {
  trace(_message: string, _context?: Record<string, unknown>): void {}
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _context?: Record<string, unknown>): void {}
}

export const noopLogger: Logger = new NoopLogger();
