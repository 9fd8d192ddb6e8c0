export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  level: LogLevel;
  json: boolean; // If false, use human-readable format
}

export interface LogSink {
  debug(msg: string, context?: Record<string, unknown>): void;
  info(msg: string, context?: Record<string, unknown>): void;
  warn(msg: string, context?: Record<string, unknown>): void;
  error(msg: string, context?: Record<string, unknown>): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Levelled logger writing to stderr, so stdout only ever carries the report.
 */
export class Logger implements LogSink {
  private readonly level: LogLevel;
  private readonly json: boolean;

  constructor(
    options: LoggerOptions,
    private readonly write: (line: string) => void = (line) => process.stderr.write(line + '\n'),
  ) {
    this.level = options.level;
    this.json = options.json;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.level];
  }

  private format(level: LogLevel, msg: string, context?: Record<string, unknown>): string {
    const ts = new Date().toISOString();
    if (this.json) {
      return JSON.stringify({ ts, level, msg, ...context });
    }
    const contextStr = context ? ` ${JSON.stringify(context)}` : '';
    return `[${ts}] ${level.toUpperCase().padEnd(5)} ${msg}${contextStr}`;
  }

  private log(level: LogLevel, msg: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;
    this.write(this.format(level, msg, context));
  }

  debug(msg: string, context?: Record<string, unknown>): void {
    this.log('debug', msg, context);
  }

  info(msg: string, context?: Record<string, unknown>): void {
    this.log('info', msg, context);
  }

  warn(msg: string, context?: Record<string, unknown>): void {
    this.log('warn', msg, context);
  }

  error(msg: string, context?: Record<string, unknown>): void {
    this.log('error', msg, context);
  }

  child(context: Record<string, unknown>): LogSink {
    return {
      debug: (msg, extra) => this.debug(msg, { ...context, ...extra }),
      info: (msg, extra) => this.info(msg, { ...context, ...extra }),
      warn: (msg, extra) => this.warn(msg, { ...context, ...extra }),
      error: (msg, extra) => this.error(msg, { ...context, ...extra }),
    };
  }

  // Returns a stop function logging the elapsed time at debug level
  time(label: string, context?: Record<string, unknown>): () => void {
    const start = performance.now();
    return () => {
      const durationMs = Math.round(performance.now() - start);
      this.debug(`${label} completed`, { ...context, durationMs });
    };
  }
}

let globalLogger: Logger | null = null;

export function createLogger(options: LoggerOptions): Logger {
  globalLogger = new Logger(options);
  return globalLogger;
}

export function getLogger(): Logger {
  if (!globalLogger) {
    // Quiet default for programmatic use
    globalLogger = new Logger({ level: 'warn', json: false });
  }
  return globalLogger;
}
