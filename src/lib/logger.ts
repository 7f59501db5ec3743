/**
 * Structured Logger
 * JSON-line logging for the auth, VTN and conversion layers.
 *   - one JSON object per line (machine readable)
 *   - minimum level per logger, overridable with OADR3_LOG_LEVEL
 *
 * Entries go to stderr so they never interleave with command output on stdout.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  /** Identifies one logical operation across log lines */
  requestId?: string;
  /** HTTP method */
  method?: string;
  /** Request URL (never contains credentials) */
  url?: string;
  /** Elapsed time in milliseconds */
  duration?: number;
  /** HTTP status code */
  statusCode?: number;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
  metadata?: Record<string, unknown>;
}

export interface LoggerConfig {
  /** Minimum level written (default: OADR3_LOG_LEVEL or 'warn') */
  minLevel?: LogLevel;
  /** Disable all output (default: false) */
  silent?: boolean;
  /** Custom line formatter */
  formatter?: (entry: LogEntry) => string;
  /** Include stack traces of logged errors (default: true) */
  includeStack?: boolean;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}

function defaultMinLevel(): LogLevel {
  const fromEnv = process.env.OADR3_LOG_LEVEL?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'warn';
}

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export class StructuredLogger {
  private component: string;
  private config: Required<LoggerConfig>;

  constructor(component: string, config: LoggerConfig = {}) {
    this.component = component;
    this.config = {
      minLevel: config.minLevel ?? defaultMinLevel(),
      silent: config.silent ?? false,
      formatter: config.formatter ?? ((entry: LogEntry) => JSON.stringify(entry)),
      includeStack: config.includeStack !== false,
    };
  }

  private shouldLog(level: LogLevel): boolean {
    return !this.config.silent && LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.minLevel];
  }

  private output(entry: LogEntry): void {
    console.error(this.config.formatter(entry));
  }

  debug(message: string, context?: LogContext, metadata?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    this.log('debug', message, context, metadata);
  }

  info(message: string, context?: LogContext, metadata?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;
    this.log('info', message, context, metadata);
  }

  warn(message: string, context?: LogContext, metadata?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;
    this.log('warn', message, context, metadata);
  }

  error(
    message: string,
    error?: Error | null,
    context?: LogContext,
    metadata?: Record<string, unknown>
  ): void {
    if (!this.shouldLog('error')) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: 'error',
      message,
      component: this.component,
      context,
      metadata,
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        code: errorCode(error),
        stack: this.config.includeStack ? error.stack : undefined,
      };
    }

    this.output(entry);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: LogContext,
    metadata?: Record<string, unknown>
  ): void {
    this.output({
      timestamp: new Date().toISOString(),
      level,
      message,
      component: this.component,
      context,
      metadata,
    });
  }

  setMinLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.config.minLevel;
  }
}

/**
 * Component loggers
 */
export const loggers = {
  auth: new StructuredLogger('Auth'),
  vtn: new StructuredLogger('VTN'),
  conversion: new StructuredLogger('Conversion'),
  cli: new StructuredLogger('CLI'),
};

/**
 * Sets the minimum level of every component logger
 */
export function setLogLevel(level: LogLevel): void {
  for (const logger of Object.values(loggers)) {
    logger.setMinLevel(level);
  }
}
