/**
 * Structured logging utility for the publisher
 *
 * Provides structured logging with levels, timestamps, and contextual metadata.
 * JSON lines in production (for telemetry ingestion), one readable line otherwise.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogMetadata {
  readonly [key: string]: unknown;
}

export interface LoggerConfig {
  readonly level: LogLevel;
  readonly service: string;
  readonly pretty: boolean;
  /** Metadata attached to every record */
  readonly context?: LogMetadata;
}

export class Logger {
  private readonly config: LoggerConfig;
  private readonly levels: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  get level(): LogLevel {
    return this.config.level;
  }

  /**
   * Logger carrying additional bound metadata
   */
  child(context: LogMetadata): Logger {
    return new Logger({
      ...this.config,
      context: { ...this.config.context, ...context },
    });
  }

  private shouldLog(level: LogLevel): boolean {
    return this.levels[level] >= this.levels[this.config.level];
  }

  private formatMessage(
    level: LogLevel,
    message: string,
    metadata?: LogMetadata
  ): string {
    const timestamp = new Date().toISOString();
    const merged: LogMetadata = { ...this.config.context, ...metadata };
    const hasMetadata = Object.keys(merged).length > 0;

    if (this.config.pretty) {
      const metaStr = hasMetadata ? ` ${JSON.stringify(merged, errorReplacer)}` : '';
      return `[${timestamp}] ${level.toUpperCase()} ${this.config.service}: ${message}${metaStr}`;
    }

    return JSON.stringify(
      {
        timestamp,
        level,
        service: this.config.service,
        message,
        ...merged,
      },
      errorReplacer
    );
  }

  debug(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('debug')) return;
    console.debug(this.formatMessage('debug', message, metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('info')) return;
    console.info(this.formatMessage('info', message, metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('warn')) return;
    console.warn(this.formatMessage('warn', message, metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('error')) return;
    console.error(this.formatMessage('error', message, metadata));
  }
}

// Errors have no enumerable fields; log their name and message instead of `{}`
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

const getLogLevel = (): LogLevel => {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  return level !== undefined && isLogLevel(level) ? level : 'info';
};

const SERVICE_NAME = 'data-product-publisher';

// Default logger instance
export const logger = new Logger({
  level: getLogLevel(),
  service: SERVICE_NAME,
  pretty: process.env.NODE_ENV !== 'production',
});

/**
 * Create a module logger with additional context
 *
 * `level` overrides LOG_LEVEL (e.g. the configured log level).
 */
export function createLogger(
  context: LogMetadata & { readonly module: string; readonly level?: LogLevel }
): Logger {
  const { module, level, ...rest } = context;
  return new Logger({
    level: level ?? getLogLevel(),
    service: `${SERVICE_NAME}:${module}`,
    pretty: process.env.NODE_ENV !== 'production',
    context: rest,
  });
}
