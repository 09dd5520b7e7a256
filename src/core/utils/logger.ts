/**
 * Structured logging for MEPS Reader
 *
 * Console-based. Each module takes its own logger from createLogger() so
 * that lines carry the module they came from; JSON lines in production,
 * single-line text otherwise. LOG_LEVEL sets the threshold.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

/**
 * Minimal logging surface accepted by library components.
 * Both Logger and the CLI logger satisfy it.
 */
export interface StructuredLogger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;
}

export interface LoggerConfig {
  readonly level: LogLevel;
  readonly service: string;
  /** Source module, e.g. `providers/puf-name-registry` */
  readonly module?: string;
  readonly pretty: boolean;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const SERVICE_NAME = 'meps-reader';

export class Logger implements StructuredLogger {
  private readonly config: LoggerConfig;

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  debug(message: string, metadata?: LogMetadata): void {
    if (this.enabled('debug')) console.debug(this.render('debug', message, metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    if (this.enabled('info')) console.info(this.render('info', message, metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    if (this.enabled('warn')) console.warn(this.render('warn', message, metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    if (this.enabled('error')) console.error(this.render('error', message, metadata));
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.config.level];
  }

  private render(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const timestamp = new Date().toISOString();
    const hasMetadata = metadata !== undefined && Object.keys(metadata).length > 0;

    if (this.config.pretty) {
      const scope = this.config.module ? ` [${this.config.module}]` : '';
      const meta = hasMetadata ? ` ${JSON.stringify(metadata)}` : '';
      return `[${timestamp}] ${level.toUpperCase()}${scope}: ${message}${meta}`;
    }

    return JSON.stringify({
      timestamp,
      level,
      service: this.config.service,
      ...(this.config.module ? { module: this.config.module } : {}),
      message,
      ...(hasMetadata ? metadata : {}),
    });
  }
}

function levelFromEnv(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return 'info';
}

export interface CreateLoggerOptions {
  readonly module: string;
  /** Default: LOG_LEVEL, else `info` */
  readonly level?: LogLevel;
  /** Default: text unless NODE_ENV is `production` */
  readonly pretty?: boolean;
}

/**
 * Create a logger scoped to a module
 */
export function createLogger(options: CreateLoggerOptions): Logger {
  return new Logger({
    level: options.level ?? levelFromEnv(),
    service: SERVICE_NAME,
    module: options.module,
    pretty: options.pretty ?? process.env.NODE_ENV !== 'production',
  });
}
