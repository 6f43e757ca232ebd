// ============================================================================
// ipns-dataset-client — Structured Logging
// ============================================================================

/** Log levels in increasing severity; `silent` disables output. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

/**
 * Parse a level name, falling back to `info` for anything unrecognised.
 * @internal
 */
export function parseLogLevel(raw: string | undefined): LogLevel {
  const level = raw?.toLowerCase();
  return LOG_LEVELS.find((l) => l === level) ?? 'info';
}

interface ConsoleLoggerConfig {
  readonly module: string;
  readonly level: LogLevel;
  readonly pretty: boolean;
}

class ConsoleLogger implements Logger {
  constructor(private readonly config: ConsoleLoggerConfig) {}

  private shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.config.level];
  }

  private format(level: Exclude<LogLevel, 'silent'>, message: string, metadata?: LogMetadata): string {
    const timestamp = new Date().toISOString();
    const hasMeta = metadata !== undefined && Object.keys(metadata).length > 0;

    if (this.config.pretty) {
      const metaStr = hasMeta ? ` ${JSON.stringify(metadata)}` : '';
      return `[${timestamp}] ${level.toUpperCase()} [${this.config.module}]: ${message}${metaStr}`;
    }

    return JSON.stringify({
      timestamp,
      level,
      service: `ipns-dataset-client:${this.config.module}`,
      message,
      ...(hasMeta ? metadata : {}),
    });
  }

  debug(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('debug')) return;
    console.debug(this.format('debug', message, metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('info')) return;
    console.info(this.format('info', message, metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('warn')) return;
    console.warn(this.format('warn', message, metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('error')) return;
    console.error(this.format('error', message, metadata));
  }
}

/**
 * Create a logger for one module. Level comes from `LOG_LEVEL` (default
 * `info`); output is JSON lines when `NODE_ENV=production`.
 */
export function createLogger(module: string, level?: LogLevel): Logger {
  return new ConsoleLogger({
    module,
    level: level ?? parseLogLevel(process.env.LOG_LEVEL),
    pretty: process.env.NODE_ENV !== 'production',
  });
}
