/**
 * Structured logging for the transaction client
 *
 * Namespaced loggers (`txn`, `retry`, `session`, `client`, `rpc`) with a
 * process-wide level and output format. Output goes to `console` unless a
 * custom sink is configured.
 */

/**
 * Available log levels in order of severity. `silent` disables output.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Level of an individual log entry
 */
export type EntryLevel = Exclude<LogLevel, 'silent'>;

/**
 * Logger interface with standard log level methods
 */
export interface Logger {
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
}

/**
 * Receives every formatted line that passes the level filter
 */
export type LogSink = (level: EntryLevel, line: string) => void;

/**
 * Configuration options for logging
 */
export interface LogConfig {
  /** Minimum log level to output (default: 'warn') */
  level: LogLevel;
  /** Whether to output structured JSON (default: true) */
  structured: boolean;
  /** Destination for formatted lines (default: the matching console method) */
  sink?: LogSink;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const DEFAULT_CONFIG: LogConfig = {
  level: 'warn',
  structured: true,
};

let globalConfig: LogConfig = { ...DEFAULT_CONFIG };

/**
 * Configure global logging settings
 *
 * @param config - Partial configuration to merge with existing config
 */
export function configureLogging(config: Partial<LogConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

/**
 * Restore the default logging configuration (level `warn`, JSON, console).
 */
export function resetLogging(): void {
  globalConfig = { ...DEFAULT_CONFIG };
}

export function getLogConfig(): LogConfig {
  return { ...globalConfig };
}

/**
 * Parse a level name (case-insensitive), e.g. from an environment variable.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized);
}

function shouldLog(level: EntryLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[globalConfig.level];
}

function serializeField(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

function formatLog(
  namespace: string,
  level: EntryLevel,
  message: string,
  fields?: Record<string, unknown>
): string {
  const timestamp = new Date().toISOString();
  const entries = fields ? Object.entries(fields).filter(([, v]) => v !== undefined) : [];

  if (globalConfig.structured) {
    const logEntry: Record<string, unknown> = {
      timestamp,
      level,
      namespace,
      message,
    };

    if (entries.length > 0) {
      logEntry['fields'] = Object.fromEntries(entries.map(([k, v]) => [k, serializeField(v)]));
    }

    return JSON.stringify(logEntry);
  }

  const fieldsStr =
    entries.length > 0
      ? ` ${entries.map(([k, v]) => `${k}=${JSON.stringify(serializeField(v))}`).join(' ')}`
      : '';

  return `[${timestamp}] [${level.toUpperCase()}] [${namespace}] ${message}${fieldsStr}`;
}

function emit(level: EntryLevel, line: string): void {
  if (globalConfig.sink) {
    globalConfig.sink(level, line);
    return;
  }
  console[level](line);
}

/**
 * Create a logger with the specified namespace
 *
 * @param namespace - Component the entries belong to
 *
 * @example
 * ```typescript
 * const logger = createLogger('txn');
 * logger.debug('Discarding transaction', { startTs: 42 });
 * logger.warn('Transaction failed after retries', { attempts: 6 });
 * ```
 */
export function createLogger(namespace: string): Logger {
  const log = (level: EntryLevel, message: string, fields?: Record<string, unknown>): void => {
    if (shouldLog(level)) {
      emit(level, formatLog(namespace, level, message, fields));
    }
  };

  return {
    debug: (message, fields) => log('debug', message, fields),
    info: (message, fields) => log('info', message, fields),
    warn: (message, fields) => log('warn', message, fields),
    error: (message, fields) => log('error', message, fields),
  };
}
