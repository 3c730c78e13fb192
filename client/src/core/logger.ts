/**
 * Structured logger with categories and levels.
 * Filtered by the WINDFIELD_LOG_LEVEL env var or runtime config.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type EmitLevel = Exclude<LogLevel, 'silent'>;

const LOG_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export type LogFields = Record<string, unknown>;

export interface LogRecord {
  level: EmitLevel;
  category: string;
  message: string;
  fields?: LogFields;
}

export type LogSink = (record: LogRecord) => void;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  /** Logger whose category is nested under this one, e.g. `Field:pipeline`. */
  child(subcategory: string): Logger;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_PRIORITY, value);
}

/** Writes to the console with a `[category]` prefix. */
export const consoleSink: LogSink = ({ level, category, message, fields }) => {
  const prefix = `[${category}]`;
  if (fields === undefined) {
    console[level](prefix, message);
  } else {
    console[level](prefix, message, fields);
  }
};

function levelFromEnv(): LogLevel {
  const raw = typeof process === 'undefined' ? undefined : process.env['WINDFIELD_LOG_LEVEL'];
  return isLogLevel(raw) ? raw : 'info';
}

let globalLevel: LogLevel = levelFromEnv();
let sink: LogSink = consoleSink;

export function setLogLevel(level: LogLevel): void {
  globalLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalLevel;
}

/** Route every logger through `next`; `null` restores the console. */
export function setLogSink(next: LogSink | null): void {
  sink = next ?? consoleSink;
}

export function createLogger(category: string): Logger {
  function write(level: EmitLevel, message: string, fields?: LogFields): void {
    if (LOG_PRIORITY[level] < LOG_PRIORITY[globalLevel]) return;
    sink(fields === undefined ? { level, category, message } : { level, category, message, fields });
  }

  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
    child: (subcategory) => createLogger(`${category}:${subcategory}`),
  };
}
