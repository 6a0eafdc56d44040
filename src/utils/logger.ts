/**
 * Structured JSON logger
 *
 * Log format (one JSON object per line):
 * { timestamp, level, event, ... }
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  method?: string;
  url?: string;
  status?: number;
  latency_ms?: number;
  body?: string;
  error?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(entry: Omit<LogEntry, 'timestamp' | 'level'>): void;
  info(entry: Omit<LogEntry, 'timestamp' | 'level'>): void;
  warn(entry: Omit<LogEntry, 'timestamp' | 'level'>): void;
  error(entry: Omit<LogEntry, 'timestamp' | 'level'>): void;
}

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Create a structured JSON logger
 * @param output Write function (default: console.error, keeping stdout for results)
 * @param minLevel Minimum log level to output
 */
export function createLogger(
  output: (line: string) => void = console.error,
  minLevel: LogLevel = 'info'
): Logger {
  const log = (level: LogLevel, entry: Omit<LogEntry, 'timestamp' | 'level'>) => {
    if (LOG_LEVELS[level] < LOG_LEVELS[minLevel]) return;

    const fullEntry = {
      timestamp: new Date().toISOString(),
      level,
      ...entry,
    };

    output(JSON.stringify(fullEntry));
  };

  return {
    debug: (entry) => log('debug', entry),
    info: (entry) => log('info', entry),
    warn: (entry) => log('warn', entry),
    error: (entry) => log('error', entry),
  };
}

/** Default logger instance */
export const logger = createLogger();
