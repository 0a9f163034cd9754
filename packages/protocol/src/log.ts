/**
 * Console logging
 *
 * One line per event: `[ISO time] [scope] event {details}`. Every component
 * takes a Logger so tests can capture or silence output.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogDetails = Record<string, unknown>;

export interface Logger {
  debug(event: string, details?: LogDetails): void;
  info(event: string, details?: LogDetails): void;
  warn(event: string, details?: LogDetails): void;
  error(event: string, details?: LogDetails): void;
  child(scope: string): Logger;
}

export type LogSink = (level: LogLevel, line: string) => void;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_RANK;
}

function consoleSink(level: LogLevel, line: string): void {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function formatLine(scope: string, event: string, details: LogDetails = {}): string {
  const time = new Date().toISOString();
  const suffix = Object.keys(details).length ? ` ${JSON.stringify(details, jsonSafe)}` : '';
  return `[${time}] [${scope}] ${event}${suffix}`;
}

// bigint and Uint8Array values show up in details often enough to matter
function jsonSafe(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Uint8Array) return `<${value.length} bytes>`;
  return value;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
}

export function createLogger(scope: string, opts: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[opts.level ?? 'info'];
  const sink = opts.sink ?? consoleSink;

  function emit(level: LogLevel, event: string, details?: LogDetails) {
    if (LEVEL_RANK[level] < threshold) return;
    sink(level, formatLine(scope, event, details));
  }

  return {
    debug: (event, details) => emit('debug', event, details),
    info: (event, details) => emit('info', event, details),
    warn: (event, details) => emit('warn', event, details),
    error: (event, details) => emit('error', event, details),
    child: (childScope) => createLogger(`${scope}:${childScope}`, opts),
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = createLogger('silent', { sink: () => {} });
