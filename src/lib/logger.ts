/**
 * Structured Logger
 * Writes one JSON line per entry to stderr, filtered by LOG_LEVEL
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(scope: string): Logger;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_RANK;
}

function currentLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

/**
 * Errors don't survive JSON.stringify; flatten them
 */
function serializeFields(fields: LogFields): LogFields {
  const out: LogFields = {};
  for (const [key, value] of Object.entries(fields)) {
    out[key] =
      value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return out;
}

/**
 * Create a logger for a named scope (e.g. 'transfer', 'bookdrop-client')
 */
export function createLogger(scope: string): Logger {
  function write(level: Exclude<LogLevel, 'silent'>, message: string, fields?: LogFields): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[currentLevel()]) {
      return;
    }
    const entry = {
      time: new Date().toISOString(),
      level,
      scope,
      msg: message,
      ...(fields && serializeFields(fields)),
    };
    console.error(JSON.stringify(entry));
  }

  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
    child: (childScope) => createLogger(`${scope}:${childScope}`),
  };
}
