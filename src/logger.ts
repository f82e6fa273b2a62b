/**
 * Structured JSON Logger
 *
 * One JSON object per line, suitable for log aggregators.
 *
 * Format:
 *   {"timestamp":"2025-01-15T12:00:00.000Z","level":"info","service":"directory-search","component":"ratelimit","message":"..."}
 *
 * Features:
 *   - LOG_LEVEL (debug/info/warn/error) set once via initLogger()
 *   - Child loggers carry fixed context fields (component, org, ...)
 *   - console.* is routed through the same output after initLogger()
 */

// ---------------------------------------------------------------------------
// Log levels
// ---------------------------------------------------------------------------

export const LOG_LEVELS = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

export type LogFields = Record<string, string | number | boolean | null>;

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  child(fields: LogFields): Logger;
}

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

let currentLevel: LogLevel = 'info';
let serviceName = 'directory-search';

const originalConsole = {
  log: console.log.bind(console),
  info: console.info.bind(console),
  warn: console.warn.bind(console),
  error: console.error.bind(console),
  debug: console.debug.bind(console),
};

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

function formatArg(arg: unknown): string {
  if (typeof arg === 'string') return arg;
  if (arg instanceof Error) return `${arg.message}\n${arg.stack ?? ''}`;
  try {
    return JSON.stringify(arg) ?? String(arg);
  } catch {
    return String(arg);
  }
}

function writeLog(level: LogLevel, fields: LogFields, args: unknown[]): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[currentLevel]) return;

  const entry = {
    timestamp: new Date().toISOString(),
    level,
    service: serviceName,
    ...fields,
    message: args.map(formatArg).join(' '),
  };

  // Original methods, so an intercepted console does not recurse
  const writer = level === 'error' ? originalConsole.error : originalConsole.log;
  writer(JSON.stringify(entry));
}

function createLogger(fields: LogFields): Logger {
  return {
    debug: (...args) => writeLog('debug', fields, args),
    info: (...args) => writeLog('info', fields, args),
    warn: (...args) => writeLog('warn', fields, args),
    error: (...args) => writeLog('error', fields, args),
    child: (extra) => createLogger({ ...fields, ...extra }),
  };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export const logger: Logger = createLogger({});

/**
 * Set the level and service name, then route console.* through the logger.
 * An unknown level falls back to 'info' with a warning.
 */
export function initLogger(opts?: { level?: string; service?: string }): void {
  const rawLevel = opts?.level ?? 'info';
  if (isLogLevel(rawLevel)) {
    currentLevel = rawLevel;
  } else {
    currentLevel = 'info';
    writeLog('warn', { component: 'logger' }, [
      `Unknown LOG_LEVEL "${rawLevel}", defaulting to "info"`,
    ]);
  }

  if (opts?.service) {
    serviceName = opts.service;
  }

  console.log = (...args: unknown[]) => writeLog('info', {}, args);
  console.info = (...args: unknown[]) => writeLog('info', {}, args);
  console.warn = (...args: unknown[]) => writeLog('warn', {}, args);
  console.error = (...args: unknown[]) => writeLog('error', {}, args);
  console.debug = (...args: unknown[]) => writeLog('debug', {}, args);
}

/** Restore the original console methods (tests). */
export function restoreConsole(): void {
  console.log = originalConsole.log;
  console.info = originalConsole.info;
  console.warn = originalConsole.warn;
  console.error = originalConsole.error;
  console.debug = originalConsole.debug;
}
