// ═══════════════════════════════════════════════════════════════════════════════
// STRUCTURED LOGGER — Leveled JSON / Pretty Logging with Component Context
// ifaddr Observability
// ═══════════════════════════════════════════════════════════════════════════════
//
// Usage:
//   import { getLogger } from '../observability/index.js';
//
//   const logger = getLogger({ component: 'codec' });
//   logger.warn('Rejected record', { length: 12 });
//
// Level, format and the on/off switch come from the `logging` config section.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getConfig } from '../../config/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Log levels in order of severity.
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Numeric log level values (Pino-compatible).
 */
export const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

/**
 * Receives each formatted line. Defaults to the console.
 */
export type LogSink = (level: LogLevel, line: string) => void;

/**
 * Options for creating a child logger.
 */
export interface LoggerOptions {
  /** Component name */
  component?: string;

  /** Additional context */
  context?: Record<string, unknown>;
}

export interface ILogger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
  fatal(message: string, error?: unknown, context?: Record<string, unknown>): void;

  /** Create a child logger with additional context */
  child(options: LoggerOptions): ILogger;

  /** Check if a level is enabled */
  isLevelEnabled(level: LogLevel): boolean;
}

// ─────────────────────────────────────────────────────────────────────────────────
// OUTPUT
// ─────────────────────────────────────────────────────────────────────────────────

const SERVICE_NAME = 'ifaddr';

function consoleSink(level: LogLevel, line: string): void {
  if (level === 'error' || level === 'fatal') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

let sink: LogSink = consoleSink;

/**
 * Redirect log output, e.g. to capture lines in tests.
 * Passing nothing restores console output.
 */
export function setLogSink(next?: LogSink): void {
  sink = next ?? consoleSink;
}

// ─────────────────────────────────────────────────────────────────────────────────
// FORMATTERS
// ─────────────────────────────────────────────────────────────────────────────────

function formatError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      errorName: error.name,
      errorMessage: error.message,
      ...(error.cause !== undefined ? { errorCause: String(error.cause) } : {}),
    };
  }

  return { errorMessage: String(error) };
}

function formatLogEntry(
  level: LogLevel,
  message: string,
  context: Record<string, unknown>,
  component?: string
): Record<string, unknown> {
  return {
    level,
    levelNum: LOG_LEVELS[level],
    time: new Date().toISOString(),
    msg: message,
    service: SERVICE_NAME,
    ...(component ? { component } : {}),
    ...context,
  };
}

const COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
};
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

function prettyPrint(
  level: LogLevel,
  message: string,
  context: Record<string, unknown>,
  component?: string
): string {
  const time = new Date().toISOString().split('T')[1]?.replace('Z', '') ?? '';
  const componentStr = component ? `[${component}] ` : '';
  const contextStr = Object.keys(context).length > 0
    ? ` ${DIM}${JSON.stringify(context)}${RESET}`
    : '';

  return `${DIM}${time}${RESET} ${COLORS[level]}${level.toUpperCase().padEnd(5)}${RESET} ${componentStr}${message}${contextStr}`;
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOGGER IMPLEMENTATION
// ─────────────────────────────────────────────────────────────────────────────────

function createLoggerImpl(options: LoggerOptions = {}): ILogger {
  const { component, context: baseContext = {} } = options;

  // Read per call so that config reloads take effect on existing loggers.
  const isLevelEnabled = (level: LogLevel): boolean => {
    const { logging } = getConfig();
    return logging.enabled && LOG_LEVELS[level] >= LOG_LEVELS[logging.level];
  };

  const write = (level: LogLevel, message: string, context: Record<string, unknown>): void => {
    if (!isLevelEnabled(level)) {
      return;
    }

    const fullContext = { ...baseContext, ...context };
    const line = getConfig().logging.pretty
      ? prettyPrint(level, message, fullContext, component)
      : JSON.stringify(formatLogEntry(level, message, fullContext, component));
    sink(level, line);
  };

  const writeWithError = (
    level: LogLevel,
    message: string,
    error?: unknown,
    context: Record<string, unknown> = {}
  ): void => {
    const errorContext = error !== undefined ? formatError(error) : {};
    write(level, message, { ...context, ...errorContext });
  };

  return {
    trace: (message, context = {}) => write('trace', message, context),
    debug: (message, context = {}) => write('debug', message, context),
    info: (message, context = {}) => write('info', message, context),
    warn: (message, context = {}) => write('warn', message, context),
    error: (message, error, context) => writeWithError('error', message, error, context),
    fatal: (message, error, context) => writeWithError('fatal', message, error, context),

    child: (childOptions: LoggerOptions): ILogger => {
      return createLoggerImpl({
        component: childOptions.component ?? component,
        context: { ...baseContext, ...childOptions.context },
      });
    },

    isLevelEnabled,
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// PUBLIC API
// ─────────────────────────────────────────────────────────────────────────────────

let rootLogger: ILogger | null = null;

/**
 * Get the root logger or create a child logger.
 */
export function getLogger(options?: LoggerOptions): ILogger {
  if (!rootLogger) {
    rootLogger = createLoggerImpl();
  }

  if (options) {
    return rootLogger.child(options);
  }

  return rootLogger;
}

/**
 * Reset the root logger and sink (for testing).
 */
export function resetLogger(): void {
  rootLogger = null;
  sink = consoleSink;
}

/**
 * Component loggers used across the library.
 */
export const loggers = {
  get address(): ILogger { return getLogger({ component: 'address' }); },
  get codec(): ILogger { return getLogger({ component: 'codec' }); },
  get platform(): ILogger { return getLogger({ component: 'platform' }); },
};
