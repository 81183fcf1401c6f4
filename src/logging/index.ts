/**
 * Structured logging API for the bridge.
 *
 * Every module logs through these helpers so that bridge lifecycle events
 * carry the same field names (component, operation, token, thread).
 * The sink is a pino logger; outside production and test environments the
 * output goes through pino-pretty.
 *
 * Call setLogger() to route output to a different pino instance (tests use
 * this to capture records). clearLogger() restores the default sink.
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

/**
 * Structured logging fields.
 *
 * Common fields:
 * - component: subsystem identifier (e.g., "future-adaptor", "handle-table")
 * - operation: operation being performed (e.g., "to_host", "trampoline")
 * - token: correlation token of the bridge context involved
 * - thread: name of the logical thread the event happened on
 * - error_message: error message for error logs
 */
export interface LogFields {
  [key: string]: string | number | boolean | null | undefined;
}

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

function defaultEnvironment(): string {
  return process.env.FUTURE_BRIDGE_ENV ?? process.env.NODE_ENV ?? 'development';
}

function createDefaultLogger(): Logger {
  const loggerOptions: LoggerOptions = {
    name: 'future-bridge',
    level: process.env.FUTURE_BRIDGE_LOG_LEVEL ?? 'info',
  };

  const env = defaultEnvironment();
  if (env !== 'production' && env !== 'test') {
    loggerOptions.transport = {
      target: 'pino-pretty',
      options: { colorize: true },
    };
  }

  return pino(loggerOptions);
}

/**
 * Installed logger. Created lazily so that importing the package never
 * spawns a transport by itself.
 */
let installedLogger: Logger | null = null;

/**
 * Install a pino logger for all bridge logging.
 *
 * @example
 * ```typescript
 * setLogger(pino({ level: 'debug' }));
 * ```
 */
export function setLogger(logger: Logger): void {
  installedLogger = logger;
}

/**
 * Drop the installed logger; the next log call recreates the default one.
 *
 * Primarily for testing.
 */
export function clearLogger(): void {
  installedLogger = null;
}

/**
 * Get the active pino logger, creating the default one on first use.
 */
export function getLogger(): Logger {
  if (!installedLogger) {
    installedLogger = createDefaultLogger();
  }
  return installedLogger;
}

/**
 * Change the level of the active logger.
 */
export function setLogLevel(level: LogLevel): void {
  getLogger().level = level;
}

/**
 * Drop undefined values so they do not show up as explicit keys.
 */
function compactFields(fields?: LogFields): Record<string, string | number | boolean | null> {
  const result: Record<string, string | number | boolean | null> = {};
  if (!fields) {
    return result;
  }
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Log an ERROR level message with structured fields.
 */
export function logError(message: string, fields?: LogFields): void {
  getLogger().error(compactFields(fields), message);
}

/**
 * Log a WARN level message with structured fields.
 */
export function logWarn(message: string, fields?: LogFields): void {
  getLogger().warn(compactFields(fields), message);
}

/**
 * Log an INFO level message with structured fields.
 */
export function logInfo(message: string, fields?: LogFields): void {
  getLogger().info(compactFields(fields), message);
}

/**
 * Log a DEBUG level message with structured fields.
 */
export function logDebug(message: string, fields?: LogFields): void {
  getLogger().debug(compactFields(fields), message);
}

/**
 * Log a TRACE level message with structured fields.
 */
export function logTrace(message: string, fields?: LogFields): void {
  getLogger().trace(compactFields(fields), message);
}

export interface BoundLogger {
  error(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  debug(message: string, fields?: LogFields): void;
  trace(message: string, fields?: LogFields): void;
}

/**
 * Create a logger with preset fields.
 */
export function createLogger(defaultFields: LogFields): BoundLogger {
  const mergeFields = (fields?: LogFields): LogFields => ({
    ...defaultFields,
    ...fields,
  });

  return {
    error: (message: string, fields?: LogFields) => logError(message, mergeFields(fields)),
    warn: (message: string, fields?: LogFields) => logWarn(message, mergeFields(fields)),
    info: (message: string, fields?: LogFields) => logInfo(message, mergeFields(fields)),
    debug: (message: string, fields?: LogFields) => logDebug(message, mergeFields(fields)),
    trace: (message: string, fields?: LogFields) => logTrace(message, mergeFields(fields)),
  };
}

/**
 * Render an unknown thrown value as a message for log fields.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
