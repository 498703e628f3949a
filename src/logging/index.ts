/**
 * Structured logging API.
 *
 * Thin layer over a single pino root logger so every component logs
 * through the same sink with consistent field names.
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

/**
 * Structured logging fields.
 *
 * Common fields include:
 * - component: Component/subsystem identifier (e.g., "task-group", "shutdown")
 * - operation: Operation being performed (e.g., "spawn", "stop")
 * - group_id: Task group instance identifier
 * - task_id: Spawned task identifier
 * - error_message: Error message for error logs
 */
export interface LogFields {
  [key: string]: string | number | boolean | null | undefined;
}

const loggerOptions: LoggerOptions = {
  name: 'multiraft-task-group',
  level: process.env.TASK_GROUP_LOG_LEVEL ?? 'info',
};

if (process.env.NODE_ENV === 'development') {
  loggerOptions.transport = {
    target: 'pino-pretty',
    options: { colorize: true },
  };
}

let rootLogger: Logger = pino(loggerOptions);

/**
 * Replace the root logger (tests and embedding runtimes).
 */
export function setRootLogger(logger: Logger): void {
  rootLogger = logger;
}

/**
 * Get the root logger.
 */
export function getRootLogger(): Logger {
  return rootLogger;
}

function compact(fields?: LogFields): Record<string, string | number | boolean | null> {
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
 *
 * @example
 * logError('Finalizer failed', {
 *   component: 'shutdown',
 *   error_message: 'disk full',
 * });
 */
export function logError(message: string, fields?: LogFields): void {
  rootLogger.error(compact(fields), message);
}

/**
 * Log a WARN level message with structured fields.
 */
export function logWarn(message: string, fields?: LogFields): void {
  rootLogger.warn(compact(fields), message);
}

/**
 * Log an INFO level message with structured fields.
 */
export function logInfo(message: string, fields?: LogFields): void {
  rootLogger.info(compact(fields), message);
}

/**
 * Log a DEBUG level message with structured fields.
 */
export function logDebug(message: string, fields?: LogFields): void {
  rootLogger.debug(compact(fields), message);
}

/**
 * Log a TRACE level message with structured fields.
 *
 * Typically disabled outside of local debugging.
 */
export function logTrace(message: string, fields?: LogFields): void {
  rootLogger.trace(compact(fields), message);
}

/**
 * Component logger returned by {@link createLogger}.
 */
export interface ComponentLogger {
  error(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  debug(message: string, fields?: LogFields): void;
  trace(message: string, fields?: LogFields): void;
}

/**
 * Create a logger with preset fields.
 *
 * @example
 * const logger = createLogger({ component: 'tick-driver' });
 * logger.info('Tick loop started', { interval_ms: 100 });
 * // Logs: { component: 'tick-driver', interval_ms: 100 }
 */
export function createLogger(defaultFields: LogFields): ComponentLogger {
  const mergeFields = (fields?: LogFields): LogFields => ({
    ...defaultFields,
    ...fields,
  });

  return {
    error: (message, fields) => logError(message, mergeFields(fields)),
    warn: (message, fields) => logWarn(message, mergeFields(fields)),
    info: (message, fields) => logInfo(message, mergeFields(fields)),
    debug: (message, fields) => logDebug(message, mergeFields(fields)),
    trace: (message, fields) => logTrace(message, mergeFields(fields)),
  };
}
