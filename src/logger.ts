/**
 * Logger abstraction.
 *
 * Structured, level-based logging with context. Every asynchronous task in
 * the debugger core (page fetches, backtrace and source fetches, status
 * subscriptions) logs through a child logger that carries its trace id and
 * execution id, so interleaved work can be told apart in the console.
 * Consumers can replace the default implementation by calling setLogHandler().
 */

import { v4 as uuidv4 } from 'uuid';
import type { TypedError } from './domain/errors';
import type { ExecutionId } from './domain/execution-id';

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

/** Context fields; the well-known ones are lifted onto the LogRecord. */
export interface LogContext {
  executionId?: ExecutionId;
  traceId?: string;
  [key: string]: unknown;
}

export interface LogRecord {
  level: LogLevel;
  message: string;
  /** Execution the logging task works on. */
  executionId?: ExecutionId;
  /** Shared by every record of one asynchronous task. */
  traceId?: string;
  /** `TypedError.code` of a record written by `Logger.failure`. */
  errorCode?: string;
  context?: Record<string, unknown>;
  timestamp: string;
}

export type LogHandler = (entry: LogRecord) => void;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

/** Default log handler writes structured JSON to console. */
const defaultLogHandler: LogHandler = (entry: LogRecord) => {
  const output = {
    level: entry.level,
    ts: entry.timestamp,
    msg: entry.message,
    executionId: entry.executionId,
    traceId: entry.traceId,
    errorCode: entry.errorCode,
    ...entry.context,
  };
  switch (entry.level) {
    case LogLevel.Error:
      console.error(JSON.stringify(output));
      break;
    case LogLevel.Warn:
      console.warn(JSON.stringify(output));
      break;
    case LogLevel.Debug:
      console.debug(JSON.stringify(output));
      break;
    default:
      console.log(JSON.stringify(output));
  }
};

let currentHandler: LogHandler = defaultLogHandler;
let currentMinLevel: LogLevel = LogLevel.Info;

/** Replace the default log handler (e.g., for testing or a remote log sink). */
export function setLogHandler(handler: LogHandler): void {
  currentHandler = handler;
}

/** Restore the console handler. */
export function resetLogHandler(): void {
  currentHandler = defaultLogHandler;
}

/** Set the minimum log level. Messages below this level are suppressed. */
export function setLogLevel(level: LogLevel): void {
  currentMinLevel = level;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[currentMinLevel];
}

function log(level: LogLevel, message: string, context: LogContext, errorCode?: string): void {
  if (!shouldLog(level)) return;
  const { executionId, traceId: trace, ...rest } = context;
  currentHandler({
    level,
    message,
    executionId,
    traceId: trace,
    errorCode,
    context: Object.keys(rest).length > 0 ? rest : undefined,
    timestamp: new Date().toISOString(),
  });
}

/** Create a child logger with persistent context fields. */
export function createLogger(baseContext: LogContext = {}): Logger {
  return {
    debug: (msg, ctx) => log(LogLevel.Debug, msg, { ...baseContext, ...ctx }),
    info: (msg, ctx) => log(LogLevel.Info, msg, { ...baseContext, ...ctx }),
    warn: (msg, ctx) => log(LogLevel.Warn, msg, { ...baseContext, ...ctx }),
    error: (msg, ctx) => log(LogLevel.Error, msg, { ...baseContext, ...ctx }),
    failure: (msg, error, ctx) =>
      log(
        error.retryable ? LogLevel.Warn : LogLevel.Error,
        msg,
        {
          executionId: error.executionId,
          ...baseContext,
          ...ctx,
          error: error.message,
          retryable: error.retryable,
          ...error.details,
        },
        error.code,
      ),
    child: (childCtx) => createLogger({ ...baseContext, ...childCtx }),
  };
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Log a failed operation; retryable errors are warnings, the rest errors. */
  failure(message: string, error: TypedError, context?: LogContext): void;
  child(context: LogContext): Logger;
}

/**
 * Short random id used to correlate the log lines of one asynchronous task.
 */
export function traceId(): string {
  return uuidv4().slice(0, 8);
}

/** Root logger instance. */
export const logger = createLogger({ component: 'execution-debugger' });
