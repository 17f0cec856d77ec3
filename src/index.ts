/**
 * Execution debugger core.
 *
 * Framework-agnostic stores, correlators and tree builders live under
 * `execution/`; `react/` binds them to components. Everything talks to the
 * backend through an `ExecutionRepositoryClient` supplied by the host.
 */

export * from './domain';
export * from './execution';
export * from './rpc/client';
export * from './config';
export * from './notifications/toast';
export {
  createLogger,
  logger,
  LogLevel,
  resetLogHandler,
  setLogHandler,
  setLogLevel,
  traceId,
} from './logger';
export type { LogContext, LogHandler, LogRecord, Logger } from './logger';
export * from './react';
