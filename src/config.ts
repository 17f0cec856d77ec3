/**
 * Runtime configuration for the debugger core.
 *
 * Every consumer (event streams, logs pager, notifications) reads its knobs
 * from one DebuggerConfig. Callers override only the fields they care about
 * via mergeDebuggerConfig().
 */

import { TypedError, validationError } from './domain/errors';

export interface DebuggerConfig {
  /** Upper bound for both events and responses requested per page. Default: 500. */
  pageSize: number;
  /** Delay (ms) before fetching the next page of an unfinished execution. Default: 2500. */
  pollIntervalMs: number;
  /** Page size of the execution logs pager. Default: 20. */
  logsPageSize: number;
  /** How long a notification stays visible (ms). Default: 5000. */
  notificationDurationMs: number;
}

export const DEFAULT_DEBUGGER_CONFIG: Readonly<DebuggerConfig> = {
  pageSize: 500,
  pollIntervalMs: 2_500,
  logsPageSize: 20,
  notificationDurationMs: 5_000,
};

const CONFIG_FIELDS: ReadonlyArray<keyof DebuggerConfig> = [
  'pageSize',
  'pollIntervalMs',
  'logsPageSize',
  'notificationDurationMs',
];

/** Layer `override` on the defaults; `undefined` fields keep the default. */
export function mergeDebuggerConfig(override?: Partial<DebuggerConfig>): DebuggerConfig {
  const merged: DebuggerConfig = { ...DEFAULT_DEBUGGER_CONFIG };
  if (!override) return merged;
  for (const key of CONFIG_FIELDS) {
    const value = override[key];
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return merged;
}

/** Returns one error per field that is not a positive integer. */
export function validateDebuggerConfig(config: DebuggerConfig): TypedError[] {
  const errors: TypedError[] = [];
  for (const key of CONFIG_FIELDS) {
    const value = config[key];
    if (!Number.isInteger(value) || value <= 0) {
      errors.push(
        validationError(`Configuration field "${key}" must be a positive integer`, {
          field: key,
          value,
        }),
      );
    }
  }
  return errors;
}
