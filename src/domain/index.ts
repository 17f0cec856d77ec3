/**
 * Domain model exports.
 */

export * from './backtrace';
export * from './color';
export * from './component-id';
export * from './errors';
export * from './execution-event';
export * from './execution-id';
export * from './execution-status';
export * from './join-set-id';
export * from './log-entry';
export * from './time';
export * from './version-path';
