export * from './event-store';
export * from './pagination-driver';
export * from './join-correlator';
export * from './ancestry';
export * from './highlighter';
export * from './backtrace-cache';
export * from './backtrace-view';
export * from './trace-tree';
export * from './event-summary';
export * from './logs';
export * from './status-subscription';
