/**
 * React bindings for the debugger and trace views.
 *
 * Hooks own the stores, drivers and caches of one mounted view and tear
 * them down on unmount. Components are props-driven; navigation is always
 * handed back to the host through `onNavigate`.
 */

export { useEventStream } from './use-event-stream';
export type { UseEventStreamOptions, UseEventStreamReturn } from './use-event-stream';
export { useDebugger } from './use-debugger';
export type {
  DebuggerLevelView,
  DebuggerLogItem,
  UseDebuggerOptions,
  UseDebuggerReturn,
} from './use-debugger';
export { useTraceTree } from './use-trace-tree';
export type { UseTraceTreeOptions, UseTraceTreeReturn } from './use-trace-tree';
export { useExecutionLogs } from './use-execution-logs';
export type { UseExecutionLogsReturn } from './use-execution-logs';
export { useExecutionStatus } from './use-execution-status';
export type { UseExecutionStatusOptions, UseExecutionStatusReturn } from './use-execution-status';
export { StepControlsView } from './step-controls';
export type { StepControlsViewProps } from './step-controls';
export { BacktraceBlock } from './backtrace-block';
export type { BacktraceBlockProps } from './backtrace-block';
