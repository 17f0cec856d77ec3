/**
 * Contract of the execution repository RPC service.
 *
 * The host application supplies an implementation (gRPC-web, Connect, a
 * test fake...). The wire encoding is not part of this library. Failures
 * reject with `RpcError`; a NotFound status must use code `NOT_FOUND`.
 */

import type { BacktraceFilter, GetBacktraceResponse } from '../domain/backtrace';
import type { ComponentId } from '../domain/component-id';
import type { ExecutionEvent, ResponseWithCursor } from '../domain/execution-event';
import type { ExecutionId } from '../domain/execution-id';
import type { ExecutionStatus, GetStatusMessage } from '../domain/execution-status';
import type { LogEntry, LogLevelCode, LogStreamType } from '../domain/log-entry';

// ---------------------------------------------------------------------------
// Request / response shapes
// ---------------------------------------------------------------------------

export interface ListExecutionEventsAndResponsesRequest {
  executionId: ExecutionId;
  versionFrom: number;
  eventsLength: number;
  responsesCursorFrom: number;
  responsesLength: number;
  /** Include the response at `responsesCursorFrom` itself; only true on the first page. */
  responsesIncludingCursor: boolean;
  includeBacktraceId: boolean;
}

export interface ListExecutionEventsAndResponsesResponse {
  events: ExecutionEvent[];
  responses: ResponseWithCursor[];
  currentStatus?: ExecutionStatus;
}

export interface GetBacktraceRequest {
  executionId: ExecutionId;
  filter: BacktraceFilter;
}

export interface GetBacktraceSourceRequest {
  componentId: ComponentId;
  file: string;
}

export interface GetBacktraceSourceResponse {
  content: string;
}

export interface ListLogsRequest {
  executionId: ExecutionId;
  pageSize: number;
  pageToken: string;
  showLogs: boolean;
  showStreams: boolean;
  levels: LogLevelCode[];
  streamTypes: LogStreamType[];
}

export interface ListLogsResponse {
  logs: LogEntry[];
  nextPageToken: string;
}

export interface GetStatusRequest {
  executionId: ExecutionId;
  follow: boolean;
  sendFinishedStatus: boolean;
}

/** Per-call options. Aborting `signal` cancels the call. */
export interface CallOptions {
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export interface ExecutionRepositoryClient {
  listExecutionEventsAndResponses(
    request: ListExecutionEventsAndResponsesRequest,
    options?: CallOptions,
  ): Promise<ListExecutionEventsAndResponsesResponse>;

  getBacktrace(request: GetBacktraceRequest, options?: CallOptions): Promise<GetBacktraceResponse>;

  getBacktraceSource(
    request: GetBacktraceSourceRequest,
    options?: CallOptions,
  ): Promise<GetBacktraceSourceResponse>;

  listLogs(request: ListLogsRequest, options?: CallOptions): Promise<ListLogsResponse>;

  /** Server stream of status messages. Ends when the server closes it. */
  getStatus(request: GetStatusRequest, options?: CallOptions): AsyncIterable<GetStatusMessage>;
}
