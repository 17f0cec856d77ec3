/**
 * Execution event log model.
 *
 * Each execution owns an append-only log of events ordered by version
 * (0, 1, 2, ...) plus, per join set, the responses that arrived for it.
 * Timestamps are epoch milliseconds.
 */

import type { ComponentId } from './component-id';
import type { ExecutionId } from './execution-id';
import type { JoinSetId } from './join-set-id';

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export type ExecutionFailureKind =
  | 'timedOut'
  | 'nondeterminismDetected'
  | 'outOfFuel'
  | 'cancelled'
  | 'uncategorized'
  | 'unspecified';

/** Outcome of a finished execution. */
export type FunctionResult =
  | { type: 'ok'; value?: unknown }
  | { type: 'error'; value?: unknown }
  | { type: 'executionFailure'; kind: ExecutionFailureKind; reason?: string };

// ---------------------------------------------------------------------------
// HTTP client traces (recorded by activities and webhooks)
// ---------------------------------------------------------------------------

export interface HttpClientTrace {
  method: string;
  uri: string;
  sentAt: number;
  finishedAt?: number;
  result?: { type: 'status'; statusCode: number } | { type: 'error'; message: string };
}

// ---------------------------------------------------------------------------
// History events
// ---------------------------------------------------------------------------

export type JoinSetRequest =
  | { type: 'childExecutionRequest'; childExecutionId: ExecutionId }
  | { type: 'delayRequest'; delayId: string; expiresAt: number };

export type HistoryEvent =
  | { type: 'joinSetCreated'; joinSetId: JoinSetId }
  | { type: 'joinSetRequest'; joinSetId: JoinSetId; request: JoinSetRequest }
  | { type: 'joinNext'; joinSetId: JoinSetId; closing?: boolean; runExpiresAt?: number }
  | { type: 'joinNextTry'; joinSetId: JoinSetId; foundResponse: boolean }
  | { type: 'joinNextTooMany'; joinSetId: JoinSetId; requestedIndex?: number };

// ---------------------------------------------------------------------------
// Execution events
// ---------------------------------------------------------------------------

export type ExecutionEventBody =
  | {
      type: 'created';
      functionName: string;
      scheduledAt: number;
      componentId?: ComponentId;
      scheduledBy?: ExecutionId;
      params?: unknown;
    }
  | { type: 'locked'; lockExpiresAt: number; runId?: string }
  | { type: 'unlocked'; reason?: string }
  | {
      type: 'temporarilyFailed';
      reason: string;
      backoffExpiresAt?: number;
      httpClientTraces: HttpClientTrace[];
    }
  | { type: 'temporarilyTimedOut'; backoffExpiresAt?: number; httpClientTraces: HttpClientTrace[] }
  | { type: 'finished'; result: FunctionResult; httpClientTraces: HttpClientTrace[] }
  | { type: 'history'; history: HistoryEvent };

export type ExecutionEventType = ExecutionEventBody['type'];

/** One entry of an execution's log. Immutable once received. */
export interface ExecutionEvent {
  version: number;
  createdAt: number;
  /** Version of the backtrace captured for this event, when one was recorded. */
  backtraceId?: number;
  event: ExecutionEventBody;
}

// ---------------------------------------------------------------------------
// Join set responses
// ---------------------------------------------------------------------------

export type JoinSetResponse =
  | { type: 'childExecutionFinished'; childExecutionId: ExecutionId; result: FunctionResult }
  | { type: 'delayFinished'; delayId: string; success: boolean };

export interface JoinSetResponseEvent {
  joinSetId: JoinSetId;
  createdAt: number;
  response: JoinSetResponse;
}

/** A response as delivered by the paginated API, with its resume cursor. */
export interface ResponseWithCursor {
  cursor: number;
  event: JoinSetResponseEvent;
}

// ---------------------------------------------------------------------------
// Narrowing helpers
// ---------------------------------------------------------------------------

export function isFinishedEvent(event: ExecutionEvent): boolean {
  return event.event.type === 'finished';
}

export function historyOf(event: ExecutionEvent): HistoryEvent | undefined {
  return event.event.type === 'history' ? event.event.history : undefined;
}

/** The child id when `event` is a ChildExecutionRequest. */
export function childExecutionIdOf(event: ExecutionEvent): ExecutionId | undefined {
  const history = historyOf(event);
  if (history?.type === 'joinSetRequest' && history.request.type === 'childExecutionRequest') {
    return history.request.childExecutionId;
  }
  return undefined;
}
