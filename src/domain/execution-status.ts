import type { ExecutionFailureKind, FunctionResult } from './execution-event';
import type { ExecutionId } from './execution-id';
import { formatJoinSetId, JoinSetId } from './join-set-id';
import { formatDate } from './time';

export type ResultKind =
  | { type: 'ok' }
  | { type: 'error' }
  | { type: 'executionFailure'; kind: ExecutionFailureKind };

export type ExecutionStatus =
  | { type: 'locked'; lockExpiresAt?: number; runId?: string }
  | { type: 'pendingAt'; scheduledAt?: number }
  | { type: 'blockedByJoinSet'; joinSetId: JoinSetId; lockExpiresAt?: number; closing?: boolean }
  | { type: 'finished'; resultKind?: ResultKind; finishedAt?: number };

export interface ExecutionSummary {
  executionId: ExecutionId;
  functionName: string;
  currentStatus: ExecutionStatus;
}

/** One message of the GetStatus stream. */
export type GetStatusMessage =
  | { type: 'currentStatus'; status: ExecutionStatus }
  | { type: 'summary'; summary: ExecutionSummary }
  | {
      type: 'finishedStatus';
      createdAt?: number;
      scheduledAt: number;
      finishedAt: number;
      result: FunctionResult;
    };

export function failureKindLabel(kind: ExecutionFailureKind): string {
  switch (kind) {
    case 'timedOut':
      return 'Timeout';
    case 'nondeterminismDetected':
      return 'Nondeterminism detected';
    case 'outOfFuel':
      return 'Out of fuel';
    case 'cancelled':
      return 'Cancelled';
    case 'uncategorized':
      return 'Execution failure';
    case 'unspecified':
      return 'Unspecified';
  }
}

/** Accepts a FunctionResult as well, which carries the same discriminants. */
export function resultKindLabel(resultKind: ResultKind): string {
  switch (resultKind.type) {
    case 'ok':
      return 'Finished OK';
    case 'error':
      return 'Finished with error';
    case 'executionFailure':
      return failureKindLabel(resultKind.kind);
  }
}

export function statusToString(status: ExecutionStatus): string {
  switch (status.type) {
    case 'locked':
      return status.lockExpiresAt === undefined
        ? 'Locked'
        : `Locked until ${formatDate(status.lockExpiresAt)}`;
    case 'pendingAt':
      return status.scheduledAt === undefined
        ? 'Pending'
        : `Pending at ${formatDate(status.scheduledAt)}`;
    case 'blockedByJoinSet':
      return `Blocked by ${formatJoinSetId(status.joinSetId)}`;
    case 'finished':
      return status.resultKind ? resultKindLabel(status.resultKind) : 'Finished with unknown result';
  }
}

export function isFinishedDetailed(message: GetStatusMessage): boolean {
  return message.type === 'finishedStatus';
}

/** A FinishedStatus, or any message whose current status is finished. */
export function isFinishedAny(message: GetStatusMessage): boolean {
  switch (message.type) {
    case 'finishedStatus':
      return true;
    case 'currentStatus':
      return message.status.type === 'finished';
    case 'summary':
      return message.summary.currentStatus.type === 'finished';
  }
}
