import type {
  ExecutionEvent,
  FunctionResult,
  JoinSetResponseEvent,
} from '../domain/execution-event';
import { childExecutionIdOf, historyOf } from '../domain/execution-event';
import type { ExecutionId } from '../domain/execution-id';
import { formatJoinSetId } from '../domain/join-set-id';
import type { JoinSetResponses } from './event-store';

/** Version of a JoinNext / JoinNextTry event -> the response it consumed. */
export type JoinNextToResponse = ReadonlyMap<number, JoinSetResponseEvent>;

/**
 * Pair joins with responses, FIFO per join set: the k-th JoinNext (or
 * successful JoinNextTry) on a join set gets the k-th response that arrived
 * for it. Joins without a matching response yet get no entry.
 */
export function computeJoinNextToResponse(
  events: readonly ExecutionEvent[],
  responses: JoinSetResponses,
): Map<number, JoinSetResponseEvent> {
  const consumed = new Map<string, number>();
  const result = new Map<number, JoinSetResponseEvent>();
  for (const event of events) {
    const history = historyOf(event);
    if (!history) continue;
    const consumes =
      history.type === 'joinNext' || (history.type === 'joinNextTry' && history.foundResponse);
    if (!consumes) continue;
    const key = formatJoinSetId(history.joinSetId);
    const index = consumed.get(key) ?? 0;
    consumed.set(key, index + 1);
    const response = responses.get(key)?.[index];
    if (response) {
      result.set(event.version, response);
    }
  }
  return result;
}

export interface ParentExecutionBounds {
  /** Version of the ChildExecutionRequest that created the child. */
  start?: number;
  /** Version of the JoinNext that consumed the child's result. */
  end?: number;
}

/**
 * Where a child execution sits inside its parent's log. Scanning stops at
 * the first JoinNext that consumed the child's ChildExecutionFinished.
 */
export function getParentExecutionBounds(
  parentEvents: readonly ExecutionEvent[] | undefined,
  parentResponses: JoinSetResponses | undefined,
  childId: ExecutionId,
): ParentExecutionBounds {
  if (!parentEvents || !parentResponses) return {};
  const joinNextToResponse = computeJoinNextToResponse(parentEvents, parentResponses);
  const bounds: ParentExecutionBounds = {};
  for (const event of parentEvents) {
    if (childExecutionIdOf(event) === childId) {
      bounds.start = event.version;
      continue;
    }
    if (historyOf(event)?.type !== 'joinNext') continue;
    const response = joinNextToResponse.get(event.version)?.response;
    if (
      response?.type === 'childExecutionFinished' &&
      response.childExecutionId === childId
    ) {
      bounds.end = event.version;
      break;
    }
  }
  return bounds;
}

export interface ChildExecutionResult {
  result: FunctionResult;
  finishedAt: number;
}

/** Results of finished children, from every join set of the parent. */
export function computeChildExecutionResults(
  responses: JoinSetResponses,
): Map<ExecutionId, ChildExecutionResult> {
  const results = new Map<ExecutionId, ChildExecutionResult>();
  for (const list of responses.values()) {
    for (const { response, createdAt } of list) {
      if (response.type === 'childExecutionFinished') {
        results.set(response.childExecutionId, { result: response.result, finishedAt: createdAt });
      }
    }
  }
  return results;
}
