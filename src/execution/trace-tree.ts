/**
 * Trace tree of an execution and its loaded descendants.
 *
 * The tree is rebuilt from EventStreamState on every call and addressed by
 * integer handles into a flat node array. Children follow ChildExecutionRequest
 * events only, and child ids are generated fresh per request, so the walk
 * always terminates.
 */

import type {
  ExecutionEvent,
  FunctionResult,
  HttpClientTrace,
} from '../domain/execution-event';
import { childExecutionIdOf } from '../domain/execution-event';
import { invariant } from '../domain/errors';
import { childExecutionSuffix, ExecutionId } from '../domain/execution-id';
import type { ExecutionStatus } from '../domain/execution-status';
import { formatDuration } from '../domain/time';
import type { EventStreamState, JoinSetResponses } from './event-store';
import { computeChildExecutionResults } from './join-correlator';

export type TraceNodeHandle = number;

export type BusyIntervalStatus =
  | { type: 'executionSinceScheduled' }
  | { type: 'executionLocked' }
  | { type: 'executionErrorTemporary' }
  | { type: 'executionTimeoutTemporary' }
  | { type: 'executionFinishedOk' }
  | { type: 'executionFinishedError' }
  | { type: 'executionFailure' }
  | { type: 'executionUnfinished' }
  | { type: 'httpTraceFinished'; statusCode: number }
  | { type: 'httpTraceError' }
  | { type: 'httpTraceNotResponded' };

export interface BusyInterval {
  startedAt: number;
  /** Absent while still running. */
  finishedAt?: number;
  title?: string;
  status: BusyIntervalStatus;
}

export interface TraceExecutionNode {
  kind: 'execution';
  executionId: ExecutionId;
  /** Relative to the parent for children, the full id for the root. */
  name: string;
  title: string;
  functionName: string;
  scheduledAt: number;
  lastEventAt: number;
  busy: BusyInterval[];
  children: TraceNodeHandle[];
  /** Referenced children that have not been requested yet. */
  loadableChildIds: ExecutionId[];
  currentStatus?: ExecutionStatus;
  isStub: boolean;
  /** Activities and webhooks record HTTP client traces. */
  hasHttpTraces: boolean;
  httpTracesShown: boolean;
}

/** A child execution without loaded events, an HTTP trace or its outcome. */
export interface TraceSummaryNode {
  kind: 'summary';
  name: string;
  title: string;
  /** Set for child executions, to link to their own trace. */
  executionId?: ExecutionId;
  busy: BusyInterval[];
  children: TraceNodeHandle[];
}

export type TraceNode = TraceExecutionNode | TraceSummaryNode;

export interface TraceTree {
  nodes: TraceNode[];
  root: TraceNodeHandle;
  /** Children referenced anywhere in the tree without a fetch state. */
  missingIds: ExecutionId[];
}

export interface TraceTreeOptions {
  hideFinished: boolean;
  /** Executions whose HTTP client traces are expanded. */
  showHttpTraces: ReadonlySet<ExecutionId>;
}

export function statusFromResult(result: FunctionResult): BusyIntervalStatus {
  switch (result.type) {
    case 'ok':
      return { type: 'executionFinishedOk' };
    case 'error':
      return { type: 'executionFinishedError' };
    case 'executionFailure':
      return { type: 'executionFailure' };
  }
}

export function busyIntervalStatusLabel(status: BusyIntervalStatus): string {
  switch (status.type) {
    case 'executionSinceScheduled':
      return 'Since scheduled';
    case 'executionLocked':
      return 'Locked';
    case 'executionErrorTemporary':
      return 'Temporarily failed';
    case 'executionTimeoutTemporary':
      return 'Temporarily timed out';
    case 'executionFinishedOk':
      return 'Finished OK';
    case 'executionFinishedError':
      return 'Finished with error';
    case 'executionFailure':
      return 'Execution failure';
    case 'executionUnfinished':
      return 'Unfinished';
    case 'httpTraceFinished':
      return `HTTP ${status.statusCode}`;
    case 'httpTraceError':
      return 'HTTP error';
    case 'httpTraceNotResponded':
      return 'No response';
  }
}

function intervalTitle(status: BusyIntervalStatus, startedAt: number, finishedAt: number): string {
  return `${busyIntervalStatusLabel(status)} in ${formatDuration(startedAt, finishedAt)}`;
}

/** Latest known activity; unfinished executions also count their last responses. */
export function computeLastEventAt(
  events: readonly ExecutionEvent[],
  responses: JoinSetResponses,
): number {
  const lastEvent = events[events.length - 1];
  let lastEventAt = lastEvent.createdAt;
  if (lastEvent.event.type !== 'finished') {
    for (const list of responses.values()) {
      if (list.length > 0) {
        lastEventAt = Math.max(lastEventAt, list[list.length - 1].createdAt);
      }
    }
  }
  return lastEventAt;
}

/** Intervals of the execution's own work, the since-scheduled one first. */
export function computeBusyIntervals(
  events: readonly ExecutionEvent[],
  scheduledAt: number,
  lastEventAt: number,
): BusyInterval[] {
  const busy: BusyInterval[] = [
    { startedAt: scheduledAt, finishedAt: lastEventAt, status: { type: 'executionSinceScheduled' } },
  ];
  let openLock: { lockedAt: number; expiresAt: number } | undefined;

  for (const { createdAt, event } of events) {
    switch (event.type) {
      case 'locked':
        if (openLock) {
          // Extended lock: close the previous one at its expiry.
          busy.push({
            startedAt: openLock.lockedAt,
            finishedAt: openLock.expiresAt,
            title: `Locked for ${formatDuration(openLock.lockedAt, openLock.expiresAt)}`,
            status: { type: 'executionLocked' },
          });
        }
        openLock = { lockedAt: createdAt, expiresAt: event.lockExpiresAt };
        break;
      case 'temporarilyFailed':
      case 'unlocked':
      case 'temporarilyTimedOut':
      case 'finished': {
        // Webhooks are never locked.
        const startedAt = openLock ? openLock.lockedAt : scheduledAt;
        openLock = undefined;
        const status: BusyIntervalStatus =
          event.type === 'temporarilyFailed'
            ? { type: 'executionErrorTemporary' }
            : event.type === 'unlocked'
              ? { type: 'executionLocked' }
              : event.type === 'temporarilyTimedOut'
                ? { type: 'executionTimeoutTemporary' }
                : statusFromResult(event.result);
        busy.push({
          startedAt,
          finishedAt: createdAt,
          title: intervalTitle(status, startedAt, createdAt),
          status,
        });
        break;
      }
      default:
        break;
    }
  }

  if (openLock) {
    const status: BusyIntervalStatus = { type: 'executionUnfinished' };
    busy.push({ startedAt: openLock.lockedAt, title: busyIntervalStatusLabel(status), status });
  }
  return busy;
}

function httpTracesOf(event: ExecutionEvent): readonly HttpClientTrace[] | undefined {
  switch (event.event.type) {
    case 'temporarilyFailed':
    case 'temporarilyTimedOut':
    case 'finished':
      return event.event.httpClientTraces;
    default:
      return undefined;
  }
}

/**
 * Build the trace of `executionId`. Returns `undefined` until at least one
 * of its events is loaded.
 */
export function computeRootTrace(
  executionId: ExecutionId,
  state: EventStreamState,
  options: TraceTreeOptions,
): TraceTree | undefined {
  const nodes: TraceNode[] = [];
  const missingIds: ExecutionId[] = [];

  function push(node: TraceNode): TraceNodeHandle {
    nodes.push(node);
    return nodes.length - 1;
  }

  function httpTraceNode(trace: HttpClientTrace, eventCreatedAt: number): TraceNodeHandle {
    const name = `${trace.method} ${trace.uri}`;
    const status: BusyIntervalStatus =
      trace.result === undefined
        ? { type: 'httpTraceNotResponded' }
        : trace.result.type === 'status'
          ? { type: 'httpTraceFinished', statusCode: trace.result.statusCode }
          : { type: 'httpTraceError' };
    const children: TraceNodeHandle[] = [];
    if (trace.result) {
      const outcome =
        trace.result.type === 'status'
          ? `Status code: ${trace.result.statusCode}`
          : `Failed: \`${trace.result.message}\``;
      children.push(push({ kind: 'summary', name: outcome, title: outcome, busy: [], children: [] }));
    }
    return push({
      kind: 'summary',
      name,
      title: name,
      busy: [{ startedAt: trace.sentAt, finishedAt: trace.finishedAt ?? eventCreatedAt, status }],
      children,
    });
  }

  function build(id: ExecutionId, name: string): TraceExecutionNode | undefined {
    const log = state.logs.get(id);
    if (!log || log.events.length === 0) return undefined;
    const { events, responses } = log;

    const created = events[0].event;
    invariant(created.type === 'created', `First event of ${id} must be Created`);

    let lastEventAt = computeLastEventAt(events, responses);
    const childResults = computeChildExecutionResults(responses);
    const httpTracesShown = options.showHttpTraces.has(id);
    const loadableChildIds: ExecutionId[] = [];
    const children: TraceNodeHandle[] = [];

    for (const event of events) {
      const traces = httpTracesOf(event);
      if (traces) {
        if (httpTracesShown) {
          for (const trace of traces) {
            children.push(httpTraceNode(trace, event.createdAt));
          }
        }
        continue;
      }

      const childId = childExecutionIdOf(event);
      if (childId === undefined) continue;
      const childResult = childResults.get(childId);
      if (options.hideFinished && childResult) continue;
      if (!state.fetchStates.has(childId)) {
        loadableChildIds.push(childId);
        missingIds.push(childId);
      }

      const childName = childExecutionSuffix(id, childId);
      const childNode = build(childId, childName);
      if (childNode) {
        lastEventAt = Math.max(lastEventAt, childNode.lastEventAt);
        children.push(push(childNode));
        continue;
      }

      // Not loaded: one interval from the request to the known result.
      const startedAt = event.createdAt;
      let interval: BusyInterval;
      if (childResult) {
        const status = statusFromResult(childResult.result);
        interval = {
          startedAt,
          finishedAt: childResult.finishedAt,
          title: intervalTitle(status, startedAt, childResult.finishedAt),
          status,
        };
      } else {
        const status: BusyIntervalStatus = { type: 'executionUnfinished' };
        interval = { startedAt, title: busyIntervalStatusLabel(status), status };
      }
      children.push(
        push({
          kind: 'summary',
          name: childName,
          title: childId,
          executionId: childId,
          busy: [interval],
          children: [],
        }),
      );
    }

    const componentType = created.componentId?.componentType;
    return {
      kind: 'execution',
      executionId: id,
      name,
      title: `${id} ${created.functionName}`,
      functionName: created.functionName,
      scheduledAt: created.scheduledAt,
      lastEventAt,
      busy: computeBusyIntervals(events, created.scheduledAt, lastEventAt),
      children,
      loadableChildIds,
      currentStatus: state.currentStatuses.get(id),
      isStub: componentType === 'ACTIVITY_STUB',
      hasHttpTraces: componentType === 'ACTIVITY_WASM' || componentType === 'WEBHOOK_ENDPOINT',
      httpTracesShown,
    };
  }

  const root = build(executionId, executionId);
  if (!root) return undefined;
  return { nodes, root: push(root), missingIds };
}

/** Events listed beside the trace; lock bookkeeping and join set creation are left out. */
export function traceLogEvents(events: readonly ExecutionEvent[]): ExecutionEvent[] {
  return events.filter(
    (event) =>
      event.event.type !== 'locked' &&
      event.event.type !== 'unlocked' &&
      !(event.event.type === 'history' && event.event.history.type === 'joinSetCreated'),
  );
}

/** Resolve a handle; handles only come from the same tree. */
export function traceNode(tree: TraceTree, handle: TraceNodeHandle): TraceNode {
  const node = tree.nodes[handle];
  invariant(node !== undefined, `Unknown trace node handle ${handle}`);
  return node;
}
