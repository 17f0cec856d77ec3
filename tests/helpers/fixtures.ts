import type { GetBacktraceResponse } from '../../src/domain/backtrace';
import type { ComponentId } from '../../src/domain/component-id';
import type {
  ExecutionEvent,
  ExecutionEventBody,
  FunctionResult,
  HistoryEvent,
  JoinSetResponseEvent,
  ResponseWithCursor,
} from '../../src/domain/execution-event';
import type { JoinSetId } from '../../src/domain/join-set-id';
import type { EventStreamStore } from '../../src/execution/event-store';

export const WORKFLOW: ComponentId = {
  componentType: 'WORKFLOW',
  name: 'test-workflow',
  digest: 'sha256:0000',
};

export const OK: FunctionResult = { type: 'ok' };

export function oneOff(name: string): JoinSetId {
  return { kind: 'oneOff', name };
}

/** Builds event logs with consecutive versions and a 1 s clock. */
export class LogBuilder {
  readonly events: ExecutionEvent[] = [];

  constructor(private readonly startedAt = 1_000) {}

  add(event: ExecutionEventBody, extra: Partial<ExecutionEvent> = {}): this {
    const version = this.events.length;
    this.events.push({ version, createdAt: this.startedAt + version * 1_000, event, ...extra });
    return this;
  }

  created(functionName = 'test:pkg/ifc.fn', componentId: ComponentId = WORKFLOW): this {
    return this.add({ type: 'created', functionName, scheduledAt: this.startedAt, componentId });
  }

  locked(lockExpiresAt = 99_000): this {
    return this.add({ type: 'locked', lockExpiresAt });
  }

  unlocked(): this {
    return this.add({ type: 'unlocked' });
  }

  history(history: HistoryEvent, backtraceId?: number): this {
    return this.add({ type: 'history', history }, backtraceId === undefined ? {} : { backtraceId });
  }

  joinSetCreated(joinSet: JoinSetId, backtraceId?: number): this {
    return this.history({ type: 'joinSetCreated', joinSetId: joinSet }, backtraceId);
  }

  childRequest(joinSet: JoinSetId, childExecutionId: string, backtraceId?: number): this {
    return this.history(
      {
        type: 'joinSetRequest',
        joinSetId: joinSet,
        request: { type: 'childExecutionRequest', childExecutionId },
      },
      backtraceId,
    );
  }

  joinNext(joinSet: JoinSetId, backtraceId?: number): this {
    return this.history({ type: 'joinNext', joinSetId: joinSet }, backtraceId);
  }

  finished(result: FunctionResult = OK): this {
    return this.add({ type: 'finished', result, httpClientTraces: [] });
  }
}

export function childFinished(
  joinSetId: JoinSetId,
  childExecutionId: string,
  createdAt: number,
  result: FunctionResult = OK,
): JoinSetResponseEvent {
  return {
    joinSetId,
    createdAt,
    response: { type: 'childExecutionFinished', childExecutionId, result },
  };
}

export function withCursors(responses: JoinSetResponseEvent[], first = 0): ResponseWithCursor[] {
  return responses.map((event, i) => ({ cursor: first + i, event }));
}

export function backtrace(
  versionMinIncluding: number,
  versionMaxExcluding: number,
  file = 'src/lib.rs',
  line = 10,
): GetBacktraceResponse {
  return {
    componentId: WORKFLOW,
    wasmBacktrace: {
      versionMinIncluding,
      versionMaxExcluding,
      frames: [
        {
          module: 'test_workflow',
          funcName: 'run',
          symbols: [{ funcName: 'run', file, line, col: 5 }],
        },
      ],
    },
  };
}

/** Feed one complete page per execution through the store's reducer. */
export function loadPage(
  store: EventStreamStore,
  executionId: string,
  events: ExecutionEvent[],
  responses: JoinSetResponseEvent[] = [],
): void {
  store.dispatch({ type: 'addExecutionId', executionId });
  store.dispatch({ type: 'setPending', executionId });
  store.dispatch({
    type: 'savePage',
    executionId,
    events,
    responses: withCursors(responses),
    isFinished: events.some((e) => e.event.type === 'finished'),
    nextCursors: { versionFrom: events.length, responsesCursorFrom: responses.length },
  });
}
