/**
 * Reducer-driven store of execution event logs.
 *
 * Holds, per execution, the ordered event log, the join set -> responses
 * map and the pagination fetch state. The store only ever grows: events and
 * responses are appended in page order and never removed, reordered or
 * deduplicated. Pagination windows must therefore not overlap.
 *
 * ```ts
 * const store = createEventStreamStore();
 * store.dispatch({ type: 'addExecutionId', executionId: 'E_01' });
 * const { events, responses } = store.get('E_01');
 * ```
 */

import type {
  ExecutionEvent,
  JoinSetResponseEvent,
  ResponseWithCursor,
} from '../domain/execution-event';
import type { ExecutionId } from '../domain/execution-id';
import type { ExecutionStatus } from '../domain/execution-status';
import { formatJoinSetId } from '../domain/join-set-id';

// ---------------------------------------------------------------------------
// Execution log
// ---------------------------------------------------------------------------

/** Responses per join set, keyed by `formatJoinSetId`. */
export type JoinSetResponses = ReadonlyMap<string, readonly JoinSetResponseEvent[]>;

export interface ExecutionLog {
  events: readonly ExecutionEvent[];
  responses: JoinSetResponses;
}

export const EMPTY_EXECUTION_LOG: ExecutionLog = Object.freeze({
  events: [],
  responses: new Map<string, readonly JoinSetResponseEvent[]>(),
});

/**
 * Append one page to a log. Returns a new log; `log` is left untouched.
 */
export function appendToLog(
  log: ExecutionLog,
  events: readonly ExecutionEvent[],
  responses: readonly JoinSetResponseEvent[],
): ExecutionLog {
  const nextResponses = new Map(log.responses);
  for (const response of responses) {
    const key = formatJoinSetId(response.joinSetId);
    nextResponses.set(key, [...(nextResponses.get(key) ?? []), response]);
  }
  return {
    events: events.length > 0 ? [...log.events, ...events] : log.events,
    responses: responses.length > 0 ? nextResponses : log.responses,
  };
}

// ---------------------------------------------------------------------------
// Fetch state
// ---------------------------------------------------------------------------

export interface Cursors {
  versionFrom: number;
  responsesCursorFrom: number;
}

export const INITIAL_CURSORS: Cursors = Object.freeze({ versionFrom: 0, responsesCursorFrom: 0 });

/**
 * Pagination state of one execution.
 *
 * `pending` covers both the in-flight request and the polling delay after
 * it; `cursors` is where the next page starts. `failed` is terminal until a
 * `retry` action.
 */
export type FetchState =
  | { type: 'requested'; cursors: Cursors }
  | { type: 'pending'; cursors: Cursors }
  | { type: 'finished' }
  | { type: 'failed'; cursors: Cursors; message: string };

// ---------------------------------------------------------------------------
// State & actions
// ---------------------------------------------------------------------------

export interface EventStreamState {
  /** Incremented on every change; consumers compare it to skip recomputation. */
  revision: number;
  fetchStates: ReadonlyMap<ExecutionId, FetchState>;
  logs: ReadonlyMap<ExecutionId, ExecutionLog>;
  currentStatuses: ReadonlyMap<ExecutionId, ExecutionStatus>;
}

export type EventStreamAction =
  | { type: 'addExecutionId'; executionId: ExecutionId }
  | { type: 'setPending'; executionId: ExecutionId }
  | {
      type: 'savePage';
      executionId: ExecutionId;
      events: readonly ExecutionEvent[];
      responses: readonly ResponseWithCursor[];
      currentStatus?: ExecutionStatus;
      isFinished: boolean;
      nextCursors: Cursors;
    }
  | { type: 'requestNextPage'; executionId: ExecutionId }
  | { type: 'pageFailed'; executionId: ExecutionId; message: string }
  | { type: 'retry'; executionId: ExecutionId }
  /** Re-request a pending page whose request or poll timer was owned by a disposed driver. */
  | { type: 'resume'; executionId: ExecutionId };

export function createInitialEventStreamState(): EventStreamState {
  return {
    revision: 0,
    fetchStates: new Map(),
    logs: new Map(),
    currentStatuses: new Map(),
  };
}

function withFetchState(
  state: EventStreamState,
  executionId: ExecutionId,
  fetchState: FetchState,
): EventStreamState {
  const fetchStates = new Map(state.fetchStates);
  fetchStates.set(executionId, fetchState);
  return { ...state, revision: state.revision + 1, fetchStates };
}

/**
 * Pure transition function. Returns the same state object when the action
 * does not apply (unknown execution, wrong source state).
 */
export function eventStreamReducer(
  state: EventStreamState,
  action: EventStreamAction,
): EventStreamState {
  const current = state.fetchStates.get(action.executionId);

  switch (action.type) {
    case 'addExecutionId':
      if (current) return state;
      return withFetchState(state, action.executionId, {
        type: 'requested',
        cursors: INITIAL_CURSORS,
      });

    case 'setPending':
      if (current?.type !== 'requested') return state;
      return withFetchState(state, action.executionId, {
        type: 'pending',
        cursors: current.cursors,
      });

    case 'savePage': {
      if (current?.type !== 'pending') return state;
      const next = withFetchState(
        state,
        action.executionId,
        action.isFinished ? { type: 'finished' } : { type: 'pending', cursors: action.nextCursors },
      );
      const logs = new Map(state.logs);
      logs.set(
        action.executionId,
        appendToLog(
          state.logs.get(action.executionId) ?? EMPTY_EXECUTION_LOG,
          action.events,
          action.responses.map((r) => r.event),
        ),
      );
      let currentStatuses = state.currentStatuses;
      if (action.currentStatus) {
        const statuses = new Map(state.currentStatuses);
        statuses.set(action.executionId, action.currentStatus);
        currentStatuses = statuses;
      }
      return { ...next, logs, currentStatuses };
    }

    case 'requestNextPage':
    case 'resume':
      if (current?.type !== 'pending') return state;
      return withFetchState(state, action.executionId, {
        type: 'requested',
        cursors: current.cursors,
      });

    case 'pageFailed':
      if (current?.type !== 'pending') return state;
      return withFetchState(state, action.executionId, {
        type: 'failed',
        cursors: current.cursors,
        message: action.message,
      });

    case 'retry':
      if (current?.type !== 'failed') return state;
      return withFetchState(state, action.executionId, {
        type: 'requested',
        cursors: current.cursors,
      });
  }
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export type EventStreamListener = (state: EventStreamState) => void;

export interface EventStreamStore {
  getState(): EventStreamState;
  dispatch(action: EventStreamAction): void;
  /** Subscribe to state changes. Returns an unsubscribe function. */
  subscribe(listener: EventStreamListener): () => void;
  /** Events and responses loaded so far; empty for an unknown execution. */
  get(executionId: ExecutionId): ExecutionLog;
  getFetchState(executionId: ExecutionId): FetchState | undefined;
  /** `currentStatus` of the most recent page, if any was reported. */
  getCurrentStatus(executionId: ExecutionId): ExecutionStatus | undefined;
}

export function createEventStreamStore(
  initialState: EventStreamState = createInitialEventStreamState(),
): EventStreamStore {
  let state = initialState;
  const listeners = new Set<EventStreamListener>();

  return {
    getState: () => state,

    dispatch(action) {
      const next = eventStreamReducer(state, action);
      if (next === state) return;
      state = next;
      for (const listener of [...listeners]) {
        listener(state);
      }
    },

    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    get: (executionId) => state.logs.get(executionId) ?? EMPTY_EXECUTION_LOG,

    getFetchState: (executionId) => state.fetchStates.get(executionId),

    getCurrentStatus: (executionId) => state.currentStatuses.get(executionId),
  };
}
