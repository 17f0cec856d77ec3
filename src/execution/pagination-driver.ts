/**
 * Pagination driver for an EventStreamStore.
 *
 * Walks every execution of the store through
 * `requested -> pending -> requested(next cursors) | finished`,
 * tailing unfinished executions by polling for the next page after a fixed
 * delay. A failed page is reported once and halts that execution until a
 * manual `retry` action; other executions are unaffected.
 *
 * At most one driver may be attached to a store at a time. Executions left
 * `pending` by a previously disposed driver are resumed on attach.
 *
 * ```ts
 * const store = createEventStreamStore();
 * const driver = attachPaginationDriver(store, { client, notifier });
 * store.dispatch({ type: 'addExecutionId', executionId });
 * // ... on unmount
 * driver.dispose();
 * ```
 */

import { DebuggerConfig, mergeDebuggerConfig, validateDebuggerConfig } from '../config';
import { errorMessage, rpcTypedError } from '../domain/errors';
import { isFinishedEvent } from '../domain/execution-event';
import type { ExecutionId } from '../domain/execution-id';
import { Logger, logger as rootLogger, traceId } from '../logger';
import type { Notifier } from '../notifications/toast';
import type {
  ExecutionRepositoryClient,
  ListExecutionEventsAndResponsesRequest,
  ListExecutionEventsAndResponsesResponse,
} from '../rpc/client';
import type { Cursors, EventStreamStore } from './event-store';

export interface PaginationDriverOptions {
  client: ExecutionRepositoryClient;
  notifier: Notifier;
  config?: Partial<DebuggerConfig>;
  logger?: Logger;
}

export interface PaginationDriver {
  /** Stop polling, abort in-flight requests and drop their late results. */
  dispose(): void;
}

export function buildPageRequest(
  executionId: ExecutionId,
  cursors: Cursors,
  pageSize: number,
): ListExecutionEventsAndResponsesRequest {
  return {
    executionId,
    versionFrom: cursors.versionFrom,
    eventsLength: pageSize,
    responsesCursorFrom: cursors.responsesCursorFrom,
    responsesLength: pageSize,
    responsesIncludingCursor: cursors.responsesCursorFrom === 0,
    includeBacktraceId: true,
  };
}

/** Cursors after `page`; each dimension keeps `previous` when the page had nothing new. */
export function nextCursors(
  previous: Cursors,
  page: ListExecutionEventsAndResponsesResponse,
): Cursors {
  const lastEvent = page.events.length > 0 ? page.events[page.events.length - 1] : undefined;
  const lastResponse =
    page.responses.length > 0 ? page.responses[page.responses.length - 1] : undefined;
  return {
    versionFrom: lastEvent ? lastEvent.version + 1 : previous.versionFrom,
    responsesCursorFrom: lastResponse ? lastResponse.cursor : previous.responsesCursorFrom,
  };
}

export function isLastPage(page: ListExecutionEventsAndResponsesResponse): boolean {
  const lastEvent = page.events.length > 0 ? page.events[page.events.length - 1] : undefined;
  return lastEvent !== undefined && isFinishedEvent(lastEvent);
}

export function attachPaginationDriver(
  store: EventStreamStore,
  options: PaginationDriverOptions,
): PaginationDriver {
  const { client, notifier } = options;
  const config = mergeDebuggerConfig(options.config);
  const log = (options.logger ?? rootLogger).child({ module: 'pagination-driver' });
  for (const error of validateDebuggerConfig(config)) {
    log.warn(error.message, { code: error.code, ...error.details });
  }

  const controller = new AbortController();
  const timers = new Set<ReturnType<typeof setTimeout>>();
  let disposed = false;
  let pumping = false;
  let dirty = false;

  async function fetchPage(executionId: ExecutionId, cursors: Cursors): Promise<void> {
    const taskLog = log.child({ executionId, traceId: traceId() });
    const request = buildPageRequest(executionId, cursors, config.pageSize);
    taskLog.debug('Requesting page', { ...cursors });

    let page: ListExecutionEventsAndResponsesResponse;
    try {
      page = await client.listExecutionEventsAndResponses(request, { signal: controller.signal });
    } catch (err) {
      if (disposed) {
        taskLog.debug('Page request ended after dispose', { error: errorMessage(err) });
        return;
      }
      const typed = rpcTypedError('ListExecutionEventsAndResponses', err, executionId);
      taskLog.failure('Failed to load execution events', typed, { ...cursors });
      notifier.error(`Failed to load execution events: ${errorMessage(err)}`);
      store.dispatch({ type: 'pageFailed', executionId, message: errorMessage(err) });
      return;
    }

    if (disposed) {
      taskLog.debug('Dropping page received after dispose');
      return;
    }

    const isFinished = isLastPage(page);
    const cursorsAfter = nextCursors(cursors, page);
    taskLog.debug('Got page', {
      events: page.events.length,
      responses: page.responses.length,
      isFinished,
    });
    store.dispatch({
      type: 'savePage',
      executionId,
      events: page.events,
      responses: page.responses,
      currentStatus: page.currentStatus,
      isFinished,
      nextCursors: cursorsAfter,
    });

    if (isFinished) {
      taskLog.info('Execution finished loading');
      return;
    }
    const timer = setTimeout(() => {
      timers.delete(timer);
      if (!disposed) {
        store.dispatch({ type: 'requestNextPage', executionId });
      }
    }, config.pollIntervalMs);
    timers.add(timer);
  }

  function startRequested(): void {
    const requested: Array<[ExecutionId, Cursors]> = [];
    for (const [executionId, fetchState] of store.getState().fetchStates) {
      if (fetchState.type === 'requested') {
        requested.push([executionId, fetchState.cursors]);
      }
    }
    for (const [executionId, cursors] of requested) {
      if (store.getFetchState(executionId)?.type !== 'requested') continue;
      store.dispatch({ type: 'setPending', executionId });
      void fetchPage(executionId, cursors);
    }
  }

  // Dispatching from inside a listener re-enters it; coalesce into one loop.
  function pump(): void {
    if (disposed) return;
    if (pumping) {
      dirty = true;
      return;
    }
    pumping = true;
    try {
      do {
        dirty = false;
        startRequested();
      } while (dirty && !disposed);
    } finally {
      pumping = false;
    }
  }

  // A pending execution has no live request here: the driver that started it is gone.
  const orphaned: ExecutionId[] = [];
  for (const [executionId, fetchState] of store.getState().fetchStates) {
    if (fetchState.type === 'pending') orphaned.push(executionId);
  }
  if (orphaned.length > 0) {
    log.debug('Resuming pending executions', { executionIds: orphaned });
  }
  for (const executionId of orphaned) {
    store.dispatch({ type: 'resume', executionId });
  }

  const unsubscribe = store.subscribe(pump);
  pump();

  return {
    dispose() {
      if (disposed) return;
      disposed = true;
      unsubscribe();
      controller.abort();
      for (const timer of timers) {
        clearTimeout(timer);
      }
      timers.clear();
      log.debug('Pagination driver disposed');
    },
  };
}
