/**
 * React hook paging through an execution's logs and output streams.
 *
 * The first page loads on mount; further pages load when `loadMore` is
 * called. Unmounting aborts the request in flight. The state belongs to one
 * execution: render with a `key` per execution id to switch executions.
 */

import { useCallback, useEffect, useReducer, useRef } from 'react';
import { mergeDebuggerConfig } from '../config';
import type { ExecutionId } from '../domain/execution-id';
import {
  fetchLogsPage,
  hasMoreLogPages,
  INITIAL_LOGS_STATE,
  logsReducer,
  LogsState,
} from '../execution/logs';
import { Logger, logger as rootLogger, traceId } from '../logger';
import type { ExecutionRepositoryClient } from '../rpc/client';

export interface UseExecutionLogsReturn {
  state: LogsState;
  hasMore: boolean;
  /** Request the next page; ignored while one is loading or none is left. */
  loadMore: () => void;
}

export function useExecutionLogs(
  client: ExecutionRepositoryClient,
  executionId: ExecutionId,
  options: { pageSize?: number; logger?: Logger } = {},
): UseExecutionLogsReturn {
  const [state, dispatch] = useReducer(logsReducer, INITIAL_LOGS_STATE);
  const pageSize = options.pageSize ?? mergeDebuggerConfig().logsPageSize;
  const parentLogger = options.logger ?? rootLogger;
  const { fetchState, nextPageToken } = state;
  const controllerRef = useRef<AbortController | null>(null);

  useEffect(() => {
    return () => {
      controllerRef.current?.abort();
    };
  }, [client, executionId]);

  useEffect(() => {
    if (fetchState !== 'requested') return;
    const controller = new AbortController();
    controllerRef.current = controller;
    const log = parentLogger.child({ module: 'execution-logs', executionId, traceId: traceId() });
    dispatch({ type: 'setPending' });
    void fetchLogsPage({
      client,
      executionId,
      pageToken: nextPageToken,
      pageSize,
      logger: log,
      options: { signal: controller.signal },
    }).then((action) => {
      if (!controller.signal.aborted) dispatch(action);
    });
  }, [fetchState, nextPageToken, client, executionId, pageSize, parentLogger]);

  const hasMore = hasMoreLogPages(state);
  const loadMore = useCallback(() => {
    if (fetchState === 'requestFinished' && hasMore) {
      dispatch({ type: 'fetchNextPage' });
    }
  }, [fetchState, hasMore]);

  return { state, hasMore, loadMore };
}
