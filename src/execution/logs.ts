/**
 * Forward pagination over an execution's logs and output streams.
 *
 * One page is in flight at a time; the next one is requested explicitly
 * (a "Load more" button), never by polling.
 */

import { errorMessage } from '../domain/errors';
import type { ExecutionId } from '../domain/execution-id';
import type { LogEntry, LogStreamType } from '../domain/log-entry';
import type { Logger } from '../logger';
import type { CallOptions, ExecutionRepositoryClient, ListLogsResponse } from '../rpc/client';

export type LogsFetchState = 'requested' | 'pending' | 'requestFinished';

export interface LogsState {
  fetchState: LogsFetchState;
  logs: LogEntry[];
  nextPageToken: string;
}

export type LogsAction =
  | { type: 'setPending' }
  | { type: 'save'; response: ListLogsResponse }
  | { type: 'fetchNextPage' }
  | { type: 'fetchError' };

export const INITIAL_LOGS_STATE: LogsState = {
  fetchState: 'requested',
  logs: [],
  nextPageToken: '',
};

export function logsReducer(state: LogsState, action: LogsAction): LogsState {
  switch (action.type) {
    case 'setPending':
      return { ...state, fetchState: 'pending' };
    case 'save':
      return {
        fetchState: 'requestFinished',
        logs: [...state.logs, ...action.response.logs],
        nextPageToken: action.response.nextPageToken,
      };
    case 'fetchNextPage':
      return { ...state, fetchState: 'requested' };
    case 'fetchError':
      return { ...state, fetchState: 'requestFinished' };
  }
}

export function hasMoreLogPages(state: LogsState): boolean {
  return state.nextPageToken !== '';
}

/**
 * Fetch the page after `state` and return the action that records it.
 * Failures are logged and become `fetchError`.
 */
export async function fetchLogsPage(params: {
  client: ExecutionRepositoryClient;
  executionId: ExecutionId;
  pageToken: string;
  pageSize: number;
  logger: Logger;
  options?: CallOptions;
}): Promise<LogsAction> {
  const { client, executionId, pageToken, pageSize, logger } = params;
  logger.debug('Requesting logs page', { pageToken });
  try {
    const response = await client.listLogs(
      {
        executionId,
        pageSize,
        pageToken,
        showLogs: true,
        showStreams: true,
        levels: [],
        streamTypes: [],
      },
      params.options,
    );
    return { type: 'save', response };
  } catch (err) {
    logger.error('Failed to fetch logs', { error: errorMessage(err) });
    return { type: 'fetchError' };
  }
}

const LEVEL_LABELS: Record<number, string> = {
  1: 'TRACE',
  2: 'DEBUG',
  3: 'INFO',
  4: 'WARN',
  5: 'ERROR',
};

export function logLevelLabel(level: number): string {
  return LEVEL_LABELS[level] ?? 'UNKNOWN';
}

export function streamTypeLabel(streamType: LogStreamType): string {
  switch (streamType) {
    case 'stdout':
      return 'STDOUT';
    case 'stderr':
      return 'STDERR';
    case 'unspecified':
      return 'UNKNOWN';
  }
}

/** Invalid sequences become U+FFFD. */
export function decodeStreamPayload(payload: Uint8Array): string {
  return new TextDecoder('utf-8', { fatal: false }).decode(payload);
}
