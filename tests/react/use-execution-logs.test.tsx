import { act, renderHook, waitFor } from '@testing-library/react';
import type { LogEntry } from '../../src/domain/log-entry';
import { resetLogHandler, setLogHandler } from '../../src/logger';
import { useExecutionLogs } from '../../src/react/use-execution-logs';
import { deferred, FakeClient } from '../helpers/fake-client';

const entry = (message: string): LogEntry => ({
  createdAt: 1_000,
  entry: { type: 'log', level: 3, message },
});

describe('useExecutionLogs', () => {
  let client: FakeClient;

  beforeEach(() => {
    setLogHandler(jest.fn());
    client = new FakeClient();
  });

  afterEach(() => {
    resetLogHandler();
  });

  it('loads the first page on mount and the next one on demand', async () => {
    client.onLogs = (request) =>
      request.pageToken === ''
        ? { logs: [entry('one')], nextPageToken: 't2' }
        : { logs: [entry('two')], nextPageToken: '' };
    const { result } = renderHook(() => useExecutionLogs(client, 'E_1'));

    await waitFor(() => {
      expect(result.current.state.fetchState).toBe('requestFinished');
    });
    expect(result.current.state.logs).toEqual([entry('one')]);
    expect(result.current.hasMore).toBe(true);
    expect(client.logRequests[0]).toMatchObject({ pageSize: 20, pageToken: '' });

    act(() => {
      result.current.loadMore();
    });
    await waitFor(() => {
      expect(result.current.state.logs).toHaveLength(2);
    });
    expect(client.logRequests[1].pageToken).toBe('t2');
    expect(result.current.hasMore).toBe(false);

    act(() => {
      result.current.loadMore();
    });
    expect(client.logRequests).toHaveLength(2);
  });

  it('aborts the request in flight on unmount', async () => {
    const page = deferred<{ logs: LogEntry[]; nextPageToken: string }>();
    client.onLogs = () => page.promise;
    const { result, unmount } = renderHook(() => useExecutionLogs(client, 'E_1', { pageSize: 5 }));

    await waitFor(() => {
      expect(result.current.state.fetchState).toBe('pending');
    });
    expect(client.logRequests[0].pageSize).toBe(5);
    expect(client.signals[0].aborted).toBe(false);

    unmount();
    expect(client.signals[0].aborted).toBe(true);
    page.resolve({ logs: [], nextPageToken: '' });
  });
});
