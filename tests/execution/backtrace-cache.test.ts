import type { GetBacktraceResponse } from '../../src/domain/backtrace';
import { RpcError } from '../../src/domain/errors';
import {
  backtraceKey,
  BacktraceCache,
  createBacktraceCache,
  sourceKey,
} from '../../src/execution/backtrace-cache';
import { plainTextHighlighter } from '../../src/execution/highlighter';
import { LogLevel, resetLogHandler, setLogHandler } from '../../src/logger';
import { createFakeNotifier, deferred, FakeClient, flushPromises } from '../helpers/fake-client';
import { backtrace, WORKFLOW } from '../helpers/fixtures';

describe('keys', () => {
  it('formats backtrace and source keys', () => {
    expect(backtraceKey('E_1.0', 3)).toBe('E_1.0@3');
    expect(sourceKey(WORKFLOW, 'src/lib.rs')).toBe('WORKFLOW:test-workflow:sha256:0000\nsrc/lib.rs');
  });
});

describe('createBacktraceCache', () => {
  let client: FakeClient;
  let notifier: ReturnType<typeof createFakeNotifier>;
  let highlight: jest.Mock;
  let cache: BacktraceCache;

  beforeEach(() => {
    setLogHandler(jest.fn());
    client = new FakeClient();
    notifier = createFakeNotifier();
    highlight = jest.fn((content: string) => plainTextHighlighter.highlight(content, undefined));
    cache = createBacktraceCache({ client, notifier, highlighter: { highlight } });
  });

  afterEach(() => {
    cache.dispose();
    resetLogHandler();
  });

  it('shares one fetch between concurrent requests', async () => {
    const response = deferred<GetBacktraceResponse>();
    client.onBacktrace = () => response.promise;

    const first = cache.request('E_1', 3);
    const second = cache.request('E_1', 3);
    expect(second).toBe(first);
    expect(client.backtraceRequests).toEqual([
      { executionId: 'E_1', filter: { type: 'specific', version: 3 } },
    ]);
    expect(cache.get('E_1', 3)).toEqual({ type: 'requested' });

    response.resolve(backtrace(2, 5));
    await first;
    expect(cache.get('E_1', 3)).toEqual({ type: 'ok', backtrace: backtrace(2, 5) });

    await cache.request('E_1', 3);
    expect(client.backtraceRequests).toHaveLength(1);
  });

  it('asks for the first backtrace at version 0', async () => {
    client.onBacktrace = () => backtrace(0, 2);
    await cache.request('E_1', 0);
    expect(client.backtraceRequests[0].filter).toEqual({ type: 'first' });
  });

  it('caches NotFound without notifying or retrying', async () => {
    await cache.request('E_1', 0);
    expect(cache.get('E_1', 0)).toEqual({ type: 'error', error: 'notFound' });
    expect(notifier.error).not.toHaveBeenCalled();

    await cache.request('E_1', 0);
    expect(client.backtraceRequests).toHaveLength(1);
  });

  it('notifies about other failures', async () => {
    client.onBacktrace = () => {
      throw new RpcError('INTERNAL', 'boom');
    };
    await cache.request('E_1', 4);
    expect(cache.get('E_1', 4)).toEqual({ type: 'error', error: 'other' });
    expect(notifier.error).toHaveBeenCalledWith('Failed to load backtrace: boom');
  });

  it('logs failures with their typed error code', async () => {
    const handler = jest.fn();
    setLogHandler(handler);
    client.onBacktrace = () => {
      throw new RpcError('INTERNAL', 'boom');
    };
    await cache.request('E_1', 4);

    expect(handler).toHaveBeenCalledWith(
      expect.objectContaining({
        level: LogLevel.Error,
        message: 'Failed to get backtrace',
        executionId: 'E_1',
        errorCode: 'RPC.TRANSPORT',
        context: expect.objectContaining({
          version: 4,
          error: 'GetBacktrace: boom',
          retryable: false,
          rpcCode: 'INTERNAL',
        }),
      }),
    );
  });

  it('fetches each source file once and highlights it once', async () => {
    client.onBacktrace = (request) =>
      request.filter.type === 'specific' && request.filter.version === 5
        ? backtrace(5, 8, 'src/lib.rs', 20)
        : backtrace(2, 5, 'src/lib.rs', 10);
    client.onSource = () => ({ content: 'fn a() {}\nfn b() {}' });

    await cache.request('E_1', 2);
    await cache.request('E_1', 5);
    await flushPromises();

    expect(client.sourceRequests).toEqual([{ componentId: WORKFLOW, file: 'src/lib.rs' }]);
    expect(cache.getSource(WORKFLOW, 'src/lib.rs')).toEqual({
      type: 'found',
      content: 'fn a() {}\nfn b() {}',
    });

    const lines = cache.getHighlightedSource(WORKFLOW, 'src/lib.rs');
    expect(lines).toEqual([
      { html: 'fn a() {}', line: 1 },
      { html: 'fn b() {}', line: 2 },
    ]);
    expect(cache.getHighlightedSource(WORKFLOW, 'src/lib.rs')).toBe(lines);
    expect(highlight).toHaveBeenCalledTimes(1);
    expect(highlight).toHaveBeenCalledWith('fn a() {}\nfn b() {}', 'rust');
  });

  it('marks a missing source without notifying', async () => {
    client.onBacktrace = () => backtrace(2, 5);
    await cache.request('E_1', 2);
    await flushPromises();
    expect(cache.getSource(WORKFLOW, 'src/lib.rs')).toEqual({ type: 'notFoundOrErr' });
    expect(cache.getHighlightedSource(WORKFLOW, 'src/lib.rs')).toBeUndefined();
    expect(notifier.error).not.toHaveBeenCalled();
  });

  it('bumps the revision and notifies subscribers on every change', async () => {
    const listener = jest.fn();
    cache.subscribe(listener);
    const before = cache.getRevision();

    await cache.request('E_1', 0);
    // requested, then notFound
    expect(listener).toHaveBeenCalledTimes(2);
    expect(cache.getRevision()).toBe(before + 2);
  });

  it('drops late results after dispose', async () => {
    const response = deferred<GetBacktraceResponse>();
    client.onBacktrace = () => response.promise;
    const pending = cache.request('E_1', 3);

    cache.dispose();
    expect(client.signals[0].aborted).toBe(true);
    response.resolve(backtrace(2, 5));
    await pending;

    expect(cache.get('E_1', 3)).toEqual({ type: 'requested' });
    expect(client.sourceRequests).toHaveLength(0);
  });
});
