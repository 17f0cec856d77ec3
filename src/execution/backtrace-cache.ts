/**
 * Backtrace and source cache.
 *
 * Backtraces are keyed by (executionId, requested version), sources by
 * (component, file). Both are fetched at most once per key: a `requested`
 * marker is stored before the fetch starts, and concurrent callers of
 * `request()` share the same promise. Entries are never evicted or retried;
 * a NotFound backtrace is a valid terminal state, not a failure.
 */

import type { GetBacktraceResponse } from '../domain/backtrace';
import { backtraceFilterFor } from '../domain/backtrace';
import { ComponentId, formatComponentId } from '../domain/component-id';
import { errorMessage, isNotFound, rpcTypedError } from '../domain/errors';
import type { ExecutionId } from '../domain/execution-id';
import { Logger, logger as rootLogger, traceId } from '../logger';
import type { Notifier } from '../notifications/toast';
import type { ExecutionRepositoryClient } from '../rpc/client';
import {
  HighlightedLine,
  languageFromFile,
  plainTextHighlighter,
  SourceHighlighter,
} from './highlighter';

export type BacktraceError = 'notFound' | 'other';

export type BacktraceEntry =
  | { type: 'requested' }
  | { type: 'ok'; backtrace: GetBacktraceResponse }
  | { type: 'error'; error: BacktraceError };

export type SourceCodeState =
  | { type: 'requested' }
  | { type: 'inFlight' }
  | { type: 'found'; content: string }
  | { type: 'notFoundOrErr' };

export interface BacktraceCacheOptions {
  client: ExecutionRepositoryClient;
  notifier: Notifier;
  highlighter?: SourceHighlighter;
  logger?: Logger;
}

export interface BacktraceCache {
  /** Fetch the backtrace unless it is cached or already being fetched. */
  request(executionId: ExecutionId, version: number): Promise<void>;
  get(executionId: ExecutionId, version: number): BacktraceEntry | undefined;
  /** Fetch a source file unless it is already known. */
  requestSource(componentId: ComponentId, file: string): void;
  getSource(componentId: ComponentId, file: string): SourceCodeState | undefined;
  /** Highlighted lines of a found source; computed on first access, then cached. */
  getHighlightedSource(componentId: ComponentId, file: string): HighlightedLine[] | undefined;
  subscribe(listener: () => void): () => void;
  /** Incremented on every backtrace or source state change. */
  getRevision(): number;
  dispose(): void;
}

export function backtraceKey(executionId: ExecutionId, version: number): string {
  return `${executionId}@${version}`;
}

export function sourceKey(componentId: ComponentId, file: string): string {
  return `${formatComponentId(componentId)}\n${file}`;
}

export function createBacktraceCache(options: BacktraceCacheOptions): BacktraceCache {
  const { client, notifier } = options;
  const highlighter = options.highlighter ?? plainTextHighlighter;
  const log = (options.logger ?? rootLogger).child({ module: 'backtrace-cache' });

  const backtraces = new Map<string, BacktraceEntry>();
  const inFlight = new Map<string, Promise<void>>();
  const sources = new Map<string, SourceCodeState>();
  const highlighted = new Map<string, HighlightedLine[]>();
  const listeners = new Set<() => void>();
  const controller = new AbortController();
  let revision = 0;
  let disposed = false;

  function notify(): void {
    revision += 1;
    for (const listener of [...listeners]) {
      listener();
    }
  }

  function setBacktrace(key: string, entry: BacktraceEntry): void {
    backtraces.set(key, entry);
    notify();
  }

  function setSource(key: string, state: SourceCodeState): void {
    sources.set(key, state);
    notify();
  }

  async function loadSource(
    key: string,
    componentId: ComponentId,
    file: string,
    taskLog: Logger,
  ): Promise<void> {
    setSource(key, { type: 'inFlight' });
    try {
      const { content } = await client.getBacktraceSource(
        { componentId, file },
        { signal: controller.signal },
      );
      if (disposed) return;
      setSource(key, { type: 'found', content });
    } catch (err) {
      if (disposed) return;
      const typed = rpcTypedError('GetBacktraceSource', err);
      taskLog.info('Cannot obtain source', { code: typed.code, error: typed.message });
      setSource(key, { type: 'notFoundOrErr' });
    }
  }

  function requestSource(componentId: ComponentId, file: string, parentLog: Logger = log): void {
    if (disposed) return;
    const key = sourceKey(componentId, file);
    if (sources.has(key)) return;
    const taskLog = parentLog.child({ file, traceId: traceId() });
    taskLog.debug('Requesting source');
    setSource(key, { type: 'requested' });
    void loadSource(key, componentId, file, taskLog);
  }

  async function loadBacktrace(
    key: string,
    executionId: ExecutionId,
    version: number,
  ): Promise<void> {
    const taskLog = log.child({ executionId, version, traceId: traceId() });
    taskLog.info('Requesting backtrace');
    let response: GetBacktraceResponse;
    try {
      response = await client.getBacktrace(
        { executionId, filter: backtraceFilterFor(version) },
        { signal: controller.signal },
      );
    } catch (err) {
      if (disposed) return;
      if (isNotFound(err)) {
        taskLog.debug('No backtrace recorded');
        setBacktrace(key, { type: 'error', error: 'notFound' });
        return;
      }
      taskLog.failure('Failed to get backtrace', rpcTypedError('GetBacktrace', err, executionId));
      notifier.error(`Failed to load backtrace: ${errorMessage(err)}`);
      setBacktrace(key, { type: 'error', error: 'other' });
      return;
    }
    if (disposed) return;

    for (const frame of response.wasmBacktrace.frames) {
      for (const symbol of frame.symbols) {
        if (symbol.file !== undefined) {
          requestSource(response.componentId, symbol.file, taskLog);
        }
      }
    }
    setBacktrace(key, { type: 'ok', backtrace: response });
  }

  return {
    request(executionId, version) {
      const key = backtraceKey(executionId, version);
      const pending = inFlight.get(key);
      if (pending) return pending;
      if (disposed || backtraces.has(key)) return Promise.resolve();
      setBacktrace(key, { type: 'requested' });
      const promise = loadBacktrace(key, executionId, version).finally(() => {
        inFlight.delete(key);
      });
      inFlight.set(key, promise);
      return promise;
    },

    get: (executionId, version) => backtraces.get(backtraceKey(executionId, version)),

    requestSource: (componentId, file) => requestSource(componentId, file),

    getSource: (componentId, file) => sources.get(sourceKey(componentId, file)),

    getHighlightedSource(componentId, file) {
      const key = sourceKey(componentId, file);
      const state = sources.get(key);
      if (state?.type !== 'found') return undefined;
      let lines = highlighted.get(key);
      if (!lines) {
        lines = highlighter.highlight(state.content, languageFromFile(file));
        highlighted.set(key, lines);
      }
      return lines;
    },

    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    getRevision: () => revision,

    dispose() {
      if (disposed) return;
      disposed = true;
      controller.abort();
      listeners.clear();
      log.debug('Backtrace cache disposed');
    },
  };
}
