/**
 * React hook backing the trace view of one root execution.
 *
 * With `autoload` on, every child the tree references but the store does
 * not know yet is registered as soon as it shows up, so the whole subtree
 * loads by itself. Without it, `loadChildren` registers the direct children
 * of one node on demand.
 */

import { useCallback, useEffect, useMemo, useState } from 'react';
import type { DebuggerConfig } from '../config';
import type { ExecutionId } from '../domain/execution-id';
import { EventSummary, summarizeEvent } from '../execution/event-summary';
import { computeJoinNextToResponse } from '../execution/join-correlator';
import { computeRootTrace, traceLogEvents, TraceTree } from '../execution/trace-tree';
import type { Logger } from '../logger';
import type { Notifier } from '../notifications/toast';
import type { ExecutionRepositoryClient } from '../rpc/client';
import { useEventStream } from './use-event-stream';

export interface UseTraceTreeOptions {
  client: ExecutionRepositoryClient;
  executionId: ExecutionId;
  autoload: boolean;
  hideFinished: boolean;
  notifier?: Notifier;
  config?: Partial<DebuggerConfig>;
  logger?: Logger;
}

export interface UseTraceTreeReturn {
  /** Undefined until the root's first page arrives. */
  tree?: TraceTree;
  /** Log panel of the root execution. */
  logItems: EventSummary[];
  /** Register the given children for loading. */
  loadChildren: (childIds: readonly ExecutionId[]) => void;
  /** Show or hide HTTP client traces of one execution. */
  toggleHttpTraces: (executionId: ExecutionId) => void;
  retry: (executionId: ExecutionId) => void;
}

export function useTraceTree(options: UseTraceTreeOptions): UseTraceTreeReturn {
  const { client, executionId, autoload, hideFinished, notifier, config, logger } = options;
  const rootIds = useMemo(() => [executionId], [executionId]);
  const { store, revision, addExecutionId, retry } = useEventStream(client, rootIds, {
    notifier,
    config,
    logger,
  });
  const [showHttpTraces, setShowHttpTraces] = useState<ReadonlySet<ExecutionId>>(new Set());

  const tree = useMemo(
    () => computeRootTrace(executionId, store.getState(), { hideFinished, showHttpTraces }),
    // Recomputed per store revision.
    [store, revision, executionId, hideFinished, showHttpTraces],
  );

  useEffect(() => {
    if (!autoload || !tree) return;
    for (const childId of tree.missingIds) {
      addExecutionId(childId);
    }
  }, [autoload, tree, addExecutionId]);

  const logItems = useMemo(() => {
    const log = store.get(executionId);
    const joinNextToResponse = computeJoinNextToResponse(log.events, log.responses);
    return traceLogEvents(log.events).map((event) => summarizeEvent(event, joinNextToResponse));
  }, [store, revision, executionId]);

  const loadChildren = useCallback(
    (childIds: readonly ExecutionId[]) => {
      for (const childId of childIds) {
        addExecutionId(childId);
      }
    },
    [addExecutionId],
  );

  const toggleHttpTraces = useCallback((id: ExecutionId) => {
    setShowHttpTraces((prev) => {
      const next = new Set(prev);
      if (next.has(id)) {
        next.delete(id);
      } else {
        next.add(id);
      }
      return next;
    });
  }, []);

  return { tree, logItems, loadChildren, toggleHttpTraces, retry };
}
