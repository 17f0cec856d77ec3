/**
 * React binding for an EventStreamStore and its PaginationDriver.
 *
 * One store + driver pair lives for as long as the hook's context key (the
 * first execution id) stays the same. Changing the key or unmounting
 * disposes the driver, which aborts in-flight page requests and clears the
 * polling timers, so nothing from the old context lands in the new store.
 *
 * ```tsx
 * const { store, revision } = useEventStream(client, [executionId], { notifier });
 * const { events } = store.get(executionId);
 * ```
 */

import { useCallback, useEffect, useMemo, useRef, useState } from 'react';
import type { DebuggerConfig } from '../config';
import type { ExecutionId } from '../domain/execution-id';
import { createEventStreamStore, EventStreamStore } from '../execution/event-store';
import { attachPaginationDriver } from '../execution/pagination-driver';
import type { Logger } from '../logger';
import { createToastNotifier, Notifier } from '../notifications/toast';
import type { ExecutionRepositoryClient } from '../rpc/client';

export interface UseEventStreamOptions {
  notifier?: Notifier;
  config?: Partial<DebuggerConfig>;
  logger?: Logger;
}

export interface UseEventStreamReturn {
  store: EventStreamStore;
  /** Store revision of the last render; changes whenever the store does. */
  revision: number;
  /** Register an execution for loading. Idempotent. */
  addExecutionId: (executionId: ExecutionId) => void;
  /** Resume an execution whose page request failed. */
  retry: (executionId: ExecutionId) => void;
}

export function useEventStream(
  client: ExecutionRepositoryClient,
  executionIds: readonly ExecutionId[],
  options: UseEventStreamOptions = {},
): UseEventStreamReturn {
  const contextKey = executionIds[0];
  const store = useMemo(() => {
    void contextKey;
    return createEventStreamStore();
  }, [contextKey]);
  const [revision, setRevision] = useState(store.getState().revision);

  const executionIdsRef = useRef(executionIds);
  executionIdsRef.current = executionIds;
  const optionsRef = useRef(options);
  optionsRef.current = options;

  const { pageSize, pollIntervalMs } = options.config ?? {};

  useEffect(() => {
    const { notifier, logger } = optionsRef.current;
    const unsubscribe = store.subscribe((state) => {
      setRevision(state.revision);
    });
    const driver = attachPaginationDriver(store, {
      client,
      notifier: notifier ?? createToastNotifier(),
      config: { pageSize, pollIntervalMs },
      logger,
    });
    return () => {
      unsubscribe();
      driver.dispose();
    };
  }, [store, client, pageSize, pollIntervalMs]);

  const idsKey = executionIds.join('\n');
  useEffect(() => {
    for (const executionId of executionIdsRef.current) {
      store.dispatch({ type: 'addExecutionId', executionId });
    }
  }, [store, idsKey]);

  const addExecutionId = useCallback(
    (executionId: ExecutionId) => store.dispatch({ type: 'addExecutionId', executionId }),
    [store],
  );
  const retry = useCallback(
    (executionId: ExecutionId) => store.dispatch({ type: 'retry', executionId }),
    [store],
  );

  return { store, revision, addExecutionId, retry };
}
