import { useEffect, useRef, useState } from 'react';
import type { ExecutionId } from '../domain/execution-id';
import { GetStatusMessage, isFinishedAny, isFinishedDetailed } from '../domain/execution-status';
import { runStatusSubscription } from '../execution/status-subscription';
import type { Logger } from '../logger';
import type { ExecutionRepositoryClient } from '../rpc/client';

export interface UseExecutionStatusOptions {
  /** Wait for the FinishedStatus message (timestamps and result). Default true. */
  sendFinishedStatus?: boolean;
  logger?: Logger;
}

export interface UseExecutionStatusReturn {
  /** Last message received; undefined until the first one arrives. */
  message?: GetStatusMessage;
  finished: boolean;
}

/**
 * Follow the live status of an execution.
 *
 * The subscription is not (re)started once the execution is known to be
 * finished. Unmounting or changing the execution aborts it.
 */
export function useExecutionStatus(
  client: ExecutionRepositoryClient,
  executionId: ExecutionId,
  options: UseExecutionStatusOptions = {},
): UseExecutionStatusReturn {
  const sendFinishedStatus = options.sendFinishedStatus ?? true;
  const { logger } = options;
  const [current, setCurrent] = useState<{ executionId: ExecutionId; message: GetStatusMessage }>();
  const currentRef = useRef(current);
  currentRef.current = current;

  const isDone = sendFinishedStatus ? isFinishedDetailed : isFinishedAny;

  useEffect(() => {
    const last = currentRef.current;
    if (last?.executionId === executionId && isDone(last.message)) return;

    const controller = new AbortController();
    void runStatusSubscription({
      client,
      executionId,
      sendFinishedStatus,
      signal: controller.signal,
      logger,
      onMessage: (message) => setCurrent({ executionId, message }),
    });
    return () => {
      controller.abort();
    };
  }, [client, executionId, sendFinishedStatus, isDone, logger]);

  const message = current?.executionId === executionId ? current.message : undefined;
  return { message, finished: message !== undefined && isDone(message) };
}
