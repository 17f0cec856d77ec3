/**
 * Live status subscription.
 *
 * Follows the GetStatus stream of one execution until the server ends it,
 * it fails, or the caller aborts. Aborting ends the loop right away and
 * closes the stream; a late message is never delivered after abort. The
 * returned promise never rejects.
 */

import { errorMessage } from '../domain/errors';
import type { ExecutionId } from '../domain/execution-id';
import type { GetStatusMessage } from '../domain/execution-status';
import { Logger, logger as rootLogger, traceId } from '../logger';
import type { ExecutionRepositoryClient } from '../rpc/client';

export interface StatusSubscriptionParams {
  client: ExecutionRepositoryClient;
  executionId: ExecutionId;
  /** Ask for a FinishedStatus message (timestamps and result) at the end. */
  sendFinishedStatus: boolean;
  signal: AbortSignal;
  onMessage(message: GetStatusMessage): void;
  logger?: Logger;
}

export async function runStatusSubscription(params: StatusSubscriptionParams): Promise<void> {
  const { client, executionId, sendFinishedStatus, signal, onMessage } = params;
  const log = (params.logger ?? rootLogger).child({
    module: 'status-subscription',
    executionId,
    traceId: traceId(),
  });
  if (signal.aborted) return;

  log.debug('Subscribing to status');
  let iterator: AsyncIterator<GetStatusMessage>;
  try {
    iterator = client
      .getStatus({ executionId, follow: true, sendFinishedStatus }, { signal })
      [Symbol.asyncIterator]();
  } catch (err) {
    log.error('Cannot subscribe to status', { error: errorMessage(err) });
    return;
  }

  let resolveAborted: (value: 'aborted') => void = () => undefined;
  const aborted = new Promise<'aborted'>((resolve) => {
    resolveAborted = resolve;
  });
  const onAbort = (): void => resolveAborted('aborted');
  signal.addEventListener('abort', onAbort, { once: true });

  try {
    for (;;) {
      const next = await Promise.race([iterator.next(), aborted]);
      if (next === 'aborted' || next.done) break;
      if (signal.aborted) break;
      onMessage(next.value);
    }
  } catch (err) {
    if (!signal.aborted) {
      log.error('Error while listening to status updates', { error: errorMessage(err) });
    }
  } finally {
    signal.removeEventListener('abort', onAbort);
    if (signal.aborted && iterator.return) {
      void iterator.return().catch((err: unknown) => {
        log.debug('Closing status stream failed', { error: errorMessage(err) });
      });
    }
  }
  log.debug('Ended subscription');
}
