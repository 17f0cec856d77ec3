import type { ExecutionEvent, JoinSetResponse } from '../domain/execution-event';
import type { ExecutionId } from '../domain/execution-id';
import { resultKindLabel } from '../domain/execution-status';
import { formatJoinSetId, JoinSetId } from '../domain/join-set-id';
import type { JoinNextToResponse } from './join-correlator';

export type EventTone = 'neutral' | 'success' | 'error' | 'pending';

/** One line of an execution log panel. */
export interface EventSummary {
  version: number;
  title: string;
  tone: EventTone;
  childExecutionId?: ExecutionId;
  joinSetId?: JoinSetId;
}

function responseLabel(response: JoinSetResponse): string {
  switch (response.type) {
    case 'childExecutionFinished':
      return resultKindLabel(response.result);
    case 'delayFinished':
      return response.success ? 'Delay finished' : 'Delay cancelled';
  }
}

function responseTone(response: JoinSetResponse): EventTone {
  if (response.type === 'childExecutionFinished') {
    return response.result.type === 'ok' ? 'success' : 'error';
  }
  return 'neutral';
}

export function summarizeEvent(
  event: ExecutionEvent,
  joinNextToResponse: JoinNextToResponse,
): EventSummary {
  const { version } = event;
  const line = (text: string, tone: EventTone = 'neutral'): EventSummary => ({
    version,
    title: `${version}. ${text}`,
    tone,
  });
  const body = event.event;

  switch (body.type) {
    case 'created':
      return line(`Created: ${body.functionName}`);
    case 'locked':
      return line('Locked');
    case 'unlocked':
      return line(body.reason ? `Unlocked: ${body.reason}` : 'Unlocked');
    case 'temporarilyFailed':
      return line(`Temporarily Failed: ${body.reason}`, 'error');
    case 'temporarilyTimedOut':
      return line('Temporarily Timed Out', 'error');
    case 'finished':
      return line(resultKindLabel(body.result), body.result.type === 'ok' ? 'success' : 'error');
    case 'history':
      break;
  }

  const history = body.history;
  const joinSet = `\`${formatJoinSetId(history.joinSetId)}\``;
  const withJoinSet = (summary: EventSummary): EventSummary => ({
    ...summary,
    joinSetId: history.joinSetId,
  });

  switch (history.type) {
    case 'joinSetCreated':
      return withJoinSet(line(`Join Set Created: ${joinSet}`));
    case 'joinSetRequest':
      if (history.request.type === 'childExecutionRequest') {
        return withJoinSet({
          ...line(`Child Execution Request: \`${history.request.childExecutionId}\``),
          childExecutionId: history.request.childExecutionId,
        });
      }
      return withJoinSet(line(`Delay Request: \`${history.request.delayId}\``));
    case 'joinNext':
    case 'joinNextTry': {
      const label =
        history.type === 'joinNext'
          ? 'Join Next'
          : `Join Next Try (${history.foundResponse ? 'found' : 'pending'})`;
      const response = joinNextToResponse.get(version)?.response;
      if (!response) {
        return withJoinSet(line(`${label}: ${joinSet}`, 'pending'));
      }
      const summary = withJoinSet(
        line(`${label}: ${joinSet} → ${responseLabel(response)}`, responseTone(response)),
      );
      return response.type === 'childExecutionFinished'
        ? { ...summary, childExecutionId: response.childExecutionId }
        : summary;
    }
    case 'joinNextTooMany':
      return withJoinSet(line(`Join Next Too Many: ${joinSet}`, 'error'));
  }
}
