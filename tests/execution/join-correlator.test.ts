import { appendToLog, EMPTY_EXECUTION_LOG } from '../../src/execution/event-store';
import {
  computeChildExecutionResults,
  computeJoinNextToResponse,
  getParentExecutionBounds,
} from '../../src/execution/join-correlator';
import { childFinished, LogBuilder, oneOff } from '../helpers/fixtures';

describe('computeJoinNextToResponse', () => {
  it('pairs joins with responses first-in first-out per join set', () => {
    const js = { kind: 'generated' as const, name: 'g0' };
    const events = new LogBuilder()
      .created()
      .joinSetCreated(js)
      .childRequest(js, 'E_1.0')
      .childRequest(js, 'E_1.1')
      .joinNext(js)
      .joinNext(js).events;
    const first = childFinished(js, 'E_1.1', 7_000);
    const second = childFinished(js, 'E_1.0', 8_000, { type: 'error' });
    const log = appendToLog(EMPTY_EXECUTION_LOG, events, [first, second]);

    const map = computeJoinNextToResponse(log.events, log.responses);
    expect(map.get(4)).toBe(first);
    expect(map.get(5)).toBe(second);
    expect(map.size).toBe(2);
  });

  it('leaves a join without a response unmapped', () => {
    const js = oneOff('a');
    const events = new LogBuilder().created().joinSetCreated(js).childRequest(js, 'E_1.0').joinNext(js)
      .events;
    expect(computeJoinNextToResponse(events, new Map()).size).toBe(0);
  });

  it('counts only JoinNextTry events that found a response', () => {
    const js = oneOff('a');
    const events = new LogBuilder()
      .created()
      .joinSetCreated(js)
      .childRequest(js, 'E_1.0')
      .history({ type: 'joinNextTry', joinSetId: js, foundResponse: false })
      .history({ type: 'joinNextTry', joinSetId: js, foundResponse: true }).events;
    const response = childFinished(js, 'E_1.0', 6_000);
    const log = appendToLog(EMPTY_EXECUTION_LOG, events, [response]);

    const map = computeJoinNextToResponse(log.events, log.responses);
    expect(map.has(3)).toBe(false);
    expect(map.get(4)).toBe(response);
  });
});

describe('getParentExecutionBounds', () => {
  const x = oneOff('x');
  const a = oneOff('a');
  const b = oneOff('b');
  const events = new LogBuilder()
    .created() // 0
    .locked() // 1
    .joinSetCreated(x) // 2
    .childRequest(x, 'E_1.9') // 3
    .joinSetCreated(a) // 4
    .childRequest(a, 'E_1.0') // 5
    .joinNext(x) // 6
    .joinSetCreated(b) // 7
    .childRequest(b, 'E_1.1') // 8
    .joinNext(a) // 9
    .joinNext(b).events; // 10
  const parent = appendToLog(EMPTY_EXECUTION_LOG, events, [
    childFinished(x, 'E_1.9', 20_000),
    childFinished(a, 'E_1.0', 21_000),
    childFinished(b, 'E_1.1', 22_000),
  ]);

  it('finds the request and the join that consumed the child', () => {
    expect(getParentExecutionBounds(parent.events, parent.responses, 'E_1.0')).toEqual({
      start: 5,
      end: 9,
    });
  });

  it('has no end while the child result is not consumed', () => {
    const unfinished = appendToLog(EMPTY_EXECUTION_LOG, events.slice(0, 9), []);
    expect(getParentExecutionBounds(unfinished.events, unfinished.responses, 'E_1.0')).toEqual({
      start: 5,
    });
  });

  it('is empty without a parent log or for an unknown child', () => {
    expect(getParentExecutionBounds(undefined, undefined, 'E_1.0')).toEqual({});
    expect(getParentExecutionBounds(parent.events, parent.responses, 'E_1.7')).toEqual({});
  });
});

describe('computeChildExecutionResults', () => {
  it('collects finished children across join sets', () => {
    const log = appendToLog(EMPTY_EXECUTION_LOG, [], [
      childFinished(oneOff('a'), 'E_1.0', 5_000),
      childFinished(oneOff('b'), 'E_1.1', 6_000, { type: 'error' }),
      { joinSetId: oneOff('c'), createdAt: 7_000, response: { type: 'delayFinished', delayId: 'd1', success: true } },
    ]);
    const results = computeChildExecutionResults(log.responses);
    expect(results.size).toBe(2);
    expect(results.get('E_1.0')).toEqual({ result: { type: 'ok' }, finishedAt: 5_000 });
    expect(results.get('E_1.1')).toEqual({ result: { type: 'error' }, finishedAt: 6_000 });
  });
});
