/**
 * Ancestry chain and step navigation for the debugger.
 *
 * The debugger shows the current (leaf) execution together with its parent,
 * grandparent and so on. Every level owns one element of the VersionPath.
 * Step controls produce navigation targets; they never navigate themselves.
 */

import type { WasmBacktrace } from '../domain/backtrace';
import type { ExecutionEvent } from '../domain/execution-event';
import { childExecutionIdOf, historyOf } from '../domain/execution-event';
import { ExecutionId, parentExecutionId } from '../domain/execution-id';
import { VersionPath } from '../domain/version-path';
import type { ExecutionLog } from './event-store';
import { getParentExecutionBounds, JoinNextToResponse } from './join-correlator';

export interface AncestryLevel {
  executionId: ExecutionId;
  versionPath: VersionPath;
  isLeaf: boolean;
}

/** Leaf first, then each ancestor while both the id and the path can step out. */
export function computeAncestry(executionId: ExecutionId, versionPath: VersionPath): AncestryLevel[] {
  const levels: AncestryLevel[] = [{ executionId, versionPath, isLeaf: true }];
  let currentId = executionId;
  let currentPath = versionPath;
  for (;;) {
    const parentId = parentExecutionId(currentId);
    const parentPath = currentPath.stepOut();
    if (parentId === undefined || parentPath === undefined) break;
    levels.push({ executionId: parentId, versionPath: parentPath, isLeaf: false });
    currentId = parentId;
    currentPath = parentPath;
  }
  return levels;
}

// ---------------------------------------------------------------------------
// Step targets
// ---------------------------------------------------------------------------

export interface StepTarget {
  executionId: ExecutionId;
  versionPath: VersionPath;
}

export interface MarkedStepTarget extends StepTarget {
  /** The target version is the parent version currently requested. */
  isCurrent: boolean;
}

export type StepOut =
  | { type: 'disabled' }
  | { type: 'single'; target: StepTarget }
  | { type: 'startEnd'; start: MarkedStepTarget; end?: MarkedStepTarget };

/**
 * Step Out of one ancestry level.
 *
 * For the leaf the parent's log decides the target: the version that
 * requested the child and the one that consumed its result, collapsed into
 * one target when adjacent.
 */
export function computeStepOut(level: AncestryLevel, parentLog?: ExecutionLog): StepOut {
  const parentId = parentExecutionId(level.executionId);
  if (parentId === undefined) return { type: 'disabled' };

  if (!level.isLeaf) {
    const parentPath = level.versionPath.stepOut();
    return parentPath
      ? { type: 'single', target: { executionId: parentId, versionPath: parentPath } }
      : { type: 'disabled' };
  }

  const parentPath = level.versionPath.stepOut() ?? VersionPath.default();
  const requestedParentVersion = parentPath.last();
  const { start, end } = getParentExecutionBounds(
    parentLog?.events,
    parentLog?.responses,
    level.executionId,
  );

  if (start === undefined) {
    return { type: 'single', target: { executionId: parentId, versionPath: parentPath } };
  }
  if (end === start + 1) {
    return {
      type: 'single',
      target: { executionId: parentId, versionPath: parentPath.change(start) },
    };
  }
  const mark = (version: number): MarkedStepTarget => ({
    executionId: parentId,
    versionPath: parentPath.change(version),
    isCurrent: version === requestedParentVersion,
  });
  return {
    type: 'startEnd',
    start: mark(start),
    end: end === undefined ? undefined : mark(end),
  };
}

// ---------------------------------------------------------------------------
// Backtrace versions
// ---------------------------------------------------------------------------

/** Sorted, unique versions that carry a backtrace. */
export function backtraceVersions(events: readonly ExecutionEvent[]): number[] {
  const versions = new Set<number>();
  for (const event of events) {
    if (event.backtraceId !== undefined) versions.add(event.backtraceId);
  }
  return [...versions].sort((a, b) => a - b);
}

export function computeStepPrev(
  level: AncestryLevel,
  events: readonly ExecutionEvent[],
  backtrace: WasmBacktrace,
): StepTarget | undefined {
  const candidates = backtraceVersions(events).filter((v) => v < backtrace.versionMinIncluding);
  if (candidates.length === 0) return undefined;
  return {
    executionId: level.executionId,
    versionPath: level.versionPath.change(candidates[candidates.length - 1]),
  };
}

export function computeStepNext(
  level: AncestryLevel,
  events: readonly ExecutionEvent[],
  backtrace: WasmBacktrace,
): StepTarget | undefined {
  const next = backtraceVersions(events).find((v) => v >= backtrace.versionMaxExcluding);
  if (next === undefined) return undefined;
  return { executionId: level.executionId, versionPath: level.versionPath.change(next) };
}

/**
 * Version holding the child request (or the join) a backtrace points at.
 *
 * A backtrace spanning exactly three versions comes from a one-off join set
 * (JoinSetCreated, request, JoinNext share one call site), so the request is
 * the second of them. This mirrors the backend's current one-off join set
 * encoding and must change with it.
 */
export function childRequestVersion(backtrace: WasmBacktrace): number {
  return backtrace.versionMaxExcluding - backtrace.versionMinIncluding === 3
    ? backtrace.versionMinIncluding + 1
    : backtrace.versionMinIncluding;
}

function eventAt(events: readonly ExecutionEvent[], version: number): ExecutionEvent | undefined {
  const candidate = version < events.length ? events[version] : undefined;
  return candidate?.version === version ? candidate : events.find((e) => e.version === version);
}

/** Step Into the child the leaf's backtrace points at; leaf level only. */
export function computeStepInto(
  level: AncestryLevel,
  events: readonly ExecutionEvent[],
  joinNextToResponse: JoinNextToResponse,
  backtrace: WasmBacktrace,
): StepTarget | undefined {
  if (!level.isLeaf) return undefined;
  const event = eventAt(events, childRequestVersion(backtrace));
  if (!event) return undefined;

  const requested = childExecutionIdOf(event);
  if (requested !== undefined) {
    return { executionId: requested, versionPath: level.versionPath.stepInto() };
  }
  if (historyOf(event)?.type === 'joinNext') {
    const response = joinNextToResponse.get(event.version)?.response;
    if (response?.type === 'childExecutionFinished') {
      return { executionId: response.childExecutionId, versionPath: level.versionPath.stepInto() };
    }
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Bundled controls
// ---------------------------------------------------------------------------

export interface StepControls {
  stepOut: StepOut;
  /** Undefined while disabled, including while the backtrace is not loaded. */
  stepPrev?: StepTarget;
  stepNext?: StepTarget;
  stepInto?: StepTarget;
}

export interface StepControlsInput {
  level: AncestryLevel;
  log: ExecutionLog;
  parentLog?: ExecutionLog;
  joinNextToResponse: JoinNextToResponse;
  /** The level's loaded backtrace, if any. */
  backtrace?: WasmBacktrace;
}

export function computeStepControls(input: StepControlsInput): StepControls {
  const { level, log, parentLog, joinNextToResponse, backtrace } = input;
  const stepOut = computeStepOut(level, parentLog);
  if (!backtrace) return { stepOut };
  return {
    stepOut,
    stepPrev: computeStepPrev(level, log.events, backtrace),
    stepNext: computeStepNext(level, log.events, backtrace),
    stepInto: computeStepInto(level, log.events, joinNextToResponse, backtrace),
  };
}

// ---------------------------------------------------------------------------
// Version slider & log panel
// ---------------------------------------------------------------------------

/** Index of the first version `>= selected`, else the last index; -1 when empty. */
export function selectedVersionIndex(versions: readonly number[], selected: number): number {
  const index = versions.findIndex((v) => v >= selected);
  return index === -1 ? versions.length - 1 : index;
}

/** Step Into starts a child at version 0; show the backtrace's first version instead. */
export function displayedVersion(requested: number, backtrace?: WasmBacktrace): number {
  if (backtrace && requested < backtrace.versionMinIncluding) {
    return backtrace.versionMinIncluding;
  }
  return requested;
}

export function isEventInBacktrace(event: ExecutionEvent, backtrace?: WasmBacktrace): boolean {
  if (!backtrace) return false;
  return (
    backtrace.versionMinIncluding <= event.version && event.version < backtrace.versionMaxExcluding
  );
}

/** Events listed beside the debugger: Created, Finished and anything with a backtrace. */
export function debuggerLogEvents(events: readonly ExecutionEvent[]): ExecutionEvent[] {
  return events.filter(
    (event) =>
      event.event.type === 'created' ||
      event.event.type === 'finished' ||
      event.backtraceId !== undefined,
  );
}
