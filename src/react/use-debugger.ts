/**
 * React hook backing the debugger view.
 *
 * Loads the event logs of the leaf execution, its parent and all of its
 * ancestors,
 * requests one backtrace per ancestry level (at the version that level's
 * VersionPath element points at) and turns everything into view models:
 * step controls, backtrace state, frame views with source blocks, and the
 * leaf's log panel and version slider.
 *
 * Navigation is left to the caller. Step targets carry the execution id and
 * VersionPath to navigate to; rendering a new `executionId` starts a fresh
 * context (new event store and backtrace cache).
 *
 * ```tsx
 * const { levels, logItems } = useDebugger({ client, executionId, versionPath });
 * return levels.map((level) => <BacktraceBlock key={level.executionId} level={level} onNavigate={go} />);
 * ```
 */

import { useEffect, useMemo, useState } from 'react';
import type { DebuggerConfig } from '../config';
import type { ExecutionId } from '../domain/execution-id';
import { lastExecutionIdSegment, parentExecutionId } from '../domain/execution-id';
import type { VersionPath } from '../domain/version-path';
import {
  AncestryLevel,
  backtraceVersions,
  computeAncestry,
  computeStepControls,
  debuggerLogEvents,
  displayedVersion,
  isEventInBacktrace,
  selectedVersionIndex,
  StepControls,
} from '../execution/ancestry';
import { BacktraceCache, BacktraceEntry, createBacktraceCache } from '../execution/backtrace-cache';
import { computeFrameViews, FrameView } from '../execution/backtrace-view';
import { EventSummary, summarizeEvent } from '../execution/event-summary';
import type { SourceHighlighter } from '../execution/highlighter';
import { computeJoinNextToResponse } from '../execution/join-correlator';
import type { Logger } from '../logger';
import { createToastNotifier, Notifier } from '../notifications/toast';
import type { ExecutionRepositoryClient } from '../rpc/client';
import { useEventStream } from './use-event-stream';

export interface UseDebuggerOptions {
  client: ExecutionRepositoryClient;
  executionId: ExecutionId;
  versionPath: VersionPath;
  notifier?: Notifier;
  config?: Partial<DebuggerConfig>;
  highlighter?: SourceHighlighter;
  /** Hide frame headers and symbol locations, keep source blocks. */
  hideFrames?: boolean;
  logger?: Logger;
}

/** Everything one ancestry level renders. */
export interface DebuggerLevelView {
  executionId: ExecutionId;
  /** Last segment of the id, shown as the block title. */
  label: string;
  versionPath: VersionPath;
  isLeaf: boolean;
  /** Version from the path, moved up to the backtrace's first version. */
  version: number;
  controls: StepControls;
  /** Undefined until the backtrace request is issued. */
  backtrace?: BacktraceEntry;
  frames: FrameView[];
}

export interface DebuggerLogItem extends EventSummary {
  /** The event lies inside the leaf's current backtrace. */
  isSelected: boolean;
}

export interface UseDebuggerReturn {
  /** Leaf first, root last. */
  levels: DebuggerLevelView[];
  logItems: DebuggerLogItem[];
  /** Versions of the leaf that carry a backtrace, ascending. */
  sliderVersions: number[];
  /** Index into `sliderVersions` of the displayed leaf version; -1 when empty. */
  selectedIndex: number;
}

export function useDebugger(options: UseDebuggerOptions): UseDebuggerReturn {
  const { client, executionId, versionPath, config, highlighter, logger } = options;
  const hideFrames = options.hideFrames ?? false;
  const pathKey = versionPath.toString();

  const ancestry = useMemo(
    () => computeAncestry(executionId, versionPath),
    // `versionPath` is compared by value.
    [executionId, pathKey],
  );
  // The leaf's parent bounds Step Out even when the path does not reach it.
  const streamIds = useMemo(() => {
    const ids = ancestry.map((level) => level.executionId);
    const parentId = parentExecutionId(executionId);
    if (parentId !== undefined && !ids.includes(parentId)) ids.push(parentId);
    return ids;
  }, [ancestry, executionId]);

  const [notifier] = useState(() => options.notifier ?? createToastNotifier());
  const { store, revision } = useEventStream(client, streamIds, { notifier, config, logger });

  const [cache, setCache] = useState<BacktraceCache>();
  const [cacheRevision, setCacheRevision] = useState(0);

  useEffect(() => {
    const next = createBacktraceCache({ client, notifier, highlighter, logger });
    const unsubscribe = next.subscribe(() => {
      setCacheRevision(next.getRevision());
    });
    setCache(next);
    return () => {
      unsubscribe();
      next.dispose();
    };
  }, [client, executionId, notifier, highlighter, logger]);

  useEffect(() => {
    if (!cache) return;
    for (const level of ancestry) {
      void cache.request(level.executionId, level.versionPath.last());
    }
  }, [cache, ancestry]);

  return useMemo(() => {
    // Shared across levels so a source position is rendered once.
    const seenPositions = new Set<string>();

    const levels = ancestry.map((level: AncestryLevel): DebuggerLevelView => {
      const log = store.get(level.executionId);
      const parentId = parentExecutionId(level.executionId);
      const entry = cache?.get(level.executionId, level.versionPath.last());
      const response = entry?.type === 'ok' ? entry.backtrace : undefined;
      const controls = computeStepControls({
        level,
        log,
        parentLog: parentId === undefined ? undefined : store.get(parentId),
        joinNextToResponse: computeJoinNextToResponse(log.events, log.responses),
        backtrace: response?.wasmBacktrace,
      });
      const frames =
        response && cache
          ? computeFrameViews(response, {
              hideFrames,
              seenPositions,
              getHighlightedSource: cache.getHighlightedSource,
            })
          : [];
      return {
        executionId: level.executionId,
        label: lastExecutionIdSegment(level.executionId),
        versionPath: level.versionPath,
        isLeaf: level.isLeaf,
        version: displayedVersion(level.versionPath.last(), response?.wasmBacktrace),
        controls,
        backtrace: entry,
        frames,
      };
    });

    const leafLog = store.get(executionId);
    const leafEntry = cache?.get(executionId, versionPath.last());
    const leafBacktrace = leafEntry?.type === 'ok' ? leafEntry.backtrace.wasmBacktrace : undefined;
    const joinNextToResponse = computeJoinNextToResponse(leafLog.events, leafLog.responses);
    const logItems = debuggerLogEvents(leafLog.events).map((event) => ({
      ...summarizeEvent(event, joinNextToResponse),
      isSelected: isEventInBacktrace(event, leafBacktrace),
    }));
    const sliderVersions = backtraceVersions(leafLog.events);
    const selectedIndex = selectedVersionIndex(
      sliderVersions,
      displayedVersion(versionPath.last(), leafBacktrace),
    );

    return { levels, logItems, sliderVersions, selectedIndex };
    // Store and cache are mutable; their revisions mark changes.
  }, [store, revision, cache, cacheRevision, ancestry, executionId, pathKey, hideFrames]);
}
