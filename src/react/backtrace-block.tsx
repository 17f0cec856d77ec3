/**
 * BacktraceBlock: one ancestry level of the debugger.
 *
 * Header with the execution's last id segment and displayed version, the
 * step controls, then the backtrace: a loading or error line, or one block
 * per frame with symbol locations and highlighted source.
 *
 * @example
 * ```tsx
 * const { levels } = useDebugger({ client, executionId, versionPath });
 * {levels.map(level => (
 *   <BacktraceBlock
 *     key={level.executionId}
 *     level={level}
 *     onNavigate={t => navigate(`/debug/${t.executionId}/${t.versionPath}`)}
 *   />
 * ))}
 * ```
 */

import React from 'react';
import type { SourceBlockView } from '../execution/backtrace-view';
import type { StepTarget } from '../execution/ancestry';
import { StepControlsView } from './step-controls';
import type { DebuggerLevelView } from './use-debugger';

export interface BacktraceBlockProps {
  level: DebuggerLevelView;
  onNavigate: (target: StepTarget) => void;
  className?: string;
}

function SourceBlock({ source }: { source: SourceBlockView }) {
  return (
    <pre className="bg-gray-950 rounded p-2 mt-1 text-xs overflow-x-auto">
      <code>
        {source.lines.map(line => (
          <div
            key={line.line}
            className={line.line === source.focusLine ? 'bg-yellow-900/40' : undefined}
            data-line={line.line}
          >
            <span className="text-gray-600 select-none mr-3">{line.line}</span>
            <span dangerouslySetInnerHTML={{ __html: line.html }} />
          </div>
        ))}
      </code>
    </pre>
  );
}

function BacktraceBody({ level }: { level: DebuggerLevelView }) {
  const entry = level.backtrace;
  if (entry?.type === 'error') {
    return (
      <p className="text-xs text-gray-400">
        {entry.error === 'notFound' ? 'Backtrace not found' : 'Loading backtrace failed'}
      </p>
    );
  }
  if (entry?.type !== 'ok') {
    return <p className="text-xs text-gray-500">Loading backtrace...</p>;
  }

  return (
    <div className="space-y-2">
      {level.frames.map(frame => (
        <div key={frame.index}>
          {frame.header && <p className="text-xs font-mono text-gray-300">{frame.header}</p>}
          {frame.symbols.map((symbol, i) => (
            <div key={i} className="pl-3">
              {symbol.location && (
                <p className="text-xs font-mono text-gray-500">{symbol.location}</p>
              )}
              {symbol.source && <SourceBlock source={symbol.source} />}
            </div>
          ))}
        </div>
      ))}
    </div>
  );
}

export function BacktraceBlock({ level, onNavigate, className }: BacktraceBlockProps) {
  return (
    <section className={`bg-gray-900 border border-gray-700 rounded-lg p-3 ${className ?? ''}`}>
      <div className="flex items-center justify-between gap-2 mb-2">
        <h3 className="text-white font-semibold text-sm truncate" title={level.executionId}>
          {level.label}
        </h3>
        <span className="text-xs text-gray-500 font-mono flex-shrink-0">
          Version {level.version}
        </span>
      </div>
      <StepControlsView controls={level.controls} onNavigate={onNavigate} className="mb-2" />
      <BacktraceBody level={level} />
    </section>
  );
}
