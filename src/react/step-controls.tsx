/**
 * StepControlsView: Step Out / Prev / Next / Into buttons of one ancestry level.
 *
 * Props-driven: the targets come from `computeStepControls` and a click
 * hands the target to `onNavigate`. Disabled steps render as muted spans.
 */

import React from 'react';
import { ArrowDownToLine, ArrowUpFromLine, ChevronLeft, ChevronRight } from 'lucide-react';
import type { StepControls, StepTarget } from '../execution/ancestry';

export interface StepControlsViewProps {
  controls: StepControls;
  onNavigate: (target: StepTarget) => void;
  className?: string;
}

function StepButton({
  label,
  icon,
  target,
  current,
  onNavigate,
}: {
  label: string;
  icon: React.ReactNode;
  target?: StepTarget;
  current?: boolean;
  onNavigate: (target: StepTarget) => void;
}) {
  if (!target) {
    return (
      <span
        className="inline-flex items-center gap-1 text-xs text-gray-600 cursor-not-allowed"
        aria-disabled="true"
      >
        {icon}
        {label}
      </span>
    );
  }
  return (
    <button
      type="button"
      onClick={() => onNavigate(target)}
      className={`inline-flex items-center gap-1 text-xs hover:text-white transition-colors ${
        current ? 'text-blue-400 font-semibold' : 'text-gray-300'
      }`}
      title={`${target.executionId} @ ${target.versionPath.toString()}`}
    >
      {icon}
      {label}
    </button>
  );
}

export function StepControlsView({ controls, onNavigate, className }: StepControlsViewProps) {
  const { stepOut } = controls;
  const outIcon = <ArrowUpFromLine size={14} />;

  return (
    <div className={`flex items-center gap-3 ${className ?? ''}`}>
      {stepOut.type === 'disabled' && (
        <StepButton label="Step Out" icon={outIcon} onNavigate={onNavigate} />
      )}
      {stepOut.type === 'single' && (
        <StepButton label="Step Out" icon={outIcon} target={stepOut.target} onNavigate={onNavigate} />
      )}
      {stepOut.type === 'startEnd' && (
        <>
          <StepButton
            label="Step Out (Start)"
            icon={outIcon}
            target={stepOut.start}
            current={stepOut.start.isCurrent}
            onNavigate={onNavigate}
          />
          <StepButton
            label="Step Out (End)"
            icon={outIcon}
            target={stepOut.end}
            current={stepOut.end?.isCurrent}
            onNavigate={onNavigate}
          />
        </>
      )}
      <StepButton
        label="Step Prev"
        icon={<ChevronLeft size={14} />}
        target={controls.stepPrev}
        onNavigate={onNavigate}
      />
      <StepButton
        label="Step Next"
        icon={<ChevronRight size={14} />}
        target={controls.stepNext}
        onNavigate={onNavigate}
      />
      <StepButton
        label="Step Into"
        icon={<ArrowDownToLine size={14} />}
        target={controls.stepInto}
        onNavigate={onNavigate}
      />
    </div>
  );
}
