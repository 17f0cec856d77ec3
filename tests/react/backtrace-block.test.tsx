import React from 'react';
import { render, screen } from '@testing-library/react';
import '@testing-library/jest-dom';
import { VersionPath } from '../../src/domain/version-path';
import { BacktraceBlock } from '../../src/react/backtrace-block';
import type { DebuggerLevelView } from '../../src/react/use-debugger';
import { backtrace } from '../helpers/fixtures';

function level(overrides: Partial<DebuggerLevelView> = {}): DebuggerLevelView {
  return {
    executionId: 'E_1.0',
    label: '0',
    versionPath: VersionPath.of(3, 0),
    isLeaf: true,
    version: 0,
    controls: { stepOut: { type: 'disabled' } },
    frames: [],
    ...overrides,
  };
}

describe('BacktraceBlock', () => {
  it('shows the label and displayed version', () => {
    render(<BacktraceBlock level={level({ version: 4 })} onNavigate={jest.fn()} />);
    expect(screen.getByText('0')).toHaveAttribute('title', 'E_1.0');
    expect(screen.getByText('Version 4')).toBeInTheDocument();
  });

  it('shows loading until the backtrace arrives', () => {
    render(<BacktraceBlock level={level({ backtrace: { type: 'requested' } })} onNavigate={jest.fn()} />);
    expect(screen.getByText('Loading backtrace...')).toBeInTheDocument();
  });

  it('distinguishes a missing backtrace from a failed request', () => {
    const { rerender } = render(
      <BacktraceBlock
        level={level({ backtrace: { type: 'error', error: 'notFound' } })}
        onNavigate={jest.fn()}
      />,
    );
    expect(screen.getByText('Backtrace not found')).toBeInTheDocument();

    rerender(
      <BacktraceBlock
        level={level({ backtrace: { type: 'error', error: 'other' } })}
        onNavigate={jest.fn()}
      />,
    );
    expect(screen.getByText('Loading backtrace failed')).toBeInTheDocument();
  });

  it('renders frames with highlighted source', () => {
    const view = level({
      backtrace: { type: 'ok', backtrace: backtrace(0, 2) },
      frames: [
        {
          index: 0,
          header: '0: test_workflow, function: run',
          symbols: [
            {
              location: 'at src/lib.rs:2:5',
              source: {
                file: 'src/lib.rs',
                focusLine: 2,
                lines: [
                  { html: 'fn run() {', line: 1 },
                  { html: '  &lt;T&gt;', line: 2 },
                ],
              },
            },
          ],
        },
      ],
    });
    const { container } = render(<BacktraceBlock level={view} onNavigate={jest.fn()} />);

    expect(screen.getByText('0: test_workflow, function: run')).toBeInTheDocument();
    expect(screen.getByText('at src/lib.rs:2:5')).toBeInTheDocument();
    expect(screen.getByText('<T>', { exact: false })).toBeInTheDocument();
    expect(container.querySelector('[data-line="2"]')).toHaveClass('bg-yellow-900/40');
    expect(container.querySelector('[data-line="1"]')).not.toHaveClass('bg-yellow-900/40');
  });
});
