import React from 'react';
import { render, screen, fireEvent } from '@testing-library/react';
import '@testing-library/jest-dom';
import { VersionPath } from '../../src/domain/version-path';
import type { StepControls } from '../../src/execution/ancestry';
import { StepControlsView } from '../../src/react/step-controls';

const into = { executionId: 'E_1.0', versionPath: VersionPath.of(3, 0) };
const start = { executionId: 'E_1', versionPath: VersionPath.of(2), isCurrent: true };

describe('StepControlsView', () => {
  it('renders enabled steps as buttons and disabled ones as spans', () => {
    const controls: StepControls = { stepOut: { type: 'disabled' }, stepInto: into };
    render(<StepControlsView controls={controls} onNavigate={jest.fn()} />);

    expect(screen.getByRole('button', { name: 'Step Into' })).toBeInTheDocument();
    expect(screen.queryByRole('button', { name: 'Step Out' })).not.toBeInTheDocument();
    expect(screen.getByText('Step Out')).toHaveAttribute('aria-disabled', 'true');
    expect(screen.getByText('Step Prev')).toHaveAttribute('aria-disabled', 'true');
    expect(screen.getByText('Step Next')).toHaveAttribute('aria-disabled', 'true');
  });

  it('hands the clicked target to onNavigate', () => {
    const onNavigate = jest.fn();
    const controls: StepControls = { stepOut: { type: 'disabled' }, stepInto: into };
    render(<StepControlsView controls={controls} onNavigate={onNavigate} />);

    fireEvent.click(screen.getByRole('button', { name: 'Step Into' }));
    expect(onNavigate).toHaveBeenCalledWith(into);
  });

  it('splits Step Out into start and end', () => {
    const onNavigate = jest.fn();
    const controls: StepControls = { stepOut: { type: 'startEnd', start } };
    render(<StepControlsView controls={controls} onNavigate={onNavigate} />);

    fireEvent.click(screen.getByRole('button', { name: 'Step Out (Start)' }));
    expect(onNavigate).toHaveBeenCalledWith(start);
    expect(screen.getByText('Step Out (End)')).toHaveAttribute('aria-disabled', 'true');
  });

  it('offers a single Step Out target', () => {
    const onNavigate = jest.fn();
    const target = { executionId: 'E_1', versionPath: VersionPath.of(3) };
    render(
      <StepControlsView controls={{ stepOut: { type: 'single', target } }} onNavigate={onNavigate} />,
    );

    fireEvent.click(screen.getByRole('button', { name: 'Step Out' }));
    expect(onNavigate).toHaveBeenCalledWith(target);
  });
});
