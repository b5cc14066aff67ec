/**
 * ErrorBanner Component Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { render, screen } from '@testing-library/react';
import userEvent from '@testing-library/user-event';
import ErrorBanner from './ErrorBanner';

describe('ErrorBanner', () => {
  it('shows the message as an alert', () => {
    render(<ErrorBanner message="Request Timed Out" />);
    expect(screen.getByRole('alert')).toHaveTextContent('Request Timed Out');
  });

  it('hides actions that have no handler', () => {
    render(<ErrorBanner message="Oops, something broke" />);
    expect(screen.queryByRole('button')).not.toBeInTheDocument();
  });

  it('calls onRetry and onDismiss', async () => {
    const user = userEvent.setup();
    const onRetry = vi.fn();
    const onDismiss = vi.fn();
    render(<ErrorBanner message="Server Error" onRetry={onRetry} onDismiss={onDismiss} />);

    await user.click(screen.getByText('Try again'));
    await user.click(screen.getByLabelText('Dismiss'));

    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onDismiss).toHaveBeenCalledTimes(1);
  });
});
