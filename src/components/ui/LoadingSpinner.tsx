/**
 * Loading Spinner Component
 */

interface LoadingSpinnerProps {
  message?: string;
  size?: 'small' | 'medium' | 'large';
}

export default function LoadingSpinner({
  message,
  size = 'medium',
}: LoadingSpinnerProps) {
  return (
    <div
      className={`loading-spinner loading-spinner--${size}`}
      role="status"
      aria-label={message ?? 'Loading'}
    >
      <div className="spinner" aria-hidden="true" />
      {message && <p className="loading-message">{message}</p>}
    </div>
  );
}
