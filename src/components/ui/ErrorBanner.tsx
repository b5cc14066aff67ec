/**
 * Error Banner Component
 * Inline error with optional retry and dismiss actions
 */

import { useTranslation } from 'react-i18next';

interface ErrorBannerProps {
  message: string;
  onRetry?: () => void;
  onDismiss?: () => void;
}

export default function ErrorBanner({ message, onRetry, onDismiss }: ErrorBannerProps) {
  const { t } = useTranslation();

  return (
    <div className="error-banner" role="alert">
      <p className="error-banner__message">{message}</p>
      <div className="error-banner__actions">
        {onRetry && (
          <button type="button" className="secondary-btn" onClick={onRetry}>
            {t('common.retry')}
          </button>
        )}
        {onDismiss && (
          <button
            type="button"
            className="icon-btn"
            onClick={onDismiss}
            aria-label={t('common.dismiss')}
          >
            ×
          </button>
        )}
      </div>
    </div>
  );
}
