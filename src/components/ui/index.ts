/**
 * UI Components exports
 */

export { default as LoadingSpinner } from './LoadingSpinner';
export { default as ErrorBanner } from './ErrorBanner';
