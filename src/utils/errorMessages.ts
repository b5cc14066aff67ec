/**
 * Error Message Mapper
 * Turns API error codes into titles and messages a traveller can act on
 */

import { ApiError } from '../api/client';
import type { UserFriendlyError } from '../types';

const GENERIC_MESSAGE = 'An unexpected error occurred. Please try again.';

function friendly(
  title: string,
  message: string,
  isRetryable: boolean,
  suggestion: string | null = null
): UserFriendlyError {
  return { title, message, isRetryable, suggestion };
}

function mentions(message: string, ...words: string[]): boolean {
  const lower = message.toLowerCase();
  return words.every((w) => lower.includes(w));
}

/**
 * Strip stack frames and error-class prefixes from a raw message.
 */
export function sanitizeErrorMessage(message: string): string {
  const sanitized = message
    .replace(/\bat\s+[^\n]*?\([^)]*\)/g, '')
    .replace(/\b\w*(?:Error|Exception):?\s*/g, '')
    .replace(/\s+/g, ' ')
    .trim();

  if (sanitized.length < 10 || /null|undefined/i.test(sanitized)) {
    return GENERIC_MESSAGE;
  }
  return sanitized.slice(0, 200);
}

function parseValidationError(message: string): string {
  if (mentions(message, 'passenger', 'required')) {
    return 'Please enter all required passenger information.';
  }
  if (mentions(message, 'date', 'invalid')) return 'Please select a valid date.';
  if (mentions(message, 'email')) return 'Please enter a valid email address.';
  if (mentions(message, 'phone')) return 'Please enter a valid phone number.';
  if (mentions(message, 'document')) return 'Please enter valid document information.';
  return sanitizeErrorMessage(message);
}

function parsePaymentError(message: string): string {
  if (mentions(message, 'declined')) {
    return 'Your card was declined. Please try a different card.';
  }
  if (mentions(message, 'insufficient')) {
    return 'Insufficient funds. Please try a different card.';
  }
  if (mentions(message, 'expired')) {
    return 'Your card has expired. Please use a valid card.';
  }
  if (mentions(message, 'cvv') || mentions(message, 'cvc')) {
    return 'Invalid security code. Please check and try again.';
  }
  if (mentions(message, 'number')) {
    return 'Invalid card number. Please check and try again.';
  }
  return 'Payment could not be processed. Please check your card details.';
}

export function mapApiError(error: ApiError): UserFriendlyError {
  const { code, message } = error;

  switch (code) {
    case 'NETWORK_ERROR':
      return friendly(
        'Connection Error',
        'Unable to connect to the server. Please check your internet connection and try again.',
        true,
        'Check your WiFi or mobile data connection'
      );
    case 'TIMEOUT':
      return friendly(
        'Request Timed Out',
        'The server took too long to respond. Please try again.',
        true,
        'This might be due to a slow connection'
      );
    case 'HTTP_400':
    case 'VALIDATION_ERROR':
      return friendly(
        'Invalid Request',
        parseValidationError(message),
        false,
        'Please check your input and try again'
      );
    case 'HTTP_401':
    case 'UNAUTHORIZED':
      return friendly(
        'Session Expired',
        'Your session has expired. Please start a new search.',
        false,
        'Return to the search page to continue'
      );
    case 'HTTP_403':
    case 'FORBIDDEN':
      return friendly(
        'Access Denied',
        "You don't have permission to perform this action.",
        false
      );
    case 'HTTP_404':
    case 'NOT_FOUND':
      return friendly(
        'Not Found',
        'The requested resource was not found.',
        false,
        'The flight or booking may no longer be available'
      );
    case 'HTTP_429':
      return friendly(
        'Too Many Requests',
        "You're making requests too quickly. Please wait a moment.",
        true,
        'Wait 30 seconds before trying again'
      );
    case 'SEARCH_EXPIRED':
      return friendly(
        'Search Expired',
        'Your search session has expired. Please search again for current availability.',
        false,
        'Flight prices and availability may have changed'
      );
    case 'FLIGHT_NOT_FOUND':
      return friendly(
        'Flight Unavailable',
        'The selected flight is no longer available.',
        false,
        'Please search again for available flights'
      );
    case 'FARE_NOT_FOUND':
      return friendly(
        'Fare Unavailable',
        'The selected fare is no longer available at this price.',
        false,
        'Please select a different fare option'
      );
    case 'BOOKING_ERROR':
    case 'BOOKING_FAILED':
      return friendly(
        'Booking Failed',
        "We couldn't complete your booking. No payment has been charged.",
        true,
        'Please try again or contact support if the problem persists'
      );
    case 'PAYMENT_ERROR':
      return friendly(
        'Payment Failed',
        parsePaymentError(message),
        true,
        'Please check your card details and try again'
      );
    case 'INVALID_ROUTE':
      return friendly(
        'Invalid Route',
        'This route is not available. Please select a different destination.',
        false,
        'Check our available destinations'
      );
  }

  if (code === 'SERVER_ERROR' || code.startsWith('SERVER_ERROR_')) {
    return friendly(
      'Server Error',
      "Something went wrong on our end. We're working to fix it.",
      true,
      'Please try again in a few moments'
    );
  }

  if (code === 'ERROR' && mentions(message, 'parse')) {
    return friendly(
      'Data Error',
      'There was a problem processing the response. Please try again.',
      true
    );
  }

  return friendly(
    'Something Went Wrong',
    sanitizeErrorMessage(message),
    error.isRetryable,
    error.isRetryable ? 'Please try again' : null
  );
}

/**
 * Map any thrown value to a user-friendly error
 */
export function toUserFriendly(error: unknown): UserFriendlyError {
  if (error instanceof ApiError) return mapApiError(error);
  const message = error instanceof Error ? error.message : '';
  return friendly('Something Went Wrong', sanitizeErrorMessage(message), false);
}

export function toDisplayMessage(error: unknown): string {
  return toUserFriendly(error).message;
}

/**
 * Message plus suggestion, separated by a blank line
 */
export function getFullMessage(error: unknown): string {
  const mapped = toUserFriendly(error);
  return mapped.suggestion ? `${mapped.message}\n\n${mapped.suggestion}` : mapped.message;
}

/**
 * Short form for toasts: "Title: first 50 chars..."
 */
export function getShortMessage(error: unknown): string {
  const mapped = toUserFriendly(error);
  const truncated = mapped.message.length > 50 ? '...' : '';
  return `${mapped.title}: ${mapped.message.slice(0, 50)}${truncated}`;
}
