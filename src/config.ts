/**
 * Runtime configuration
 * Values come from Vite env variables (see .env.example)
 */

export const API_BASE_URL = import.meta.env.VITE_API_URL || 'http://localhost:8080';

export const API_PREFIX = '/api/v1';

export const REQUEST_TIMEOUT_MS = 30000;

export const DEFAULT_CURRENCY = import.meta.env.VITE_DEFAULT_CURRENCY || 'SAR';

export const MAX_CHAT_MESSAGE_LENGTH = 500;

export const ROUTE_CACHE_TTL_MS = 24 * 60 * 60 * 1000;

export const MAX_SEARCH_HISTORY = 10;
