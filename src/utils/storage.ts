/**
 * localStorage persistence
 * Values are JSON; anything unreadable falls back to the default.
 */

import { MAX_SEARCH_HISTORY, ROUTE_CACHE_TTL_MS } from '../config';
import {
  STORAGE_KEYS,
  type RouteCache,
  type SavedBooking,
  type SearchHistoryEntry,
  type StorageKey,
} from '../types';

// =============================================================================
// Generic read/write
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readJson<T>(
  key: StorageKey,
  isValid: (value: unknown) => value is T,
  fallback: T
): T {
  const stored = localStorage.getItem(key);
  if (!stored) return fallback;

  try {
    const parsed: unknown = JSON.parse(stored);
    if (isValid(parsed)) return parsed;
    console.warn(`Ignoring malformed data in ${key}`);
  } catch (error) {
    console.warn(`Failed to read ${key}:`, error);
  }
  return fallback;
}

export function writeJson(key: StorageKey, value: unknown): void {
  localStorage.setItem(key, JSON.stringify(value));
}

// =============================================================================
// Saved bookings
// =============================================================================

function isSavedBooking(value: unknown): value is SavedBooking {
  return (
    isRecord(value) &&
    typeof value.pnr === 'string' &&
    typeof value.status === 'string' &&
    typeof value.totalPaidMinor === 'number' &&
    typeof value.currency === 'string'
  );
}

function isSavedBookingList(value: unknown): value is SavedBooking[] {
  return Array.isArray(value) && value.every(isSavedBooking);
}

export function loadSavedBookings(): SavedBooking[] {
  return readJson(STORAGE_KEYS.SAVED_BOOKINGS, isSavedBookingList, []);
}

export function storeSavedBookings(bookings: SavedBooking[]): void {
  writeJson(STORAGE_KEYS.SAVED_BOOKINGS, bookings);
}

/**
 * Replace any booking with the same PNR, newest last
 */
export function upsertBooking(bookings: SavedBooking[], booking: SavedBooking): SavedBooking[] {
  return [...bookings.filter((b) => b.pnr !== booking.pnr), booking];
}

// =============================================================================
// Search history
// =============================================================================

function isSearchHistoryEntry(value: unknown): value is SearchHistoryEntry {
  return (
    isRecord(value) &&
    typeof value.origin === 'string' &&
    typeof value.destination === 'string' &&
    typeof value.departureDate === 'string' &&
    isRecord(value.passengers) &&
    typeof value.passengers.adults === 'number' &&
    typeof value.passengers.children === 'number' &&
    typeof value.passengers.infants === 'number'
  );
}

function isSearchHistory(value: unknown): value is SearchHistoryEntry[] {
  return Array.isArray(value) && value.every(isSearchHistoryEntry);
}

export function loadSearchHistory(): SearchHistoryEntry[] {
  return readJson(STORAGE_KEYS.SEARCH_HISTORY, isSearchHistory, []);
}

/**
 * Put the entry first, drop older copies of the same search, keep the list short.
 */
export function addSearchToHistory(entry: SearchHistoryEntry): SearchHistoryEntry[] {
  const updated = [
    entry,
    ...loadSearchHistory().filter(
      (e) =>
        !(
          e.origin === entry.origin &&
          e.destination === entry.destination &&
          e.departureDate === entry.departureDate
        )
    ),
  ].slice(0, MAX_SEARCH_HISTORY);

  writeJson(STORAGE_KEYS.SEARCH_HISTORY, updated);
  return updated;
}

// =============================================================================
// Route cache
// =============================================================================

function isRouteCache(value: unknown): value is RouteCache {
  return (
    isRecord(value) &&
    isRecord(value.routes) &&
    Array.isArray(value.stations) &&
    typeof value.cachedAt === 'number'
  );
}

/**
 * Cached stations and routes, or null when absent or older than a day
 */
export function loadRouteCache(now: number = Date.now()): RouteCache | null {
  const cache = readJson<RouteCache | null>(
    STORAGE_KEYS.ROUTE_CACHE,
    (value): value is RouteCache | null => value === null || isRouteCache(value),
    null
  );
  if (!cache || now - cache.cachedAt >= ROUTE_CACHE_TTL_MS) return null;
  return cache;
}

export function storeRouteCache(cache: RouteCache): void {
  writeJson(STORAGE_KEYS.ROUTE_CACHE, cache);
}
