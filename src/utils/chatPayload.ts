/**
 * Chat card payloads
 * The assistant attaches a JSON string (uiData) to some replies. Parsing is
 * lenient: malformed data yields an empty card, never an exception.
 */

import type { BookingSummaryInfo, ParsedFlight } from '../types/chat';

const MONTHS: Record<string, string> = {
  '01': 'Jan',
  '02': 'Feb',
  '03': 'Mar',
  '04': 'Apr',
  '05': 'May',
  '06': 'Jun',
  '07': 'Jul',
  '08': 'Aug',
  '09': 'Sep',
  '10': 'Oct',
  '11': 'Nov',
  '12': 'Dec',
};

const ARABIC_RANGES: ReadonlyArray<[number, number]> = [
  [0x0600, 0x06ff],
  [0x0750, 0x077f],
  [0x08a0, 0x08ff],
  [0xfb50, 0xfdff],
  [0xfe70, 0xfeff],
];

// =============================================================================
// JSON helpers
// =============================================================================

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseObject(uiData: string | null | undefined): JsonObject | null {
  if (!uiData || !uiData.trim()) return null;
  try {
    const parsed: unknown = JSON.parse(uiData);
    return isJsonObject(parsed) ? parsed : null;
  } catch (error) {
    console.warn('Failed to parse chat card data:', error);
    return null;
  }
}

function stringField(obj: JsonObject, key: string): string | undefined {
  const value = obj[key];
  return typeof value === 'string' ? value : undefined;
}

function numberField(obj: JsonObject, key: string): number {
  const value = obj[key];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  return 0;
}

// =============================================================================
// Display formatting
// =============================================================================

/**
 * "2025-12-10T09:00:00" -> "09:00", "09:00:00" -> "09:00"
 */
export function formatTimeForDisplay(time: string): string {
  const index = time.indexOf('T');
  const timePart = index >= 0 ? time.slice(index + 1) : time;
  return timePart.slice(0, 5);
}

/**
 * "2025-12-10" -> "Dec 10"; other shapes are returned unchanged.
 */
export function formatDateForDisplay(date: string): string {
  const parts = date.split('-');
  if (parts.length !== 3) return date;

  const month = MONTHS[parts[1]] ?? parts[1];
  const day = /^\d+$/.test(parts[2]) ? String(Number(parts[2])) : parts[2];
  return `${month} ${day}`;
}

// =============================================================================
// Card parsers
// =============================================================================

/**
 * Expected shape:
 * {"date": "2025-12-10", "flights": [{"flightNumber": "FA101", "departureTime": "09:00", "lowestPrice": 450, "currency": "SAR"}]}
 */
export function parseFlightList(uiData: string | null | undefined): ParsedFlight[] {
  const root = parseObject(uiData);
  if (!root) return [];

  const flights = root.flights;
  if (!Array.isArray(flights)) return [];

  const rootDate = stringField(root, 'date');
  const date = rootDate !== undefined ? formatDateForDisplay(rootDate) : '';

  const parsed: ParsedFlight[] = [];
  for (const item of flights) {
    if (!isJsonObject(item)) continue;
    const flightNumber = stringField(item, 'flightNumber');
    if (flightNumber === undefined) continue;

    const departureTime = stringField(item, 'departureTime');
    const currency = stringField(item, 'currency') ?? 'SAR';
    parsed.push({
      flightNumber,
      departureTime: departureTime !== undefined ? formatTimeForDisplay(departureTime) : '',
      date,
      price: `${currency} ${Math.trunc(numberField(item, 'lowestPrice'))}`,
    });
  }
  return parsed;
}

export function parseBookingSummary(uiData: string | null | undefined): BookingSummaryInfo | null {
  const root = parseObject(uiData);
  if (!root) return null;

  return {
    pnr: stringField(root, 'pnr') ?? '',
    flightNumber: stringField(root, 'flightNumber') ?? '',
    origin: stringField(root, 'origin') ?? '',
    destination: stringField(root, 'destination') ?? '',
    dateTime: stringField(root, 'dateTime') ?? '',
  };
}

// =============================================================================
// Text helpers
// =============================================================================

function isArabicCode(code: number): boolean {
  return ARABIC_RANGES.some(([start, end]) => code >= start && code <= end);
}

export function containsArabic(text: string): boolean {
  for (let i = 0; i < text.length; i++) {
    if (isArabicCode(text.charCodeAt(i))) return true;
  }
  return false;
}

/**
 * Drop emoji and other symbols outside Latin, Arabic and general punctuation.
 * Works on UTF-16 code units, so astral characters lose both halves.
 */
export function stripEmojis(text: string): string {
  let result = '';
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code < 0x2000 || isArabicCode(code) || (code >= 0x2000 && code <= 0x206f)) {
      result += text[i];
    }
  }
  return result;
}
