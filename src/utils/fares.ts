/**
 * Fare family helpers
 */

import type { FareFamilyOffer, FareInclusions, Flight } from '../types';
import { formatMoney } from './money';

export type FareFamilyCode = 'BASIC' | 'PLUS' | 'MAX';

export const FARE_FAMILY_NAMES: Record<FareFamilyCode, string> = {
  BASIC: 'Basic',
  PLUS: 'Plus',
  MAX: 'Max',
};

export interface FareOption {
  code: string;
  family: FareFamilyCode;
  displayName: string;
  priceMinor: number;
  priceFormatted: string;
  currency: string;
  inclusions: string[];
}

/**
 * Map a backend fare code (including legacy aliases) onto a fare family.
 * Unknown codes fall back to BASIC.
 */
export function fareFamilyFromCode(code: string): FareFamilyCode {
  switch (code.trim().toUpperCase()) {
    case 'PLUS':
    case 'VALUE':
    case 'BASIC_PLUS':
      return 'PLUS';
    case 'MAX':
    case 'FLEX':
      return 'MAX';
    default:
      return 'BASIC';
  }
}

export function buildInclusions(inclusions: FareInclusions): string[] {
  const list = [`Carry-on: ${inclusions.carryOnBag}`];
  if (inclusions.checkedBag) list.push(`Checked bag: ${inclusions.checkedBag}`);
  list.push(`Seat: ${inclusions.seatSelection}`);
  if (inclusions.priorityBoarding) list.push('Priority boarding');
  if (inclusions.loungeAccess) list.push('Lounge access');
  return list;
}

function toFareOption(offer: FareFamilyOffer): FareOption {
  const family = fareFamilyFromCode(offer.code);
  return {
    code: offer.code,
    family,
    displayName: offer.name || FARE_FAMILY_NAMES[family],
    priceMinor: offer.priceMinor,
    priceFormatted: offer.priceFormatted || formatMoney(offer.priceMinor, offer.currency),
    currency: offer.currency,
    inclusions: buildInclusions(offer.inclusions),
  };
}

export function toFareOptions(flight: Flight): FareOption[] {
  return flight.fareFamilies.map(toFareOption);
}

export function findOffer(flight: Flight, fareCode: string): FareFamilyOffer | undefined {
  return flight.fareFamilies.find((offer) => offer.code === fareCode);
}

export function lowestFare(flight: Flight): FareFamilyOffer | undefined {
  return flight.fareFamilies.reduce<FareFamilyOffer | undefined>(
    (lowest, offer) => (!lowest || offer.priceMinor < lowest.priceMinor ? offer : lowest),
    undefined
  );
}

export function flightDuration(flight: Flight): string {
  if (flight.durationFormatted) return flight.durationFormatted;
  const hours = Math.floor(flight.durationMinutes / 60);
  const minutes = flight.durationMinutes % 60;
  return `${hours}h ${minutes}m`;
}

/**
 * "2025-12-10T09:05:00" -> "09:05"
 */
export function formatFlightTime(dateTime: string): string {
  const timePart = dateTime.includes('T') ? dateTime.split('T')[1] : dateTime;
  return timePart.slice(0, 5);
}
