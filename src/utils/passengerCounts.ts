/**
 * Passenger count rules
 * At most 9 travellers per booking, at least one adult, one lap infant per adult.
 */

import type { PassengerCounts } from '../types';

export const MAX_PASSENGERS = 9;
export const MAX_CHILDREN = 8;

export const DEFAULT_PASSENGER_COUNTS: PassengerCounts = { adults: 1, children: 0, infants: 0 };

const clamp = (value: number, min: number, max: number) => Math.min(Math.max(value, min), max);

export function incrementAdults(counts: PassengerCounts): PassengerCounts {
  if (counts.adults + 1 > MAX_PASSENGERS - counts.children) return counts;
  return { ...counts, adults: counts.adults + 1 };
}

/**
 * Never below one adult, nor below the number of infants they carry.
 */
export function decrementAdults(counts: PassengerCounts): PassengerCounts {
  return { ...counts, adults: Math.max(counts.adults - 1, 1, counts.infants) };
}

export function incrementChildren(counts: PassengerCounts): PassengerCounts {
  const max = clamp(MAX_PASSENGERS - counts.adults - counts.infants, 0, MAX_CHILDREN);
  if (counts.children + 1 > max) return counts;
  return { ...counts, children: counts.children + 1 };
}

export function decrementChildren(counts: PassengerCounts): PassengerCounts {
  return { ...counts, children: Math.max(counts.children - 1, 0) };
}

export function incrementInfants(counts: PassengerCounts): PassengerCounts {
  const max = Math.min(counts.adults, MAX_PASSENGERS - counts.adults - counts.children);
  if (counts.infants + 1 > max) return counts;
  return { ...counts, infants: counts.infants + 1 };
}

export function decrementInfants(counts: PassengerCounts): PassengerCounts {
  return { ...counts, infants: Math.max(counts.infants - 1, 0) };
}

export function normalizePassengerCounts(
  adults: number,
  children: number,
  infants: number
): PassengerCounts {
  const safeAdults = clamp(adults, 1, MAX_PASSENGERS);
  return {
    adults: safeAdults,
    children: clamp(children, 0, MAX_CHILDREN),
    infants: clamp(infants, 0, safeAdults),
  };
}

export function totalPassengers(counts: PassengerCounts): number {
  return counts.adults + counts.children + counts.infants;
}
