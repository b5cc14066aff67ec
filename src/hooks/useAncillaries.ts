/**
 * useAncillaries Hook
 * Extra baggage, meals and priority boarding before payment
 */

import { useState } from 'react';
import { useBooking } from '../context/BookingContext';
import {
  ancillariesTotal,
  toSelectedAncillaries,
  type AncillarySelection,
} from '../utils/ancillaries';

const BOOKING_UNAVAILABLE = 'Booking information not available';

export function useAncillaries() {
  const { selectedFlight, passengers, ancillaries, priceSummary, setAncillaries } = useBooking();

  const [selection, setSelection] = useState<AncillarySelection>(() => ({
    baggage: ancillaries?.baggage ?? {},
    meals: ancillaries?.meals ?? {},
    priorityBoarding: ancillaries?.priorityBoarding ?? false,
  }));
  const [error, setError] = useState<string | null>(
    selectedFlight && passengers.length > 0 ? null : BOOKING_UNAVAILABLE
  );

  const ancillariesTotalMinor = ancillariesTotal(selection);
  const fareTotalMinor = priceSummary?.fareTotalMinor ?? 0;

  const confirm = (): boolean => {
    if (!selectedFlight || passengers.length === 0) {
      setError(BOOKING_UNAVAILABLE);
      return false;
    }
    setAncillaries(toSelectedAncillaries(passengers, selection, selectedFlight.currency));
    return true;
  };

  return {
    passengers,
    selection,
    currency: selectedFlight?.currency ?? '',
    fareTotalMinor,
    ancillariesTotalMinor,
    grandTotalMinor: fareTotalMinor + ancillariesTotalMinor,
    error,
    selectBaggage: (passengerId: string, weight: number) =>
      setSelection((prev) => ({ ...prev, baggage: { ...prev.baggage, [passengerId]: weight } })),
    selectMeal: (passengerId: string, code: string) =>
      setSelection((prev) => ({ ...prev, meals: { ...prev.meals, [passengerId]: code } })),
    togglePriorityBoarding: () =>
      setSelection((prev) => ({ ...prev, priorityBoarding: !prev.priorityBoarding })),
    confirm,
  };
}
