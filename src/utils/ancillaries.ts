/**
 * Ancillary catalogue and totals
 */

import type {
  AncillaryPayload,
  BaggageOption,
  MealOption,
  PassengerInfo,
  SelectedAncillaries,
} from '../types';
import { toMinorUnits } from './money';

export const BAGGAGE_OPTIONS: BaggageOption[] = [
  { weight: 0, priceMinor: 0, label: 'No checked bag' },
  { weight: 20, priceMinor: toMinorUnits(75), label: '20 kg' },
  { weight: 25, priceMinor: toMinorUnits(100), label: '25 kg' },
  { weight: 30, priceMinor: toMinorUnits(125), label: '30 kg' },
  { weight: 32, priceMinor: toMinorUnits(150), label: '32 kg' },
];

export const MEAL_OPTIONS: MealOption[] = [
  { code: 'NONE', name: 'No meal', priceMinor: 0 },
  { code: 'MOML', name: 'Arabic meal', priceMinor: toMinorUnits(35) },
  { code: 'CHML', name: 'Child meal', priceMinor: toMinorUnits(35) },
  { code: 'VGML', name: 'Vegetarian meal', priceMinor: toMinorUnits(35) },
  { code: 'BBML', name: 'Baby meal', priceMinor: toMinorUnits(25) },
];

export const PRIORITY_BOARDING_PRICE_MINOR = toMinorUnits(35);

export function baggagePrice(weight: number): number {
  return BAGGAGE_OPTIONS.find((o) => o.weight === weight)?.priceMinor ?? 0;
}

export function mealPrice(code: string): number {
  return MEAL_OPTIONS.find((o) => o.code === code)?.priceMinor ?? 0;
}

export interface AncillarySelection {
  baggage: Record<string, number>;
  meals: Record<string, string>;
  priorityBoarding: boolean;
}

export function ancillariesTotal(selection: AncillarySelection): number {
  const bags = Object.values(selection.baggage).reduce((sum, w) => sum + baggagePrice(w), 0);
  const meals = Object.values(selection.meals).reduce((sum, c) => sum + mealPrice(c), 0);
  return bags + meals + (selection.priorityBoarding ? PRIORITY_BOARDING_PRICE_MINOR : 0);
}

/**
 * Line items sent with the booking; free selections are left out.
 */
export function buildAncillaryItems(
  passengers: PassengerInfo[],
  selection: AncillarySelection,
  currency: string
): AncillaryPayload[] {
  const items: AncillaryPayload[] = [];

  passengers.forEach((passenger, index) => {
    const weight = selection.baggage[passenger.id] ?? 0;
    if (weight > 0) {
      items.push({ type: `BAGGAGE_${weight}KG`, passengerIndex: index, priceMinor: baggagePrice(weight), currency });
    }

    const meal = selection.meals[passenger.id] ?? 'NONE';
    if (meal !== 'NONE') {
      items.push({ type: `MEAL_${meal}`, passengerIndex: index, priceMinor: mealPrice(meal), currency });
    }
  });

  if (selection.priorityBoarding) {
    items.push({
      type: 'PRIORITY_BOARDING',
      passengerIndex: 0,
      priceMinor: PRIORITY_BOARDING_PRICE_MINOR,
      currency,
    });
  }

  return items;
}

export function toSelectedAncillaries(
  passengers: PassengerInfo[],
  selection: AncillarySelection,
  currency: string
): SelectedAncillaries {
  return {
    ...selection,
    items: buildAncillaryItems(passengers, selection, currency),
    ancillariesTotalMinor: ancillariesTotal(selection),
  };
}
