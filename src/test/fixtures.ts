/**
 * Shared test data
 */

import type {
  BookingConfirmation,
  FareInclusions,
  Flight,
  SearchCriteria,
  Station,
} from '../types';

export const RUH: Station = { code: 'RUH', name: 'King Khalid International', city: 'Riyadh', country: 'SA' };
export const JED: Station = { code: 'JED', name: 'King Abdulaziz International', city: 'Jeddah', country: 'SA' };
export const DMM: Station = { code: 'DMM', name: 'King Fahd International', city: 'Dammam', country: 'SA' };

export const STATIONS: Station[] = [RUH, JED, DMM];

export const ROUTES: Record<string, string[]> = {
  RUH: ['JED', 'DMM'],
  JED: ['RUH'],
  DMM: ['JED'],
};

export const INCLUSIONS: FareInclusions = {
  carryOnBag: '7 kg',
  checkedBag: null,
  seatSelection: 'Paid',
  changePolicy: 'Fee applies',
  cancellationPolicy: 'Non-refundable',
  priorityBoarding: false,
  loungeAccess: false,
};

export const FLIGHT: Flight = {
  flightNumber: 'FA101',
  origin: 'RUH',
  destination: 'JED',
  departureTime: '2025-12-10T09:00:00',
  arrivalTime: '2025-12-10T11:00:00',
  durationMinutes: 120,
  durationFormatted: '2h 0m',
  aircraft: 'A320',
  fareFamilies: [
    { code: 'BASIC', name: 'Basic', priceMinor: 45000, priceFormatted: 'SAR 450.00', currency: 'SAR', inclusions: INCLUSIONS },
    {
      code: 'FLEX',
      name: 'Flex',
      priceMinor: 90000,
      priceFormatted: 'SAR 900.00',
      currency: 'SAR',
      inclusions: { ...INCLUSIONS, checkedBag: '23 kg', priorityBoarding: true },
    },
  ],
};

export const CRITERIA: SearchCriteria = {
  origin: RUH,
  destination: JED,
  departureDate: '2025-12-10',
  passengers: { adults: 1, children: 0, infants: 0 },
};

export const CONFIRMATION: BookingConfirmation = {
  pnr: 'ABC123',
  bookingReference: 'REF-1',
  status: 'CONFIRMED',
  totalPaidMinor: 45000,
  totalPaidFormatted: 'SAR 450.00',
  currency: 'SAR',
  createdAt: '2025-01-15T10:00:00Z',
};
