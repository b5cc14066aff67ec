/**
 * SkyFare - TypeScript Type Definitions
 * Single source of truth for booking data models
 */

// =============================================================================
// Primitives
// =============================================================================

export type PassengerType = 'ADULT' | 'CHILD' | 'INFANT';

export type DocumentType = 'PASSPORT' | 'NATIONAL_ID' | 'IQAMA';

export type BookingStep =
  | 'search'
  | 'results'
  | 'passengers'
  | 'ancillaries'
  | 'payment'
  | 'confirmation';

export const BOOKING_STEPS: BookingStep[] = [
  'search',
  'results',
  'passengers',
  'ancillaries',
  'payment',
  'confirmation',
];

// =============================================================================
// Stations & Routes
// =============================================================================

export interface Station {
  code: string;     // IATA code, e.g. "RUH"
  name: string;
  city: string;
  country: string;
}

export interface RouteMap {
  routes: Record<string, string[]>;  // origin code -> destination codes
}

// =============================================================================
// Search
// =============================================================================

export interface PassengerCounts {
  adults: number;
  children: number;
  infants: number;
}

export interface FlightSearchRequest {
  origin: string;
  destination: string;
  departureDate: string;  // YYYY-MM-DD
  passengers: PassengerCounts;
}

export interface FlightSearchResponse {
  flights: Flight[];
  searchId: string;
}

export interface SearchCriteria {
  origin: Station;
  destination: Station;
  departureDate: string;
  passengers: PassengerCounts;
}

// =============================================================================
// Flights & Fares
// =============================================================================

export interface FareInclusions {
  carryOnBag: string;
  checkedBag?: string | null;
  seatSelection: string;
  changePolicy: string;
  cancellationPolicy: string;
  priorityBoarding: boolean;
  loungeAccess: boolean;
}

export interface FareFamilyOffer {
  code: string;
  name: string;
  priceMinor: number;
  priceFormatted: string;
  currency: string;
  inclusions: FareInclusions;
}

export interface Flight {
  flightNumber: string;
  origin: string;
  destination: string;
  departureTime: string;  // ISO local datetime
  arrivalTime: string;
  durationMinutes: number;
  durationFormatted: string;
  aircraft: string;
  fareFamilies: FareFamilyOffer[];
}

export interface SelectedFlight {
  flight: Flight;
  fareFamily: string;  // offer code
  priceMinor: number;  // per passenger
  priceFormatted: string;
  currency: string;
}

// =============================================================================
// Passengers
// =============================================================================

export interface PassengerInfo {
  id: string;  // adult_0, child_1, ...
  type: PassengerType;
  title: string;
  firstName: string;
  lastName: string;
  dateOfBirth: string;  // YYYY-MM-DD
  nationality: string;
  documentType: DocumentType;
  documentNumber: string;
  documentExpiry: string;
  email: string;
  phone: string;
}

export type PassengerField = Exclude<keyof PassengerInfo, 'id' | 'type' | 'documentType'>;

export interface PassengerForm extends PassengerInfo {
  label: string;
}

// =============================================================================
// Ancillaries
// =============================================================================

export interface BaggageOption {
  weight: number;  // kg, 0 = no checked bag
  priceMinor: number;
  label: string;
}

export interface MealOption {
  code: string;
  name: string;
  priceMinor: number;
}

export interface SelectedAncillaries {
  baggage: Record<string, number>;  // passengerId -> weight
  meals: Record<string, string>;    // passengerId -> meal code
  priorityBoarding: boolean;
  items: AncillaryPayload[];
  ancillariesTotalMinor: number;
}

// =============================================================================
// Booking
// =============================================================================

export interface PassengerPayload {
  type: PassengerType;
  title: string;
  firstName: string;
  lastName: string;
  dateOfBirth: string;
  nationality: string;
  documentType: DocumentType;
  documentNumber: string;
  documentExpiry: string;
}

export interface AncillaryPayload {
  type: string;  // BAGGAGE_20KG, MEAL_VGML, PRIORITY_BOARDING
  passengerIndex: number;
  priceMinor: number;
  currency: string;
}

export interface PaymentPayload {
  cardholderName: string;
  cardNumberLast4: string;
  totalAmountMinor: number;
  currency: string;
}

export interface BookingRequest {
  searchId: string;
  flightNumber: string;
  fareFamily: string;
  passengers: PassengerPayload[];
  ancillaries: AncillaryPayload[];
  contactEmail: string;
  contactPhone: string;
  payment: PaymentPayload;
}

export interface BookingConfirmation {
  pnr: string;
  bookingReference: string;
  status: string;
  totalPaidMinor: number;
  totalPaidFormatted: string;
  currency: string;
  createdAt: string;
}

export interface SavedBooking extends BookingConfirmation {
  flightNumber: string;
  origin: string;
  destination: string;
  departureTime: string;
  passengerCount: number;
  primaryPassengerName: string;
  savedAt: string;
}

export interface PriceSummary {
  passengerCount: number;
  farePerPassengerMinor: number;
  fareTotalMinor: number;
  ancillariesTotalMinor: number;
  grandTotalMinor: number;
  currency: string;
}

// =============================================================================
// Local persistence
// =============================================================================

export interface SearchHistoryEntry {
  origin: string;
  destination: string;
  departureDate: string;
  passengers: PassengerCounts;
  searchedAt: string;
}

export interface RouteCache {
  routes: Record<string, string[]>;
  stations: Station[];
  cachedAt: number;  // epoch ms
}

// =============================================================================
// UI State Types
// =============================================================================

export interface UserFriendlyError {
  title: string;
  message: string;
  isRetryable: boolean;
  suggestion: string | null;
}

// =============================================================================
// localStorage Keys (for type safety)
// =============================================================================

export const STORAGE_KEYS = {
  SAVED_BOOKINGS: 'skyfare_saved_bookings',
  SEARCH_HISTORY: 'skyfare_search_history',
  ROUTE_CACHE: 'skyfare_route_cache',
} as const;

export type StorageKey = (typeof STORAGE_KEYS)[keyof typeof STORAGE_KEYS];
