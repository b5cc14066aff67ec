/**
 * Booking Context - the flight booking flow shared by every booking screen
 * Search -> results -> passengers -> ancillaries -> payment -> confirmation
 */

import {
  createContext,
  useCallback,
  useContext,
  useMemo,
  useReducer,
  type ReactNode,
} from 'react';
import type {
  BookingConfirmation,
  BookingStep,
  Flight,
  FlightSearchResponse,
  PassengerInfo,
  PriceSummary,
  SearchCriteria,
  SelectedAncillaries,
  SelectedFlight,
} from '../types';
import { findOffer } from '../utils/fares';
import { totalPassengers } from '../utils/passengerCounts';

// =============================================================================
// State & Actions
// =============================================================================

export interface BookingState {
  searchCriteria: SearchCriteria | null;
  searchResult: FlightSearchResponse | null;
  selectedFlight: SelectedFlight | null;
  passengers: PassengerInfo[];
  ancillaries: SelectedAncillaries | null;
  confirmation: BookingConfirmation | null;
}

export type BookingAction =
  | { type: 'SET_SEARCH'; payload: { criteria: SearchCriteria; result: FlightSearchResponse } }
  | { type: 'SELECT_FLIGHT'; payload: SelectedFlight }
  | { type: 'SET_PASSENGERS'; payload: PassengerInfo[] }
  | { type: 'SET_ANCILLARIES'; payload: SelectedAncillaries }
  | { type: 'SET_CONFIRMATION'; payload: BookingConfirmation }
  | { type: 'RESET' };

export const initialBookingState: BookingState = {
  searchCriteria: null,
  searchResult: null,
  selectedFlight: null,
  passengers: [],
  ancillaries: null,
  confirmation: null,
};

// =============================================================================
// Reducer
// =============================================================================

export function bookingReducer(state: BookingState, action: BookingAction): BookingState {
  switch (action.type) {
    case 'SET_SEARCH':
      return {
        ...initialBookingState,
        searchCriteria: action.payload.criteria,
        searchResult: action.payload.result,
      };

    case 'SELECT_FLIGHT': {
      const previous = state.selectedFlight;
      const next = action.payload;
      const unchanged =
        previous !== null &&
        previous.flight.flightNumber === next.flight.flightNumber &&
        previous.fareFamily === next.fareFamily;
      if (unchanged) {
        return { ...state, selectedFlight: next };
      }
      return {
        ...state,
        selectedFlight: next,
        passengers: [],
        ancillaries: null,
        confirmation: null,
      };
    }

    case 'SET_PASSENGERS':
      return { ...state, passengers: action.payload };

    case 'SET_ANCILLARIES':
      return { ...state, ancillaries: action.payload };

    case 'SET_CONFIRMATION':
      return { ...state, confirmation: action.payload };

    case 'RESET':
      return initialBookingState;

    default:
      return state;
  }
}

// =============================================================================
// Selectors
// =============================================================================

export function canEnterStep(state: BookingState, step: BookingStep): boolean {
  switch (step) {
    case 'search':
      return true;
    case 'results':
      return state.searchResult !== null;
    case 'passengers':
      return state.selectedFlight !== null;
    case 'ancillaries':
    case 'payment':
      return state.selectedFlight !== null && state.passengers.length > 0;
    case 'confirmation':
      return state.confirmation !== null;
  }
}

/**
 * Furthest step the traveller may enter. Ancillaries are optional, so
 * passengers being filled in already opens payment.
 */
export function currentStep(state: BookingState): BookingStep {
  if (canEnterStep(state, 'confirmation')) return 'confirmation';
  if (canEnterStep(state, 'payment')) return 'payment';
  if (canEnterStep(state, 'passengers')) return 'passengers';
  if (canEnterStep(state, 'results')) return 'results';
  return 'search';
}

export function priceSummary(state: BookingState): PriceSummary | null {
  const { selectedFlight, searchCriteria, ancillaries } = state;
  if (!selectedFlight || !searchCriteria) return null;

  const passengerCount = totalPassengers(searchCriteria.passengers);
  const fareTotalMinor = selectedFlight.priceMinor * passengerCount;
  const ancillariesTotalMinor = ancillaries?.ancillariesTotalMinor ?? 0;

  return {
    passengerCount,
    farePerPassengerMinor: selectedFlight.priceMinor,
    fareTotalMinor,
    ancillariesTotalMinor,
    grandTotalMinor: fareTotalMinor + ancillariesTotalMinor,
    currency: selectedFlight.currency,
  };
}

export function toSelectedFlight(flight: Flight, fareCode: string): SelectedFlight | null {
  const offer = findOffer(flight, fareCode);
  if (!offer) return null;
  return {
    flight,
    fareFamily: offer.code,
    priceMinor: offer.priceMinor,
    priceFormatted: offer.priceFormatted,
    currency: offer.currency,
  };
}

// =============================================================================
// Context
// =============================================================================

interface BookingContextValue extends BookingState {
  priceSummary: PriceSummary | null;
  currentStep: BookingStep;
  canEnterStep: (step: BookingStep) => boolean;
  setSearch: (criteria: SearchCriteria, result: FlightSearchResponse) => void;
  selectFlight: (flight: Flight, fareCode: string) => boolean;
  setPassengers: (passengers: PassengerInfo[]) => void;
  setAncillaries: (selection: SelectedAncillaries) => void;
  setConfirmation: (confirmation: BookingConfirmation) => void;
  reset: () => void;
}

const BookingContext = createContext<BookingContextValue | null>(null);

// =============================================================================
// Provider
// =============================================================================

interface BookingProviderProps {
  children: ReactNode;
  initialState?: BookingState;
}

export function BookingProvider({ children, initialState = initialBookingState }: BookingProviderProps) {
  const [state, dispatch] = useReducer(bookingReducer, initialState);

  const selectFlight = useCallback((flight: Flight, fareCode: string) => {
    const selected = toSelectedFlight(flight, fareCode);
    if (!selected) return false;
    dispatch({ type: 'SELECT_FLIGHT', payload: selected });
    return true;
  }, []);

  const actions = useMemo(
    () => ({
      setSearch: (criteria: SearchCriteria, result: FlightSearchResponse) =>
        dispatch({ type: 'SET_SEARCH', payload: { criteria, result } }),
      selectFlight,
      setPassengers: (passengers: PassengerInfo[]) =>
        dispatch({ type: 'SET_PASSENGERS', payload: passengers }),
      setAncillaries: (selection: SelectedAncillaries) =>
        dispatch({ type: 'SET_ANCILLARIES', payload: selection }),
      setConfirmation: (confirmation: BookingConfirmation) =>
        dispatch({ type: 'SET_CONFIRMATION', payload: confirmation }),
      reset: () => dispatch({ type: 'RESET' }),
    }),
    [selectFlight]
  );

  const value: BookingContextValue = {
    ...state,
    ...actions,
    priceSummary: priceSummary(state),
    currentStep: currentStep(state),
    canEnterStep: (step) => canEnterStep(state, step),
  };

  return <BookingContext.Provider value={value}>{children}</BookingContext.Provider>;
}

// =============================================================================
// Hook
// =============================================================================

export function useBooking(): BookingContextValue {
  const context = useContext(BookingContext);
  if (!context) {
    throw new Error('useBooking must be used within BookingProvider');
  }
  return context;
}
