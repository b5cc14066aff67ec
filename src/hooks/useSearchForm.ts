/**
 * useSearchForm Hook
 * Stations, routes, dates and passenger counts for the flight search screen
 */

import { useCallback, useEffect, useReducer, useState } from 'react';
import { addDays, format } from 'date-fns';
import { configApi, searchApi } from '../api';
import { useBooking } from '../context/BookingContext';
import type { PassengerCounts, SearchHistoryEntry, Station } from '../types';
import { toDisplayMessage } from '../utils/errorMessages';
import {
  DEFAULT_PASSENGER_COUNTS,
  decrementAdults,
  decrementChildren,
  decrementInfants,
  incrementAdults,
  incrementChildren,
  incrementInfants,
  normalizePassengerCounts,
} from '../utils/passengerCounts';
import {
  addSearchToHistory,
  loadRouteCache,
  loadSearchHistory,
  storeRouteCache,
} from '../utils/storage';

// =============================================================================
// State & Actions
// =============================================================================

export interface SearchFormState {
  stations: Station[];
  routes: Record<string, string[]>;
  origin: Station | null;
  destination: Station | null;
  availableDestinations: Station[];
  departureDate: string;
  passengers: PassengerCounts;
  isLoading: boolean;
  isSearching: boolean;
  error: string | null;
}

type PassengerOp =
  | 'INCREMENT_ADULTS'
  | 'DECREMENT_ADULTS'
  | 'INCREMENT_CHILDREN'
  | 'DECREMENT_CHILDREN'
  | 'INCREMENT_INFANTS'
  | 'DECREMENT_INFANTS';

export type SearchFormAction =
  | { type: 'LOAD_START' }
  | { type: 'LOAD_SUCCESS'; payload: { stations: Station[]; routes: Record<string, string[]> } }
  | { type: 'LOAD_FAILURE'; payload: string }
  | { type: 'SELECT_ORIGIN'; payload: Station }
  | { type: 'SELECT_DESTINATION'; payload: Station }
  | { type: 'SET_DATE'; payload: string }
  | { type: 'SWAP_AIRPORTS' }
  | { type: PassengerOp }
  | { type: 'SET_PASSENGERS'; payload: PassengerCounts }
  | { type: 'SEARCH_START' }
  | { type: 'SEARCH_DONE' }
  | { type: 'SEARCH_FAILURE'; payload: string }
  | { type: 'CLEAR_ERROR' };

const PASSENGER_OPS: Record<PassengerOp, (counts: PassengerCounts) => PassengerCounts> = {
  INCREMENT_ADULTS: incrementAdults,
  DECREMENT_ADULTS: decrementAdults,
  INCREMENT_CHILDREN: incrementChildren,
  DECREMENT_CHILDREN: decrementChildren,
  INCREMENT_INFANTS: incrementInfants,
  DECREMENT_INFANTS: decrementInfants,
};

export function defaultDepartureDate(today: Date = new Date()): string {
  return format(addDays(today, 1), 'yyyy-MM-dd');
}

export function createInitialSearchState(today: Date = new Date()): SearchFormState {
  return {
    stations: [],
    routes: {},
    origin: null,
    destination: null,
    availableDestinations: [],
    departureDate: defaultDepartureDate(today),
    passengers: DEFAULT_PASSENGER_COUNTS,
    isLoading: true,
    isSearching: false,
    error: null,
  };
}

function destinationsFor(state: SearchFormState, origin: Station): Station[] {
  const codes = state.routes[origin.code] ?? [];
  return state.stations.filter((s) => codes.includes(s.code));
}

// =============================================================================
// Reducer
// =============================================================================

export function searchFormReducer(state: SearchFormState, action: SearchFormAction): SearchFormState {
  switch (action.type) {
    case 'LOAD_START':
      return { ...state, isLoading: true, error: null };

    case 'LOAD_SUCCESS':
      return {
        ...state,
        stations: action.payload.stations,
        routes: action.payload.routes,
        isLoading: false,
      };

    case 'LOAD_FAILURE':
      return { ...state, isLoading: false, error: action.payload };

    case 'SELECT_ORIGIN': {
      const origin = action.payload;
      const availableDestinations = destinationsFor(state, origin);
      const keepDestination =
        state.destination !== null &&
        availableDestinations.some((s) => s.code === state.destination?.code);
      return {
        ...state,
        origin,
        availableDestinations,
        destination: keepDestination ? state.destination : null,
      };
    }

    case 'SELECT_DESTINATION':
      return { ...state, destination: action.payload };

    case 'SET_DATE':
      return { ...state, departureDate: action.payload };

    case 'SWAP_AIRPORTS': {
      const { origin, destination } = state;
      if (!origin || !destination) return state;
      const reverseExists = (state.routes[destination.code] ?? []).includes(origin.code);
      if (!reverseExists) {
        return { ...state, error: 'Reverse route not available' };
      }
      return {
        ...state,
        origin: destination,
        destination: origin,
        availableDestinations: destinationsFor(state, destination),
        error: null,
      };
    }

    case 'INCREMENT_ADULTS':
    case 'DECREMENT_ADULTS':
    case 'INCREMENT_CHILDREN':
    case 'DECREMENT_CHILDREN':
    case 'INCREMENT_INFANTS':
    case 'DECREMENT_INFANTS':
      return { ...state, passengers: PASSENGER_OPS[action.type](state.passengers) };

    case 'SET_PASSENGERS':
      return { ...state, passengers: action.payload };

    case 'SEARCH_START':
      return { ...state, isSearching: true, error: null };

    case 'SEARCH_DONE':
      return { ...state, isSearching: false };

    case 'SEARCH_FAILURE':
      return { ...state, isSearching: false, error: action.payload };

    case 'CLEAR_ERROR':
      return { ...state, error: null };

    default:
      return state;
  }
}

export function canSearch(state: SearchFormState): boolean {
  return (
    state.origin !== null &&
    state.destination !== null &&
    state.departureDate !== '' &&
    !state.isSearching
  );
}

// =============================================================================
// Hook
// =============================================================================

export function useSearchForm() {
  const { setSearch } = useBooking();
  const [state, dispatch] = useReducer(searchFormReducer, undefined, () => createInitialSearchState());
  const [recentSearches, setRecentSearches] = useState<SearchHistoryEntry[]>(loadSearchHistory);

  const loadConfig = useCallback(async () => {
    const cached = loadRouteCache();
    if (cached) {
      dispatch({ type: 'LOAD_SUCCESS', payload: { stations: cached.stations, routes: cached.routes } });
      return;
    }

    dispatch({ type: 'LOAD_START' });
    try {
      const [stations, routeMap] = await Promise.all([
        configApi.getStations(),
        configApi.getRoutes(),
      ]);
      storeRouteCache({ stations, routes: routeMap.routes, cachedAt: Date.now() });
      dispatch({ type: 'LOAD_SUCCESS', payload: { stations, routes: routeMap.routes } });
    } catch (err) {
      console.error('Failed to load stations:', err);
      dispatch({ type: 'LOAD_FAILURE', payload: toDisplayMessage(err) });
    }
  }, []);

  useEffect(() => {
    void loadConfig();
  }, [loadConfig]);

  const search = async (): Promise<boolean> => {
    const { origin, destination, departureDate, passengers } = state;
    if (!origin || !destination || !canSearch(state)) return false;

    dispatch({ type: 'SEARCH_START' });
    try {
      const result = await searchApi.searchFlights({
        origin: origin.code,
        destination: destination.code,
        departureDate,
        passengers,
      });
      setSearch({ origin, destination, departureDate, passengers }, result);
      setRecentSearches(
        addSearchToHistory({
          origin: origin.code,
          destination: destination.code,
          departureDate,
          passengers,
          searchedAt: new Date().toISOString(),
        })
      );
      dispatch({ type: 'SEARCH_DONE' });
      return true;
    } catch (err) {
      dispatch({ type: 'SEARCH_FAILURE', payload: toDisplayMessage(err) });
      return false;
    }
  };

  /**
   * Refill the form from a previous search; stations no longer served are skipped
   */
  const applyRecentSearch = (entry: SearchHistoryEntry) => {
    const origin = state.stations.find((s) => s.code === entry.origin);
    const destination = state.stations.find((s) => s.code === entry.destination);
    if (origin) dispatch({ type: 'SELECT_ORIGIN', payload: origin });
    if (origin && destination && (state.routes[origin.code] ?? []).includes(destination.code)) {
      dispatch({ type: 'SELECT_DESTINATION', payload: destination });
    }
    dispatch({ type: 'SET_DATE', payload: entry.departureDate });
    const { adults, children, infants } = entry.passengers;
    dispatch({ type: 'SET_PASSENGERS', payload: normalizePassengerCounts(adults, children, infants) });
  };

  return {
    ...state,
    canSearch: canSearch(state),
    recentSearches,
    retry: loadConfig,
    selectOrigin: (station: Station) => dispatch({ type: 'SELECT_ORIGIN', payload: station }),
    selectDestination: (station: Station) => dispatch({ type: 'SELECT_DESTINATION', payload: station }),
    setDepartureDate: (date: string) => dispatch({ type: 'SET_DATE', payload: date }),
    swapAirports: () => dispatch({ type: 'SWAP_AIRPORTS' }),
    incrementAdults: () => dispatch({ type: 'INCREMENT_ADULTS' }),
    decrementAdults: () => dispatch({ type: 'DECREMENT_ADULTS' }),
    incrementChildren: () => dispatch({ type: 'INCREMENT_CHILDREN' }),
    decrementChildren: () => dispatch({ type: 'DECREMENT_CHILDREN' }),
    incrementInfants: () => dispatch({ type: 'INCREMENT_INFANTS' }),
    decrementInfants: () => dispatch({ type: 'DECREMENT_INFANTS' }),
    setPassengers: (adults: number, children: number, infants: number) =>
      dispatch({ type: 'SET_PASSENGERS', payload: normalizePassengerCounts(adults, children, infants) }),
    search,
    applyRecentSearch,
    clearError: () => dispatch({ type: 'CLEAR_ERROR' }),
  };
}
