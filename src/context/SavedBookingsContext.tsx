/**
 * Saved Bookings Context - bookings kept on this device
 * localStorage persistence so confirmed trips survive a reload
 */

import {
  createContext,
  useContext,
  useEffect,
  useReducer,
  type ReactNode,
} from 'react';
import { bookingApi } from '../api';
import type { BookingConfirmation, SavedBooking } from '../types';
import { toDisplayMessage } from '../utils/errorMessages';
import { loadSavedBookings, storeSavedBookings, upsertBooking } from '../utils/storage';
import { isValidPnr } from '../utils/validation';

// =============================================================================
// State & Actions
// =============================================================================

export interface SavedBookingsState {
  bookings: SavedBooking[];
  selected: SavedBooking | null;
  lookupResult: BookingConfirmation | null;
  isLookingUp: boolean;
  error: string | null;
  isLoading: boolean;
}

type SavedBookingsAction =
  | { type: 'HYDRATE'; payload: SavedBooking[] }
  | { type: 'SAVE'; payload: SavedBooking }
  | { type: 'REMOVE'; payload: string }
  | { type: 'CLEAR_ALL' }
  | { type: 'SELECT'; payload: SavedBooking }
  | { type: 'CLEAR_SELECTION' }
  | { type: 'LOOKUP_START' }
  | { type: 'LOOKUP_SUCCESS'; payload: BookingConfirmation }
  | { type: 'LOOKUP_FAILURE'; payload: string };

const initialState: SavedBookingsState = {
  bookings: [],
  selected: null,
  lookupResult: null,
  isLookingUp: false,
  error: null,
  isLoading: true,
};

// =============================================================================
// Reducer
// =============================================================================

export function savedBookingsReducer(
  state: SavedBookingsState,
  action: SavedBookingsAction
): SavedBookingsState {
  switch (action.type) {
    case 'HYDRATE':
      return { ...state, bookings: action.payload, isLoading: false };
    case 'SAVE':
      return { ...state, bookings: upsertBooking(state.bookings, action.payload) };
    case 'REMOVE':
      return {
        ...state,
        bookings: state.bookings.filter((b) => b.pnr !== action.payload),
        selected: state.selected?.pnr === action.payload ? null : state.selected,
      };
    case 'CLEAR_ALL':
      return { ...state, bookings: [], selected: null };
    case 'SELECT':
      return { ...state, selected: action.payload };
    case 'CLEAR_SELECTION':
      return { ...state, selected: null };
    case 'LOOKUP_START':
      return { ...state, isLookingUp: true, error: null, lookupResult: null };
    case 'LOOKUP_SUCCESS':
      return { ...state, isLookingUp: false, lookupResult: action.payload };
    case 'LOOKUP_FAILURE':
      return { ...state, isLookingUp: false, error: action.payload };
    default:
      return state;
  }
}

/**
 * Saved form of a booking fetched by PNR, with no flight details attached
 */
export function fromConfirmation(confirmation: BookingConfirmation): SavedBooking {
  return {
    ...confirmation,
    flightNumber: '',
    origin: '',
    destination: '',
    departureTime: '',
    passengerCount: 0,
    primaryPassengerName: '',
    savedAt: new Date().toISOString(),
  };
}

// =============================================================================
// Context
// =============================================================================

interface SavedBookingsContextValue extends SavedBookingsState {
  save: (booking: SavedBooking) => void;
  remove: (pnr: string) => void;
  clearAll: () => void;
  find: (pnr: string) => SavedBooking | undefined;
  select: (booking: SavedBooking) => void;
  clearSelection: () => void;
  lookup: (pnr: string) => Promise<boolean>;
}

const SavedBookingsContext = createContext<SavedBookingsContextValue | null>(null);

// =============================================================================
// Provider
// =============================================================================

interface SavedBookingsProviderProps {
  children: ReactNode;
}

export function SavedBookingsProvider({ children }: SavedBookingsProviderProps) {
  const [state, dispatch] = useReducer(savedBookingsReducer, initialState);

  // Load from localStorage on mount
  useEffect(() => {
    dispatch({ type: 'HYDRATE', payload: loadSavedBookings() });
  }, []);

  // Persist after hydration
  useEffect(() => {
    if (!state.isLoading) {
      storeSavedBookings(state.bookings);
    }
  }, [state.bookings, state.isLoading]);

  const lookup = async (pnr: string): Promise<boolean> => {
    if (!isValidPnr(pnr)) {
      dispatch({
        type: 'LOOKUP_FAILURE',
        payload: 'Booking reference must be 6 letters or numbers',
      });
      return false;
    }

    dispatch({ type: 'LOOKUP_START' });
    try {
      const confirmation = await bookingApi.getByPnr(pnr);
      dispatch({ type: 'LOOKUP_SUCCESS', payload: confirmation });
      return true;
    } catch (err) {
      dispatch({ type: 'LOOKUP_FAILURE', payload: toDisplayMessage(err) });
      return false;
    }
  };

  const value: SavedBookingsContextValue = {
    ...state,
    save: (booking) => dispatch({ type: 'SAVE', payload: booking }),
    remove: (pnr) => dispatch({ type: 'REMOVE', payload: pnr }),
    clearAll: () => dispatch({ type: 'CLEAR_ALL' }),
    find: (pnr) => state.bookings.find((b) => b.pnr === pnr.trim().toUpperCase()),
    select: (booking) => dispatch({ type: 'SELECT', payload: booking }),
    clearSelection: () => dispatch({ type: 'CLEAR_SELECTION' }),
    lookup,
  };

  return (
    <SavedBookingsContext.Provider value={value}>{children}</SavedBookingsContext.Provider>
  );
}

// =============================================================================
// Hook
// =============================================================================

export function useSavedBookings(): SavedBookingsContextValue {
  const context = useContext(SavedBookingsContext);
  if (!context) {
    throw new Error('useSavedBookings must be used within SavedBookingsProvider');
  }
  return context;
}
