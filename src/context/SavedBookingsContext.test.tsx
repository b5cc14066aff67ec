/**
 * SavedBookingsContext Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { act, renderHook, waitFor } from '@testing-library/react';
import type { ReactNode } from 'react';
import {
  fromConfirmation,
  SavedBookingsProvider,
  useSavedBookings,
} from './SavedBookingsContext';
import { bookingApi } from '../api';
import { ApiError } from '../api/client';
import { STORAGE_KEYS, type BookingConfirmation } from '../types';

vi.mock('../api', () => ({
  bookingApi: {
    getByPnr: vi.fn(),
  },
}));

const confirmation: BookingConfirmation = {
  pnr: 'ABC123',
  bookingReference: 'REF-1',
  status: 'CONFIRMED',
  totalPaidMinor: 45000,
  totalPaidFormatted: 'SAR 450.00',
  currency: 'SAR',
  createdAt: '2025-01-15T10:00:00Z',
};

const wrapper = ({ children }: { children: ReactNode }) => (
  <SavedBookingsProvider>{children}</SavedBookingsProvider>
);

describe('SavedBookingsContext', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('throws outside the provider', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    expect(() => renderHook(() => useSavedBookings())).toThrow(
      'useSavedBookings must be used within SavedBookingsProvider'
    );
    errorSpy.mockRestore();
  });

  it('hydrates from localStorage', async () => {
    localStorage.setItem(STORAGE_KEYS.SAVED_BOOKINGS, JSON.stringify([fromConfirmation(confirmation)]));

    const { result } = renderHook(() => useSavedBookings(), { wrapper });

    await waitFor(() => {
      expect(result.current.isLoading).toBe(false);
    });
    expect(result.current.bookings.map((b) => b.pnr)).toEqual(['ABC123']);
  });

  it('saves, finds and removes bookings and persists the list', async () => {
    const { result } = renderHook(() => useSavedBookings(), { wrapper });
    await waitFor(() => expect(result.current.isLoading).toBe(false));

    act(() => {
      result.current.save(fromConfirmation(confirmation));
    });

    expect(result.current.find(' abc123 ')?.status).toBe('CONFIRMED');
    const stored: unknown = JSON.parse(localStorage.getItem(STORAGE_KEYS.SAVED_BOOKINGS) ?? '[]');
    expect(stored).toHaveLength(1);

    act(() => {
      result.current.remove('ABC123');
    });
    expect(result.current.bookings).toEqual([]);
  });

  it('clears the selection when the selected booking is removed', async () => {
    const { result } = renderHook(() => useSavedBookings(), { wrapper });
    await waitFor(() => expect(result.current.isLoading).toBe(false));
    const saved = fromConfirmation(confirmation);

    act(() => {
      result.current.save(saved);
      result.current.select(saved);
    });
    expect(result.current.selected?.pnr).toBe('ABC123');

    act(() => {
      result.current.clearAll();
    });
    expect(result.current.selected).toBeNull();
    expect(result.current.bookings).toEqual([]);
  });

  it('rejects malformed references without calling the API', async () => {
    const { result } = renderHook(() => useSavedBookings(), { wrapper });

    let found = true;
    await act(async () => {
      found = await result.current.lookup('AB1');
    });

    expect(found).toBe(false);
    expect(bookingApi.getByPnr).not.toHaveBeenCalled();
    expect(result.current.error).toBe('Booking reference must be 6 letters or numbers');
  });

  it('looks up a booking by PNR', async () => {
    vi.mocked(bookingApi.getByPnr).mockResolvedValue(confirmation);
    const { result } = renderHook(() => useSavedBookings(), { wrapper });

    await act(async () => {
      await result.current.lookup('abc123');
    });

    expect(bookingApi.getByPnr).toHaveBeenCalledWith('abc123');
    expect(result.current.lookupResult?.pnr).toBe('ABC123');
    expect(result.current.error).toBeNull();
  });

  it('shows a friendly message when the lookup fails', async () => {
    vi.mocked(bookingApi.getByPnr).mockRejectedValue(new ApiError(404, 'missing', 'NOT_FOUND'));
    const { result } = renderHook(() => useSavedBookings(), { wrapper });

    await act(async () => {
      await result.current.lookup('ZZZ999');
    });

    expect(result.current.lookupResult).toBeNull();
    expect(result.current.error).toBe('The requested resource was not found.');
  });
});

describe('fromConfirmation', () => {
  it('keeps the confirmation and leaves flight details blank', () => {
    const saved = fromConfirmation(confirmation);

    expect(saved.pnr).toBe('ABC123');
    expect(saved.totalPaidMinor).toBe(45000);
    expect(saved.flightNumber).toBe('');
    expect(saved.passengerCount).toBe(0);
  });
});
