/**
 * usePassengerForms Tests
 */

import { describe, it, expect } from 'vitest';
import { act, renderHook } from '@testing-library/react';
import type { ReactNode } from 'react';
import { usePassengerForms } from './usePassengerForms';
import {
  BookingProvider,
  initialBookingState,
  toSelectedFlight,
  useBooking,
  type BookingState,
} from '../context/BookingContext';
import { CRITERIA, FLIGHT } from '../test/fixtures';

const TODAY = new Date(2025, 0, 15);

const state: BookingState = {
  ...initialBookingState,
  searchCriteria: { ...CRITERIA, passengers: { adults: 1, children: 1, infants: 0 } },
  searchResult: { searchId: 'search-1', flights: [FLIGHT] },
  selectedFlight: toSelectedFlight(FLIGHT, 'BASIC'),
};

const wrapper = ({ children }: { children: ReactNode }) => (
  <BookingProvider initialState={state}>{children}</BookingProvider>
);

function renderForms() {
  return renderHook(() => ({ forms: usePassengerForms(), booking: useBooking() }), { wrapper });
}

describe('usePassengerForms', () => {
  it('creates a form per traveller starting at the first', () => {
    const { result } = renderForms();

    expect(result.current.forms.forms.map((f) => f.id)).toEqual(['adult_0', 'child_0']);
    expect(result.current.forms.currentForm?.id).toBe('adult_0');
    expect(result.current.forms.isFirst).toBe(true);
    expect(result.current.forms.isLast).toBe(false);
    expect(result.current.forms.progress).toBe(0.5);
  });

  it('normalises typed values', () => {
    const { result } = renderForms();

    act(() => {
      result.current.forms.updateField('adult_0', 'firstName', 'ahmed');
      result.current.forms.updateField('adult_0', 'dateOfBirth', '19900520');
      result.current.forms.setDocumentType('adult_0', 'NATIONAL_ID');
    });

    const [adult] = result.current.forms.forms;
    expect(adult.firstName).toBe('AHMED');
    expect(adult.dateOfBirth).toBe('1990-05-20');
    expect(adult.documentType).toBe('NATIONAL_ID');
  });

  it('moves between passengers within bounds', () => {
    const { result } = renderForms();

    act(() => result.current.forms.next());
    act(() => result.current.forms.next());
    expect(result.current.forms.currentIndex).toBe(1);
    expect(result.current.forms.isLast).toBe(true);

    act(() => result.current.forms.previous());
    act(() => result.current.forms.previous());
    expect(result.current.forms.currentIndex).toBe(0);
  });

  it('reports every problem for the first invalid passenger', () => {
    const { result } = renderForms();
    act(() => result.current.forms.goTo(1));

    let ok = true;
    act(() => {
      ok = result.current.forms.submit(TODAY);
    });

    expect(ok).toBe(false);
    expect(result.current.forms.currentIndex).toBe(0);
    expect(result.current.forms.error).toBe(
      'Adult 1: Title is required, First name is required, Last name is required, ' +
        'Date of birth is required, Email is required, Phone number is required'
    );
  });

  it('stores passengers in the booking when every form is valid', () => {
    const { result } = renderForms();

    act(() => {
      const { updateField } = result.current.forms;
      updateField('adult_0', 'title', 'Mr');
      updateField('adult_0', 'firstName', 'Ahmed');
      updateField('adult_0', 'lastName', 'Ali');
      updateField('adult_0', 'dateOfBirth', '1990-05-20');
      updateField('adult_0', 'email', 'test@example.com');
      updateField('adult_0', 'phone', '+966500000000');
      updateField('child_0', 'title', 'Miss');
      updateField('child_0', 'firstName', 'Sara');
      updateField('child_0', 'lastName', 'Ali');
      updateField('child_0', 'dateOfBirth', '2018-03-01');
    });

    let ok = false;
    act(() => {
      ok = result.current.forms.submit(TODAY);
    });

    expect(ok).toBe(true);
    expect(result.current.forms.error).toBeNull();
    expect(result.current.booking.passengers.map((p) => `${p.firstName} ${p.lastName}`)).toEqual([
      'AHMED ALI',
      'SARA ALI',
    ]);
  });
});
