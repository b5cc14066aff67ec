/**
 * usePayment Hook
 * Card entry, validation and booking submission
 */

import { useRef, useState } from 'react';
import { bookingApi } from '../api';
import { priceSummary, useBooking, type BookingState } from '../context/BookingContext';
import { useSavedBookings } from '../context/SavedBookingsContext';
import type {
  BookingConfirmation,
  BookingRequest,
  PassengerInfo,
  PassengerPayload,
  SavedBooking,
} from '../types';
import {
  detectCardType,
  digitsOnly,
  formatCardNumber,
  formatExpiryDate,
  hasPaymentErrors,
  validatePaymentForm,
  type PaymentFieldErrors,
  type PaymentForm,
} from '../utils/cards';
import { toDisplayMessage } from '../utils/errorMessages';

const BOOKING_UNAVAILABLE = 'Booking information not available';

const EMPTY_FORM: PaymentForm = {
  cardholderName: '',
  cardNumber: '',
  expiryDate: '',
  cvv: '',
};

function toPassengerPayload(passenger: PassengerInfo): PassengerPayload {
  return {
    type: passenger.type,
    title: passenger.title,
    firstName: passenger.firstName,
    lastName: passenger.lastName,
    dateOfBirth: passenger.dateOfBirth,
    nationality: passenger.nationality,
    documentType: passenger.documentType,
    documentNumber: passenger.documentNumber,
    documentExpiry: passenger.documentExpiry,
  };
}

/**
 * Assemble the booking request; only the last four card digits leave the form.
 */
export function buildBookingRequest(state: BookingState, form: PaymentForm): BookingRequest | null {
  const { searchResult, selectedFlight, passengers, ancillaries } = state;
  const summary = priceSummary(state);
  if (!searchResult || !selectedFlight || !summary || passengers.length === 0) {
    return null;
  }

  const contact = passengers[0];

  return {
    searchId: searchResult.searchId,
    flightNumber: selectedFlight.flight.flightNumber,
    fareFamily: selectedFlight.fareFamily,
    passengers: passengers.map(toPassengerPayload),
    ancillaries: ancillaries?.items ?? [],
    contactEmail: contact.email,
    contactPhone: contact.phone,
    payment: {
      cardholderName: form.cardholderName.trim(),
      cardNumberLast4: form.cardNumber.slice(-4),
      totalAmountMinor: summary.grandTotalMinor,
      currency: summary.currency,
    },
  };
}

export function toSavedBooking(
  confirmation: BookingConfirmation,
  state: BookingState
): SavedBooking {
  const flight = state.selectedFlight?.flight;
  const primary = state.passengers[0];
  return {
    ...confirmation,
    flightNumber: flight?.flightNumber ?? '',
    origin: flight?.origin ?? '',
    destination: flight?.destination ?? '',
    departureTime: flight?.departureTime ?? '',
    passengerCount: state.passengers.length,
    primaryPassengerName: primary ? `${primary.firstName} ${primary.lastName}` : '',
    savedAt: new Date().toISOString(),
  };
}

export function usePayment() {
  const booking = useBooking();
  const { save } = useSavedBookings();

  const [form, setForm] = useState<PaymentForm>(EMPTY_FORM);
  const [fieldErrors, setFieldErrors] = useState<PaymentFieldErrors>({});
  const [isProcessing, setIsProcessing] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const processingRef = useRef(false);

  const updateForm = (updates: Partial<PaymentForm>, field: keyof PaymentFieldErrors) => {
    setForm((prev) => ({ ...prev, ...updates }));
    setFieldErrors((prev) => ({ ...prev, [field]: undefined }));
  };

  const submit = async (today: Date = new Date()): Promise<boolean> => {
    if (processingRef.current) return false;

    const errors = validatePaymentForm(form, today);
    setFieldErrors(errors);
    if (hasPaymentErrors(errors)) return false;

    const request = buildBookingRequest(booking, form);
    if (!request) {
      setError(BOOKING_UNAVAILABLE);
      return false;
    }

    processingRef.current = true;
    setIsProcessing(true);
    setError(null);

    try {
      const confirmation = await bookingApi.create(request);
      booking.setConfirmation(confirmation);
      save(toSavedBooking(confirmation, booking));
      return true;
    } catch (err) {
      console.error('Booking failed:', toDisplayMessage(err));
      setError(toDisplayMessage(err));
      return false;
    } finally {
      processingRef.current = false;
      setIsProcessing(false);
    }
  };

  return {
    form,
    fieldErrors,
    isProcessing,
    error,
    cardType: detectCardType(form.cardNumber),
    displayCardNumber: formatCardNumber(form.cardNumber),
    displayExpiry: formatExpiryDate(form.expiryDate),
    totalMinor: booking.priceSummary?.grandTotalMinor ?? 0,
    currency: booking.priceSummary?.currency ?? '',
    setCardholderName: (value: string) => updateForm({ cardholderName: value }, 'cardholderName'),
    setCardNumber: (value: string) => updateForm({ cardNumber: digitsOnly(value, 16) }, 'cardNumber'),
    setExpiryDate: (value: string) => updateForm({ expiryDate: digitsOnly(value, 4) }, 'expiryDate'),
    setCvv: (value: string) => updateForm({ cvv: digitsOnly(value, 4) }, 'cvv'),
    submit,
  };
}
