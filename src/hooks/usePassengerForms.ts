/**
 * usePassengerForms Hook
 * One form per traveller, stepped through one at a time
 */

import { useState } from 'react';
import { useBooking } from '../context/BookingContext';
import type { DocumentType, PassengerField, PassengerForm } from '../types';
import {
  createPassengerForms,
  normalizeFieldValue,
  toPassengerInfo,
} from '../utils/passengerForms';
import { validatePassenger } from '../utils/validation';

const clampIndex = (index: number, count: number) => Math.min(Math.max(index, 0), Math.max(count - 1, 0));

export function usePassengerForms() {
  const { searchCriteria, passengers, setPassengers } = useBooking();

  const [forms, setForms] = useState<PassengerForm[]>(() =>
    searchCriteria ? createPassengerForms(searchCriteria.passengers, passengers) : []
  );
  const [currentIndex, setCurrentIndex] = useState(0);
  const [error, setError] = useState<string | null>(null);

  const updateForm = (id: string, update: (form: PassengerForm) => PassengerForm) => {
    setForms((prev) => prev.map((form) => (form.id === id ? update(form) : form)));
    setError(null);
  };

  const updateField = (id: string, field: PassengerField, value: string) => {
    updateForm(id, (form) => ({ ...form, [field]: normalizeFieldValue(field, value) }));
  };

  const setDocumentType = (id: string, documentType: DocumentType) => {
    updateForm(id, (form) => ({ ...form, documentType }));
  };

  const goTo = (index: number) => setCurrentIndex(clampIndex(index, forms.length));

  /**
   * Validate every form; on failure jump to the first passenger with problems
   */
  const submit = (today: Date = new Date()): boolean => {
    for (let i = 0; i < forms.length; i++) {
      const errors = validatePassenger(forms[i], today);
      if (errors.length > 0) {
        setCurrentIndex(i);
        setError(`${forms[i].label}: ${errors.join(', ')}`);
        return false;
      }
    }

    setPassengers(forms.map(toPassengerInfo));
    setError(null);
    return true;
  };

  return {
    forms,
    currentIndex,
    currentForm: forms[currentIndex] ?? null,
    isFirst: currentIndex === 0,
    isLast: currentIndex >= forms.length - 1,
    progress: forms.length > 0 ? (currentIndex + 1) / forms.length : 0,
    error,
    updateField,
    setDocumentType,
    next: () => goTo(currentIndex + 1),
    previous: () => goTo(currentIndex - 1),
    goTo,
    submit,
    clearError: () => setError(null),
  };
}
