/**
 * Passenger form construction and field normalisation
 */

import type {
  PassengerCounts,
  PassengerField,
  PassengerForm,
  PassengerInfo,
  PassengerType,
} from '../types';
import { formatDateInput } from './validation';

export const TITLE_OPTIONS: Record<PassengerType, string[]> = {
  ADULT: ['Mr', 'Mrs', 'Ms', 'Dr'],
  CHILD: ['Master', 'Miss'],
  INFANT: ['Infant'],
};

const TYPE_LABELS: Record<PassengerType, string> = {
  ADULT: 'Adult',
  CHILD: 'Child',
  INFANT: 'Infant',
};

function emptyForm(type: PassengerType, index: number): PassengerForm {
  return {
    id: `${type.toLowerCase()}_${index}`,
    type,
    label: `${TYPE_LABELS[type]} ${index + 1}`,
    title: '',
    firstName: '',
    lastName: '',
    dateOfBirth: '',
    nationality: 'SA',
    documentType: 'PASSPORT',
    documentNumber: '',
    documentExpiry: '',
    email: '',
    phone: '',
  };
}

/**
 * One form per traveller (adults, then children, then infants), restoring
 * details already entered for the same id.
 */
export function createPassengerForms(
  counts: PassengerCounts,
  existing: PassengerInfo[] = []
): PassengerForm[] {
  const groups: Array<[PassengerType, number]> = [
    ['ADULT', counts.adults],
    ['CHILD', counts.children],
    ['INFANT', counts.infants],
  ];

  return groups.flatMap(([type, count]) =>
    Array.from({ length: count }, (_, index) => {
      const form = emptyForm(type, index);
      const saved = existing.find((p) => p.id === form.id);
      return saved ? { ...saved, label: form.label } : form;
    })
  );
}

export function normalizeFieldValue(field: PassengerField, value: string): string {
  switch (field) {
    case 'firstName':
    case 'lastName':
    case 'nationality':
    case 'documentNumber':
      return value.toUpperCase();
    case 'email':
      return value.toLowerCase();
    case 'dateOfBirth':
    case 'documentExpiry':
      return formatDateInput(value);
    default:
      return value;
  }
}

export function toPassengerInfo(form: PassengerForm): PassengerInfo {
  return {
    id: form.id,
    type: form.type,
    title: form.title,
    firstName: form.firstName.trim(),
    lastName: form.lastName.trim(),
    dateOfBirth: form.dateOfBirth,
    nationality: form.nationality.trim(),
    documentType: form.documentType,
    documentNumber: form.documentNumber.trim(),
    documentExpiry: form.documentExpiry,
    email: form.email.trim(),
    phone: form.phone.trim(),
  };
}
