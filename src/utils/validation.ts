/**
 * Passenger & booking field validation
 */

import {
  addMonths,
  differenceInYears,
  isAfter,
  isBefore,
  startOfDay,
} from 'date-fns';
import type { DocumentType, PassengerForm, PassengerType } from '../types';

const INVALID_DATE_FORMAT = 'Invalid date format (use YYYY-MM-DD)';

// =============================================================================
// Input formatting
// =============================================================================

/**
 * Insert dashes while typing a date: "19860429" -> "1986-04-29"
 */
export function formatDateInput(input: string): string {
  const digits = input.replace(/\D/g, '').slice(0, 8);
  let result = '';
  for (let i = 0; i < digits.length; i++) {
    result += digits[i];
    if (i === 3 && digits.length > 4) result += '-';
    if (i === 5 && digits.length > 6) result += '-';
  }
  return result;
}

/**
 * Parse YYYY-MM-DD into a local date, or null when it isn't a real calendar day
 */
export function parseIsoDate(value: string): Date | null {
  const parts = value.split('-');
  if (parts.length !== 3 || parts.some((p) => !/^\d+$/.test(p))) return null;

  const [year, month, day] = parts.map(Number);
  if (year < 1900 || year > 2100) return null;
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > 31) return null;

  const date = new Date(year, month - 1, day);
  if (date.getMonth() !== month - 1 || date.getDate() !== day) return null;
  return date;
}

// =============================================================================
// Dates
// =============================================================================

export function validateDateOfBirth(
  value: string,
  type: PassengerType,
  today: Date
): string | null {
  const date = parseIsoDate(value);
  if (!date) return INVALID_DATE_FORMAT;

  const todayStart = startOfDay(today);
  if (!isBefore(date, todayStart)) {
    return 'Date of birth must be in the past';
  }

  const age = differenceInYears(todayStart, date);
  switch (type) {
    case 'ADULT':
      if (age < 12) return 'Adult must be 12 years or older';
      if (age > 120) return 'Invalid date of birth';
      return null;
    case 'CHILD':
      if (age < 2) return 'Child must be at least 2 years old';
      if (age >= 12) return 'Child must be under 12 years old';
      return null;
    case 'INFANT':
      return age >= 2 ? 'Infant must be under 2 years old' : null;
  }
}

/**
 * Travel documents must stay valid for six months after today.
 */
export function validateDocumentExpiry(value: string, today: Date): string | null {
  const date = parseIsoDate(value);
  if (!date) return INVALID_DATE_FORMAT;

  const todayStart = startOfDay(today);
  if (!isAfter(date, todayStart)) return 'Document has expired';
  if (isBefore(date, addMonths(todayStart, 6))) {
    return 'Document should be valid for at least 6 months';
  }
  return null;
}

// =============================================================================
// Documents
// =============================================================================

/**
 * Checksum shared by national ID and iqama numbers: digits at even
 * positions are doubled (digit sum when > 9), total must be a multiple of 10.
 */
export function isValidSaudiIdChecksum(number: string): boolean {
  if (!/^\d{10}$/.test(number)) return false;

  let sum = 0;
  for (let i = 0; i < number.length; i++) {
    let digit = Number(number[i]);
    if (i % 2 === 0) {
      digit *= 2;
      if (digit > 9) digit -= 9;
    }
    sum += digit;
  }
  return sum % 10 === 0;
}

function validateTenDigitId(number: string, name: string, prefix: string): string | null {
  if (number.length !== 10) return `${name} must be 10 digits`;
  if (!/^\d+$/.test(number)) return `${name} must contain only numbers`;
  if (!number.startsWith(prefix)) return `${name} must start with ${prefix}`;
  if (!isValidSaudiIdChecksum(number)) return `Invalid ${name} number`;
  return null;
}

export function validateDocumentNumber(value: string, type: DocumentType): string | null {
  const number = value.trim().toUpperCase();

  switch (type) {
    case 'PASSPORT':
      if (number.length < 6) return 'Passport number too short (min 6 characters)';
      if (number.length > 12) return 'Passport number too long (max 12 characters)';
      if (!/^[A-Z0-9]+$/.test(number)) {
        return 'Passport number should only contain letters and numbers';
      }
      return null;
    case 'NATIONAL_ID':
      return validateTenDigitId(number, 'National ID', '1');
    case 'IQAMA':
      return validateTenDigitId(number, 'Iqama', '2');
  }
}

// =============================================================================
// Contact
// =============================================================================

export function isValidEmail(email: string): boolean {
  return email.includes('@') && email.includes('.');
}

export const PRIMARY_CONTACT_ID = 'adult_0';

// =============================================================================
// Passenger form
// =============================================================================

/**
 * Validate a single passenger form, returning every problem found
 */
export function validatePassenger(passenger: PassengerForm, today: Date): string[] {
  const errors: string[] = [];

  if (!passenger.title.trim()) errors.push('Title is required');
  if (!passenger.firstName.trim()) errors.push('First name is required');
  if (!passenger.lastName.trim()) errors.push('Last name is required');

  if (!passenger.dateOfBirth.trim()) {
    errors.push('Date of birth is required');
  } else {
    const dobError = validateDateOfBirth(passenger.dateOfBirth, passenger.type, today);
    if (dobError) errors.push(dobError);
  }

  if (passenger.documentNumber.trim()) {
    const docError = validateDocumentNumber(passenger.documentNumber, passenger.documentType);
    if (docError) errors.push(docError);

    if (!passenger.documentExpiry.trim()) {
      errors.push('Document expiry date is required');
    } else {
      const expiryError = validateDocumentExpiry(passenger.documentExpiry, today);
      if (expiryError) errors.push(expiryError);
    }
  }

  if (passenger.type === 'ADULT' && passenger.id === PRIMARY_CONTACT_ID) {
    if (!passenger.email.trim()) {
      errors.push('Email is required');
    } else if (!isValidEmail(passenger.email)) {
      errors.push('Invalid email format');
    }
    if (!passenger.phone.trim()) errors.push('Phone number is required');
  }

  return errors;
}

// =============================================================================
// Booking lookup
// =============================================================================

export function isValidPnr(value: string): boolean {
  return /^[A-Za-z0-9]{6}$/.test(value.trim());
}
