/**
 * Payment card helpers
 */

export type CardType = 'VISA' | 'MASTERCARD' | 'AMEX' | 'UNKNOWN';

export interface PaymentForm {
  cardholderName: string;
  cardNumber: string;  // digits only
  expiryDate: string;  // MMYY digits
  cvv: string;
}

export interface PaymentFieldErrors {
  cardholderName?: string;
  cardNumber?: string;
  expiryDate?: string;
  cvv?: string;
}

export function digitsOnly(value: string, maxLength: number): string {
  return value.replace(/\D/g, '').slice(0, maxLength);
}

/**
 * Luhn checksum used by all major card schemes
 */
export function isValidLuhn(cardNumber: string): boolean {
  if (!/^\d+$/.test(cardNumber)) return false;

  let sum = 0;
  let isSecondDigit = false;
  for (let i = cardNumber.length - 1; i >= 0; i--) {
    let digit = Number(cardNumber[i]);
    if (isSecondDigit) {
      digit *= 2;
      if (digit > 9) digit -= 9;
    }
    sum += digit;
    isSecondDigit = !isSecondDigit;
  }
  return sum % 10 === 0;
}

export function detectCardType(number: string): CardType {
  if (number.startsWith('4')) return 'VISA';
  if (number.startsWith('5') || number.startsWith('2')) return 'MASTERCARD';
  if (number.startsWith('3')) return 'AMEX';
  return 'UNKNOWN';
}

/**
 * "4111111111111111" -> "4111 1111 1111 1111"
 */
export function formatCardNumber(number: string): string {
  return (number.match(/.{1,4}/g) ?? []).join(' ');
}

/**
 * "0428" -> "04/28"
 */
export function formatExpiryDate(date: string): string {
  return date.length >= 2 ? `${date.slice(0, 2)}/${date.slice(2)}` : date;
}

export function validatePaymentForm(form: PaymentForm, today: Date): PaymentFieldErrors {
  const errors: PaymentFieldErrors = {};

  if (form.cardNumber.length < 13) {
    errors.cardNumber = 'Card number is too short';
  } else if (!isValidLuhn(form.cardNumber)) {
    errors.cardNumber = 'Invalid card number';
  }

  if (!form.cardholderName.trim()) {
    errors.cardholderName = 'Cardholder name is required';
  }

  if (form.expiryDate.length !== 4) {
    errors.expiryDate = 'Invalid expiry date';
  } else {
    const month = Number(form.expiryDate.slice(0, 2));
    const year = 2000 + Number(form.expiryDate.slice(2));
    if (month < 1 || month > 12) {
      errors.expiryDate = 'Invalid month';
    } else if (
      year < today.getFullYear() ||
      (year === today.getFullYear() && month < today.getMonth() + 1)
    ) {
      errors.expiryDate = 'Card has expired';
    }
  }

  if (form.cvv.length < 3) {
    errors.cvv = 'CVV is required';
  }

  return errors;
}

export function hasPaymentErrors(errors: PaymentFieldErrors): boolean {
  return Object.values(errors).some(Boolean);
}
