/**
 * Money Helper Tests
 */

import { describe, it, expect } from 'vitest';
import { formatMinor, formatMoney, toMinorUnits } from './money';

describe('toMinorUnits', () => {
  it('converts major units and rounds away float noise', () => {
    expect(toMinorUnits(450)).toBe(45000);
    expect(toMinorUnits(19.99)).toBe(1999);
    expect(toMinorUnits(0.1 + 0.2)).toBe(30);
  });
});

describe('formatMinor', () => {
  it('formats with two decimals and thousands separators', () => {
    expect(formatMinor(123450)).toBe('1,234.50');
    expect(formatMinor(5)).toBe('0.05');
    expect(formatMinor(100000000)).toBe('1,000,000.00');
  });

  it('keeps the sign', () => {
    expect(formatMinor(-2500)).toBe('-25.00');
  });
});

describe('formatMoney', () => {
  it('prefixes the currency', () => {
    expect(formatMoney(45000, 'SAR')).toBe('SAR 450.00');
  });
});
