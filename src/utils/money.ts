/**
 * Money helpers
 * All arithmetic is done on integer minor units (halalas, cents)
 */

export function toMinorUnits(major: number): number {
  return Math.round(major * 100);
}

/**
 * Format minor units with two decimals and thousands separators: 123450 -> "1,234.50"
 */
export function formatMinor(amountMinor: number): string {
  const negative = amountMinor < 0;
  const abs = Math.abs(Math.round(amountMinor));
  const major = Math.floor(abs / 100).toString().replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  const minor = (abs % 100).toString().padStart(2, '0');
  return `${negative ? '-' : ''}${major}.${minor}`;
}

export function formatMoney(amountMinor: number, currency: string): string {
  return `${currency} ${formatMinor(amountMinor)}`;
}
