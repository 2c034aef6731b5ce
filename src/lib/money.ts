/**
 * Money helpers: 2-decimal rounding, cent arithmetic and display formatting.
 */

export const SUPPORTED_CURRENCIES = ['TRY', 'USD', 'EUR', 'GBP'] as const;

export type SupportedCurrency = (typeof SUPPORTED_CURRENCIES)[number];

export const DEFAULT_CURRENCY: SupportedCurrency = 'TRY';

export function isSupportedCurrency(code: string): boolean {
  const upper = code.toUpperCase();
  return SUPPORTED_CURRENCIES.some((c) => c === upper);
}

export function toCents(amount: number): number {
  return Math.round(amount * 100);
}

export function fromCents(cents: number): number {
  return cents / 100;
}

/** Round half away from zero to 2 decimals (EPSILON nudge handles 1.005-style inputs). */
export function roundMoney(amount: number): number {
  const sign = amount < 0 ? -1 : 1;
  return (sign * Math.round((Math.abs(amount) + Number.EPSILON) * 100)) / 100;
}

const moneyFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/** e.g. formatMoney(1234.5, 'try') === '1,234.50 TRY' */
export function formatMoney(amount: number, currency: string): string {
  return `${moneyFormat.format(amount)} ${currency.toUpperCase()}`;
}
