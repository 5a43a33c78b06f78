import { Decimal } from 'decimal.js';

export const DEFAULT_PRECISION = 28;

/** Decimal constructor bound to one computation; the global Decimal is never configured. */
export function createMoneyContext(precision = DEFAULT_PRECISION): Decimal.Constructor {
  return Decimal.clone({ precision, rounding: Decimal.ROUND_HALF_EVEN });
}

export function sumDecimals(D: Decimal.Constructor, values: Decimal[]): Decimal {
  return values.reduce((acc, val) => acc.plus(val), new D(0));
}

export function maxDecimal(D: Decimal.Constructor, values: Decimal[]): Decimal {
  return values.length > 0 ? D.max(...values) : new D(0);
}

/**
 * Two-decimal display with space-grouped thousands, e.g. `8 606.64`.
 * A currency code, when given, is appended as a suffix.
 */
export function formatMoney(amount: Decimal.Value, currency?: string): string {
  const fixed = new Decimal(amount).toFixed(2);
  const isNegative = fixed.startsWith('-');
  const [whole, fraction] = (isNegative ? fixed.slice(1) : fixed).split('.');
  const grouped = whole.replace(/\B(?=(\d{3})+(?!\d))/g, ' ');
  const body = `${isNegative ? '-' : ''}${grouped}.${fraction}`;
  return currency ? `${body} ${currency}` : body;
}

export function formatPercent(rate: Decimal.Value): string {
  return `${new Decimal(rate).times(100).toFixed(2)}%`;
}
