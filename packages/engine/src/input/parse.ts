import { Decimal } from 'decimal.js';
import { parseYearMonth, type YearMonth } from '../calendar/month.js';
import { ParseError } from '../errors.js';
import type { LoanType, OverpaymentKind } from '../loan/types.js';

const AMOUNT_SUFFIXES: Record<string, number> = { k: 1_000, m: 1_000_000 };

function toDecimal(raw: string, original: string, label: string): Decimal {
  if (!/^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i.test(raw)) {
    throw new ParseError(original, `Invalid ${label}: ${original}`);
  }
  return new Decimal(raw);
}

/** Accepts `500000`, `500,000`, `500k` or `1.2m`. */
export function parseAmount(value: string): Decimal {
  let body = value.trim().toLowerCase().replace(/,/g, '');
  let factor = 1;
  const suffix = body.slice(-1);
  if (suffix in AMOUNT_SUFFIXES) {
    factor = AMOUNT_SUFFIXES[suffix];
    body = body.slice(0, -1);
  }
  return toDecimal(body, value, 'amount').times(factor);
}

/** `80`, `80%` and `0.8` all mean 80%. Returns a fraction. */
export function parsePercent(value: string): Decimal {
  let body = value.trim();
  if (body.endsWith('%')) body = body.slice(0, -1).trim();
  const p = toDecimal(body, value, 'percentage');
  return p.gt(1) ? p.div(100) : p;
}

export function parseOverpaymentKind(value: string): OverpaymentKind {
  const kind = value.trim().toLowerCase();
  if (kind !== 'term' && kind !== 'installment') {
    throw new ParseError(value, `Overpayment type must be 'term' or 'installment'; got ${value}`);
  }
  return kind;
}

export function parseLoanType(value: string): LoanType {
  const type = value.trim().toLowerCase();
  if (type !== 'annuity' && type !== 'decreasing') {
    throw new ParseError(value, `Loan type must be 'annuity' or 'decreasing'; got ${value}`);
  }
  return type;
}

/** `YYYY-MM:PERCENT` */
export function parseTrancheSpec(value: string): { month: YearMonth; percent: Decimal } {
  const parts = value.split(':');
  if (parts.length !== 2) {
    throw new ParseError(value, `Tranche must be in YYYY-MM:PERCENT format; got ${value}`);
  }
  return { month: parseYearMonth(parts[0]), percent: parsePercent(parts[1]) };
}

/** `YYYY-MM:AMOUNT:TYPE` */
export function parseOverpaymentSpec(value: string): { month: YearMonth; amount: Decimal; kind: OverpaymentKind } {
  const parts = value.split(':');
  if (parts.length !== 3) {
    throw new ParseError(value, `Overpayment must be in YYYY-MM:AMOUNT:TYPE format; got ${value}`);
  }
  return {
    month: parseYearMonth(parts[0]),
    amount: parseAmount(parts[1]),
    kind: parseOverpaymentKind(parts[2]),
  };
}

/** `AMOUNT:TYPE`, applied every month of the term. */
export function parseMonthlyOverpaymentSpec(value: string): { amount: Decimal; kind: OverpaymentKind } {
  const parts = value.split(':');
  if (parts.length !== 2) {
    throw new ParseError(value, `Monthly overpayment must be in AMOUNT:TYPE format, e.g. '500:term'; got ${value}`);
  }
  return { amount: parseAmount(parts[0]), kind: parseOverpaymentKind(parts[1]) };
}

export function parseHolidaySpec(value: string): YearMonth {
  return parseYearMonth(value);
}
