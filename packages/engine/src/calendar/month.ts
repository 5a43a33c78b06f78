import { ParseError } from '../errors.js';

/** Calendar month in `YYYY-MM` form. */
export type YearMonth = string;

const YEAR_MONTH_RE = /^(\d{4})-(\d{1,2})(?:-\d{1,2})?$/;

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

export function formatYearMonth(year: number, month: number): YearMonth {
  return `${year}-${pad(month)}`;
}

/**
 * Parses `YYYY-MM` (or a full `YYYY-MM-DD`, whose day is dropped) into a
 * normalized month.
 */
export function parseYearMonth(value: string): YearMonth {
  const match = YEAR_MONTH_RE.exec(value.trim());
  if (!match) {
    throw new ParseError(value, `Invalid year-month string: ${value}`);
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  if (month < 1 || month > 12) {
    throw new ParseError(value, `Invalid year-month string: ${value}`);
  }
  if (year < 1000) {
    throw new ParseError(value, `Year must be 1000 or later: ${value}`);
  }
  return formatYearMonth(year, month);
}

function splitYearMonth(ym: YearMonth): [number, number] {
  const [y, m] = ym.split('-').map(Number);
  return [y, m];
}

/**
 * Advances an ISO date (`YYYY-MM-DD`) by `months` calendar months. The day is
 * clamped to the last day of the target month, so Jan 31 + 1 is Feb 28/29.
 */
export function addMonths(isoDate: string, months: number): string {
  const [y, m, d] = isoDate.split('-').map(Number);
  // Date.UTC reads years 0-99 as 1900-1999; setUTCFullYear does not.
  const target = new Date(0);
  target.setUTCFullYear(y, m - 1 + months, 1);
  const monthEnd = new Date(0);
  monthEnd.setUTCFullYear(target.getUTCFullYear(), target.getUTCMonth() + 1, 0);
  target.setUTCDate(Math.min(d, monthEnd.getUTCDate()));
  return target.toISOString().split('T')[0];
}

export function addMonthsToYearMonth(ym: YearMonth, months: number): YearMonth {
  return addMonths(`${ym}-01`, months).slice(0, 7);
}

export function compareYearMonth(a: YearMonth, b: YearMonth): number {
  const [ay, am] = splitYearMonth(a);
  const [by, bm] = splitYearMonth(b);
  return ay * 12 + am - (by * 12 + bm);
}
