import { describe, it, expect } from 'vitest';
import {
  addMonths,
  addMonthsToYearMonth,
  compareYearMonth,
  formatYearMonth,
  parseYearMonth,
} from '../src/calendar/month.js';
import { ParseError } from '../src/errors.js';

describe('parseYearMonth', () => {
  it('normalizes single-digit months', () => {
    expect(parseYearMonth('2024-1')).toBe('2024-01');
  });

  it('drops the day of a full date', () => {
    expect(parseYearMonth('2024-03-15')).toBe('2024-03');
  });

  it('trims surrounding whitespace', () => {
    expect(parseYearMonth(' 2024-12 ')).toBe('2024-12');
  });

  it('rejects month 13', () => {
    expect(() => parseYearMonth('2024-13')).toThrow(ParseError);
  });

  it('rejects years before 1000', () => {
    expect(() => parseYearMonth('0050-01')).toThrow('Year must be 1000 or later: 0050-01');
  });

  it('names the offending value', () => {
    expect(() => parseYearMonth('march')).toThrow('Invalid year-month string: march');
  });
});

describe('addMonths', () => {
  it('clamps Jan 31 to the end of a leap February', () => {
    expect(addMonths('2024-01-31', 1)).toBe('2024-02-29');
  });

  it('clamps Jan 31 to Feb 28 outside leap years', () => {
    expect(addMonths('2023-01-31', 1)).toBe('2023-02-28');
  });

  it('crosses year boundaries', () => {
    expect(addMonths('2024-11-15', 3)).toBe('2025-02-15');
  });

  it('keeps two-digit years as written', () => {
    expect(addMonths('0050-01-15', 1)).toBe('0050-02-15');
  });

  it('goes backwards for negative counts', () => {
    expect(addMonths('2024-03-31', -1)).toBe('2024-02-29');
  });
});

describe('year-month helpers', () => {
  it('advances months', () => {
    expect(addMonthsToYearMonth('2024-12', 1)).toBe('2025-01');
    expect(addMonthsToYearMonth('2024-01', 11)).toBe('2024-12');
  });

  it('returns the signed distance in months', () => {
    expect(compareYearMonth('2025-01', '2024-12')).toBe(1);
    expect(compareYearMonth('2024-01', '2024-03')).toBe(-2);
    expect(compareYearMonth('2024-05', '2024-05')).toBe(0);
  });

  it('formats with a zero-padded month', () => {
    expect(formatYearMonth(2024, 3)).toBe('2024-03');
  });
});
