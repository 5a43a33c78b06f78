import { describe, it, expect } from 'vitest';
import { Decimal } from 'decimal.js';
import {
  annuityPayment,
  decreasingPayment,
  decreasingPrincipal,
  effectiveAnnualRate,
  monthlyRate,
} from '../src/loan/formulas.js';
import { InvalidTermError } from '../src/errors.js';

describe('monthlyRate', () => {
  it('divides the annual percent by 1200', () => {
    expect(monthlyRate(new Decimal(6)).toString()).toBe('0.005');
  });
});

describe('annuityPayment', () => {
  it('computes the level installment', () => {
    const payment = annuityPayment(new Decimal(100000), new Decimal('0.005'), 12);
    expect(payment.toFixed(2)).toBe('8606.64');
  });

  it('splits evenly at a zero rate', () => {
    expect(annuityPayment(new Decimal(12000), new Decimal(0), 12).toString()).toBe('1000');
  });

  it('rejects a non-positive term', () => {
    expect(() => annuityPayment(new Decimal(1000), new Decimal('0.005'), 0)).toThrow(InvalidTermError);
  });
});

describe('decreasing installments', () => {
  it('repays equal principal each month', () => {
    expect(decreasingPrincipal(new Decimal(120000), 12).toString()).toBe('10000');
  });

  it('adds interest on the outstanding balance', () => {
    expect(decreasingPayment(new Decimal(120000), new Decimal('0.005'), 12).toString()).toBe('10600');
  });

  it('rejects a non-positive term', () => {
    expect(() => decreasingPrincipal(new Decimal(1000), -1)).toThrow(InvalidTermError);
  });
});

describe('effectiveAnnualRate', () => {
  it('compounds monthly', () => {
    expect(effectiveAnnualRate(new Decimal('0.005')).toFixed(6)).toBe('0.061678');
  });
});
