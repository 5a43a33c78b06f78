import type { Decimal } from 'decimal.js';
import { InvalidTermError } from '../errors.js';

/** Nominal annual percent (e.g. `6` for 6%) to a simple monthly rate. */
export function monthlyRate(annualPercent: Decimal): Decimal {
  return annualPercent.div(100).div(12);
}

/**
 * Equal installment that amortizes `principal` over `term` months:
 * `P·i·(1+i)^n / ((1+i)^n − 1)`, or `P/n` when the rate is zero.
 */
export function annuityPayment(principal: Decimal, rate: Decimal, term: number): Decimal {
  if (term <= 0) throw new InvalidTermError(term);
  if (rate.isZero()) return principal.div(term);

  const factor = rate.plus(1).pow(term);
  return principal.times(rate).times(factor).div(factor.minus(1));
}

export function decreasingPrincipal(principal: Decimal, term: number): Decimal {
  if (term <= 0) throw new InvalidTermError(term);
  return principal.div(term);
}

export function decreasingPayment(principal: Decimal, rate: Decimal, term: number): Decimal {
  return decreasingPrincipal(principal, term).plus(principal.times(rate));
}

/** Effective annual rate implied by monthly compounding: `(1+i)^12 − 1`. */
export function effectiveAnnualRate(rate: Decimal): Decimal {
  return rate.plus(1).pow(12).minus(1);
}
