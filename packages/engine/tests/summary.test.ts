import { describe, it, expect } from 'vitest';
import { computeSchedule } from '../src/loan/engine.js';
import { createLoanConfig } from '../src/loan/config.js';
import { summarizeSchedule } from '../src/loan/summary.js';
import { createMoneyContext } from '../src/math/money.js';

describe('summarizeSchedule', () => {
  it('reports the financed principal net of the down payment', () => {
    const { summary } = computeSchedule(createLoanConfig({
      principal: 100000,
      downPayment: 20000,
      rate: 6,
      term: 12,
      startMonth: '2024-01',
    }));

    expect(summary.principalFinanced.toString()).toBe('80000');
    expect(summary.totalInterest.toFixed(2)).toBe('2623.77');
    expect(summary.totalCost.toFixed(2)).toBe('82623.77');
    expect(summary.maxPayment.toFixed(2)).toBe('6885.31');
    expect(summary.totalOverpayment.isZero()).toBe(true);
  });

  it('derives APR from monthly compounding', () => {
    const { summary } = computeSchedule(createLoanConfig({ principal: 1000, rate: 6, term: 12, startMonth: '2024-01' }));
    expect(summary.apr.toFixed(6)).toBe('0.061678');
    expect(summary.termMonths).toBe(12);
  });

  it('does not count holidays as payments', () => {
    const { entries, summary } = computeSchedule(createLoanConfig({
      principal: 100000,
      rate: 6,
      term: 12,
      startMonth: '2024-01',
      holidays: ['2024-03'],
    }));

    expect(entries).toHaveLength(13);
    expect(summary.paymentsMade).toBe(12);
    expect(summary.originalEndDate).toBe('2024-12');
    expect(summary.newEndDate).toBe('2025-01');
  });

  it('does not count idle months before the first tranche', () => {
    const { entries, summary } = computeSchedule(createLoanConfig({
      principal: 100000,
      rate: 6,
      term: 6,
      startMonth: '2024-01',
      tranches: [{ month: '2024-03', percent: 1 }],
    }));

    expect(entries).toHaveLength(8);
    expect(summary.paymentsMade).toBe(6);
  });

  it('handles an empty schedule', () => {
    const config = createLoanConfig({ principal: 1000, rate: 6, term: 12, startMonth: '2024-05' });
    const summary = summarizeSchedule(createMoneyContext(), config, []);

    expect(summary.totalInterest.isZero()).toBe(true);
    expect(summary.maxPayment.isZero()).toBe(true);
    expect(summary.paymentsMade).toBe(0);
    expect(summary.newEndDate).toBe('2024-05');
    expect(summary.originalEndDate).toBe('2025-04');
  });
});
