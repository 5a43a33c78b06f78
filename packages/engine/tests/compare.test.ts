import { describe, it, expect } from 'vitest';
import { computeSchedule } from '../src/loan/engine.js';
import { createLoanConfig } from '../src/loan/config.js';
import {
  compareScenarios,
  compareWithBaseline,
  evaluateScenarios,
  hasOverpayments,
} from '../src/loan/compare.js';
import type { LoanConfigInput } from '../src/loan/types.js';

const plain: LoanConfigInput = { principal: 100000, rate: 6, term: 12, startMonth: '2024-01' };
const withTermOverpayment: LoanConfigInput = {
  ...plain,
  overpayments: [{ month: '2024-06', amount: 20000, kind: 'term' }],
};
const withInstallmentOverpayment: LoanConfigInput = {
  ...plain,
  overpayments: [{ month: '2024-06', amount: 20000, kind: 'installment' }],
};

describe('hasOverpayments', () => {
  it('is false for a plain loan', () => {
    expect(hasOverpayments(createLoanConfig(plain))).toBe(false);
  });

  it('is true with overpayments or a target payment', () => {
    expect(hasOverpayments(createLoanConfig(withTermOverpayment))).toBe(true);
    expect(hasOverpayments(createLoanConfig({ ...plain, targetPayment: 9000 }))).toBe(true);
  });
});

describe('compareWithBaseline', () => {
  it('reports interest saved by an installment-kind overpayment', () => {
    const result = computeSchedule(createLoanConfig(withInstallmentOverpayment));
    const comparison = compareWithBaseline(result);

    expect(comparison.baselineTotalInterest.toFixed(2)).toBe('3279.72');
    expect(comparison.interestSaved.toFixed(2)).toBe('351.45');
    expect(comparison.totalCostSaved.toFixed(2)).toBe('351.45');
    expect(comparison.monthsSaved).toBe(0);
  });

  it('reports months saved by a term-kind overpayment', () => {
    const result = computeSchedule(createLoanConfig(withTermOverpayment));
    const comparison = compareWithBaseline(result);

    expect(comparison.interestSaved.toFixed(2)).toBe('531.25');
    expect(comparison.monthsSaved).toBe(2);
  });

  it('reports no savings for a plain loan', () => {
    const comparison = compareWithBaseline(computeSchedule(createLoanConfig(plain)));
    expect(comparison.interestSaved.isZero()).toBe(true);
    expect(comparison.monthsSaved).toBe(0);
  });
});

describe('compareScenarios', () => {
  it('returns scenario 2 minus scenario 1 per metric', () => {
    const first = computeSchedule(createLoanConfig(plain)).summary;
    const second = computeSchedule(createLoanConfig(withTermOverpayment)).summary;
    const metrics = compareScenarios(first, second);

    expect(metrics.map((m) => m.metric)).toEqual(['total_cost', 'total_interest', 'payments_made']);
    expect(metrics[0].difference).toBeCloseTo(-531.25, 2);
    expect(metrics[1].scenario1).toBeCloseTo(3279.72, 2);
    expect(metrics[2]).toEqual({ metric: 'payments_made', scenario1: 12, scenario2: 10, difference: -2 });
  });
});

describe('evaluateScenarios', () => {
  it('computes each configuration independently', () => {
    const results = evaluateScenarios([
      createLoanConfig(plain),
      createLoanConfig(withTermOverpayment),
      createLoanConfig({ ...plain, holidays: ['2024-03'] }),
    ]);

    expect(results.map((r) => r.entries.length)).toEqual([12, 10, 13]);
  });
});
