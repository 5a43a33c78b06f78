import type { YearMonth } from '../calendar/month.js';
import type { BaselineComparison, ScheduleEntry, ScheduleResult, ScheduleSummary } from '../loan/types.js';

// Key names below are the stable boundary shared by JSON, CSV, terminal and
// HTTP output. Do not rename them.

export interface ScheduleRecord {
  period_index: number;
  month: YearMonth;
  starting_balance: number;
  payment: number;
  principal_component: number;
  interest_component: number;
  overpayment_amount: number;
  ending_balance: number;
  tranche_disbursed_amount: number;
  is_holiday: boolean;
}

export interface SummaryRecord {
  principal_financed: number;
  total_interest: number;
  total_overpayment: number;
  total_cost: number;
  apr: number;
  term_months: number;
  original_end_date: YearMonth;
  new_end_date: YearMonth;
  payments_made: number;
  max_payment: number;
}

export interface ComparisonRecord {
  baseline_total_interest: number;
  interest_saved: number;
  total_cost_saved: number;
  months_saved: number;
}

export interface JsonDocument {
  summary: SummaryRecord;
  schedule: ScheduleRecord[];
}

export const SCHEDULE_RECORD_KEYS = [
  'period_index',
  'month',
  'starting_balance',
  'payment',
  'principal_component',
  'interest_component',
  'overpayment_amount',
  'ending_balance',
  'tranche_disbursed_amount',
  'is_holiday',
] as const satisfies readonly (keyof ScheduleRecord)[];

export function toScheduleRecord(entry: ScheduleEntry): ScheduleRecord {
  return {
    period_index: entry.periodIndex,
    month: entry.month,
    starting_balance: entry.startingBalance.toNumber(),
    payment: entry.payment.toNumber(),
    principal_component: entry.principalComponent.toNumber(),
    interest_component: entry.interestComponent.toNumber(),
    overpayment_amount: entry.overpaymentAmount.toNumber(),
    ending_balance: entry.endingBalance.toNumber(),
    tranche_disbursed_amount: entry.trancheDisbursedAmount.toNumber(),
    is_holiday: entry.isHoliday,
  };
}

export function toSummaryRecord(summary: ScheduleSummary): SummaryRecord {
  return {
    principal_financed: summary.principalFinanced.toNumber(),
    total_interest: summary.totalInterest.toNumber(),
    total_overpayment: summary.totalOverpayment.toNumber(),
    total_cost: summary.totalCost.toNumber(),
    apr: summary.apr.toNumber(),
    term_months: summary.termMonths,
    original_end_date: summary.originalEndDate,
    new_end_date: summary.newEndDate,
    payments_made: summary.paymentsMade,
    max_payment: summary.maxPayment.toNumber(),
  };
}

export function toComparisonRecord(comparison: BaselineComparison): ComparisonRecord {
  return {
    baseline_total_interest: comparison.baselineTotalInterest.toNumber(),
    interest_saved: comparison.interestSaved.toNumber(),
    total_cost_saved: comparison.totalCostSaved.toNumber(),
    months_saved: comparison.monthsSaved,
  };
}

export function toJsonDocument(result: ScheduleResult): JsonDocument {
  return {
    summary: toSummaryRecord(result.summary),
    schedule: result.entries.map(toScheduleRecord),
  };
}
