import type { Decimal } from 'decimal.js';
import type { YearMonth } from '../calendar/month.js';

export type LoanType = 'annuity' | 'decreasing';

/** `term` shortens the schedule at a fixed installment; `installment` re-amortizes. */
export type OverpaymentKind = 'term' | 'installment';

export interface Tranche {
  month: YearMonth;
  /** Cumulative share of the financed principal disbursed by `month`, in [0, 1]. */
  percent: Decimal;
}

export interface Overpayment {
  month: YearMonth;
  amount: Decimal;
  kind: OverpaymentKind;
}

export interface LoanConfig {
  readonly principal: Decimal;
  readonly downPayment: Decimal;
  /** Nominal annual rate in percent, e.g. 3.5. */
  readonly rate: Decimal;
  readonly term: number;
  readonly startMonth: YearMonth;
  readonly loanType: LoanType;
  readonly tranches: readonly Readonly<Tranche>[];
  readonly overpayments: readonly Readonly<Overpayment>[];
  readonly holidays: ReadonlySet<YearMonth>;
  readonly targetPayment: Decimal | null;
}

export interface LoanConfigInput {
  principal: Decimal.Value;
  downPayment?: Decimal.Value;
  rate: Decimal.Value;
  term: number;
  startMonth: YearMonth;
  loanType?: LoanType;
  tranches?: { month: YearMonth; percent: Decimal.Value }[];
  overpayments?: { month: YearMonth; amount: Decimal.Value; kind: OverpaymentKind }[];
  holidays?: Iterable<YearMonth>;
  targetPayment?: Decimal.Value | null;
}

export interface ScheduleEntry {
  readonly periodIndex: number;
  readonly month: YearMonth;
  readonly startingBalance: Decimal;
  /** Scheduled installment: principalComponent + interestComponent. */
  readonly payment: Decimal;
  readonly principalComponent: Decimal;
  readonly interestComponent: Decimal;
  /** Extra principal paid on top of `payment` (explicit and target-driven). */
  readonly overpaymentAmount: Decimal;
  readonly endingBalance: Decimal;
  readonly trancheDisbursedAmount: Decimal;
  readonly isHoliday: boolean;
}

export interface ScheduleSummary {
  readonly principalFinanced: Decimal;
  readonly totalInterest: Decimal;
  readonly totalOverpayment: Decimal;
  readonly totalCost: Decimal;
  readonly apr: Decimal;
  readonly termMonths: number;
  readonly originalEndDate: YearMonth;
  readonly newEndDate: YearMonth;
  readonly paymentsMade: number;
  readonly maxPayment: Decimal;
}

export interface ScheduleResult {
  readonly config: LoanConfig;
  readonly entries: readonly ScheduleEntry[];
  readonly summary: ScheduleSummary;
}

export interface ScheduleOptions {
  /** Significant digits for every decimal operation in this run. */
  precision?: number;
}

export interface BaselineComparison {
  baselineTotalInterest: Decimal;
  interestSaved: Decimal;
  totalCostSaved: Decimal;
  monthsSaved: number;
}

export type ComparedMetric = 'total_cost' | 'total_interest' | 'payments_made';

export interface MetricComparison {
  metric: ComparedMetric;
  scenario1: number;
  scenario2: number;
  difference: number;
}
