import {
  formatMoney,
  formatPercent,
  type BaselineComparison,
  type MetricComparison,
  type ScheduleEntry,
  type ScheduleSummary,
} from '@loancalc/engine';

const RULE = '-'.repeat(72);
const DOUBLE_RULE = '='.repeat(72);

export function renderSummary(summary: ScheduleSummary, comparison?: BaselineComparison): string[] {
  const lines = [
    'Summary',
    RULE,
    `Principal financed : ${formatMoney(summary.principalFinanced)}`,
    `Total interest     : ${formatMoney(summary.totalInterest)}`,
  ];
  if (!summary.totalOverpayment.isZero()) {
    lines.push(`Total overpayment  : ${formatMoney(summary.totalOverpayment)}`);
  }
  lines.push(
    `Total cost         : ${formatMoney(summary.totalCost)}`,
    `APR (approx)       : ${formatPercent(summary.apr)}`,
    `Original end date  : ${summary.originalEndDate}`,
    `New end date       : ${summary.newEndDate}`,
    `Payments made      : ${summary.paymentsMade}`,
  );
  if (!summary.maxPayment.isZero()) {
    lines.push(`Highest payment    : ${formatMoney(summary.maxPayment)}`);
  }

  if (comparison) {
    lines.push(
      `Baseline interest  : ${formatMoney(comparison.baselineTotalInterest)}`,
      `Interest saved     : ${formatMoney(comparison.interestSaved)}`,
      `Total cost saved   : ${formatMoney(comparison.totalCostSaved)}`,
    );
    if (comparison.monthsSaved !== 0) {
      lines.push(`Term reduction     : ${comparison.monthsSaved} months`);
    }
  }

  lines.push(RULE);
  return lines;
}

const SCHEDULE_HEADERS = ['Period', 'Date', 'StartBal', 'Payment', 'Principal', 'Interest', 'Overpay', 'EndBal', 'Tranche', 'Holiday'];

// Idle months before a tranche carry no information.
function isBlankRow(e: ScheduleEntry): boolean {
  return e.startingBalance.isZero() && e.endingBalance.isZero() && e.trancheDisbursedAmount.isZero();
}

/** Tab-separated table, one line per entry. */
export function renderSchedule(entries: readonly ScheduleEntry[]): string[] {
  const lines = [SCHEDULE_HEADERS.join('\t')];
  for (const e of entries) {
    if (isBlankRow(e)) continue;
    lines.push([
      String(e.periodIndex),
      e.month,
      e.startingBalance.toFixed(2),
      e.payment.toFixed(2),
      e.principalComponent.toFixed(2),
      e.interestComponent.toFixed(2),
      e.overpaymentAmount.toFixed(2),
      e.endingBalance.toFixed(2),
      e.trancheDisbursedAmount.toFixed(2),
      e.isHoliday ? 'Yes' : 'No',
    ].join('\t'));
  }
  return lines;
}

/** Negative differences favour scenario 2. */
export function renderComparison(metrics: MetricComparison[]): string[] {
  const row = (label: string, a: string, b: string, diff: string) =>
    `${label.padEnd(20)} ${a.padStart(15)} ${b.padStart(15)} ${diff.padStart(15)}`;

  return [
    'Comparison',
    DOUBLE_RULE,
    row('Metric', 'Scenario1', 'Scenario2', 'Difference'),
    ...metrics.map((m) =>
      row(m.metric, m.scenario1.toFixed(2), m.scenario2.toFixed(2), m.difference.toFixed(2)),
    ),
    DOUBLE_RULE,
  ];
}
