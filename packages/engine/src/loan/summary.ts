import type { Decimal } from 'decimal.js';
import { addMonthsToYearMonth } from '../calendar/month.js';
import { maxDecimal, sumDecimals } from '../math/money.js';
import { financedPrincipal } from './config.js';
import { effectiveAnnualRate, monthlyRate } from './formulas.js';
import type { LoanConfig, ScheduleEntry, ScheduleSummary } from './types.js';

export function summarizeSchedule(
  D: Decimal.Constructor,
  config: LoanConfig,
  entries: readonly ScheduleEntry[],
): ScheduleSummary {
  const financed = financedPrincipal(D, config);
  const totalInterest = sumDecimals(D, entries.map((e) => e.interestComponent));
  const totalOverpayment = sumDecimals(D, entries.map((e) => e.overpaymentAmount));

  // Peak cash outflow; holidays contribute nothing.
  const outflows = entries
    .map((e) => e.payment.plus(e.overpaymentAmount))
    .filter((amount) => amount.gt(0));

  const last = entries[entries.length - 1];

  return Object.freeze({
    principalFinanced: financed,
    totalInterest,
    totalOverpayment,
    totalCost: financed.plus(totalInterest),
    apr: effectiveAnnualRate(monthlyRate(new D(config.rate))),
    termMonths: config.term,
    originalEndDate: addMonthsToYearMonth(config.startMonth, config.term - 1),
    newEndDate: last ? last.month : config.startMonth,
    paymentsMade: entries.filter((e) => !e.isHoliday && e.payment.gt(0)).length,
    maxPayment: maxDecimal(D, outflows),
  });
}
