import { Decimal } from 'decimal.js';
import { addMonthsToYearMonth, parseYearMonth, type YearMonth } from '../calendar/month.js';
import { ConfigurationError, LoanError } from '../errors.js';
import type { LoanConfig, LoanConfigInput, Overpayment, OverpaymentKind, Tranche } from './types.js';

function toDecimal(field: string, value: Decimal.Value): Decimal {
  let d: Decimal;
  try {
    d = new Decimal(value);
  } catch {
    throw new ConfigurationError(field, `${field} must be a number, got ${String(value)}`);
  }
  if (!d.isFinite()) {
    throw new ConfigurationError(field, `${field} must be finite, got ${String(value)}`);
  }
  return d;
}

function toMonth(field: string, value: YearMonth): YearMonth {
  try {
    return parseYearMonth(value);
  } catch (err) {
    if (err instanceof LoanError) {
      throw new ConfigurationError(field, `${field}: ${err.message}`);
    }
    throw err;
  }
}

/**
 * Validates a loan scenario and returns it frozen. Nothing downstream mutates
 * the result, so one config may feed any number of schedule runs.
 */
export function createLoanConfig(input: LoanConfigInput): LoanConfig {
  const principal = toDecimal('principal', input.principal);
  const downPayment = toDecimal('downPayment', input.downPayment ?? 0);
  const rate = toDecimal('rate', input.rate);

  if (principal.lte(downPayment)) {
    throw new ConfigurationError('principal', 'Financed principal must be positive after down payment');
  }
  if (!Number.isInteger(input.term) || input.term <= 0) {
    throw new ConfigurationError('term', `Term must be a positive whole number of months, got ${input.term}`);
  }
  if (rate.isNegative()) {
    throw new ConfigurationError('rate', `Rate must not be negative, got ${rate.toString()}`);
  }

  const tranches: Tranche[] = (input.tranches ?? []).map((t, i) => {
    const percent = toDecimal(`tranches[${i}].percent`, t.percent);
    if (percent.isNegative() || percent.gt(1)) {
      throw new ConfigurationError(`tranches[${i}].percent`, `Tranche percent must be within [0, 1], got ${percent.toString()}`);
    }
    return Object.freeze({ month: toMonth(`tranches[${i}].month`, t.month), percent });
  });

  const overpayments: Overpayment[] = (input.overpayments ?? []).map((o, i) => {
    const amount = toDecimal(`overpayments[${i}].amount`, o.amount);
    if (amount.lte(0)) {
      throw new ConfigurationError(`overpayments[${i}].amount`, `Overpayment amount must be positive, got ${amount.toString()}`);
    }
    return Object.freeze({ month: toMonth(`overpayments[${i}].month`, o.month), amount, kind: o.kind });
  });

  const holidays = new Set<YearMonth>();
  for (const h of input.holidays ?? []) {
    holidays.add(toMonth('holidays', h));
  }

  let targetPayment: Decimal | null = null;
  if (input.targetPayment !== undefined && input.targetPayment !== null) {
    targetPayment = toDecimal('targetPayment', input.targetPayment);
    if (targetPayment.lte(0)) {
      throw new ConfigurationError('targetPayment', `Target payment must be positive, got ${targetPayment.toString()}`);
    }
  }

  return Object.freeze({
    principal,
    downPayment,
    rate,
    term: input.term,
    startMonth: toMonth('startMonth', input.startMonth),
    loanType: input.loanType ?? 'annuity',
    tranches: Object.freeze(tranches),
    overpayments: Object.freeze(overpayments),
    holidays,
    targetPayment,
  });
}

/** Same loan with every overpayment and the target payment removed. */
export function baselineOf(config: LoanConfig): LoanConfig {
  return Object.freeze({ ...config, overpayments: Object.freeze([]), targetPayment: null });
}

/** Principal less down payment, computed in the caller's decimal context. */
export function financedPrincipal(D: Decimal.Constructor, config: LoanConfig): Decimal {
  return new D(config.principal).minus(config.downPayment);
}

/** One overpayment per month for `term` months starting at `startMonth`. */
export function expandMonthlyOverpayment(
  startMonth: YearMonth,
  term: number,
  amount: Decimal.Value,
  kind: OverpaymentKind,
): { month: YearMonth; amount: Decimal.Value; kind: OverpaymentKind }[] {
  return Array.from({ length: term }, (_, i) => ({
    month: addMonthsToYearMonth(startMonth, i),
    amount,
    kind,
  }));
}
