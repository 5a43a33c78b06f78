import type { Decimal } from 'decimal.js';
import { addMonthsToYearMonth, compareYearMonth, type YearMonth } from '../calendar/month.js';
import { SimulationDivergenceError } from '../errors.js';
import { createMoneyContext, sumDecimals } from '../math/money.js';
import { financedPrincipal } from './config.js';
import { annuityPayment, decreasingPrincipal, monthlyRate } from './formulas.js';
import { summarizeSchedule } from './summary.js';
import type {
  LoanConfig,
  Overpayment,
  ScheduleEntry,
  ScheduleOptions,
  ScheduleResult,
  Tranche,
} from './types.js';

/** The period loop runs only while the balance is above one cent. */
export const BALANCE_EPSILON = '0.01';

/** A post-payment balance smaller than half a cent in magnitude becomes exactly zero. */
export const DUST_THRESHOLD = '0.005';

interface SimulationState {
  balance: Decimal;
  currentPercent: Decimal;
  disbursedPrincipal: Decimal;
  remainingTerm: number;
  /** Annuity installment, or the first-month payment of a decreasing loan. */
  installment: Decimal;
  /** Fixed per-period principal of a decreasing loan. */
  principalComponent: Decimal;
  month: YearMonth;
  periodIndex: number;
}

interface RunContext {
  D: Decimal.Constructor;
  config: LoanConfig;
  rate: Decimal;
  financed: Decimal;
  tranches: Tranche[];
  trancheByMonth: Map<YearMonth, Decimal>;
  overpaymentsByMonth: Map<YearMonth, Overpayment[]>;
  targetPayment: Decimal | null;
  epsilon: Decimal;
  dust: Decimal;
  zero: Decimal;
}

interface PeriodOutcome {
  entry: ScheduleEntry;
  state: SimulationState;
}

function createRunContext(D: Decimal.Constructor, config: LoanConfig): RunContext {
  const tranches = config.tranches
    .map((t) => ({ month: t.month, percent: new D(t.percent) }))
    .sort((a, b) => compareYearMonth(a.month, b.month));

  const trancheByMonth = new Map<YearMonth, Decimal>();
  for (const t of tranches) trancheByMonth.set(t.month, t.percent);

  const overpaymentsByMonth = new Map<YearMonth, Overpayment[]>();
  for (const op of config.overpayments) {
    const list = overpaymentsByMonth.get(op.month) ?? [];
    list.push({ month: op.month, amount: new D(op.amount), kind: op.kind });
    overpaymentsByMonth.set(op.month, list);
  }

  return {
    D,
    config,
    rate: monthlyRate(new D(config.rate)),
    financed: financedPrincipal(D, config),
    tranches,
    trancheByMonth,
    overpaymentsByMonth,
    targetPayment: config.targetPayment ? new D(config.targetPayment) : null,
    epsilon: new D(BALANCE_EPSILON),
    dust: new D(DUST_THRESHOLD),
    zero: new D(0),
  };
}

function advance(state: SimulationState): SimulationState {
  return {
    ...state,
    month: addMonthsToYearMonth(state.month, 1),
    periodIndex: state.periodIndex + 1,
  };
}

/** Recomputes installment terms from the current balance and remaining term. */
function amortize(ctx: RunContext, state: SimulationState): SimulationState {
  if (state.remainingTerm <= 0) return state;

  if (ctx.config.loanType === 'annuity') {
    return { ...state, installment: annuityPayment(state.balance, ctx.rate, state.remainingTerm) };
  }
  const principalComponent = decreasingPrincipal(state.balance, state.remainingTerm);
  return {
    ...state,
    principalComponent,
    installment: principalComponent.plus(state.balance.times(ctx.rate)),
  };
}

/**
 * Amount released by the tranche dated `month`, if its cumulative percent is
 * above what is already out. Lower percents release nothing.
 */
function trancheRelease(ctx: RunContext, currentPercent: Decimal, month: YearMonth) {
  const target = ctx.trancheByMonth.get(month);
  if (!target || target.lte(currentPercent)) {
    return { percent: currentPercent, amount: ctx.zero };
  }
  return { percent: target, amount: ctx.financed.times(target.minus(currentPercent)) };
}

function hasPendingTranche(ctx: RunContext, state: SimulationState): boolean {
  return ctx.tranches.some(
    (t) => compareYearMonth(t.month, state.month) >= 0 && t.percent.gt(state.currentPercent),
  );
}

/**
 * Disburses tranches dated before the first payment month and capitalizes the
 * interest they accrue. Without tranches the whole financed principal is out
 * at the start month.
 */
function openingState(ctx: RunContext): SimulationState {
  const { config, zero } = ctx;

  if (ctx.tranches.length === 0) {
    return amortize(ctx, {
      balance: ctx.financed,
      currentPercent: new ctx.D(1),
      disbursedPrincipal: ctx.financed,
      remainingTerm: config.term,
      installment: zero,
      principalComponent: zero,
      month: config.startMonth,
      periodIndex: 1,
    });
  }

  let percent = zero;
  let disbursed = zero;
  let capitalized = zero;
  let month = compareYearMonth(ctx.tranches[0].month, config.startMonth) < 0
    ? ctx.tranches[0].month
    : config.startMonth;

  while (compareYearMonth(month, config.startMonth) < 0) {
    const release = trancheRelease(ctx, percent, month);
    percent = release.percent;
    disbursed = disbursed.plus(release.amount);
    capitalized = capitalized.plus(disbursed.times(ctx.rate));
    month = addMonthsToYearMonth(month, 1);
  }

  const state: SimulationState = {
    balance: disbursed.plus(capitalized),
    currentPercent: percent,
    disbursedPrincipal: disbursed,
    remainingTerm: config.term,
    installment: zero,
    principalComponent: zero,
    month: config.startMonth,
    periodIndex: 1,
  };
  return state.balance.gt(0) ? amortize(ctx, state) : state;
}

/**
 * Adds the month's tranche to the balance and re-amortizes over the remaining
 * term, so new principal is repaid within the original horizon.
 */
function disburseTranche(ctx: RunContext, state: SimulationState) {
  const release = trancheRelease(ctx, state.currentPercent, state.month);
  if (release.amount.isZero()) {
    return { state, amount: release.amount };
  }
  const next = amortize(ctx, {
    ...state,
    balance: state.balance.plus(release.amount),
    currentPercent: release.percent,
    disbursedPrincipal: state.disbursedPrincipal.plus(release.amount),
  });
  return { state: next, amount: release.amount };
}

/**
 * Interest capitalized during a holiday is spread over the remaining term on
 * top of the current installment, leaving any earlier term reduction intact.
 */
function spreadCapitalizedInterest(ctx: RunContext, state: SimulationState, interest: Decimal): SimulationState {
  if (state.remainingTerm <= 0 || interest.isZero()) return state;

  if (ctx.config.loanType === 'annuity') {
    return {
      ...state,
      installment: state.installment.plus(annuityPayment(interest, ctx.rate, state.remainingTerm)),
    };
  }
  return {
    ...state,
    principalComponent: state.principalComponent.plus(decreasingPrincipal(interest, state.remainingTerm)),
  };
}

function holidayPeriod(
  ctx: RunContext,
  state: SimulationState,
  startingBalance: Decimal,
  trancheDisbursed: Decimal,
): PeriodOutcome {
  const { zero } = ctx;
  const interest = state.balance.times(ctx.rate);
  const balance = state.balance.plus(interest);

  const entry: ScheduleEntry = Object.freeze({
    periodIndex: state.periodIndex,
    month: state.month,
    startingBalance,
    payment: zero,
    principalComponent: zero,
    interestComponent: interest,
    overpaymentAmount: zero,
    endingBalance: balance,
    trancheDisbursedAmount: trancheDisbursed,
    isHoliday: true,
  });

  const next = spreadCapitalizedInterest(ctx, { ...state, balance }, interest);
  return { entry, state: advance(next) };
}

/** Nothing is owed yet; the loan waits for its next tranche without using up term. */
function idlePeriod(
  ctx: RunContext,
  state: SimulationState,
  startingBalance: Decimal,
  trancheDisbursed: Decimal,
): PeriodOutcome {
  const { zero } = ctx;
  const entry: ScheduleEntry = Object.freeze({
    periodIndex: state.periodIndex,
    month: state.month,
    startingBalance,
    payment: zero,
    principalComponent: zero,
    interestComponent: zero,
    overpaymentAmount: zero,
    endingBalance: state.balance,
    trancheDisbursedAmount: trancheDisbursed,
    isHoliday: false,
  });
  return { entry, state: advance(state) };
}

function paymentPeriod(
  ctx: RunContext,
  state: SimulationState,
  startingBalance: Decimal,
  trancheDisbursed: Decimal,
): PeriodOutcome {
  const { D, zero } = ctx;

  const interest = state.balance.times(ctx.rate);
  let principalPaid = ctx.config.loanType === 'annuity'
    ? state.installment.minus(interest)
    : state.principalComponent;
  const basePayment = principalPaid.plus(interest);

  const due = ctx.overpaymentsByMonth.get(state.month) ?? [];
  let overpayment = sumDecimals(D, due.map((op) => op.amount));
  let reamortize = due.some((op) => op.kind === 'installment');

  // Budget slack above the installment always re-amortizes.
  if (ctx.targetPayment) {
    const slack = ctx.targetPayment.minus(basePayment.plus(overpayment));
    if (slack.gt(0)) {
      overpayment = overpayment.plus(slack);
      reamortize = true;
    }
  }

  let balance = state.balance.minus(principalPaid).minus(overpayment);
  if (balance.abs().lt(ctx.dust)) balance = zero;

  let next: SimulationState;
  if (reamortize && balance.gt(0) && state.remainingTerm > 1) {
    next = amortize(ctx, { ...state, balance, remainingTerm: state.remainingTerm - 1 });
  } else {
    next = { ...state, balance, remainingTerm: state.remainingTerm - 1 };
  }

  // Final payment overshoot: trim the overpayment first, then the installment.
  if (balance.isNegative()) {
    const overshoot = balance.neg();
    const fromOverpayment = D.min(overshoot, overpayment);
    overpayment = overpayment.minus(fromOverpayment);
    principalPaid = principalPaid.minus(overshoot.minus(fromOverpayment));
    next = { ...next, balance: zero };
  }

  const entry: ScheduleEntry = Object.freeze({
    periodIndex: state.periodIndex,
    month: state.month,
    startingBalance,
    payment: principalPaid.plus(interest),
    principalComponent: principalPaid,
    interestComponent: interest,
    overpaymentAmount: overpayment,
    endingBalance: next.balance,
    trancheDisbursedAmount: trancheDisbursed,
    isHoliday: false,
  });

  return { entry, state: advance(next) };
}

/** Term exhausted with principal left: one lump payment of balance plus a month's interest. */
function forcedPayoff(
  ctx: RunContext,
  state: SimulationState,
  startingBalance: Decimal = state.balance,
  trancheDisbursed: Decimal = ctx.zero,
): ScheduleEntry {
  const { zero } = ctx;
  const interest = state.balance.times(ctx.rate);
  return Object.freeze({
    periodIndex: state.periodIndex,
    month: state.month,
    startingBalance,
    payment: state.balance.plus(interest),
    principalComponent: state.balance,
    interestComponent: interest,
    overpaymentAmount: zero,
    endingBalance: zero,
    trancheDisbursedAmount: trancheDisbursed,
    isHoliday: false,
  });
}

/**
 * Clears a balance of at most one cent left when the loop stops. It is added
 * to the last payment when nothing was disbursed since; otherwise it is paid
 * in a closing entry.
 */
function settleResidual(
  ctx: RunContext,
  entries: ScheduleEntry[],
  state: SimulationState,
  startingBalance: Decimal,
  trancheDisbursed: Decimal,
): void {
  if (!state.balance.gt(0)) return;

  const last = entries[entries.length - 1];
  const foldable = last !== undefined
    && trancheDisbursed.isZero()
    && !last.isHoliday
    && last.payment.gt(0)
    && last.endingBalance.eq(state.balance);

  if (foldable) {
    entries[entries.length - 1] = Object.freeze({
      ...last,
      payment: last.payment.plus(state.balance),
      principalComponent: last.principalComponent.plus(state.balance),
      endingBalance: ctx.zero,
    });
    return;
  }
  entries.push(forcedPayoff(ctx, state, startingBalance, trancheDisbursed));
}

function runSchedule(ctx: RunContext): ScheduleEntry[] {
  const entries: ScheduleEntry[] = [];
  const bound = ctx.config.term * 2;
  let state = openingState(ctx);

  for (;;) {
    if (state.periodIndex > bound) {
      if (state.balance.gt(ctx.epsilon)) {
        throw new SimulationDivergenceError(state.periodIndex, state.balance.toFixed(2));
      }
      settleResidual(ctx, entries, state, state.balance, ctx.zero);
      break;
    }

    const startingBalance = state.balance;
    const disbursement = disburseTranche(ctx, state);
    state = disbursement.state;

    let outcome: PeriodOutcome;
    if (state.balance.lte(ctx.epsilon)) {
      if (!hasPendingTranche(ctx, state)) {
        settleResidual(ctx, entries, state, startingBalance, disbursement.amount);
        break;
      }
      outcome = idlePeriod(ctx, state, startingBalance, disbursement.amount);
    } else if (ctx.config.holidays.has(state.month)) {
      outcome = holidayPeriod(ctx, state, startingBalance, disbursement.amount);
    } else {
      outcome = paymentPeriod(ctx, state, startingBalance, disbursement.amount);
    }

    entries.push(outcome.entry);
    state = outcome.state;

    if (state.remainingTerm <= 0 && state.balance.gt(0)) {
      entries.push(forcedPayoff(ctx, state));
      break;
    }
  }

  return entries;
}

/**
 * Simulates the loan month by month and summarizes the result. Pure: the same
 * config always yields the same entries, and runs share no state.
 *
 * @throws {SimulationDivergenceError} when the balance is still outstanding
 *   after twice the nominal term.
 */
export function computeSchedule(config: LoanConfig, options: ScheduleOptions = {}): ScheduleResult {
  const D = createMoneyContext(options.precision);
  const ctx = createRunContext(D, config);
  const entries = Object.freeze(runSchedule(ctx));

  return Object.freeze({
    config,
    entries,
    summary: summarizeSchedule(D, config, entries),
  });
}
