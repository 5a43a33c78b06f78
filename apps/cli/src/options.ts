import { parseArgs } from 'node:util';
import {
  createLoanConfig,
  expandMonthlyOverpayment,
  parseAmount,
  parseHolidaySpec,
  parseLoanType,
  parseMonthlyOverpaymentSpec,
  parseOverpaymentSpec,
  parseTrancheSpec,
  parseYearMonth,
  type LoanConfig,
  type LoanConfigInput,
} from '@loancalc/engine';

/** Malformed command line; exits with code 2. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const loanOptions = {
  principal: { type: 'string', short: 'p' },
  rate: { type: 'string', short: 'r' },
  term: { type: 'string', short: 't' },
  type: { type: 'string' },
  'start-date': { type: 'string', short: 's' },
  'down-payment': { type: 'string', short: 'd' },
  tranche: { type: 'string', multiple: true },
  overpayment: { type: 'string', multiple: true },
  holiday: { type: 'string', multiple: true },
  'monthly-overpayment': { type: 'string' },
  'constant-payment': { type: 'string' },
  output: { type: 'string', short: 'o' },
} as const;

export interface LoanFlags {
  principal: string;
  rate: string;
  term: string;
  type: string;
  startDate: string;
  downPayment?: string;
  tranche: string[];
  overpayment: string[];
  holiday: string[];
  monthlyOverpayment?: string;
  constantPayment?: string;
  output?: string;
}

function required(name: string, value: string | undefined): string {
  if (value === undefined || value.trim() === '') {
    throw new UsageError(`Missing required option '--${name}'`);
  }
  return value;
}

function parseLoanArgs(args: string[]) {
  try {
    return parseArgs({ args, options: loanOptions, strict: true, allowPositionals: false });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

/** Reads loan flags from `args`. `--output` is rejected unless `withOutput`. */
export function readLoanFlags(args: string[], withOutput = false): LoanFlags {
  const { values } = parseLoanArgs(args);
  if (!withOutput && values.output !== undefined) {
    throw new UsageError("Option '--output' is not supported here");
  }

  return {
    principal: required('principal', values.principal),
    rate: required('rate', values.rate),
    term: required('term', values.term),
    type: values.type ?? 'annuity',
    startDate: required('start-date', values['start-date']),
    downPayment: values['down-payment'],
    tranche: values.tranche ?? [],
    overpayment: values.overpayment ?? [],
    holiday: values.holiday ?? [],
    monthlyOverpayment: values['monthly-overpayment'],
    constantPayment: values['constant-payment'],
    output: values.output,
  };
}

function toNumber(name: string, value: string): number {
  const n = Number(value.trim());
  if (value.trim() === '' || !Number.isFinite(n)) {
    throw new UsageError(`Invalid value for '--${name}': ${value}`);
  }
  return n;
}

export function buildLoanConfig(flags: LoanFlags): LoanConfig {
  const term = toNumber('term', flags.term);
  const startMonth = parseYearMonth(flags.startDate);

  const overpayments: NonNullable<LoanConfigInput['overpayments']> = flags.overpayment.map(parseOverpaymentSpec);
  if (flags.monthlyOverpayment) {
    const { amount, kind } = parseMonthlyOverpaymentSpec(flags.monthlyOverpayment);
    overpayments.push(...expandMonthlyOverpayment(startMonth, term, amount, kind));
  }

  return createLoanConfig({
    principal: parseAmount(flags.principal),
    downPayment: flags.downPayment ? parseAmount(flags.downPayment) : 0,
    rate: toNumber('rate', flags.rate),
    term,
    loanType: parseLoanType(flags.type),
    startMonth,
    tranches: flags.tranche.map(parseTrancheSpec),
    overpayments,
    holidays: flags.holiday.map(parseHolidaySpec),
    targetPayment: flags.constantPayment ? parseAmount(flags.constantPayment) : null,
  });
}

/**
 * Splits a quoted scenario string such as `-p 500k -r "3.5"` into arguments.
 * Single and double quotes group words; there are no escapes.
 */
export function splitScenario(input: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let quote: string | null = null;
  let inToken = false;

  for (const ch of input) {
    if (quote) {
      if (ch === quote) quote = null;
      else current += ch;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
      inToken = true;
    } else if (/\s/.test(ch)) {
      if (inToken) tokens.push(current);
      current = '';
      inToken = false;
    } else {
      current += ch;
      inToken = true;
    }
  }

  if (quote) throw new UsageError(`Unterminated quote in scenario: ${input}`);
  if (inToken) tokens.push(current);
  return tokens;
}
