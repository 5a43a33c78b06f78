import { extname } from 'node:path';
import { parseArgs } from 'node:util';
import {
  LoanError,
  ParseError,
  compareScenarios,
  compareWithBaseline,
  computeSchedule,
  hasOverpayments,
  toComparisonRecord,
  toCsv,
  toJsonDocument,
  toSummaryRecord,
  type ScheduleResult,
} from '@loancalc/engine';
import { renderComparison, renderSchedule, renderSummary } from './format.js';
import { UsageError, buildLoanConfig, readLoanFlags, splitScenario } from './options.js';

export const MAX_PRINTED_ROWS = 120;

export const USAGE = `Usage: loancalc <command> [options]

Commands:
  schedule   Compute and print the full amortization schedule
  summary    Compute and print only the summary metrics
  compare    Compare two scenarios: --scenario1 "<flags>" --scenario2 "<flags>"

Loan options:
  -p, --principal <amount>            Total loan amount (500000, 500k, 1.2m)
  -r, --rate <percent>                Annual interest rate in percent
  -t, --term <months>                 Loan term in months
      --type <annuity|decreasing>     Installment type (default: annuity)
  -s, --start-date <YYYY-MM>          First payment month
  -d, --down-payment <amount>         Down payment
      --tranche <YYYY-MM:PERCENT>     Cumulative disbursement (repeatable)
      --overpayment <YYYY-MM:AMOUNT:term|installment>   (repeatable)
      --holiday <YYYY-MM>             Payment holiday (repeatable)
      --monthly-overpayment <AMOUNT:term|installment>
      --constant-payment <amount>     Fixed monthly budget
  -o, --output <file>                 Write .json or .csv instead of printing`;

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  writeFile(path: string, contents: string): void;
}

function withComparison(result: ScheduleResult) {
  return hasOverpayments(result.config) ? compareWithBaseline(result) : undefined;
}

function scheduleCommand(args: string[], io: CliIO): void {
  const flags = readLoanFlags(args, true);
  const result = computeSchedule(buildLoanConfig(flags));
  const comparison = withComparison(result);

  if (flags.output) {
    const ext = extname(flags.output).toLowerCase();
    if (ext === '.json') {
      const document = toJsonDocument(result);
      const body = comparison ? { ...document, comparison: toComparisonRecord(comparison) } : document;
      io.writeFile(flags.output, `${JSON.stringify(body, null, 2)}\n`);
    } else if (ext === '.csv') {
      io.writeFile(flags.output, toCsv(result.entries));
    } else {
      throw new UsageError('Unsupported output format; use .json or .csv');
    }
    io.out(`Schedule exported to ${flags.output}`);
    return;
  }

  renderSummary(result.summary, comparison).forEach((line) => io.out(line));
  let entries = result.entries;
  if (entries.length > MAX_PRINTED_ROWS) {
    io.out(`Schedule has ${entries.length} rows; showing first ${MAX_PRINTED_ROWS} rows.`);
    entries = entries.slice(0, MAX_PRINTED_ROWS);
  }
  renderSchedule(entries).forEach((line) => io.out(line));
}

function summaryCommand(args: string[], io: CliIO): void {
  const flags = readLoanFlags(args, true);
  const result = computeSchedule(buildLoanConfig(flags));

  if (flags.output) {
    if (extname(flags.output).toLowerCase() !== '.json') {
      throw new UsageError('Summary export must use .json extension');
    }
    io.writeFile(flags.output, `${JSON.stringify({ summary: toSummaryRecord(result.summary) }, null, 2)}\n`);
    io.out(`Summary exported to ${flags.output}`);
    return;
  }
  renderSummary(result.summary, withComparison(result)).forEach((line) => io.out(line));
}

// Scenario values begin with a dash, which strict parsing reads as a missing argument.
function parseScenarioArgs(args: string[]) {
  try {
    return parseArgs({
      args,
      options: { scenario1: { type: 'string' }, scenario2: { type: 'string' } },
      strict: false,
      allowPositionals: false,
    });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

function readScenarios(args: string[]): [string, string] {
  const { scenario1, scenario2 } = parseScenarioArgs(args).values;
  if (typeof scenario1 !== 'string' || typeof scenario2 !== 'string') {
    throw new UsageError("Both '--scenario1' and '--scenario2' are required");
  }
  return [scenario1, scenario2];
}

function compareCommand(args: string[], io: CliIO): void {
  const [scenario1, scenario2] = readScenarios(args);
  const first = computeSchedule(buildLoanConfig(readLoanFlags(splitScenario(scenario1))));
  const second = computeSchedule(buildLoanConfig(readLoanFlags(splitScenario(scenario2))));
  renderComparison(compareScenarios(first.summary, second.summary)).forEach((line) => io.out(line));
}

/** Runs one command and returns the process exit code. */
export function run(argv: string[], io: CliIO): number {
  const [command, ...args] = argv;

  try {
    switch (command) {
      case 'schedule':
        scheduleCommand(args, io);
        return 0;
      case 'summary':
        summaryCommand(args, io);
        return 0;
      case 'compare':
        compareCommand(args, io);
        return 0;
      case '-h':
      case '--help':
      case 'help':
        io.out(USAGE);
        return 0;
      default:
        io.err(command ? `Unknown command: ${command}` : 'Missing command');
        io.err(USAGE);
        return 2;
    }
  } catch (err) {
    if (err instanceof UsageError || err instanceof ParseError) {
      io.err(`Error: ${err.message}`);
      return 2;
    }
    if (err instanceof LoanError) {
      io.err(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }
}
