export { DEFAULT_DB_PATH, createDb, schema } from './db/index.js';
export type { DB } from './db/index.js';
export { migrate } from './db/migrate.js';
export { comparisonScenarios } from './db/schema.js';

export { LoanError, ConfigurationError, InvalidTermError, ParseError, SimulationDivergenceError } from './errors.js';

export type { YearMonth } from './calendar/month.js';
export { addMonths, addMonthsToYearMonth, compareYearMonth, formatYearMonth, parseYearMonth } from './calendar/month.js';

export { DEFAULT_PRECISION, createMoneyContext, formatMoney, formatPercent, maxDecimal, sumDecimals } from './math/money.js';

export type {
  LoanType,
  OverpaymentKind,
  Tranche,
  Overpayment,
  LoanConfig,
  LoanConfigInput,
  ScheduleEntry,
  ScheduleSummary,
  ScheduleResult,
  ScheduleOptions,
  BaselineComparison,
  ComparedMetric,
  MetricComparison,
} from './loan/types.js';
export { annuityPayment, decreasingPayment, decreasingPrincipal, effectiveAnnualRate, monthlyRate } from './loan/formulas.js';
export { baselineOf, createLoanConfig, expandMonthlyOverpayment, financedPrincipal } from './loan/config.js';
export { BALANCE_EPSILON, DUST_THRESHOLD, computeSchedule } from './loan/engine.js';
export { summarizeSchedule } from './loan/summary.js';
export { compareScenarios, compareWithBaseline, evaluateScenarios, hasOverpayments } from './loan/compare.js';

export type { ScheduleRecord, SummaryRecord, ComparisonRecord, JsonDocument } from './export/records.js';
export { SCHEDULE_RECORD_KEYS, toComparisonRecord, toJsonDocument, toScheduleRecord, toSummaryRecord } from './export/records.js';
export { toCsv } from './export/csv.js';

export {
  parseAmount,
  parseHolidaySpec,
  parseLoanType,
  parseMonthlyOverpaymentSpec,
  parseOverpaymentKind,
  parseOverpaymentSpec,
  parsePercent,
  parseTrancheSpec,
} from './input/parse.js';

export type { SavedScenario, NewScenario } from './comparison/store.js';
export {
  DEFAULT_MAX_SCENARIOS_PER_USER,
  addScenario,
  clearScenarios,
  getScenario,
  listScenarios,
  removeScenario,
} from './comparison/store.js';
