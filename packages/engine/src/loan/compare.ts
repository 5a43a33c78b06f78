import { baselineOf } from './config.js';
import { computeSchedule } from './engine.js';
import type {
  BaselineComparison,
  ComparedMetric,
  LoanConfig,
  MetricComparison,
  ScheduleOptions,
  ScheduleResult,
  ScheduleSummary,
} from './types.js';

const COMPARED_METRICS: ComparedMetric[] = ['total_cost', 'total_interest', 'payments_made'];

function metricValue(summary: ScheduleSummary, metric: ComparedMetric): number {
  switch (metric) {
    case 'total_cost':
      return summary.totalCost.toNumber();
    case 'total_interest':
      return summary.totalInterest.toNumber();
    case 'payments_made':
      return summary.paymentsMade;
  }
}

export function hasOverpayments(config: LoanConfig): boolean {
  return config.overpayments.length > 0 || config.targetPayment !== null;
}

/**
 * Savings of a scenario against the same loan without overpayments or a
 * target payment. `monthsSaved` counts schedule entries, holidays included.
 */
export function compareWithBaseline(
  result: ScheduleResult,
  options: ScheduleOptions = {},
): BaselineComparison {
  const baseline = computeSchedule(baselineOf(result.config), options);
  return {
    baselineTotalInterest: baseline.summary.totalInterest,
    interestSaved: baseline.summary.totalInterest.minus(result.summary.totalInterest),
    totalCostSaved: baseline.summary.totalCost.minus(result.summary.totalCost),
    monthsSaved: baseline.entries.length - result.entries.length,
  };
}

/** Side-by-side metrics; `difference` is scenario 2 minus scenario 1. */
export function compareScenarios(first: ScheduleSummary, second: ScheduleSummary): MetricComparison[] {
  return COMPARED_METRICS.map((metric) => {
    const scenario1 = metricValue(first, metric);
    const scenario2 = metricValue(second, metric);
    return { metric, scenario1, scenario2, difference: scenario2 - scenario1 };
  });
}

/** Runs independent scenarios; each gets its own state and decimal context. */
export function evaluateScenarios(configs: LoanConfig[], options: ScheduleOptions = {}): ScheduleResult[] {
  return configs.map((config) => computeSchedule(config, options));
}
