import { describe, it, expect } from 'vitest';
import { computeSchedule } from '../src/loan/engine.js';
import { createLoanConfig } from '../src/loan/config.js';
import { compareWithBaseline } from '../src/loan/compare.js';
import {
  SCHEDULE_RECORD_KEYS,
  toComparisonRecord,
  toJsonDocument,
  toScheduleRecord,
  toSummaryRecord,
} from '../src/export/records.js';
import { toCsv } from '../src/export/csv.js';

const evenLoan = computeSchedule(createLoanConfig({ principal: 12000, rate: 0, term: 12, startMonth: '2024-01' }));
const scenarioA = computeSchedule(createLoanConfig({ principal: 100000, rate: 6, term: 12, startMonth: '2024-01' }));

describe('toScheduleRecord', () => {
  it('uses the stable snake_case keys', () => {
    expect(Object.keys(toScheduleRecord(scenarioA.entries[0]))).toEqual([...SCHEDULE_RECORD_KEYS]);
  });

  it('converts money to numbers', () => {
    const record = toScheduleRecord(scenarioA.entries[0]);
    expect(record.period_index).toBe(1);
    expect(record.month).toBe('2024-01');
    expect(record.starting_balance).toBe(100000);
    expect(record.interest_component).toBe(500);
    expect(record.payment).toBeCloseTo(8606.64, 2);
    expect(record.tranche_disbursed_amount).toBe(0);
    expect(record.is_holiday).toBe(false);
  });
});

describe('toSummaryRecord', () => {
  it('emits every summary key', () => {
    expect(Object.keys(toSummaryRecord(scenarioA.summary))).toEqual([
      'principal_financed',
      'total_interest',
      'total_overpayment',
      'total_cost',
      'apr',
      'term_months',
      'original_end_date',
      'new_end_date',
      'payments_made',
      'max_payment',
    ]);
  });

  it('keeps dates as YYYY-MM strings', () => {
    const record = toSummaryRecord(scenarioA.summary);
    expect(record.original_end_date).toBe('2024-12');
    expect(record.new_end_date).toBe('2024-12');
    expect(record.term_months).toBe(12);
    expect(record.total_interest).toBeCloseTo(3279.72, 2);
  });
});

describe('toComparisonRecord', () => {
  it('flattens a baseline comparison', () => {
    const result = computeSchedule(createLoanConfig({
      principal: 100000,
      rate: 6,
      term: 12,
      startMonth: '2024-01',
      overpayments: [{ month: '2024-06', amount: 20000, kind: 'term' }],
    }));
    const record = toComparisonRecord(compareWithBaseline(result));

    expect(record.months_saved).toBe(2);
    expect(record.interest_saved).toBeCloseTo(531.25, 2);
    expect(record.baseline_total_interest).toBeCloseTo(3279.72, 2);
  });
});

describe('toJsonDocument', () => {
  it('survives JSON serialization unchanged', () => {
    const doc = toJsonDocument(scenarioA);
    expect(doc.schedule).toHaveLength(12);
    expect(JSON.parse(JSON.stringify(doc))).toEqual(doc);
  });
});

describe('toCsv', () => {
  const lines = toCsv(evenLoan.entries).split('\n');

  it('writes a header of record keys', () => {
    expect(lines[0]).toBe(
      'period_index,month,starting_balance,payment,principal_component,interest_component,overpayment_amount,ending_balance,tranche_disbursed_amount,is_holiday',
    );
  });

  it('writes one row per entry and a trailing newline', () => {
    expect(lines).toHaveLength(14);
    expect(lines[13]).toBe('');
  });

  it('writes plain numbers', () => {
    expect(lines[1]).toBe('1,2024-01,12000,1000,1000,0,0,11000,0,false');
    expect(lines[12]).toBe('12,2024-12,1000,1000,1000,0,0,0,0,false');
  });
});
