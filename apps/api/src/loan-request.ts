import type { Context } from 'hono';
import { z } from 'zod';
import {
  createLoanConfig,
  expandMonthlyOverpayment,
  parseAmount,
  parsePercent,
  type LoanConfig,
  type LoanConfigInput,
} from '@loancalc/engine';
import { validationError } from './errors.js';

// Amounts arrive as numbers or as strings such as "500k" / "1,200.50".
const amountSchema = z.union([z.number(), z.string().min(1)]);
const monthSchema = z.string().regex(/^\d{4}-\d{2}$/, 'Expected YYYY-MM');
const kindSchema = z.enum(['term', 'installment']);

export const loanRequestSchema = z.object({
  principal: amountSchema,
  downPayment: amountSchema.optional(),
  rate: z.number().min(0),
  term: z.number().int().positive().max(1200),
  loanType: z.enum(['annuity', 'decreasing']).default('annuity'),
  startMonth: monthSchema,
  tranches: z.array(z.object({
    month: monthSchema,
    percent: amountSchema,
  })).max(120).default([]),
  overpayments: z.array(z.object({
    month: monthSchema,
    amount: amountSchema,
    kind: kindSchema,
  })).max(1200).default([]),
  holidays: z.array(monthSchema).max(1200).default([]),
  monthlyOverpayment: z.object({
    amount: amountSchema,
    kind: kindSchema,
  }).optional(),
  targetPayment: amountSchema.optional(),
});

export type LoanRequest = z.infer<typeof loanRequestSchema>;

export async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    throw validationError('Request body must be valid JSON');
  }
}

export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw validationError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', '));
  }
  return parsed.data;
}

function toAmount(value: number | string) {
  return parseAmount(String(value));
}

export function buildLoanConfig(req: LoanRequest): LoanConfig {
  const overpayments: NonNullable<LoanConfigInput['overpayments']> = req.overpayments.map((o) => ({
    month: o.month,
    amount: toAmount(o.amount),
    kind: o.kind,
  }));
  if (req.monthlyOverpayment) {
    const { amount, kind } = req.monthlyOverpayment;
    overpayments.push(...expandMonthlyOverpayment(req.startMonth, req.term, toAmount(amount), kind));
  }

  return createLoanConfig({
    principal: toAmount(req.principal),
    downPayment: req.downPayment === undefined ? 0 : toAmount(req.downPayment),
    rate: req.rate,
    term: req.term,
    loanType: req.loanType,
    startMonth: req.startMonth,
    tranches: req.tranches.map((t) => ({ month: t.month, percent: parsePercent(String(t.percent)) })),
    overpayments,
    holidays: req.holidays,
    targetPayment: req.targetPayment === undefined ? null : toAmount(req.targetPayment),
  });
}
