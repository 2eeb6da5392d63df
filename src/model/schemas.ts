/**
 * Zod runtime validation schemas mirroring the TypeScript types in types.ts.
 *
 * These guard the engine's public boundary: index tables handed over by
 * whatever loads them, projections supplied by callers, and worker options.
 * The engine itself trusts data once it has passed through here.
 *
 * Conventions:
 *  - Years are integers.
 *  - Rates are decimals (0.024 = 2.4%); negative rates are allowed, the
 *    COLA carry-forward rule absorbs them.
 *  - Monetary amounts are dollars and non-negative.
 *  - Mappings may arrive as a Map or as a plain `{ "2030": 0.02 }` object.
 */

import dayjs from 'dayjs'
import utc from 'dayjs/plugin/utc'
import { z } from 'zod'
import type {
  EarningsProfile,
  IncomeFuture,
  IndexHistoryRow,
  IndexProjectionRow,
  NextIncomeAmount,
  Projection,
  YearSeries,
  YearsMonths,
} from './types'

dayjs.extend(utc)

// ── Reusable validators ──────────────────────────────────────────

const yearSchema = z.number().int('Year must be an integer')

const rateSchema = z.number().finite()

const dollarsNonNeg = z.number().finite().min(0, 'Amount must be non-negative')

/** Calendar date as YYYY-MM-DD that actually exists (no Feb 30). */
const isoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be YYYY-MM-DD')
  .refine((s) => dayjs.utc(s).format('YYYY-MM-DD') === s, 'Date does not exist')

/** Year → value as either a Map or a record keyed by year strings. */
function yearSeriesSchema(value: z.ZodNumber): z.ZodType<YearSeries, z.ZodTypeDef, unknown> {
  const fromRecord = z
    .record(z.string().regex(/^-?\d+$/, 'Mapping keys must be years'), value)
    .transform((rec) => {
      const series: YearSeries = new Map()
      for (const [year, v] of Object.entries(rec)) series.set(Number(year), v)
      return series
    })
  const fromMap = z.map(yearSchema, value).transform((m) => new Map(m))
  return z.union([fromMap, fromRecord])
}

// ── Ages ─────────────────────────────────────────────────────────

const yearsMonthsSchema: z.ZodType<YearsMonths, z.ZodTypeDef, unknown> = z.object({
  years: z.number().int().min(0),
  months: z.number().int().min(0).max(11, 'Months must be 0–11'),
})

// ── Projections ──────────────────────────────────────────────────

const projectionSchema: z.ZodType<Projection, z.ZodTypeDef, unknown> = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('scalar'), value: rateSchema }),
  z.object({ kind: z.literal('sequence'), values: z.array(rateSchema) }),
  z.object({ kind: z.literal('mapping'), values: yearSeriesSchema(rateSchema) }),
])

// ── Earnings ─────────────────────────────────────────────────────

const earningsProfileSchema: z.ZodType<EarningsProfile, z.ZodTypeDef, unknown> = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('sequence'), values: z.array(dollarsNonNeg) }),
  z.object({ kind: z.literal('mapping'), values: yearSeriesSchema(dollarsNonNeg) }),
  z.object({ kind: z.literal('useMax') }),
])

const nextIncomeAmountSchema: z.ZodType<NextIncomeAmount, z.ZodTypeDef, unknown> = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('amount'), value: dollarsNonNeg }),
  z.object({ kind: z.literal('useMax') }),
  z.object({ kind: z.literal('extrapolate') }),
])

const incomeFutureSchema: z.ZodType<IncomeFuture, z.ZodTypeDef, unknown> = z.union([
  z.object({ kind: z.literal('profile'), profile: earningsProfileSchema }),
  z.object({
    kind: z.literal('next'),
    nextIncomeYear: yearSchema.nullable(),
    nextIncomeAmount: nextIncomeAmountSchema,
    personalWageGrowth: projectionSchema,
    finalIncomeYear: yearSchema.optional(),
  }),
])

// ── Index tables ─────────────────────────────────────────────────

const indexHistoryRowSchema: z.ZodType<IndexHistoryRow, z.ZodTypeDef, unknown> = z.object({
  year: yearSchema,
  maxWages: dollarsNonNeg.optional(),
  cola: rateSchema.optional(),
  awi: dollarsNonNeg.optional(),
})

const indexProjectionRowSchema: z.ZodType<IndexProjectionRow, z.ZodTypeDef, unknown> = z.object({
  year: yearSchema,
  cola: rateSchema.optional(),
  awiIncrease: rateSchema.optional(),
})

const indexHistoryTableSchema = z.array(indexHistoryRowSchema).min(1, 'Index history table is empty')

const indexProjectionTableSchema = z.array(indexProjectionRowSchema)

// ── Worker ───────────────────────────────────────────────────────

const workerOptionsSchema = z.object({
  name: z.string().min(1),
  birthday: isoDateSchema,
  incomeHistory: earningsProfileSchema,
  collectionStartAge: yearsMonthsSchema.optional(),
  retireAge: yearsMonthsSchema.optional(),
  incomeFuture: incomeFutureSchema.optional(),
})

export type WorkerOptions = z.infer<typeof workerOptionsSchema>

// ── Parsing ──────────────────────────────────────────────────────

/**
 * Parse `value` or throw a single Error listing every issue as
 * `<label>: <path>: <message>`.
 */
export function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, label: string): T {
  const result = schema.safeParse(value)
  if (result.success) return result.data
  const issues = result.error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)'
    return `${path}: ${issue.message}`
  })
  throw new Error(`${label}: ${issues.join('; ')}`)
}

export {
  yearSchema,
  isoDateSchema,
  yearsMonthsSchema,
  projectionSchema,
  earningsProfileSchema,
  nextIncomeAmountSchema,
  incomeFutureSchema,
  indexHistoryRowSchema,
  indexProjectionRowSchema,
  indexHistoryTableSchema,
  indexProjectionTableSchema,
  workerOptionsSchema,
}
