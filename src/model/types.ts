/**
 * Core data model for the benefit engine.
 *
 * Every time series in the system (COLA, AWI, max wage, earnings, indexed
 * earnings, cached benefits) is a YearSeries: integer year → number.
 * Monetary amounts are plain dollars (floats); rounding happens at the
 * statutory points in the rules, never implicitly.
 */

// ── Year series ────────────────────────────────────────────────

/** Integer year → value. Contiguous over the domain its producer declares. */
export type YearSeries = Map<number, number>

/** Read-only view handed to consumers that must not mutate a series. */
export type ReadonlyYearSeries = ReadonlyMap<number, number>

// ── Projections ────────────────────────────────────────────────

/** One rate applied to every year of the range. */
export interface ScalarProjection {
  kind: 'scalar'
  value: number
}

/** Values for consecutive years, index 0 = first year of the range. */
export interface SequenceProjection {
  kind: 'sequence'
  values: number[]
}

/** Sparse year → value; gaps are forward-filled. */
export interface MappingProjection {
  kind: 'mapping'
  values: ReadonlyYearSeries
}

export type Projection = ScalarProjection | SequenceProjection | MappingProjection

export function scalar(value: number): ScalarProjection {
  return { kind: 'scalar', value }
}

export function sequence(values: number[]): SequenceProjection {
  return { kind: 'sequence', values }
}

export function mapping(values: ReadonlyYearSeries | Record<number, number>): MappingProjection {
  if (values instanceof Map) return { kind: 'mapping', values }
  const series: YearSeries = new Map()
  for (const [year, value] of Object.entries(values)) {
    series.set(Number(year), value)
  }
  return { kind: 'mapping', values: series }
}

// ── Ages ───────────────────────────────────────────────────────

/** A duration (not a date): whole years plus 0–11 months. */
export interface YearsMonths {
  years: number
  months: number
}

export function age(years: number, months: number = 0): YearsMonths {
  return { years, months }
}

// ── Earnings inputs ────────────────────────────────────────────

/** "Every year at the statutory maximum taxable wage." */
export interface UseMaxEarnings {
  kind: 'useMax'
}

/**
 * An earnings profile. A sequence is anchored at the actual birth year for
 * history and at the current year for future profiles.
 */
export type EarningsProfile = SequenceProjection | MappingProjection | UseMaxEarnings

export type NextIncomeAmount =
  | { kind: 'amount'; value: number }
  | { kind: 'useMax' }
  | { kind: 'extrapolate' }

/** Future earnings as "next year's amount, then grow by a personal rate". */
export interface IncomeFutureByNext {
  kind: 'next'
  /** First projected year; null means no future earnings at all. */
  nextIncomeYear: number | null
  nextIncomeAmount: NextIncomeAmount
  personalWageGrowth: Projection
  /** Last projected year (inclusive). Defaults to birth year + lifespan. */
  finalIncomeYear?: number
}

export interface IncomeFutureByProfile {
  kind: 'profile'
  profile: EarningsProfile
}

export type IncomeFuture = IncomeFutureByProfile | IncomeFutureByNext

// ── Index tables (tabular interchange) ─────────────────────────

/** One row of the historical index table. Columns are absent past their boundary. */
export interface IndexHistoryRow {
  year: number
  maxWages?: number
  cola?: number
  awi?: number
}

/** One row of the inflation / wage-growth projection table. */
export interface IndexProjectionRow {
  year: number
  cola?: number
  awiIncrease?: number
}

// ── Benefit results ────────────────────────────────────────────

export interface BaseBenefitResult {
  /** Monthly benefit at FRA in age-62-year dollars, floored to the dime. */
  baseBenefit: number
  bendPoint1: number
  bendPoint2: number
}

export interface BenefitInfo extends BaseBenefitResult {
  aime: number
}
