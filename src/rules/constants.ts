/**
 * Statutory constants for the retirement benefit computation.
 *
 * Single source of truth for every fixed number the rules use: lags between
 * series, formula anchors, fallback projection rates and the delayed
 * retirement credit table.
 *
 * Formula anchors: 42 U.S.C. §415(a)(1)(B) (bend points, 1979 base AWI of
 * $9,779.44) and §430(b) (contribution base, 1994 base AWI of $22,935.42
 * against a $60,600 base).
 */

import type { YearsMonths } from '../model/types'

// ── Ages and horizons ──────────────────────────────────────────

/** Earliest age at which retirement benefits can begin. */
export const BENEFIT_AGE = 62

/** Series extend this many years past the birth (or current) year. */
export const LIFESPAN_YEARS = 130

/** Delayed retirement credits stop accruing at this age. */
export const MAX_CREDIT_AGE: YearsMonths = { years: 70, months: 0 }

/** The default "use max" history starts at this age. */
export const START_MAX_INCOME_AGE = 22

/** Earnings before this year are never indexed. */
export const FIRST_INDEXED_YEAR = 1951

/** Computation years: min(35, benefit birth year − 1894). */
export const MAX_COMPUTATION_YEARS = 35
export const COMPUTATION_YEARS_BASE = 1894

// ── Series lags ────────────────────────────────────────────────

/** Max wage for year Y depends on the COLA published for Y − 1. */
export const MW_COLA_OFFSET = 1

/** Max wage for year Y depends on the AWI of Y − 2. */
export const MW_AWI_OFFSET = 2

/** Bend points and indexing are anchored at this age (62 − 2). */
export const ELIGIBILITY_INDEX_AGE = BENEFIT_AGE - MW_AWI_OFFSET

// ── Fallback projection rates ──────────────────────────────────

/** COLA when nothing else is known (compound annual average, last 20 years). */
export const DEFAULT_COLA = 0.024

/** AWI growth when nothing else is known. */
export const DEFAULT_WAGE_GROWTH = 0.036

/** Personal wage growth for a worker's future earnings. */
export const DEFAULT_PERSONAL_WAGE_GROWTH = 0.02912

// ── Formula anchors ────────────────────────────────────────────

export const MAX_WAGE_BASE = 60600
export const MAX_WAGE_BASE_AWI = 22935.42
export const MAX_WAGE_ROUNDING = 300

export const BEND_POINT_BASE_AWI = 9779.44
export const BEND_POINT_1_BASE = 180
export const BEND_POINT_2_BASE = 1085

/** Replacement rates for the three AIME brackets. */
export const PIA_RATES = [0.9, 0.32, 0.15] as const

// ── Claiming-age multiplier ────────────────────────────────────

/** Reduction is 5/9 % per month for the first 36 months before FRA … */
export const EARLY_REDUCTION_FIRST_TIER = 0.2
export const EARLY_REDUCTION_FLOOR = 1 - EARLY_REDUCTION_FIRST_TIER
/** … and 5/12 % per month beyond that. */
export const EXTRA_EARLY_REDUCTION_PER_YEAR = 0.05

/**
 * Delayed retirement credit per year past FRA, by benefit birth year.
 * Years before 1924 use the 1924 rate; after 1943 the 1943 rate.
 */
export const DELAYED_CREDIT_BY_BIRTH_YEAR: ReadonlyMap<number, number> = new Map([
  [1924, 0.030], [1925, 0.035], [1926, 0.035], [1927, 0.040], [1928, 0.040],
  [1929, 0.045], [1930, 0.045], [1931, 0.050], [1932, 0.050], [1933, 0.055],
  [1934, 0.055], [1935, 0.060], [1936, 0.060], [1937, 0.065], [1938, 0.065],
  [1939, 0.070], [1940, 0.070], [1941, 0.075], [1942, 0.075], [1943, 0.080],
])
