/**
 * Average Wage Index (AWI) and maximum taxable wage series.
 *
 * AWI history is published through currentYear − 2 and max wage through
 * currentYear. Projection grows AWI year by year from currentYear − 1 and
 * derives each max wage two years later, frozen at the prior year's value
 * when the preceding COLA was zero or the formula would lower it.
 *
 * Also hosts everything keyed off the worker's age-60 AWI: bend points,
 * the earnings index factor and the bend-point (PIA) formula.
 */

import type { BaseBenefitResult, Projection, ReadonlyYearSeries, YearSeries } from '../model/types'
import { floorToDime, roundTo } from '../model/rounding'
import { resolveProjection } from './projection'
import type { ColaView } from './cola'
import {
  BEND_POINT_1_BASE,
  BEND_POINT_2_BASE,
  BEND_POINT_BASE_AWI,
  DEFAULT_WAGE_GROWTH,
  ELIGIBILITY_INDEX_AGE,
  FIRST_INDEXED_YEAR,
  LIFESPAN_YEARS,
  MAX_WAGE_BASE,
  MAX_WAGE_BASE_AWI,
  MAX_WAGE_ROUNDING,
  MW_AWI_OFFSET,
  MW_COLA_OFFSET,
  PIA_RATES,
} from './constants'

// ── Formulas ───────────────────────────────────────────────────

export function maxWageFormula(awi: number): number {
  return roundTo((awi * MAX_WAGE_BASE) / MAX_WAGE_BASE_AWI / MAX_WAGE_ROUNDING, 0) * MAX_WAGE_ROUNDING
}

export function bendPoint1Formula(awi: number): number {
  return roundTo((awi * BEND_POINT_1_BASE) / BEND_POINT_BASE_AWI, 0)
}

export function bendPoint2Formula(awi: number): number {
  return roundTo((awi * BEND_POINT_2_BASE) / BEND_POINT_BASE_AWI, 0)
}

/** Bend-point formula, floored to the dime. */
export function piaFormula(aime: number, bendPoint1: number, bendPoint2: number): number {
  const [r1, r2, r3] = PIA_RATES
  let benefit: number
  if (aime < bendPoint1) {
    benefit = aime * r1
  } else if (aime < bendPoint2) {
    benefit = bendPoint1 * r1 + (aime - bendPoint1) * r2
  } else {
    benefit = bendPoint1 * r1 + (bendPoint2 - bendPoint1) * r2 + (aime - bendPoint2) * r3
  }
  return floorToDime(benefit)
}

// ── Series ─────────────────────────────────────────────────────

export class WageIndex {
  readonly currentYear: number
  private awiHistory: YearSeries
  private maxWageHistory: YearSeries
  private projection: Projection
  private cola: ColaView
  private awi: YearSeries = new Map()
  private maxWage: YearSeries = new Map()

  constructor(
    currentYear: number,
    awiHistory: ReadonlyYearSeries,
    maxWageHistory: ReadonlyYearSeries,
    projection: Projection,
    cola: ColaView,
  ) {
    this.currentYear = currentYear
    this.awiHistory = new Map(awiHistory)
    this.maxWageHistory = new Map(maxWageHistory)
    this.projection = projection
    this.cola = cola
    this.derive()
  }

  /** Replace the growth projection (or keep it) and re-derive. */
  setProjection(projection?: Projection): void {
    if (projection !== undefined) this.projection = projection
    this.derive()
  }

  getProjection(): Projection {
    return this.projection
  }

  /**
   * Rebuild projected AWI and max wage from history. Must run after the COLA
   * series it reads has been derived.
   */
  derive(): void {
    this.awi = new Map(this.awiHistory)
    this.maxWage = new Map(this.maxWageHistory)

    const firstYear = this.currentYear + 1 - MW_AWI_OFFSET
    const growth = resolveProjection(
      firstYear,
      this.currentYear + LIFESPAN_YEARS,
      this.projection,
      DEFAULT_WAGE_GROWTH,
    )

    for (let year = firstYear; year <= this.currentYear + LIFESPAN_YEARS; year++) {
      const previous = this.awi.get(year - 1)
      if (previous === undefined) {
        throw new Error(`AWI history must be defined for ${year - 1}`)
      }
      this.awi.set(year, roundTo(previous * (1 + (growth.get(year) ?? DEFAULT_WAGE_GROWTH)), 2))
      const mwYear = year + MW_AWI_OFFSET
      this.maxWage.set(mwYear, this.calcMaxWage(mwYear))
    }
  }

  private calcMaxWage(mwYear: number): number {
    const awi = this.awi.get(mwYear - MW_AWI_OFFSET)
    if (awi === undefined) return 0

    const formula = maxWageFormula(awi)
    const cola = this.cola.colaFor(mwYear - MW_COLA_OFFSET)
    const previous = this.maxWage.get(mwYear - 1)
    if (cola !== undefined && previous !== undefined && (cola === 0 || formula < previous)) {
      return previous
    }
    return formula
  }

  /** Max taxable wage for `year`; 0 outside the populated domain. */
  getMaxWage(year: number): number {
    return this.maxWage.get(year) ?? 0
  }

  /** AWI for `year`; 0 outside the populated domain. */
  getAwi(year: number): number {
    return this.awi.get(year) ?? 0
  }

  maxWageSeries(): ReadonlyYearSeries {
    return this.maxWage
  }

  awiSeries(): ReadonlyYearSeries {
    return this.awi
  }

  /** Bend points for a worker reaching 60 in birthYear + 60. */
  bendPoints(birthYear: number): [number, number] {
    const awi = this.requireAwi(birthYear + ELIGIBILITY_INDEX_AGE)
    return [bendPoint1Formula(awi), bendPoint2Formula(awi)]
  }

  /**
   * Index factor per year for birthYear … birthYear + 129: 0 before 1951,
   * AWI(age 60) / AWI(year) before age 60, 1 from age 60 on.
   */
  incomeIndexFactor(birthYear: number): YearSeries {
    const awiAt60 = this.requireAwi(birthYear + ELIGIBILITY_INDEX_AGE)
    const factors: YearSeries = new Map()
    for (let year = birthYear; year < birthYear + LIFESPAN_YEARS; year++) {
      if (year < FIRST_INDEXED_YEAR) {
        factors.set(year, 0)
      } else if (year - birthYear < ELIGIBILITY_INDEX_AGE) {
        factors.set(year, awiAt60 / this.requireAwi(year))
      } else {
        factors.set(year, 1)
      }
    }
    return factors
  }

  baseBenefit(birthYear: number, aime: number): BaseBenefitResult {
    const [bendPoint1, bendPoint2] = this.bendPoints(birthYear)
    return {
      baseBenefit: piaFormula(aime, bendPoint1, bendPoint2),
      bendPoint1,
      bendPoint2,
    }
  }

  private requireAwi(year: number): number {
    const awi = this.awi.get(year)
    if (awi === undefined || awi <= 0) {
      throw new Error(`AWI must be defined for ${year}`)
    }
    return awi
  }
}
