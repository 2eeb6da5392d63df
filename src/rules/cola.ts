/**
 * Cost-of-living adjustment (COLA) series.
 *
 * History is published through currentYear − 1; projections cover
 * currentYear … currentYear + 129. The published series is never negative:
 * a projected cost-of-living decrease is carried forward and only released
 * as a reduced increase once the compounded index climbs back above 1.0.
 *
 * Example: raw −0.5% then +1.5% publishes 0.0 then round(0.995 × 1.015 − 1, 3) = 0.010.
 */

import type { Projection, ReadonlyYearSeries, YearSeries } from '../model/types'
import { floorToDime, roundTo } from '../model/rounding'
import { sortedYears } from '../model/serialize'
import { resolveProjection } from './projection'
import { DEFAULT_COLA, LIFESPAN_YEARS, MW_COLA_OFFSET } from './constants'

/** What the wage-index side may see of the COLA series. */
export interface ColaView {
  colaFor(year: number): number | undefined
}

export class ColaIndex implements ColaView {
  readonly currentYear: number
  private rawHistory: YearSeries
  private projection: Projection
  private published: YearSeries = new Map()

  constructor(currentYear: number, history: ReadonlyYearSeries, projection: Projection) {
    this.currentYear = currentYear
    this.rawHistory = new Map(history)
    this.projection = projection
    this.derive()
  }

  /** Replace the projection and re-derive the published series from scratch. */
  setProjection(projection: Projection): void {
    this.projection = projection
    this.derive()
  }

  getProjection(): Projection {
    return this.projection
  }

  /** Rebuild the published series from history + projection. */
  derive(): void {
    const merged: YearSeries = new Map(this.rawHistory)
    const projected = resolveProjection(
      this.currentYear + 1 - MW_COLA_OFFSET,
      this.currentYear + LIFESPAN_YEARS - MW_COLA_OFFSET,
      this.projection,
      DEFAULT_COLA,
    )
    for (const [year, value] of projected) merged.set(year, value)

    this.published = carryForward(merged)
  }

  colaFor(year: number): number | undefined {
    return this.published.get(year)
  }

  /** Full published series (history and projection). */
  history(): ReadonlyYearSeries {
    return this.published
  }

  /**
   * Apply each year's COLA to `value` from `baseYear` up to (not including)
   * `benefitYear`, flooring to the dime at the start and after every step.
   * Years without a published COLA use the default rate.
   */
  adjust(value: number, baseYear: number, benefitYear: number): number {
    if (benefitYear < baseYear) {
      throw new Error(`COLA adjustment runs forward only: ${baseYear} → ${benefitYear}`)
    }
    let adjusted = floorToDime(value)
    if (adjusted === 0) return 0
    for (let year = baseYear; year < benefitYear; year++) {
      const cola = this.published.get(year) ?? DEFAULT_COLA
      adjusted = floorToDime(adjusted * (1 + cola))
    }
    return adjusted
  }

  /**
   * Convert `value` expressed in `baseYear` dollars into current-year
   * dollars (compounded COLA, no flooring).
   */
  valueInCurrentDollars(value: number, baseYear: number): number {
    const earlier = Math.min(baseYear, this.currentYear)
    const later = Math.max(baseYear, this.currentYear)
    let factor = 1
    for (let year = earlier; year < later; year++) {
      factor *= 1 + (this.published.get(year) ?? DEFAULT_COLA)
    }
    return baseYear < this.currentYear ? value * factor : value / factor
  }
}

/**
 * Publish a non-negative COLA for every year, in ascending year order.
 *
 * A running index compounds every raw value since the last settled year.
 * A year settles when its COLA is published directly (previous year settled)
 * or when the running index exceeds 1.0 (publish the excess).
 */
export function carryForward(raw: ReadonlyYearSeries): YearSeries {
  const years = sortedYears(raw)
  const published: YearSeries = new Map()
  if (years.length === 0) return published

  let settledYear = years[0] - 1
  let index = 1.0

  for (const year of years) {
    const value = raw.get(year) ?? 0
    if (value < 0) {
      index *= 1 + value
      published.set(year, 0)
    } else if (settledYear < year - 1) {
      index *= 1 + value
      if (index > 1.0) {
        published.set(year, roundTo(index - 1.0, 3))
        settledYear = year
        index = 1.0
      } else {
        published.set(year, 0)
      }
    } else {
      published.set(year, roundTo(value, 3))
      settledYear = year
      index = 1.0
    }
  }

  return published
}
