/**
 * Worker Earnings Engine
 *
 * Keeps two parallel views of a worker's earnings:
 *   - total earnings: what the worker actually earned (uncapped). Only
 *     needed to prorate the retirement year.
 *   - SS earnings: total earnings capped at each year's max taxable wage.
 *
 * History always wins over a future estimate for the same year. Historical
 * amounts above the cap are assumed to be total income and are capped.
 * From the retirement month on, earnings stop: the retirement year keeps
 * floor(total × (month − 1) / 12), later years are zero.
 *
 * AIME = floor(sum of the top N indexed years / N / 12).
 */

import type { Dayjs } from 'dayjs'
import type {
  EarningsProfile,
  IncomeFuture,
  IncomeFutureByNext,
  Projection,
  ReadonlyYearSeries,
  YearSeries,
  YearsMonths,
} from '../model/types'
import type { EngineLogger } from '../utils/logger'
import type { BenefitConfig } from './config'
import { resolveProjection } from './projection'
import { monthAtAge } from './dates'
import { DEFAULT_PERSONAL_WAGE_GROWTH, LIFESPAN_YEARS, START_MAX_INCOME_AGE } from './constants'

export interface EarningsContext {
  config: BenefitConfig
  /** Actual birth year (history sequences are anchored here). */
  birthYear: number
  /** SSA birthday: one day before the actual birthday. */
  benefitBirthday: Dayjs
  /** N in the AIME formula. */
  computationYears: number
  log: EngineLogger
}

/** Keep earning from the current year on, grown from last year's history. */
export function defaultIncomeFuture(currentYear: number): IncomeFutureByNext {
  return {
    kind: 'next',
    nextIncomeYear: currentYear,
    nextIncomeAmount: { kind: 'extrapolate' },
    personalWageGrowth: { kind: 'scalar', value: DEFAULT_PERSONAL_WAGE_GROWTH },
  }
}

export class Earnings {
  private ctx: EarningsContext
  private incomeHistory: EarningsProfile
  private incomeFuture: IncomeFuture
  private retireAge: YearsMonths

  private indexFactor: YearSeries = new Map()
  private totalHistory: YearSeries = new Map()
  private ssHistory: YearSeries = new Map()
  private totalFuture: YearSeries = new Map()
  private ssFuture: YearSeries = new Map()
  private totalAll: YearSeries = new Map()
  private ssAll: YearSeries = new Map()
  private totalToRetire: YearSeries = new Map()
  private ssToRetire: YearSeries = new Map()
  private indexed: YearSeries = new Map()
  private aime = 0

  constructor(ctx: EarningsContext, incomeHistory: EarningsProfile, incomeFuture: IncomeFuture, retireAge: YearsMonths) {
    this.ctx = ctx
    this.incomeHistory = incomeHistory
    this.incomeFuture = incomeFuture
    this.retireAge = retireAge
    this.refresh()
  }

  private get currentYear(): number {
    return this.ctx.config.currentYear
  }

  /** Last year any earnings series covers. */
  get finalYear(): number {
    return this.ctx.birthYear + LIFESPAN_YEARS
  }

  // ── Mutators ─────────────────────────────────────────────────

  /** Rebuild every series from the stored inputs against the current config. */
  refresh(): void {
    this.indexFactor = this.ctx.config.incomeIndexFactor(this.ctx.benefitBirthday.year())
    this.setHistory()
    this.setFuture()
    this.combine()
    this.applyRetirement()
    this.calcAime()
  }

  resetRetirementAge(retireAge: YearsMonths): void {
    this.retireAge = retireAge
    this.applyRetirement()
    this.calcAime()
  }

  resetIncomeFuture(incomeFuture: IncomeFuture): void {
    this.incomeFuture = incomeFuture
    this.setFuture()
    this.combine()
    this.applyRetirement()
    this.calcAime()
  }

  // ── Accessors ────────────────────────────────────────────────

  getAime(): number {
    return this.aime
  }

  getRetireAge(): YearsMonths {
    return this.retireAge
  }

  /** Capped, retirement-truncated earnings. */
  getSsEarnings(): ReadonlyYearSeries {
    return this.ssToRetire
  }

  /** Uncapped, retirement-truncated earnings. */
  getTotalEarnings(): ReadonlyYearSeries {
    return this.totalToRetire
  }

  getIndexedEarnings(): ReadonlyYearSeries {
    return this.indexed
  }

  getIndexFactor(): ReadonlyYearSeries {
    return this.indexFactor
  }

  getTotalEarningsInYear(year: number): number {
    return this.totalToRetire.get(year) ?? 0
  }

  // ── History ──────────────────────────────────────────────────

  private setHistory(): void {
    const { config, birthYear } = this.ctx
    this.totalHistory = this.profileSeries(this.incomeHistory, birthYear, birthYear + START_MAX_INCOME_AGE, this.currentYear - 1)

    this.ssHistory = new Map()
    for (let year = birthYear; year < this.currentYear; year++) {
      const total = this.totalHistory.get(year)
      if (total === undefined) {
        this.ssHistory.set(year, 0)
        continue
      }
      const maxWage = config.getMaxWage(year)
      if (total > maxWage) {
        this.ctx.log.debug('Capped historical earnings at max taxable wage', { year, total, maxWage })
      }
      this.ssHistory.set(year, Math.min(total, maxWage))
    }
  }

  // ── Future ───────────────────────────────────────────────────

  private setFuture(): void {
    this.totalFuture =
      this.incomeFuture.kind === 'profile'
        ? this.profileSeries(this.incomeFuture.profile, this.currentYear, this.currentYear, this.finalYear)
        : this.extrapolate(this.incomeFuture)

    for (let year = this.currentYear; year <= this.finalYear; year++) {
      if (!this.totalFuture.has(year)) this.totalFuture.set(year, 0)
    }

    this.ssFuture = new Map()
    for (const [year, total] of this.totalFuture) {
      this.ssFuture.set(year, Math.min(total, this.ctx.config.getMaxWage(year)))
    }
  }

  /**
   * Next-year rule: the first year is an explicit amount, the max wage, or the
   * previous year's history grown by the personal rate; every later year
   * grows the one before (or takes the max wage under useMax).
   */
  private extrapolate(future: IncomeFutureByNext): YearSeries {
    const series: YearSeries = new Map()
    const { nextIncomeYear, nextIncomeAmount } = future
    if (nextIncomeYear === null) return series

    const finalIncomeYear = future.finalIncomeYear ?? this.finalYear
    const growth = this.personalGrowth(future.personalWageGrowth)
    const growthIn = (year: number) => growth.get(year) ?? DEFAULT_PERSONAL_WAGE_GROWTH
    const { config } = this.ctx

    let first: number
    switch (nextIncomeAmount.kind) {
      case 'amount':
        first = nextIncomeAmount.value
        break
      case 'useMax':
        first = config.getMaxWage(nextIncomeYear)
        break
      case 'extrapolate': {
        const previous = this.totalHistory.get(nextIncomeYear - 1)
        first = previous === undefined ? 0 : previous * (1 + growthIn(nextIncomeYear))
        break
      }
    }
    series.set(nextIncomeYear, first)

    for (let year = nextIncomeYear + 1; year <= finalIncomeYear; year++) {
      if (nextIncomeAmount.kind === 'useMax') {
        series.set(year, config.getMaxWage(year))
      } else {
        series.set(year, (series.get(year - 1) ?? 0) * (1 + growthIn(year)))
      }
    }
    return series
  }

  /** Sequences of personal growth start at the current year. */
  private personalGrowth(projection: Projection): YearSeries {
    const anchored: Projection =
      projection.kind === 'sequence'
        ? { kind: 'mapping', values: new Map(projection.values.map((v, i) => [this.currentYear + i, v])) }
        : projection
    return resolveProjection(this.ctx.birthYear, this.finalYear, anchored, DEFAULT_PERSONAL_WAGE_GROWTH)
  }

  // ── Shared ───────────────────────────────────────────────────

  /**
   * Expand a profile. Sequences start at `anchorYear`; useMax fills
   * `maxFrom` … `maxThrough` with the max taxable wage.
   */
  private profileSeries(profile: EarningsProfile, anchorYear: number, maxFrom: number, maxThrough: number): YearSeries {
    switch (profile.kind) {
      case 'sequence':
        return new Map(profile.values.map((value, i) => [anchorYear + i, value]))
      case 'mapping':
        return new Map(profile.values)
      case 'useMax': {
        const series: YearSeries = new Map()
        for (let year = maxFrom; year <= maxThrough; year++) {
          series.set(year, this.ctx.config.getMaxWage(year))
        }
        return series
      }
    }
  }

  /** Future first, then history on top. The total view takes capped history. */
  private combine(): void {
    this.ssAll = new Map(this.ssFuture)
    this.totalAll = new Map(this.totalFuture)
    for (const [year, value] of this.ssHistory) {
      this.ssAll.set(year, value)
      this.totalAll.set(year, value)
    }
  }

  private applyRetirement(): void {
    this.totalToRetire = new Map(this.totalAll)
    this.ssToRetire = new Map(this.ssAll)
    const retire = monthAtAge(this.ctx.benefitBirthday, this.retireAge)

    for (let year = retire.year; year <= this.finalYear; year++) {
      const total = this.totalAll.get(year)
      if (year === retire.year && total !== undefined) {
        const partial = Math.floor((total * (retire.month - 1)) / 12)
        this.totalToRetire.set(year, partial)
        this.ssToRetire.set(year, Math.min(this.ssAll.get(year) ?? 0, partial))
      } else {
        this.totalToRetire.set(year, 0)
        this.ssToRetire.set(year, 0)
      }
    }
  }

  private calcAime(): void {
    this.indexed = new Map()
    for (const [year, income] of this.ssToRetire) {
      this.indexed.set(year, income * (this.indexFactor.get(year) ?? 0))
    }

    const n = this.ctx.computationYears
    const top = [...this.indexed.values()].sort((a, b) => b - a).slice(0, n)
    const sum = top.reduce((acc, v) => acc + v, 0)
    this.aime = Math.floor(sum / n / 12)
  }
}
