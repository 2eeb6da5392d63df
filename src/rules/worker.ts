/**
 * Benefit calculator for one worker against a shared BenefitConfig.
 *
 * Pipeline:
 *   earnings → AIME → base benefit (age-62 dollars, bend points at age 60)
 *            → COLA-adjusted base for the benefit year
 *            → × claiming-age multiplier, floored to whole dollars
 *
 * Two per-year caches:
 *   - colaBase: COLA-adjusted base benefit. Extended one year at a time from
 *     the last cached year, never recomputed from scratch.
 *   - monthly: final monthly benefit. Keyed by year only, so a benefit that
 *     changes mid-year is reported at the first month requested.
 * Both are cleared on any worker input change and whenever the config's
 * revision moves.
 */

import type { Dayjs } from 'dayjs'
import type {
  BaseBenefitResult,
  BenefitInfo,
  EarningsProfile,
  IncomeFutureByNext,
  YearSeries,
  YearsMonths,
} from '../model/types'
import { earningsProfileSchema, incomeFutureSchema, parseOrThrow, workerOptionsSchema, yearsMonthsSchema } from '../model/schemas'
import type { WorkerOptions } from '../model/schemas'
import { floorToDollar } from '../model/rounding'
import type { EngineLogger } from '../utils/logger'
import type { BenefitConfig } from './config'
import { BENEFIT_AGE, COMPUTATION_YEARS_BASE, MAX_COMPUTATION_YEARS } from './constants'
import { benefitBirthdayOf, isBefore, monthAtAge, parseBirthday } from './dates'
import type { YearMonth } from './dates'
import { Earnings, defaultIncomeFuture } from './earnings'
import { benefitMultiplier, canClaimAtExactly62, fullRetirementAge } from './multiplier'
import { sameAge } from './age'

const EARLIEST_CLAIM: YearsMonths = { years: BENEFIT_AGE, months: 0 }

/** Fields of the next-year income rule a caller may override. */
export type NextIncomeOptions = Partial<Omit<IncomeFutureByNext, 'kind'>>

export class Worker {
  readonly name: string
  readonly birthday: Dayjs
  /** SSA birthday: the day before the actual one. */
  readonly benefitBirthday: Dayjs
  /** Full retirement age for the benefit birth year. */
  readonly fra: YearsMonths
  /** Number of top earning years averaged into AIME. */
  readonly maxIncomeYears: number

  private config: BenefitConfig
  private log: EngineLogger
  private earnings: Earnings
  private collectionStartAge: YearsMonths
  private incomeFuture: IncomeFutureByNext | null = null
  private base: BaseBenefitResult
  private colaBase: YearSeries = new Map()
  private monthly: YearSeries = new Map()
  private seenRevision: number

  constructor(config: BenefitConfig, options: WorkerOptions) {
    const opts = parseOrThrow(workerOptionsSchema, options, 'Worker options')
    this.config = config
    this.name = opts.name
    this.log = config.logger.child({ component: 'worker', worker: opts.name })

    this.birthday = parseBirthday(opts.birthday)
    this.benefitBirthday = benefitBirthdayOf(this.birthday)
    this.fra = fullRetirementAge(this.benefitBirthYear)
    this.maxIncomeYears = Math.min(MAX_COMPUTATION_YEARS, this.benefitBirthYear - COMPUTATION_YEARS_BASE)
    this.collectionStartAge = opts.collectionStartAge ?? this.fra

    const incomeFuture = opts.incomeFuture ?? defaultIncomeFuture(config.currentYear)
    if (incomeFuture.kind === 'next') this.incomeFuture = incomeFuture

    this.earnings = new Earnings(
      {
        config,
        birthYear: this.birthday.year(),
        benefitBirthday: this.benefitBirthday,
        computationYears: this.maxIncomeYears,
        log: this.log,
      },
      opts.incomeHistory,
      incomeFuture,
      opts.retireAge ?? this.fra,
    )
    this.seenRevision = config.revision
    this.base = this.computeBase()
  }

  get benefitBirthYear(): number {
    return this.benefitBirthday.year()
  }

  // ── Reads ────────────────────────────────────────────────────

  getAime(): number {
    this.refreshIfStale()
    return this.earnings.getAime()
  }

  getBenefitInfo(): BenefitInfo {
    this.refreshIfStale()
    return { aime: this.earnings.getAime(), ...this.base }
  }

  getEarnings(): Earnings {
    this.refreshIfStale()
    return this.earnings
  }

  getCollectionStartAge(): YearsMonths {
    return this.collectionStartAge
  }

  getRetireAge(): YearsMonths {
    return this.earnings.getRetireAge()
  }

  getBenefitMultiplier(claimAge: YearsMonths = this.collectionStartAge): number {
    return benefitMultiplier({
      claimAge,
      benefitBirthYear: this.benefitBirthYear,
      benefitBirthDay: this.benefitBirthday.date(),
    })
  }

  /** First month benefits are paid: SSA birthday + collection age. */
  benefitStart(): YearMonth {
    return monthAtAge(this.benefitBirthday, this.collectionStartAge)
  }

  /**
   * Monthly benefit for (year, month); defaults to the benefit-start month.
   * Returns 0 before the start month and for an ineligible claim.
   */
  getMonthlyBenefit(year?: number, month?: number): number {
    this.refreshIfStale()
    if (sameAge(this.collectionStartAge, EARLIEST_CLAIM) && !canClaimAtExactly62(this.benefitBirthday.date())) {
      return 0
    }

    const start = this.benefitStart()
    const when: YearMonth = { year: year ?? start.year, month: month ?? start.month }
    if (isBefore(when, start)) return 0

    const cached = this.monthly.get(when.year)
    if (cached !== undefined) return cached

    const multiplier = this.getBenefitMultiplier()
    if (multiplier === 0) return 0

    const benefit = floorToDollar(this.colaAdjustedBase(when.year) * multiplier)
    this.monthly.set(when.year, benefit)
    return benefit
  }

  /** Base benefit carried from the age-62 year to `year` under published COLAs. */
  colaAdjustedBase(year: number): number {
    this.refreshIfStale()
    const seedYear = this.benefitBirthYear + BENEFIT_AGE
    if (year < seedYear) {
      throw new Error(`Benefit year ${year} is before the age-62 year ${seedYear}`)
    }
    if (this.colaBase.size === 0) this.colaBase.set(seedYear, this.base.baseBenefit)

    let last = seedYear + this.colaBase.size - 1
    let value = this.colaBase.get(last) ?? this.base.baseBenefit
    while (last < year) {
      value = this.config.colaAdjust(value, last, last + 1)
      last++
      this.colaBase.set(last, value)
    }
    return this.colaBase.get(year) ?? value
  }

  // ── Mutators ─────────────────────────────────────────────────

  resetRetirementAge(retireAge: YearsMonths): void {
    const age = parseOrThrow(yearsMonthsSchema, retireAge, 'Retirement age')
    this.refreshIfStale()
    this.earnings.resetRetirementAge(age)
    this.invalidate('retireAge')
  }

  resetCollectionStartAge(collectionStartAge: YearsMonths): void {
    this.collectionStartAge = parseOrThrow(yearsMonthsSchema, collectionStartAge, 'Collection start age')
    this.refreshIfStale()
    this.invalidate('collectionStartAge')
  }

  resetIncomeFutureByProfile(profile: EarningsProfile): void {
    const parsed = parseOrThrow(earningsProfileSchema, profile, 'Future income profile')
    this.refreshIfStale()
    this.incomeFuture = null
    this.earnings.resetIncomeFuture({ kind: 'profile', profile: parsed })
    this.invalidate('incomeFutureByProfile')
  }

  /** Unset fields keep their previous next-year values (or the defaults). */
  resetIncomeFutureByNext(options: NextIncomeOptions = {}): void {
    this.refreshIfStale()
    const previous = this.incomeFuture ?? defaultIncomeFuture(this.config.currentYear)
    const next: IncomeFutureByNext = {
      kind: 'next',
      nextIncomeYear: options.nextIncomeYear !== undefined ? options.nextIncomeYear : previous.nextIncomeYear,
      nextIncomeAmount: options.nextIncomeAmount ?? previous.nextIncomeAmount,
      personalWageGrowth: options.personalWageGrowth ?? previous.personalWageGrowth,
      finalIncomeYear: options.finalIncomeYear ?? previous.finalIncomeYear,
    }
    const parsed = parseOrThrow(incomeFutureSchema, next, 'Future income rule')
    this.incomeFuture = next
    this.earnings.resetIncomeFuture(parsed)
    this.invalidate('incomeFutureByNext')
  }

  // ── Cache maintenance ────────────────────────────────────────

  private computeBase(): BaseBenefitResult {
    return this.config.baseBenefit(this.benefitBirthYear, this.earnings.getAime())
  }

  private invalidate(trigger: string): void {
    this.base = this.computeBase()
    this.colaBase.clear()
    this.monthly.clear()
    this.log.debug('Benefit caches invalidated', { trigger })
  }

  private refreshIfStale(): void {
    if (this.config.revision === this.seenRevision) return
    this.seenRevision = this.config.revision
    this.earnings.refresh()
    this.invalidate('configRevision')
    this.log.debug('Worker refreshed after configuration change', { revision: this.seenRevision })
  }
}
