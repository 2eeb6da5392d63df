/**
 * Benefit calculator — monthly benefit for a worker.
 *
 * Reference worker: born 1960-01-03 (SSA birthday 1960-01-02), earnings of
 * 40,000 in 1990, 60,000 in 2000 and 80,000 in 2010, nothing else.
 *
 *   AIME           = 506
 *   bend points    = 2209 / 13314 (AWI 2020 = 120,000)
 *   base benefit   = 506 × 0.9 = 455.40
 *   62y1m          = 0.704167 → floor(455.40 × 0.704167) = 320
 */

import { describe, it, expect } from 'vitest'
import { Worker } from '../../src/rules/worker'
import type { WorkerOptions } from '../../src/model/schemas'
import { age, mapping, scalar } from '../../src/model/types'
import type { BenefitConfig } from '../../src/rules/config'
import { makeCapturingLogger, makeConfig } from '../fixtures/indexTables'

function makeWorker(overrides: Partial<WorkerOptions> = {}, config: BenefitConfig = makeConfig()): Worker {
  return new Worker(config, {
    name: 'Pat',
    birthday: '1960-01-03',
    incomeHistory: mapping({ 1990: 40000, 2000: 60000, 2010: 80000 }),
    ...overrides,
  })
}

// ── 1. Identity and defaults ─────────────────────────────────

describe('Worker defaults', () => {
  it('derives the SSA birthday, FRA and computation years', () => {
    const worker = makeWorker()
    expect(worker.benefitBirthday.format('YYYY-MM-DD')).toBe('1960-01-02')
    expect(worker.fra).toEqual({ years: 67, months: 0 })
    expect(worker.maxIncomeYears).toBe(35)
  })

  it('collects and retires at FRA unless told otherwise', () => {
    const worker = makeWorker()
    expect(worker.getCollectionStartAge()).toEqual({ years: 67, months: 0 })
    expect(worker.getRetireAge()).toEqual({ years: 67, months: 0 })
    expect(worker.benefitStart()).toEqual({ year: 2027, month: 1 })
  })

  it('uses the previous year for FRA when born on January 1st', () => {
    const worker = makeWorker({ birthday: '1960-01-01' })
    expect(worker.benefitBirthYear).toBe(1959)
    expect(worker.fra).toEqual({ years: 66, months: 10 })
  })

  it('reports AIME with base benefit and bend points', () => {
    expect(makeWorker().getBenefitInfo()).toEqual({
      aime: 506,
      baseBenefit: 455.4,
      bendPoint1: 2209,
      bendPoint2: 13314,
    })
  })
})

// ── 2. Validation ────────────────────────────────────────────

describe('Worker option validation', () => {
  it('rejects a date that does not exist', () => {
    expect(() => makeWorker({ birthday: '1960-02-30' })).toThrow('Worker options: birthday: Date does not exist')
  })

  it('rejects months outside 0–11', () => {
    expect(() => makeWorker({ collectionStartAge: { years: 62, months: 12 } })).toThrow(
      'Worker options: collectionStartAge.months: Months must be 0–11',
    )
  })

  it('rejects an empty name', () => {
    expect(() => makeWorker({ name: '' })).toThrow(/^Worker options: name: /)
  })
})

// ── 3. Monthly benefit ───────────────────────────────────────

describe('getMonthlyBenefit', () => {
  it('pays nothing at exactly 62y0m when the SSA birthday is after the 1st', () => {
    const worker = makeWorker({ collectionStartAge: age(62, 0) })
    expect(worker.getMonthlyBenefit()).toBe(0)
    expect(worker.getMonthlyBenefit(2030, 6)).toBe(0)
  })

  it('pays the reduced benefit from 62y1m', () => {
    const worker = makeWorker({ collectionStartAge: age(62, 1) })
    expect(worker.benefitStart()).toEqual({ year: 2022, month: 2 })
    expect(worker.getMonthlyBenefit()).toBe(320)
    expect(worker.getMonthlyBenefit()).toBe(Math.floor(455.4 * worker.getBenefitMultiplier()))
  })

  it('pays from 62y0m when the SSA birthday is on the 1st', () => {
    const worker = makeWorker({ birthday: '1960-01-02', collectionStartAge: age(62, 0) })
    // 455.40 × 0.70
    expect(worker.getMonthlyBenefit()).toBe(318)
  })

  it('returns 0 before the benefit start month', () => {
    const worker = makeWorker({ collectionStartAge: age(62, 1) })
    expect(worker.getMonthlyBenefit(2022, 1)).toBe(0)
    expect(worker.getMonthlyBenefit(2021, 12)).toBe(0)
  })

  it('returns 0 when collecting before 62', () => {
    const worker = makeWorker({ collectionStartAge: age(61, 6) })
    expect(worker.getMonthlyBenefit()).toBe(0)
  })

  it('applies COLAs from the age-62 year', () => {
    const worker = makeWorker({ collectionStartAge: age(62, 1) })
    // 455.40 × 1.024 = 466.32 → 466.30
    expect(worker.colaAdjustedBase(2023)).toBe(466.3)
    expect(worker.getMonthlyBenefit(2023, 6)).toBe(328)
  })

  it('caches per year', () => {
    const worker = makeWorker({ collectionStartAge: age(62, 1) })
    expect(worker.getMonthlyBenefit(2023, 1)).toBe(328)
    expect(worker.getMonthlyBenefit(2023, 12)).toBe(328)
  })

  it('extends the COLA-adjusted base one year at a time', () => {
    const worker = makeWorker()
    expect(worker.colaAdjustedBase(2027)).toBe(512.5)
    expect(worker.colaAdjustedBase(2023)).toBe(466.3)
    expect(worker.getMonthlyBenefit()).toBe(512)
  })

  it('rejects a COLA base before the age-62 year', () => {
    expect(() => makeWorker().colaAdjustedBase(2021)).toThrow('Benefit year 2021 is before the age-62 year 2022')
  })
})

// ── 4. Mutators ──────────────────────────────────────────────

describe('Worker mutators', () => {
  it('recomputes after a collection start age change', () => {
    const worker = makeWorker({ collectionStartAge: age(62, 1) })
    expect(worker.getMonthlyBenefit(2023, 6)).toBe(328)

    worker.resetCollectionStartAge(age(63, 0))
    // 466.30 × 0.75
    expect(worker.getMonthlyBenefit(2023, 6)).toBe(349)
    expect(worker.getMonthlyBenefit(2022, 6)).toBe(0)
  })

  it('recomputes base benefit after a future profile change', () => {
    const worker = makeWorker({ collectionStartAge: age(62, 1) })
    expect(worker.getMonthlyBenefit()).toBe(320)

    worker.resetIncomeFutureByProfile(mapping({ 2025: 120000 }))
    expect(worker.getBenefitInfo().aime).toBe(791)
    expect(worker.getBenefitInfo().baseBenefit).toBe(711.9)
    expect(worker.getMonthlyBenefit()).toBe(501)
  })

  it('keeps unspecified next-year fields when the rule changes', () => {
    const worker = makeWorker()
    worker.resetIncomeFutureByNext({ nextIncomeAmount: { kind: 'amount', value: 60000 }, finalIncomeYear: 2023 })
    const earnings = worker.getEarnings()
    expect(earnings.getTotalEarningsInYear(2022)).toBe(60000)
    expect(earnings.getTotalEarningsInYear(2023)).toBeCloseTo(61747.2, 6)
    expect(worker.getAime()).toBe(796)
    expect(worker.getBenefitInfo().baseBenefit).toBe(716.4)
  })

  it('keeps the previous next-year rule when a new one is rejected', () => {
    const worker = makeWorker()
    worker.resetIncomeFutureByNext({ nextIncomeAmount: { kind: 'amount', value: 60000 }, finalIncomeYear: 2023 })
    expect(worker.getAime()).toBe(796)

    expect(() => worker.resetIncomeFutureByNext({ nextIncomeAmount: { kind: 'amount', value: -1 } })).toThrow(
      'Future income rule: nextIncomeAmount.value: Amount must be non-negative',
    )
    expect(worker.getAime()).toBe(796)

    worker.resetIncomeFutureByNext({ finalIncomeYear: 2023 })
    expect(worker.getEarnings().getTotalEarningsInYear(2022)).toBe(60000)
    expect(worker.getAime()).toBe(796)
  })

  it('truncates earnings at a new retirement age', () => {
    const worker = makeWorker()
    worker.resetIncomeFutureByProfile(mapping({ 2025: 120000 }))
    expect(worker.getAime()).toBe(791)

    worker.resetRetirementAge(age(62, 0))
    expect(worker.getAime()).toBe(506)
  })

  it('logs cache invalidation with the trigger', () => {
    const { logger, entries } = makeCapturingLogger()
    const worker = makeWorker({}, makeConfig({ logger }))
    worker.resetCollectionStartAge(age(63, 0))
    expect(entries.at(-1)).toEqual({
      timestamp: '2022-06-01T00:00:00.000Z',
      level: 'debug',
      message: 'Benefit caches invalidated',
      component: 'worker',
      worker: 'Pat',
      trigger: 'collectionStartAge',
    })
  })
})

// ── 5. Configuration changes ─────────────────────────────────

describe('Worker after a configuration change', () => {
  it('rebuilds on the next read once the config revision moves', () => {
    const config = makeConfig()
    const worker = makeWorker({ collectionStartAge: age(62, 1) }, config)
    expect(worker.getMonthlyBenefit(2023, 6)).toBe(328)

    config.setColaProjection(scalar(0.1))
    // 455.40 × 1.1 = 500.94 → 500.90, × 0.704167
    expect(worker.getMonthlyBenefit(2023, 6)).toBe(352)
  })

  it('rebuilds the COLA-adjusted base once the config revision moves', () => {
    const config = makeConfig()
    const worker = makeWorker({}, config)
    expect(worker.colaAdjustedBase(2023)).toBe(466.3)

    config.setColaProjection(scalar(0.1))
    expect(worker.colaAdjustedBase(2023)).toBe(500.9)
  })

  it('logs the refresh', () => {
    const { logger, entries } = makeCapturingLogger()
    const config = makeConfig({ logger })
    const worker = makeWorker({}, config)
    config.setColaProjection(scalar(0.03))
    worker.getAime()
    expect(entries.at(-1)).toMatchObject({
      message: 'Worker refreshed after configuration change',
      worker: 'Pat',
      revision: 1,
    })
  })

  it('lets several workers share one config', () => {
    const config = makeConfig()
    const early = makeWorker({ name: 'Early', collectionStartAge: age(62, 1) }, config)
    const late = makeWorker({ name: 'Late', collectionStartAge: age(70, 0) }, config)
    expect(early.getMonthlyBenefit()).toBe(320)
    expect(late.getMonthlyBenefit()).toBeGreaterThan(early.getMonthlyBenefit())
  })
})
