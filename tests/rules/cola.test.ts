/**
 * COLA series — carry-forward of decreases, dime-floored adjustment and
 * present-value conversion.
 */

import { describe, it, expect } from 'vitest'
import { ColaIndex, carryForward } from '../../src/rules/cola'
import { mapping, scalar } from '../../src/model/types'
import { serializeYearSeries } from '../../src/model/serialize'

function flatHistory(from: number, to: number, rate: number): Map<number, number> {
  const history = new Map<number, number>()
  for (let year = from; year <= to; year++) history.set(year, rate)
  return history
}

// ── 1. carryForward ──────────────────────────────────────────

describe('carryForward', () => {
  it('publishes non-negative values unchanged, rounded to 3 places', () => {
    const published = carryForward(new Map([[2020, 0.0236], [2021, 0.05]]))
    expect(serializeYearSeries(published)).toEqual({ '2020': 0.024, '2021': 0.05 })
  })

  it('absorbs a decrease and releases the excess once the index passes 1.0', () => {
    // 0.995 × 1.015 = 1.009925 → 0.010
    const published = carryForward(new Map([[2020, 0.02], [2021, -0.005], [2022, 0.015]]))
    expect(serializeYearSeries(published)).toEqual({ '2020': 0.02, '2021': 0, '2022': 0.01 })
  })

  it('keeps publishing zero until the compounded index recovers', () => {
    // 0.97 × 1.01 = 0.9797 (still below 1), × 1.03 = 1.009091 → 0.009
    const published = carryForward(new Map([[2020, -0.03], [2021, 0.01], [2022, 0.03], [2023, 0.02]]))
    expect(serializeYearSeries(published)).toEqual({ '2020': 0, '2021': 0, '2022': 0.009, '2023': 0.02 })
  })

  it('returns an empty series for empty input', () => {
    expect(carryForward(new Map()).size).toBe(0)
  })
})

// ── 2. Derivation ────────────────────────────────────────────

describe('ColaIndex', () => {
  it('publishes history, then the projection from the current year on', () => {
    const cola = new ColaIndex(2022, flatHistory(2000, 2021, 0.02), scalar(0.03))
    expect(cola.colaFor(2021)).toBe(0.02)
    expect(cola.colaFor(2022)).toBe(0.03)
    expect(cola.colaFor(2151)).toBe(0.03)
    expect(cola.colaFor(2152)).toBeUndefined()
  })

  it('never lets a projection override history', () => {
    const cola = new ColaIndex(2022, flatHistory(2000, 2021, 0.02), mapping({ 2015: 0.5, 2023: 0.01 }))
    expect(cola.colaFor(2015)).toBe(0.02)
    expect(cola.colaFor(2022)).toBe(0.024)
    expect(cola.colaFor(2023)).toBe(0.01)
  })

  it('re-derives from raw history when the projection is replaced', () => {
    const cola = new ColaIndex(2022, flatHistory(2000, 2021, 0.02), scalar(-0.01))
    expect(cola.colaFor(2022)).toBe(0)
    cola.setProjection(scalar(0.01))
    expect(cola.colaFor(2022)).toBe(0.01)
    expect(cola.getProjection()).toEqual(scalar(0.01))
  })

  it('publishes no negative value anywhere', () => {
    const cola = new ColaIndex(2022, flatHistory(2000, 2021, 0.02), mapping({ 2022: -0.04, 2025: 0.01, 2030: -0.02 }))
    for (const value of cola.history().values()) {
      expect(value).toBeGreaterThanOrEqual(0)
    }
  })
})

// ── 3. adjust ────────────────────────────────────────────────

describe('ColaIndex.adjust', () => {
  const cola = new ColaIndex(2022, flatHistory(2000, 2021, 0.024), scalar(0.024))

  it('floors to the dime after every year, matching an explicit loop', () => {
    let expected = 1000
    for (let i = 0; i < 20; i++) expected = Math.floor(expected * (1 + 0.024) * 10) / 10
    expect(cola.adjust(1000, 2022, 2042)).toBe(expected)
    expect(cola.adjust(1000, 2022, 2042)).toBe(1605.8)
  })

  it('falls behind naive compounding within ten years', () => {
    const naive = 1000 * 1.024 ** 10
    const adjusted = cola.adjust(1000, 2022, 2032)
    expect(adjusted).toBe(1267.2)
    expect(naive - adjusted).toBeGreaterThan(0.4)
  })

  it('is non-decreasing in the benefit year when COLAs are non-negative', () => {
    let previous = 0
    for (let year = 2022; year <= 2060; year++) {
      const value = cola.adjust(850, 2022, year)
      expect(value).toBeGreaterThanOrEqual(previous)
      previous = value
    }
  })

  it('floors the starting value and returns it when no years elapse', () => {
    expect(cola.adjust(1234.56, 2030, 2030)).toBe(1234.5)
  })

  it('returns 0 for a zero value', () => {
    expect(cola.adjust(0, 2022, 2040)).toBe(0)
  })

  it('falls back to the default rate outside the published series', () => {
    const sparse = new ColaIndex(2022, new Map([[2021, 0.5]]), scalar(0.5))
    // 1990 has no published COLA: 100 × 1.024 = 102.4
    expect(sparse.adjust(100, 1990, 1991)).toBe(102.4)
  })

  it('rejects a benefit year before the base year', () => {
    expect(() => cola.adjust(1000, 2030, 2029)).toThrow('COLA adjustment runs forward only: 2030 → 2029')
  })
})

// ── 4. valueInCurrentDollars ─────────────────────────────────

describe('ColaIndex.valueInCurrentDollars', () => {
  const cola = new ColaIndex(2022, flatHistory(2000, 2021, 0.02), scalar(0.024))

  it('inflates a past value by the COLAs up to the current year', () => {
    expect(cola.valueInCurrentDollars(100, 2020)).toBeCloseTo(104.04, 10)
  })

  it('deflates a future value by the projected COLAs', () => {
    expect(cola.valueInCurrentDollars(100, 2024)).toBeCloseTo(95.367431640625, 10)
  })

  it('leaves a current-year value unchanged', () => {
    expect(cola.valueInCurrentDollars(100, 2022)).toBe(100)
  })
})
