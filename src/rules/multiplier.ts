/**
 * Full retirement age and the claiming-age benefit multiplier.
 *
 * For a 1960+ benefit birth year (FRA 67):
 *   62y0m → 0.70 (only for an SSA birthday on the 1st)
 *   62y1m → 0.704167
 *   64y0m → 0.80
 *   67y0m → 1.00
 *   70y0m → 1.24 (no further credit after 70)
 */

import type { YearsMonths } from '../model/types'
import { compareAge, minAge, sameAge, subtractAge } from './age'
import {
  BENEFIT_AGE,
  DELAYED_CREDIT_BY_BIRTH_YEAR,
  EARLY_REDUCTION_FIRST_TIER,
  EARLY_REDUCTION_FLOOR,
  EXTRA_EARLY_REDUCTION_PER_YEAR,
  MAX_CREDIT_AGE,
} from './constants'

const EARLIEST_CLAIM: YearsMonths = { years: BENEFIT_AGE, months: 0 }

/** Full retirement age for a benefit birth year. */
export function fullRetirementAge(birthYear: number): YearsMonths {
  if (birthYear <= 1937) return { years: 65, months: 0 }
  if (birthYear < 1943) return { years: 65, months: 2 * (birthYear - 1937) }
  if (birthYear <= 1954) return { years: 66, months: 0 }
  if (birthYear < 1960) return { years: 66, months: 2 * (birthYear - 1954) }
  return { years: 67, months: 0 }
}

/** Delayed retirement credit per year, clamped to the table's edges. */
export function delayedCreditRate(birthYear: number): number {
  const years = [...DELAYED_CREDIT_BY_BIRTH_YEAR.keys()]
  const first = Math.min(...years)
  const last = Math.max(...years)
  const clamped = Math.min(Math.max(birthYear, first), last)
  return DELAYED_CREDIT_BY_BIRTH_YEAR.get(clamped) ?? 0
}

/**
 * True when a claim at exactly 62y0m is allowed: only when the SSA birthday
 * (one day before the actual one) falls on the 1st, so the worker is 62
 * for the whole month.
 */
export function canClaimAtExactly62(benefitBirthDay: number): boolean {
  return benefitBirthDay === 1
}

export interface MultiplierInput {
  claimAge: YearsMonths
  benefitBirthYear: number
  /** Day of month of the SSA (benefit-calculation) birthday. */
  benefitBirthDay: number
}

export function benefitMultiplier({ claimAge, benefitBirthYear, benefitBirthDay }: MultiplierInput): number {
  const start = minAge(claimAge, MAX_CREDIT_AGE)

  if (compareAge(start, EARLIEST_CLAIM) < 0) return 0
  if (sameAge(start, EARLIEST_CLAIM) && !canClaimAtExactly62(benefitBirthDay)) return 0

  const fra = fullRetirementAge(benefitBirthYear)

  const aboveFra = subtractAge(start, fra)
  if (aboveFra.years >= 0) {
    const credit = delayedCreditRate(benefitBirthYear)
    return 1.0 + credit * aboveFra.years + (credit * aboveFra.months) / 12
  }

  // First 36 months before FRA
  const reductionStart = subtractAge(fra, { years: 3, months: 0 })
  const aboveStart = subtractAge(start, reductionStart)
  if (aboveStart.years >= 0) {
    return (
      EARLY_REDUCTION_FLOOR +
      (EARLY_REDUCTION_FIRST_TIER * aboveStart.years) / 3 +
      (EARLY_REDUCTION_FIRST_TIER * aboveStart.months) / 36
    )
  }

  const below = subtractAge(reductionStart, start)
  return (
    EARLY_REDUCTION_FLOOR -
    EXTRA_EARLY_REDUCTION_PER_YEAR * below.years -
    (EXTRA_EARLY_REDUCTION_PER_YEAR * below.months) / 12
  )
}
