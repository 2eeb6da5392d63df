/**
 * (years, months) duration arithmetic. Months stay in 0–11; a borrow moves
 * into the years, which may go negative:
 *
 *   subtractAge({62,1}, {64,0}) → {-2, 1}
 *   subtractAge({64,0}, {62,1}) → {1, 11}
 */

import type { YearsMonths } from '../model/types'

export function subtractAge(lhs: YearsMonths, rhs: YearsMonths): YearsMonths {
  if (lhs.months < rhs.months) {
    return { years: lhs.years - 1 - rhs.years, months: lhs.months + 12 - rhs.months }
  }
  return { years: lhs.years - rhs.years, months: lhs.months - rhs.months }
}

/** Negative, zero or positive, like a sort comparator. */
export function compareAge(lhs: YearsMonths, rhs: YearsMonths): number {
  return lhs.years !== rhs.years ? lhs.years - rhs.years : lhs.months - rhs.months
}

export function sameAge(lhs: YearsMonths, rhs: YearsMonths): boolean {
  return compareAge(lhs, rhs) === 0
}

export function minAge(lhs: YearsMonths, rhs: YearsMonths): YearsMonths {
  return compareAge(lhs, rhs) <= 0 ? lhs : rhs
}
