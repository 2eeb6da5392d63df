/**
 * Civil-date helpers. All dates are UTC calendar dates; times never matter.
 */

import dayjs from 'dayjs'
import utc from 'dayjs/plugin/utc'
import type { Dayjs } from 'dayjs'
import type { YearsMonths } from '../model/types'

dayjs.extend(utc)

export interface YearMonth {
  year: number
  /** 1–12 */
  month: number
}

export function parseBirthday(iso: string): Dayjs {
  return dayjs.utc(iso)
}

/** SSA treats a person as attaining an age the day before their birthday. */
export function benefitBirthdayOf(birthday: Dayjs): Dayjs {
  return birthday.subtract(1, 'day')
}

/** First day of the month in which `from` + `age` falls. */
export function monthAtAge(from: Dayjs, age: YearsMonths): YearMonth {
  const date = from.date(1).add(age.years, 'year').add(age.months, 'month')
  return { year: date.year(), month: date.month() + 1 }
}

/** Strictly earlier (year, month). */
export function isBefore(lhs: YearMonth, rhs: YearMonth): boolean {
  return lhs.year < rhs.year || (lhs.year === rhs.year && lhs.month < rhs.month)
}
