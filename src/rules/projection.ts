/**
 * Projection Resolver
 *
 * Merges a caller-supplied projection into one contiguous year series over
 * [startYear, endYear]. A year with no value takes the most recent earlier
 * resolved value, or `defaultRate` when there is none. Mapping entries
 * outside the range are ignored.
 *
 *   resolveProjection(2023, 2030, scalar(0.03), 0.024)       → 0.03 for every year
 *   resolveProjection(2023, 2026, sequence([0.01, 0.02]), 0) → 0.01, 0.02, 0.02, 0.02
 */

import type { Projection, YearSeries } from '../model/types'

export function resolveProjection(
  startYear: number,
  endYear: number,
  projection: Projection,
  defaultRate: number,
): YearSeries {
  const given = explicitValues(startYear, endYear, projection)
  const resolved: YearSeries = new Map()
  let recent: number | undefined

  for (let year = startYear; year <= endYear; year++) {
    const value = given.get(year)
    if (value !== undefined) {
      recent = value
      resolved.set(year, value)
    } else {
      resolved.set(year, recent ?? defaultRate)
    }
  }

  return resolved
}

function explicitValues(startYear: number, endYear: number, projection: Projection): YearSeries {
  switch (projection.kind) {
    case 'scalar': {
      const values: YearSeries = new Map()
      for (let year = startYear; year <= endYear; year++) values.set(year, projection.value)
      return values
    }
    case 'sequence': {
      const values: YearSeries = new Map()
      projection.values.forEach((value, i) => {
        if (startYear + i <= endYear) values.set(startYear + i, value)
      })
      return values
    }
    case 'mapping':
      return new Map(projection.values)
  }
}
