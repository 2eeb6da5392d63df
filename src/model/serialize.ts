/**
 * YearSeries ↔ plain-object conversion for tabular interchange.
 *
 * Maps do not survive JSON.stringify, so anything leaving the engine
 * (JSON exports, test snapshots, API payloads) goes through these.
 */

import type { ReadonlyYearSeries, YearSeries } from './types'

export type SerializedYearSeries = Record<string, number>

export interface YearValueRow {
  year: number
  value: number
}

/** Sorted ascending by year. */
export function sortedYears(series: ReadonlyYearSeries): number[] {
  return [...series.keys()].sort((a, b) => a - b)
}

export function serializeYearSeries(series: ReadonlyYearSeries): SerializedYearSeries {
  const out: SerializedYearSeries = {}
  for (const year of sortedYears(series)) {
    const value = series.get(year)
    if (value !== undefined) out[String(year)] = value
  }
  return out
}

export function deserializeYearSeries(serialized: SerializedYearSeries): YearSeries {
  const series: YearSeries = new Map()
  for (const [key, value] of Object.entries(serialized)) {
    series.set(Number(key), value)
  }
  return series
}

export function yearSeriesToRows(series: ReadonlyYearSeries): YearValueRow[] {
  return sortedYears(series).map((year) => ({ year, value: series.get(year) ?? 0 }))
}

export function rowsToYearSeries(rows: readonly YearValueRow[]): YearSeries {
  return new Map(rows.map((r) => [r.year, r.value]))
}
