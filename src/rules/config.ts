/**
 * BenefitConfig: the per-session configuration every worker reads.
 *
 * Built once from the historical index table (plus optional projection
 * table and caller overrides), validated at the boundary, and then the only
 * path through which workers see max wage, AWI and COLA. Replacing a
 * projection re-derives the index series in place and bumps `revision` so
 * workers know their cached results are stale.
 */

import type {
  BaseBenefitResult,
  IndexHistoryRow,
  IndexProjectionRow,
  Projection,
  ReadonlyYearSeries,
  YearSeries,
} from '../model/types'
import { scalar } from '../model/types'
import { indexHistoryTableSchema, indexProjectionTableSchema, parseOrThrow, projectionSchema } from '../model/schemas'
import { logger as rootLogger } from '../utils/logger'
import type { EngineLogger } from '../utils/logger'
import { DEFAULT_COLA, DEFAULT_WAGE_GROWTH, MW_AWI_OFFSET, MW_COLA_OFFSET } from './constants'
import { IndexEngine } from './indexEngine'

// ── Table validation ─────────────────────────────────────────────

export interface IndexHistory {
  currentYear: number
  maxWages: YearSeries
  cola: YearSeries
  awi: YearSeries
}

/**
 * Check the table boundaries and split it into series.
 *
 * current year = latest year in the table. Max wages must exist for it,
 * COLA for current − 1 and AWI for current − 2; no COLA or AWI may appear
 * past those years.
 */
export function validateIndexHistory(rows: readonly IndexHistoryRow[]): IndexHistory {
  if (rows.length === 0) throw new Error('Index history table is empty')

  const currentYear = Math.max(...rows.map((r) => r.year))
  const colaMaxYear = currentYear - MW_COLA_OFFSET
  const awiMaxYear = currentYear - MW_AWI_OFFSET

  const maxWages: YearSeries = new Map()
  const cola: YearSeries = new Map()
  const awi: YearSeries = new Map()
  const seen = new Set<number>()

  for (const row of rows) {
    if (seen.has(row.year)) throw new Error(`Index history: duplicate row for ${row.year}`)
    seen.add(row.year)

    if (row.maxWages !== undefined) maxWages.set(row.year, row.maxWages)
    if (row.cola !== undefined) {
      if (row.year > colaMaxYear) {
        throw new Error(`Index history: COLA must not be defined for ${row.year} (latest is ${colaMaxYear})`)
      }
      cola.set(row.year, row.cola)
    }
    if (row.awi !== undefined) {
      if (row.year > awiMaxYear) {
        throw new Error(`Index history: AWI must not be defined for ${row.year} (latest is ${awiMaxYear})`)
      }
      awi.set(row.year, row.awi)
    }
  }

  if (!maxWages.has(currentYear)) {
    throw new Error(`Index history: Max_Wages must be defined for ${currentYear}`)
  }
  if (!cola.has(colaMaxYear)) {
    throw new Error(`Index history: COLA must be defined for ${colaMaxYear}`)
  }
  if (!awi.has(awiMaxYear)) {
    throw new Error(`Index history: AWI must be defined for ${awiMaxYear}`)
  }

  return { currentYear, maxWages, cola, awi }
}

/** Turn the projection table's columns into mapping projections. */
export function projectionsFromTable(rows: readonly IndexProjectionRow[]): {
  cola?: Projection
  wageGrowth?: Projection
} {
  const cola: YearSeries = new Map()
  const wageGrowth: YearSeries = new Map()
  for (const row of rows) {
    if (row.cola !== undefined) cola.set(row.year, row.cola)
    if (row.awiIncrease !== undefined) wageGrowth.set(row.year, row.awiIncrease)
  }
  return {
    cola: cola.size > 0 ? { kind: 'mapping', values: cola } : undefined,
    wageGrowth: wageGrowth.size > 0 ? { kind: 'mapping', values: wageGrowth } : undefined,
  }
}

// ── Config ───────────────────────────────────────────────────────

export interface BenefitConfigInput {
  history: readonly IndexHistoryRow[]
  /** Default projections; caller projections below take precedence. */
  projections?: readonly IndexProjectionRow[]
  colaProjection?: Projection
  wageGrowthProjection?: Projection
  logger?: EngineLogger
}

export class BenefitConfig {
  readonly currentYear: number
  private engine: IndexEngine
  private log: EngineLogger
  private _revision = 0

  private constructor(history: IndexHistory, colaProjection: Projection, wageGrowthProjection: Projection, log: EngineLogger) {
    this.currentYear = history.currentYear
    this.log = log
    this.engine = new IndexEngine(
      {
        currentYear: history.currentYear,
        colaHistory: history.cola,
        awiHistory: history.awi,
        maxWageHistory: history.maxWages,
        colaProjection,
        wageGrowthProjection,
      },
      log,
    )
  }

  static fromTables(input: BenefitConfigInput): BenefitConfig {
    const log = (input.logger ?? rootLogger).child({ component: 'config' })
    const rows = parseOrThrow(indexHistoryTableSchema, input.history, 'Index history')
    const history = validateIndexHistory(rows)

    const fromTable = projectionsFromTable(
      parseOrThrow(indexProjectionTableSchema, input.projections ?? [], 'Index projections'),
    )
    const colaProjection = input.colaProjection
      ? parseOrThrow(projectionSchema, input.colaProjection, 'COLA projection')
      : fromTable.cola ?? scalar(DEFAULT_COLA)
    const wageGrowthProjection = input.wageGrowthProjection
      ? parseOrThrow(projectionSchema, input.wageGrowthProjection, 'Wage growth projection')
      : fromTable.wageGrowth ?? scalar(DEFAULT_WAGE_GROWTH)

    const config = new BenefitConfig(history, colaProjection, wageGrowthProjection, log)
    log.info('Index tables accepted', {
      currentYear: history.currentYear,
      historyRows: rows.length,
      colaProjection: colaProjection.kind,
      wageGrowthProjection: wageGrowthProjection.kind,
    })
    return config
  }

  /** Bumped whenever a projection change re-derives the index series. */
  get revision(): number {
    return this._revision
  }

  get logger(): EngineLogger {
    return this.log
  }

  // ── Projection changes ───────────────────────────────────────

  setColaProjection(projection: Projection): void {
    this.engine.setColaProjection(parseOrThrow(projectionSchema, projection, 'COLA projection'))
    this.bump('cola')
  }

  setWageGrowthProjection(projection: Projection): void {
    this.engine.setWageGrowthProjection(parseOrThrow(projectionSchema, projection, 'Wage growth projection'))
    this.bump('wageGrowth')
  }

  /** Re-derive with unchanged projections. Produces identical series. */
  rederive(): void {
    this.engine.rederive()
    this.bump('rederive')
  }

  private bump(trigger: string): void {
    this._revision++
    this.log.debug('Index series re-derived', { trigger, revision: this._revision })
  }

  // ── Lookups ──────────────────────────────────────────────────

  getMaxWage(year: number): number {
    return this.engine.wages.getMaxWage(year)
  }

  getAwi(year: number): number {
    return this.engine.wages.getAwi(year)
  }

  getCola(year: number): number | undefined {
    return this.engine.cola.colaFor(year)
  }

  getColaHistory(): ReadonlyYearSeries {
    return this.engine.cola.history()
  }

  getMaxWageHistory(): ReadonlyYearSeries {
    return this.engine.wages.maxWageSeries()
  }

  getAwiHistory(): ReadonlyYearSeries {
    return this.engine.wages.awiSeries()
  }

  incomeIndexFactor(birthYear: number): YearSeries {
    return this.engine.wages.incomeIndexFactor(birthYear)
  }

  baseBenefit(birthYear: number, aime: number): BaseBenefitResult {
    return this.engine.wages.baseBenefit(birthYear, aime)
  }

  colaAdjust(value: number, baseYear: number, benefitYear: number): number {
    return this.engine.cola.adjust(value, baseYear, benefitYear)
  }

  valueInCurrentDollars(value: number, baseYear: number): number {
    return this.engine.cola.valueInCurrentDollars(value, baseYear)
  }
}
