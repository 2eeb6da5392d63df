/**
 * Wage/Inflation Index Engine
 *
 * Owns the COLA series and the AWI / max-wage series and keeps them in step.
 * The max-wage rule reads COLA, so derivation is an ordered two-step
 * pipeline: COLA first (it never sees the wage side), then wages against a
 * read-only view of COLA. Any projection change replays both steps once.
 */

import type { Projection, ReadonlyYearSeries } from '../model/types'
import type { EngineLogger } from '../utils/logger'
import { ColaIndex } from './cola'
import { WageIndex } from './wageIndex'

export interface IndexEngineInput {
  currentYear: number
  colaHistory: ReadonlyYearSeries
  awiHistory: ReadonlyYearSeries
  maxWageHistory: ReadonlyYearSeries
  colaProjection: Projection
  wageGrowthProjection: Projection
}

export class IndexEngine {
  readonly cola: ColaIndex
  readonly wages: WageIndex
  private log: EngineLogger

  constructor(input: IndexEngineInput, log: EngineLogger) {
    this.log = log
    this.cola = new ColaIndex(input.currentYear, input.colaHistory, input.colaProjection)
    this.wages = new WageIndex(
      input.currentYear,
      input.awiHistory,
      input.maxWageHistory,
      input.wageGrowthProjection,
      this.cola,
    )
  }

  setColaProjection(projection: Projection): void {
    this.cola.setProjection(projection)
    this.log.debug('COLA projection replaced; re-deriving wage index')
    this.wages.derive()
  }

  setWageGrowthProjection(projection: Projection): void {
    this.wages.setProjection(projection)
    this.log.debug('Wage growth projection replaced')
  }

  /** Replay both derivation steps with the current projections. */
  rederive(): void {
    this.cola.derive()
    this.wages.derive()
  }
}
