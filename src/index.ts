export type {
  YearSeries,
  ReadonlyYearSeries,
  ScalarProjection,
  SequenceProjection,
  MappingProjection,
  Projection,
  YearsMonths,
  UseMaxEarnings,
  EarningsProfile,
  NextIncomeAmount,
  IncomeFutureByNext,
  IncomeFutureByProfile,
  IncomeFuture,
  IndexHistoryRow,
  IndexProjectionRow,
  BaseBenefitResult,
  BenefitInfo,
} from './model/types'
export { scalar, sequence, mapping, age } from './model/types'
export { roundTo, floorToDime, floorToDollar } from './model/rounding'
export {
  sortedYears,
  serializeYearSeries,
  deserializeYearSeries,
  yearSeriesToRows,
  rowsToYearSeries,
} from './model/serialize'
export type { SerializedYearSeries, YearValueRow } from './model/serialize'
export {
  parseOrThrow,
  projectionSchema,
  earningsProfileSchema,
  incomeFutureSchema,
  indexHistoryTableSchema,
  indexProjectionTableSchema,
  workerOptionsSchema,
} from './model/schemas'
export type { WorkerOptions } from './model/schemas'

export { resolveProjection } from './rules/projection'
export { ColaIndex, carryForward } from './rules/cola'
export type { ColaView } from './rules/cola'
export { WageIndex, maxWageFormula, bendPoint1Formula, bendPoint2Formula, piaFormula } from './rules/wageIndex'
export { IndexEngine } from './rules/indexEngine'
export type { IndexEngineInput } from './rules/indexEngine'
export { BenefitConfig, validateIndexHistory, projectionsFromTable } from './rules/config'
export type { BenefitConfigInput, IndexHistory } from './rules/config'
export { Earnings, defaultIncomeFuture } from './rules/earnings'
export type { EarningsContext } from './rules/earnings'
export { Worker } from './rules/worker'
export type { NextIncomeOptions } from './rules/worker'
export { fullRetirementAge, delayedCreditRate, benefitMultiplier, canClaimAtExactly62 } from './rules/multiplier'
export type { MultiplierInput } from './rules/multiplier'
export { subtractAge, compareAge, sameAge, minAge } from './rules/age'
export { parseBirthday, benefitBirthdayOf, monthAtAge, isBefore } from './rules/dates'
export type { YearMonth } from './rules/dates'
export { Logger, logger, resolveLevel, processSink } from './utils/logger'
export type { LogLevel, LogThreshold, LogEntry, LogSink, EngineLogger, LoggerOptions } from './utils/logger'
