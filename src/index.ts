// Domain
export * from './domain/types'
export * from './domain/errors'
export * from './domain/catalog'

// Transformations
export {
  mod12,
  transposeBy,
  transposeTo,
  retrograde,
  invert,
  pitchesToIntervals,
  rotate,
  rotateHexachords,
  pairSwapKrenek,
} from './services/transformations'

// Pitch class sets
export {
  distinctPitchClasses,
  complement,
  pitchesToIntervalVector,
  transpositionEquivalent,
  resolveByTranspositionSearch,
  pitchesToPrime,
  pitchesToForteClass,
  pitchesToCombinatoriality,
  isSelfComplementary,
  type ZRelationResolver,
} from './services/pcSetAnalysis'

// Rows
export * from './services/rowAnalysis'
export * from './services/rowProperties'
export { parseRow, stringToPitchClass, type RowInput, type ParseRowOptions } from './services/rowParser'
export { parseCorpus, corpusEntrySchema, buildAnthology } from './services/anthology'
