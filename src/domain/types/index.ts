export type { PitchClass, PitchClassSequence, Row } from './pitchClass'

export type {
  IntervalVector,
  PrimeForm,
  ForteLabel,
  Combinatoriality,
  SetClassEntry,
} from './setClass'

export type {
  TransformationKind,
  RowSegmentOptions,
  CombinatorialTransforms,
  RowDerivation,
  RowAnalysis,
} from './rowAnalysis'

export type { CorpusEntry, AnthologySectionId, AnthologySection } from './corpus'
