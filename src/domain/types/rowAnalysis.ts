import type { PitchClass, PitchClassSequence } from './pitchClass'
import type { Combinatoriality, ForteLabel, PrimeForm } from './setClass'

export type TransformationKind = 'T' | 'I' | 'RI'

export interface RowSegmentOptions {
  /** Sliding window (true) or discrete partition (false) */
  overlapping?: boolean
  segmentLength?: number
  /** Overlapping mode only: continue the window around the end of the row */
  wrap?: boolean
}

/** Transposition levels at which the row pairs combinatorially with itself */
export type CombinatorialTransforms = Record<TransformationKind, PitchClass[]>

export interface RowDerivation {
  segmentLength: number
  segments: PitchClassSequence[]
  /** The one prime form every discrete segment belongs to */
  cell: PrimeForm
  selfRotational: boolean
  /** Constant interval from each segment to the next, when self-rotational */
  rotationInterval?: number
}

export interface RowAnalysis {
  row: PitchClassSequence
  derivations: RowDerivation[]
  allInterval: boolean
  allTrichord: boolean
  selfRetrograde: boolean
  selfRetrogradeInversion: boolean
  combinatorialType: Combinatoriality
  combinatorialTransforms: CombinatorialTransforms
  hexachordPrime: PrimeForm
  hexachordForteClass: ForteLabel
}
