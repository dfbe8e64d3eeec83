import type {
  Combinatoriality,
  CombinatorialTransforms,
  PitchClass,
  PitchClassSequence,
  PrimeForm,
  Row,
  RowDerivation,
  RowSegmentOptions,
  TransformationKind,
} from '../domain/types'
import {
  InvalidRowLengthError,
  InvalidSegmentLengthError,
  InvalidTransformationKindError,
  NotDerivedRowError,
} from '../domain/errors'
import { pitchesToCombinatoriality, pitchesToPrime } from './pcSetAnalysis'
import {
  invert,
  mod12,
  pitchesToIntervals,
  retrograde,
  transposeBy,
  transposeTo,
} from './transformations'

// ─────────────────────────────────────────────────────────────────────────────
// Constants (can be overridden via function parameters)
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_SEGMENT_LENGTH = 3

// Set classes start at dyads
const MIN_SEGMENT_LENGTH = 2

export const TRANSFORMATION_KINDS: readonly TransformationKind[] = ['T', 'I', 'RI']

const ROW_LENGTH = 12

const ascending = (a: number, b: number) => a - b

function sequencesEqual(a: PitchClassSequence, b: PitchClassSequence): boolean {
  return a.length === b.length && a.every((pc, i) => pc === b[i])
}

/**
 * True for exactly 12 pitches with no pitch class repeated.
 */
export function is12tone(row: PitchClassSequence): boolean {
  if (row.length !== ROW_LENGTH) return false
  return [...row].sort(ascending).every((pc, i) => pc === i)
}

// ─────────────────────────────────────────────────────────────────────────────
// Segments and Derived Rows
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Cut a row into sub-segments of `segmentLength` pitches.
 *
 * Overlapping (default): every window of consecutive pitches, i.e. trichords on
 * pitches 0-2, 1-3, 2-4 and so on. With `wrap` (default) the window continues
 * round the end of the row (10,11,0 and 11,0,1), giving one segment per pitch;
 * without it the list stops at the last full window.
 *
 * Discrete: adjacent, non-overlapping segments. The length must divide the row:
 * a 12-tone row gives 6 dyads, 4 trichords, 3 tetrachords or 2 hexachords.
 */
export function getRowSegments(
  row: PitchClassSequence,
  options: RowSegmentOptions = {}
): PitchClass[][] {
  const { overlapping = true, segmentLength = DEFAULT_SEGMENT_LENGTH, wrap = true } = options
  const totalPitches = row.length

  if (!Number.isInteger(segmentLength) || segmentLength < MIN_SEGMENT_LENGTH) {
    throw new InvalidSegmentLengthError(
      `The segment length (${segmentLength}) must be at least ${MIN_SEGMENT_LENGTH}`
    )
  }
  if (segmentLength >= totalPitches) {
    throw new InvalidSegmentLengthError(
      `The segment length (${segmentLength}) must be less than that of the row (${totalPitches})`
    )
  }

  const segments: PitchClass[][] = []

  if (overlapping) {
    const pitches = wrap ? [...row, ...row.slice(0, segmentLength - 1)] : [...row]
    for (let i = 0; i + segmentLength <= pitches.length; i++) {
      segments.push(pitches.slice(i, i + segmentLength))
    }
    return segments
  }

  if (totalPitches % segmentLength !== 0) {
    throw new InvalidSegmentLengthError(
      `When not overlapping, the segment length (${segmentLength}) ` +
        `must divide the number of pitches (${totalPitches})`
    )
  }

  for (let start = 0; start < totalPitches; start += segmentLength) {
    segments.push(row.slice(start, start + segmentLength))
  }
  return segments
}

/**
 * Look for one pitch class set recurring among the segments.
 *
 * Returns the repeated prime form(s), in order of first appearance, or an empty
 * list. With `exactlyOne` (default) a result is only returned when every segment
 * belongs to the same set class, i.e. the row is derived from that one cell.
 */
export function containsCell(
  segments: readonly PitchClassSequence[],
  exactlyOne: boolean = true
): PrimeForm[] {
  const counts = new Map<string, { prime: PrimeForm; count: number }>()

  for (const segment of segments) {
    const prime = pitchesToPrime(segment)
    const key = prime.join(',')
    const existing = counts.get(key)
    if (existing) {
      existing.count += 1
    } else {
      counts.set(key, { prime, count: 1 })
    }
  }

  const repeated = [...counts.values()].filter((c) => c.count > 1).map((c) => c.prime)

  if (repeated.length === 0) return []
  if (exactlyOne && counts.size !== 1) return []
  return repeated
}

/**
 * Constant interval from each segment to the next, element by element, if there is one.
 */
function rotationInterval(segments: readonly PitchClassSequence[]): number | undefined {
  const reference = mod12(segments[1][0] - segments[0][0])

  for (let index = 0; index < segments.length - 1; index++) {
    const segment = segments[index]
    const next = segments[index + 1]
    for (let i = 0; i < segment.length; i++) {
      if (mod12(next[i] - segment[i]) !== reference) {
        return undefined
      }
    }
  }
  return reference
}

/**
 * True in the rare case that a derived row is rotation symmetrical: each segment
 * is the previous one transposed by the same interval.
 *
 * Call on the segments of a derived row; throws if `containsCell` does not
 * confirm the derivation first.
 */
export function isSelfRotational(segments: readonly PitchClassSequence[]): boolean {
  if (containsCell(segments, true).length === 0) {
    throw new NotDerivedRowError()
  }
  return rotationInterval(segments) !== undefined
}

/**
 * Describe how a row is derived from discrete segments of one size, or
 * undefined if the segments are not all of one set class.
 */
export function deriveRow(row: Row, segmentLength: number): RowDerivation | undefined {
  const segments = getRowSegments(row, { overlapping: false, segmentLength })
  const cells = containsCell(segments, true)
  if (cells.length === 0) return undefined

  const interval = rotationInterval(segments)

  return {
    segmentLength,
    segments,
    cell: cells[0],
    selfRotational: interval !== undefined,
    rotationInterval: interval,
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Interval Properties and Symmetry
// ─────────────────────────────────────────────────────────────────────────────

/**
 * True when the adjacent intervals run through all of 1-11.
 * With `require12tone` (default) the row must also be a 12-tone row, in which
 * case each interval appears exactly once.
 */
export function isAllInterval(row: PitchClassSequence, require12tone: boolean = true): boolean {
  if (require12tone && !is12tone(row)) return false

  const intervals = new Set(pitchesToIntervals(row))
  for (let interval = 1; interval < 12; interval++) {
    if (!intervals.has(interval)) return false
  }
  return true
}

/**
 * True when the 12 wrapped, overlapping trichords are all different set classes.
 */
export function isAllTrichord(row: PitchClassSequence): boolean {
  const trichords = getRowSegments(row, { overlapping: true, segmentLength: 3, wrap: true })
  return containsCell(trichords, false).length === 0
}

/**
 * True if the retrograde, transposed to the row's starting pitch class, is the row itself.
 */
export function isSelfR(row: PitchClassSequence): boolean {
  return sequencesEqual(transposeTo(retrograde(row), 0), transposeTo(row, 0))
}

/**
 * True if the interval succession is a palindrome, which makes the row
 * transposition-equivalent to its retrograde-inversion.
 */
export function isSelfRI(row: PitchClassSequence): boolean {
  const intervals = pitchesToIntervals(row)
  return sequencesEqual(intervals, retrograde(intervals))
}

// ─────────────────────────────────────────────────────────────────────────────
// Combinatoriality
// ─────────────────────────────────────────────────────────────────────────────

export function isTransformationKind(kind: string): kind is TransformationKind {
  return TRANSFORMATION_KINDS.some((k) => k === kind)
}

/**
 * Combinatoriality of the row's first hexachord, by table lookup:
 * 'A' (all-combinatorial), 'T', 'I', 'RI', or '' if not combinatorial.
 *
 * Exactly six hexachords are all-combinatorial:
 * (0,1,2,3,4,5), (0,1,2,6,7,8), (0,2,3,4,5,7), (0,1,4,5,8,9), (0,2,4,5,7,9) and (0,2,4,6,8,10).
 */
export function combinatorialType(row: Row): Combinatoriality {
  return pitchesToCombinatoriality(row.slice(0, 6))
}

/**
 * True when the first hexachords of two 12-tone rows make up the aggregate together.
 */
export function combinatorialPair(row1: Row, row2: Row): boolean {
  for (const row of [row1, row2]) {
    if (row.length !== ROW_LENGTH) {
      throw new InvalidRowLengthError(row.length)
    }
  }
  const union = [...row1.slice(0, 6), ...row2.slice(0, 6)].sort(ascending)
  return union.every((pc, i) => pc === i)
}

/**
 * Transposition levels (0-11, ascending) at which the row, taken as P0, is
 * combinatorial with its own transposition (T), inversion (I) or
 * retrograde-inversion (RI). Inversion is around the row's first pitch.
 * An empty list means no combinatoriality of that kind.
 *
 * Levels are 0-based semitone offsets: the untransposed form is level 0, so the
 * whole-tone hexachord under RI gives [0, 2, 4, 6, 8, 10], not 2-12.
 */
export function combinatorialByTransform(row: Row, kind: string): number[] {
  if (!isTransformationKind(kind)) {
    throw new InvalidTransformationKindError(kind)
  }

  let comparisonRow = [...row]
  if (kind === 'I' || kind === 'RI') {
    comparisonRow = invert(comparisonRow)
    if (kind === 'RI') {
      comparisonRow = retrograde(comparisonRow)
    }
  }

  const matches: number[] = []
  for (let semitones = 0; semitones < 12; semitones++) {
    if (combinatorialPair(transposeBy(comparisonRow, semitones), row)) {
      matches.push(semitones)
    }
  }
  return matches
}

export function fullCombinatorialTransforms(row: Row): CombinatorialTransforms {
  return {
    T: combinatorialByTransform(row, 'T'),
    I: combinatorialByTransform(row, 'I'),
    RI: combinatorialByTransform(row, 'RI'),
  }
}

/**
 * e.g. { T: [3, 9], I: [1, 7], RI: [4, 10] } -> "T3,9; I1,7; RI4,10".
 * Kinds without matches are left out; no matches at all gives "".
 */
export function formatCombinatorialTransforms(transforms: CombinatorialTransforms): string {
  return TRANSFORMATION_KINDS.filter((kind) => transforms[kind].length > 0)
    .map((kind) => `${kind}${transforms[kind].join(',')}`)
    .join('; ')
}

/**
 * Every combinatorial transposition of the row, by reference to P0, as a string.
 * The chromatic scale gives "T6; I11; RI5".
 */
export function fullCombinatorialTypes(row: Row): string {
  return formatCombinatorialTransforms(fullCombinatorialTransforms(row))
}
