import type {
  Combinatoriality,
  ForteLabel,
  IntervalVector,
  PitchClass,
  PrimeForm,
} from '../domain/types'
import { setClassCatalog } from '../domain/catalog'
import { InvalidEntryError, NoMatchingSetClassError } from '../domain/errors'
import { invert, mod12, transposeBy } from './transformations'

// ─────────────────────────────────────────────────────────────────────────────
// Pitch Class Set Analysis: pitches → interval vector → prime form → Forte class
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Picks one prime form out of several sharing an interval vector (a Z-related pair),
 * or returns undefined when none of them fits the pitches.
 */
export type ZRelationResolver = (
  candidates: readonly PrimeForm[],
  pitches: readonly PitchClass[]
) => PrimeForm | undefined

const ascending = (a: number, b: number) => a - b

/**
 * Distinct pitch classes of any list of integers, sorted.
 * Values are reduced mod 12 before duplicates are removed, so 0 and 12 collapse.
 */
export function distinctPitchClasses(pitches: readonly number[]): PitchClass[] {
  return [...new Set(pitches.map(mod12))].sort(ascending)
}

/**
 * Pitch classes of the aggregate missing from the set.
 */
export function complement(pitches: readonly number[]): PitchClass[] {
  const present = new Set(pitches.map(mod12))
  const missing: PitchClass[] = []
  for (let pc = 0; pc < 12; pc++) {
    if (!present.has(pc)) missing.push(pc)
  }
  return missing
}

/**
 * Count each interval class (1-6) over every unordered pair of distinct pitch classes.
 */
export function pitchesToIntervalVector(pitches: readonly number[]): IntervalVector {
  const pcs = distinctPitchClasses(pitches)
  const vector: [number, number, number, number, number, number] = [0, 0, 0, 0, 0, 0]

  for (let i = 0; i < pcs.length; i++) {
    for (let j = i + 1; j < pcs.length; j++) {
      const difference = Math.abs(pcs[j] - pcs[i])
      const intervalClass = Math.min(difference, 12 - difference)
      vector[intervalClass - 1] += 1
    }
  }

  return vector
}

/**
 * True if some transposition of `a` holds exactly the pitch classes of `b`.
 */
export function transpositionEquivalent(a: readonly number[], b: readonly number[]): boolean {
  if (a.length !== b.length) return false

  const target = b.map(mod12).sort(ascending)
  for (let semitones = 0; semitones < 12; semitones++) {
    const candidate = transposeBy(a, semitones).sort(ascending)
    if (candidate.every((pc, i) => pc === target[i])) {
      return true
    }
  }
  return false
}

/**
 * Default Z-relation resolver: try each candidate prime form, and its inversion,
 * at all 12 transpositions against the pitches; the first fit wins.
 */
export const resolveByTranspositionSearch: ZRelationResolver = (candidates, pitches) => {
  for (const prime of candidates) {
    for (const form of [prime, invert(prime)]) {
      if (transpositionEquivalent(form, pitches)) {
        return prime
      }
    }
  }
  return undefined
}

/**
 * Prime form of any collection of 2-10 distinct pitch classes.
 *
 * The interval vector identifies the set class directly except for Z-related
 * pairs (one pair of tetrachords, fifteen of hexachords, and the pentachord and
 * septachord and octachord pairs), which share a vector. Those go to `resolveZRelation`.
 */
export function pitchesToPrime(
  pitches: readonly number[],
  resolveZRelation: ZRelationResolver = resolveByTranspositionSearch
): PrimeForm {
  const pcs = distinctPitchClasses(pitches)
  const vector = pitchesToIntervalVector(pcs)
  const candidates = setClassCatalog.candidatesForVector(vector, pcs.length).map((e) => e.prime)

  if (candidates.length === 1) {
    return candidates[0]
  }

  if (candidates.length > 1) {
    const resolved = resolveZRelation(candidates, pcs)
    if (resolved) return resolved
  }

  throw new NoMatchingSetClassError(pcs)
}

export function pitchesToForteClass(pitches: readonly number[]): ForteLabel {
  const prime = pitchesToPrime(pitches)
  const entry = setClassCatalog.findByPrime(prime)
  if (!entry) {
    throw new InvalidEntryError(pitches)
  }
  return entry.label
}

/**
 * Combinatoriality via the interval vector (2, 3, 4 or 6 distinct pitch classes).
 */
export function pitchesToCombinatoriality(pitches: readonly number[]): Combinatoriality {
  return setClassCatalog.intervalVectorToCombinatoriality(pitchesToIntervalVector(pitches))
}

/**
 * True when the set's complement belongs to the same set class.
 */
export function isSelfComplementary(pitches: readonly number[]): boolean {
  const prime = pitchesToPrime(pitches)
  const complementPrime = pitchesToPrime(complement(pitches))
  return prime.length === complementPrime.length && prime.every((pc, i) => pc === complementPrime[i])
}
