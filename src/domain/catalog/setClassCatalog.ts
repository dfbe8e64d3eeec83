import { z } from 'zod'
import setClassTable from './setClasses.json'
import type { Combinatoriality, IntervalVector, PrimeForm, SetClassEntry } from '../types'
import {
  InvalidCardinalityError,
  UnknownForteClassError,
  UnknownIntervalVectorError,
  UnknownPrimeFormError,
} from '../errors'

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

// Cardinalities 0, 1, 11 and 12 each hold a single trivial set class
export const MIN_CARDINALITY = 2
export const MAX_CARDINALITY = 10

// Interval vector sum -> cardinality, for the sizes where vector lookup of
// combinatoriality is supported (sum = n(n-1)/2)
const VECTOR_SUM_TO_CARDINALITY: ReadonlyMap<number, number> = new Map([
  [1, 2],
  [3, 3],
  [6, 4],
  [15, 6],
])

// ─────────────────────────────────────────────────────────────────────────────
// Table Validation
// ─────────────────────────────────────────────────────────────────────────────

const intervalCount = z.number().int().nonnegative()

const setClassEntrySchema = z.object({
  label: z.string().regex(/^\d+-Z?\d+$/),
  prime: z.array(z.number().int().min(0).max(11)),
  vector: z.tuple([
    intervalCount,
    intervalCount,
    intervalCount,
    intervalCount,
    intervalCount,
    intervalCount,
  ]),
  transformations: z.number().int().positive(),
  combinatoriality: z.enum(['A', 'T', 'I', 'RI', '']).optional(),
})

const setClassTableSchema = z
  .record(z.string(), z.array(setClassEntrySchema))
  .superRefine((table, ctx) => {
    for (let cardinality = MIN_CARDINALITY; cardinality <= MAX_CARDINALITY; cardinality++) {
      const entries = table[String(cardinality)]
      if (!entries) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Missing set classes of cardinality ${cardinality}`,
        })
        continue
      }
      const pairs = (cardinality * (cardinality - 1)) / 2
      for (const entry of entries) {
        const vectorSum = entry.vector.reduce((sum, count) => sum + count, 0)
        if (entry.prime.length !== cardinality || vectorSum !== pairs) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `${entry.label} does not describe a set of cardinality ${cardinality}`,
          })
        }
      }
    }
  })

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function primeKey(prime: readonly number[]): string {
  return prime.join(',')
}

export function vectorsEqual(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((count, i) => count === b[i])
}

function freezeEntry(entry: SetClassEntry): SetClassEntry {
  Object.freeze(entry.prime)
  Object.freeze(entry.vector)
  return Object.freeze(entry)
}

// ─────────────────────────────────────────────────────────────────────────────
// Registry
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Read-only table of Forte set classes for cardinalities 2-10: label, prime form,
 * interval vector, number of distinct transformations and, for hexachords,
 * combinatoriality status.
 *
 * Built once from a validated table; entries are frozen for the life of the process.
 */
export class SetClassCatalog {
  private readonly cardinalities: ReadonlyMap<number, readonly SetClassEntry[]>
  private readonly byPrime: ReadonlyMap<string, SetClassEntry>
  private readonly byLabel: ReadonlyMap<string, SetClassEntry>

  constructor(table: unknown) {
    const parsed = setClassTableSchema.parse(table)

    const cardinalities = new Map<number, readonly SetClassEntry[]>()
    const byPrime = new Map<string, SetClassEntry>()
    const byLabel = new Map<string, SetClassEntry>()

    for (let cardinality = MIN_CARDINALITY; cardinality <= MAX_CARDINALITY; cardinality++) {
      const entries = (parsed[String(cardinality)] ?? []).map(freezeEntry)
      for (const entry of entries) {
        byPrime.set(primeKey(entry.prime), entry)
        byLabel.set(entry.label, entry)
      }
      cardinalities.set(cardinality, Object.freeze(entries))
    }

    this.cardinalities = cardinalities
    this.byPrime = byPrime
    this.byLabel = byLabel
  }

  /**
   * All set classes of one cardinality, in Forte order.
   */
  byCardinality(cardinality: number): readonly SetClassEntry[] {
    const entries = this.cardinalities.get(cardinality)
    if (!entries) {
      throw new InvalidCardinalityError(cardinality)
    }
    return entries
  }

  /**
   * Every set class, cardinality 2 first.
   */
  entries(): SetClassEntry[] {
    return [...this.cardinalities.values()].flat()
  }

  /**
   * Entries of the given cardinality sharing this interval vector.
   * More than one result means a Z-related pair.
   */
  candidatesForVector(vector: IntervalVector, cardinality: number): SetClassEntry[] {
    return this.byCardinality(cardinality).filter((entry) => vectorsEqual(entry.vector, vector))
  }

  findByPrime(prime: PrimeForm): SetClassEntry | undefined {
    return this.byPrime.get(primeKey(prime))
  }

  primeToCombinatoriality(prime: PrimeForm): Combinatoriality {
    const entry = this.findByPrime(prime)
    if (!entry) {
      throw new UnknownPrimeFormError(prime)
    }
    // Combinatoriality is only defined for hexachords
    return entry.combinatoriality ?? ''
  }

  /**
   * Combinatoriality from an interval vector of a 2-, 3-, 4- or 6-note set.
   * Z-related hexachords share both vector and status, so the vector alone decides.
   */
  intervalVectorToCombinatoriality(vector: readonly number[]): Combinatoriality {
    if (vector.length !== 6) {
      throw new UnknownIntervalVectorError(vector)
    }
    const total = vector.reduce((sum, count) => sum + count, 0)
    const cardinality = VECTOR_SUM_TO_CARDINALITY.get(total)
    if (cardinality === undefined) {
      throw new UnknownIntervalVectorError(vector)
    }

    const entry = this.byCardinality(cardinality).find((e) => vectorsEqual(e.vector, vector))
    if (!entry) {
      throw new UnknownIntervalVectorError(vector)
    }
    return entry.combinatoriality ?? ''
  }

  primeToForteClass(prime: PrimeForm): string {
    const entry = this.findByPrime(prime)
    if (!entry) {
      throw new UnknownPrimeFormError(prime)
    }
    return entry.label
  }

  forteClassToEntry(label: string): SetClassEntry {
    const entry = this.byLabel.get(label)
    if (!entry) {
      throw new UnknownForteClassError(label)
    }
    return entry
  }

  forteClassToPrime(label: string): PrimeForm {
    return this.forteClassToEntry(label).prime
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Export singleton instance
// ─────────────────────────────────────────────────────────────────────────────

export const setClassCatalog = new SetClassCatalog(setClassTable)
