/**
 * Counts of interval classes 1-6, in that order.
 * Sums to n(n-1)/2 for a set of n distinct pitch classes.
 */
export type IntervalVector = readonly [number, number, number, number, number, number]

/** Forte's canonical representative of a set class, sorted and starting at 0 */
export type PrimeForm = readonly number[]

/** e.g. "3-11", "4-Z15" */
export type ForteLabel = string

/**
 * Hexachordal combinatoriality status:
 * - 'A': all-combinatorial (T, I and RI)
 * - 'T' | 'I' | 'RI': semi-combinatorial by that transformation only
 * - '': not combinatorial
 */
export type Combinatoriality = 'A' | 'T' | 'I' | 'RI' | ''

export interface SetClassEntry {
  label: ForteLabel
  prime: PrimeForm
  vector: IntervalVector
  /** Distinct transpositions and inversions of the set class */
  transformations: number
  /** Hexachords only */
  combinatoriality?: Combinatoriality
}
