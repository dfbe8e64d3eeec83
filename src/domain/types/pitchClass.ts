/**
 * Integer residue 0-11 (C=0, C#=1, ..., B=11).
 * Values outside the range are accepted by set-level operations and reduced mod 12.
 */
export type PitchClass = number

/**
 * Ordered pitch classes. Transformations never mutate one in place.
 */
export type PitchClassSequence = readonly PitchClass[]

/**
 * A twelve-tone row: 12 elements, each pitch class exactly once.
 * Not enforced by the type; check with `is12tone`.
 */
export type Row = readonly PitchClass[]
