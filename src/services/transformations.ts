// ─────────────────────────────────────────────────────────────────────────────
// Transformations: Pure functions over pitch class sequences (tone rows)
// ─────────────────────────────────────────────────────────────────────────────

import type { PitchClass, PitchClassSequence } from '../domain/types'

/**
 * Reduce any integer to a pitch class 0-11 (negative values included).
 */
export function mod12(value: number): PitchClass {
  return ((value % 12) + 12) % 12
}

// ─────────────────────────────────────────────────────────────────────────────
// Basic Operations: transpose, retrograde, invert
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Transpose every pitch by `semitones`.
 */
export function transposeBy(row: PitchClassSequence, semitones: number = 0): PitchClass[] {
  return row.map((pc) => mod12(pc + semitones))
}

/**
 * Transpose so the first pitch becomes `start` (0 by default).
 */
export function transposeTo(row: PitchClassSequence, start: number = 0): PitchClass[] {
  if (row.length === 0) return []
  return transposeBy(row, start - row[0])
}

export function retrograde(row: PitchClassSequence): PitchClass[] {
  return [...row].reverse()
}

/**
 * Invert around the row's own first pitch (not around 0): each pitch becomes
 * (first - pitch) mod 12, so the result always starts on 0.
 */
export function invert(row: PitchClassSequence): PitchClass[] {
  if (row.length === 0) return []
  const startingPitch = row[0]
  return row.map((pc) => mod12(startingPitch - pc))
}

// ─────────────────────────────────────────────────────────────────────────────
// Interval Succession
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Directed intervals (mod 12) between adjacent pitches.
 * A 12-tone row gives 11 intervals; with `wrap` the 12th, from the last pitch
 * back to the first, is appended.
 */
export function pitchesToIntervals(row: PitchClassSequence, wrap: boolean = false): PitchClass[] {
  const pitches = wrap && row.length > 0 ? [...row, row[0]] : row
  const intervals: PitchClass[] = []
  for (let i = 1; i < pitches.length; i++) {
    intervals.push(mod12(pitches[i] - pitches[i - 1]))
  }
  return intervals
}

// ─────────────────────────────────────────────────────────────────────────────
// Rotations and Swaps (Krenek 1960, pp. 212-213)
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Rotate left so the result starts on element `steps`.
 * Steps are taken mod 12 (15 becomes 3, -1 becomes 11).
 */
export function rotate(row: PitchClassSequence, steps: number = 1): PitchClass[] {
  const start = mod12(steps)
  return [...row.slice(start), ...row.slice(0, start)]
}

/**
 * Split a row into hexachords and rotate each in step, one position at a time,
 * until the cycle comes back round: 7 rows, the first and last being the original.
 *
 * With `transposeIterations`, each rotated hexachord is transposed back to start
 * on that hexachord's original first pitch. This usually introduces repeated
 * pitch classes, so the results are no longer 12-tone rows.
 */
export function rotateHexachords(
  row: PitchClassSequence,
  transposeIterations: boolean = false
): PitchClass[][] {
  const rows: PitchClass[][] = [[...row]]

  const firstHexachordStart = row[0]
  const secondHexachordStart = row[6]

  for (let i = 1; i < 6; i++) {
    let firstHexachord = [...row.slice(i, 6), ...row.slice(0, i)]
    let secondHexachord = [...row.slice(6 + i), ...row.slice(6, 6 + i)]

    if (transposeIterations) {
      firstHexachord = transposeTo(firstHexachord, firstHexachordStart)
      secondHexachord = transposeTo(secondHexachord, secondHexachordStart)
    }

    rows.push([...firstHexachord, ...secondHexachord])
  }

  rows.push([...row])

  return rows
}

/**
 * Swap adjacent pairs in two alternating phases: positions (1,2), (3,4) ... (9,10),
 * then (0,1), (2,3) ... (10,11). Six rounds give 13 rows, the last of which is
 * the retrograde of the first, so running the cycle twice returns the original.
 */
export function pairSwapKrenek(row: PitchClassSequence): PitchClass[][] {
  const rows: PitchClass[][] = [[...row]]
  let current = [...row]

  for (let round = 0; round < 6; round++) {
    current = [...current]
    for (let i = 1; i < 11; i += 2) {
      ;[current[i], current[i + 1]] = [current[i + 1], current[i]]
    }
    rows.push(current)

    current = [...current]
    for (let i = 0; i < 12; i += 2) {
      ;[current[i], current[i + 1]] = [current[i + 1], current[i]]
    }
    rows.push(current)
  }

  return rows
}
