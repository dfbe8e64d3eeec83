import { Note } from 'tonal'
import type { PitchClass } from '../domain/types'
import { RowParseError } from '../domain/errors'
import { mod12, transposeTo } from './transformations'

// ─────────────────────────────────────────────────────────────────────────────
// Row Parser: the many ways rows get written down → 12 pitch classes
// ─────────────────────────────────────────────────────────────────────────────

export type RowInput = string | readonly (number | string)[] | readonly [readonly (number | string)[]]

export interface ParseRowOptions {
  /** Transpose the result to start on 0 (default true) */
  transposeToZero?: boolean
}

// Removed before splitting
const STRIPPED_CHARACTERS = /[\n[\]<>()]/g

// Order matters: ', ' before ',' or ' '. The dashes come last because '-' can
// also be a flat sign.
const DIVIDERS = [', ', ',', ' ', '~', '-', '–']

const FLATS = ['b', '♭', '-']
const SHARPS = ['#', '♯', '+']

// Single-character stand-ins for 10 and 11
const TEN = ['a', 't']
const ELEVEN = ['b', 'e']

/**
 * Convert a pitch name like 'Bb' or 'F♯♯' to its pitch class.
 *
 * The first character is a letter name (A-G, any case). Any further characters
 * must all be the same accidental: '♭', 'b' or '-' for flat; '♯', '#' or '+'
 * for sharp. 's' is not accepted: 'Fs' probably means F#, but 'Es' is more
 * likely Eb (German).
 */
export function stringToPitchClass(pitchName: string): PitchClass {
  const letter = pitchName.charAt(0).toUpperCase()
  if (!/^[A-G]$/.test(letter)) {
    throw new RowParseError(`Invalid pitch name "${pitchName}": must start with one of A-G`)
  }

  const accidentals = [...pitchName.slice(1)]
  if (accidentals.length > 0 && accidentals.some((a) => a !== accidentals[0])) {
    throw new RowParseError(`Invalid pitch name "${pitchName}": mixed accidentals`)
  }

  let accidental = ''
  if (accidentals.length > 0) {
    if (FLATS.includes(accidentals[0])) {
      accidental = 'b'.repeat(accidentals.length)
    } else if (SHARPS.includes(accidentals[0])) {
      accidental = '#'.repeat(accidentals.length)
    } else {
      throw new RowParseError(`Invalid pitch name "${pitchName}": unknown accidental`)
    }
  }

  const chroma = Note.chroma(letter + accidental)
  if (chroma === undefined || Number.isNaN(chroma)) {
    throw new RowParseError(`Invalid pitch name "${pitchName}"`)
  }
  return mod12(chroma)
}

/**
 * Split a written row into its tokens.
 */
function tokenize(row: string): string[] {
  const cleaned = row.replace(STRIPPED_CHARACTERS, '').trim()

  for (const divider of DIVIDERS) {
    if (cleaned.includes(divider)) {
      return cleaned.split(divider).filter((token) => token.length > 0)
    }
  }

  // No dividers, e.g. 014295B38A76
  return [...cleaned]
}

function toTokens(input: RowInput): (number | string)[] {
  if (typeof input === 'string') {
    return tokenize(input)
  }
  if (input.length === 1) {
    const [inner] = input
    if (typeof inner !== 'number' && typeof inner !== 'string') {
      return [...inner]
    }
  }
  const tokens: (number | string)[] = []
  for (const token of input) {
    if (typeof token === 'number' || typeof token === 'string') {
      tokens.push(token)
    } else {
      throw new RowParseError('Nested row lists must hold exactly one row')
    }
  }
  return tokens
}

function toInteger(token: number | string): number | undefined {
  if (typeof token === 'number') {
    return Number.isInteger(token) ? token : undefined
  }
  const trimmed = token.trim()
  return /^-?\d+$/.test(trimmed) ? parseInt(trimmed, 10) : undefined
}

function standInToPitchClass(token: string): PitchClass {
  const lower = token.trim().toLowerCase()
  if (TEN.includes(lower)) return 10
  if (ELEVEN.includes(lower)) return 11
  throw new RowParseError(`Unrecognised symbol "${token}": expected one of a, b, t, e`)
}

/**
 * Turn any of the common written forms of a row into a list of pitch classes:
 *
 * - '<0-4-1-11-10-3-6-5-9-8-2-7>': integers with brackets and dividers
 * - '1 4 t 0 3 9 8 6 5 2 e 7': integers plus 't'/'e' (or 'a'/'b') for 10 and 11
 * - '014295B38A76': one character per pitch, no dividers
 * - 'G#,F#,G,A,Bb,F,B,C,E,C#,Eb,D': pitch names
 * - [9, 10, 4, ...] or ['11', '10', '2', ...]: lists of numbers or strings
 *
 * The result is transposed to start on 0 unless `transposeToZero` is false.
 */
export function parseRow(input: RowInput, options: ParseRowOptions = {}): PitchClass[] {
  const { transposeToZero = true } = options

  const tokens = toTokens(input)
  if (tokens.length !== 12) {
    throw new RowParseError(`Row must have 12 pitches, found ${tokens.length}`)
  }

  const integers = tokens.map(toInteger)
  const nonIntegerCount = integers.filter((value) => value === undefined).length

  let pitches: PitchClass[]
  if (nonIntegerCount === 0) {
    pitches = integers.map((value) => value ?? 0)
  } else if (nonIntegerCount === 2) {
    // Mostly integers plus the two stand-ins for 10 and 11
    pitches = tokens.map((token, i) => integers[i] ?? standInToPitchClass(String(token)))
  } else if (nonIntegerCount === 12) {
    pitches = tokens.map((token) => stringToPitchClass(String(token).trim()))
  } else {
    throw new RowParseError('Unrecognised row format')
  }

  return transposeToZero ? transposeTo(pitches, 0) : pitches.map(mod12)
}
