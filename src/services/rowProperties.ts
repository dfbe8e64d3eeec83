import type { PrimeForm, Row, RowAnalysis, RowDerivation } from '../domain/types'
import { pitchesToForteClass, pitchesToPrime } from './pcSetAnalysis'
import {
  combinatorialType,
  deriveRow,
  fullCombinatorialTransforms,
  fullCombinatorialTypes,
  isAllInterval,
  isAllTrichord,
  isSelfR,
  isSelfRI,
} from './rowAnalysis'

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

// Discrete segment sizes that divide a 12-tone row into 6, 4, 3 and 2 cells
export const DERIVATION_SEGMENT_LENGTHS: readonly number[] = [2, 3, 4, 6]

// Longer summaries are broken over lines
const MAX_INLINE_PROPERTIES = 5

export const NO_PROPERTIES = '(No properties to report)'

// ─────────────────────────────────────────────────────────────────────────────
// Formatting Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * (0, 1, 4) -> "(0,1,4)"
 */
export function formatPrimeForm(prime: PrimeForm): string {
  return `(${prime.join(',')})`
}

// ─────────────────────────────────────────────────────────────────────────────
// Analysis
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Every derivation of the row at the standard discrete segment sizes.
 * With `stopAtSelfRotational`, stops after the first self-rotational one.
 */
export function getDerivations(
  row: Row,
  segmentLengths: readonly number[] = DERIVATION_SEGMENT_LENGTHS,
  stopAtSelfRotational: boolean = false
): RowDerivation[] {
  const derivations: RowDerivation[] = []
  for (const segmentLength of segmentLengths) {
    const derivation = deriveRow(row, segmentLength)
    if (!derivation) continue
    derivations.push(derivation)
    if (stopAtSelfRotational && derivation.selfRotational) break
  }
  return derivations
}

/**
 * Run every row classifier on a 12-tone row.
 */
export function analyzeRow(row: Row): RowAnalysis {
  const hexachord = row.slice(0, 6)

  return {
    row: [...row],
    derivations: getDerivations(row),
    allInterval: isAllInterval(row),
    allTrichord: isAllTrichord(row),
    selfRetrograde: isSelfR(row),
    selfRetrogradeInversion: isSelfRI(row),
    combinatorialType: combinatorialType(row),
    combinatorialTransforms: fullCombinatorialTransforms(row),
    hexachordPrime: pitchesToPrime(hexachord),
    hexachordForteClass: pitchesToForteClass(hexachord),
  }
}

/**
 * One-line summary of a row's notable properties, for annotating listings.
 */
export function describeRowProperties(row: Row): string {
  const properties: string[] = []

  for (const derivation of getDerivations(row, DERIVATION_SEGMENT_LENGTHS, true)) {
    properties.push(`${derivation.segmentLength}-note cell ${formatPrimeForm(derivation.cell)}`)
    if (derivation.selfRotational && derivation.rotationInterval !== undefined) {
      properties.push(`Self-rotational interval ${derivation.rotationInterval}`)
    }
  }

  const combinatorial = fullCombinatorialTypes(row)
  if (combinatorial) {
    properties.push(`Combinatorial by ${combinatorial}`)
  }

  if (isSelfR(row)) properties.push('Self-retro.')
  if (isSelfRI(row)) properties.push('Self-retro.inv.')
  if (isAllInterval(row)) properties.push('All-interval')
  if (isAllTrichord(row)) properties.push('All-trichord')

  if (properties.length === 0) return NO_PROPERTIES
  return properties.join(properties.length > MAX_INLINE_PROPERTIES ? ';\n' : '; ')
}
