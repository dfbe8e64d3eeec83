import { z } from 'zod'
import type { AnthologySection, AnthologySectionId, CorpusEntry } from '../domain/types'
import { pitchesToPrime } from './pcSetAnalysis'
import { parseRow } from './rowParser'
import { DERIVATION_SEGMENT_LENGTHS, formatPrimeForm, getDerivations } from './rowProperties'
import {
  combinatorialByTransform,
  combinatorialType,
  fullCombinatorialTypes,
  is12tone,
  isAllInterval,
  isSelfR,
  isSelfRI,
} from './rowAnalysis'

// ─────────────────────────────────────────────────────────────────────────────
// Anthology: sort a corpus of repertoire rows into sections by property
// ─────────────────────────────────────────────────────────────────────────────

const rowLiteralSchema = z.union([
  z.string().min(1),
  z.array(z.union([z.number().int(), z.string()])),
])

export const corpusEntrySchema = z
  .object({
    composer: z.string().min(1),
    work: z.string().min(1),
    year: z.union([z.number().int(), z.string()]).optional(),
    source: z.string().optional(),
    row: rowLiteralSchema,
  })
  .transform((entry, ctx): CorpusEntry => {
    try {
      return { ...entry, row: parseRow(entry.row) }
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['row'],
        message: err instanceof Error ? err.message : String(err),
      })
      return z.NEVER
    }
  })

const corpusSchema = z.record(z.string(), z.unknown())

/**
 * Validate a keyed record of corpus entries. Invalid entries are skipped with a warning.
 */
export function parseCorpus(data: unknown): CorpusEntry[] {
  const records = corpusSchema.parse(data)
  const entries: CorpusEntry[] = []

  for (const [key, value] of Object.entries(records)) {
    const result = corpusEntrySchema.safeParse(value)
    if (result.success) {
      entries.push(result.data)
    } else {
      console.warn(
        `Skipping corpus entry "${key}":`,
        result.error.issues.map((issue) => issue.message).join('; ')
      )
    }
  }

  return entries
}

// ─────────────────────────────────────────────────────────────────────────────
// Sections
// ─────────────────────────────────────────────────────────────────────────────

const SECTION_TEXT: Record<AnthologySectionId, { header: string; explanation: string }> = {
  reused: {
    header: 'Re-used Rows',
    explanation:
      'Rows used more than once in the collection. Transposition is taken into ' +
      'account (P0 forms are compared), inversion and retrograde are not.',
  },
  allInterval: {
    header: 'All-Interval',
    explanation: 'Rows that go through all 11 intervals between neighbouring pitches.',
  },
  selfRetrograde: {
    header: 'Self Retrograde',
    explanation: 'Rows whose prime form is transposition-equivalent to their retrograde.',
  },
  selfRetrogradeInversion: {
    header: 'Self Retrograde Inversion',
    explanation:
      'Rows with a palindromic interval succession: the prime is ' +
      'transposition-equivalent to the retrograde-inversion.',
  },
  dyads: {
    header: '6x Same Dyad (interval)',
    explanation:
      'Rows whose discrete dyads (pitches 1-2, 3-4, ... 11-12) all form the same ' +
      'pitch class set, given in prime form, with any self-rotational interval pattern.',
  },
  trichords: {
    header: '4x Same Trichord',
    explanation: 'Rows made of 4x the same trichord (pitches 1-3, 4-6, 7-9 and 10-12).',
  },
  tetrachords: {
    header: '3x Same Tetrachord',
    explanation: 'Rows made of 3x the same tetrachord (pitches 1-4, 5-8 and 9-12).',
  },
  hexachords: {
    header: '2x Same Hexachord',
    explanation: 'Rows made of 2x the same hexachord (pitches 1-6 and 7-12).',
  },
  transpositionCombinatorial: {
    header: 'Transposition Combinatorial',
    explanation:
      'Rows combinatorial with at least one transposition of P0: the first ' +
      'hexachords of the two forms make up the aggregate.',
  },
  inversionCombinatorial: {
    header: 'Inversion Combinatorial',
    explanation: 'Rows combinatorial by inversion, given as P0-IX (or P0-IX,Y).',
  },
  retrogradeInversionCombinatorial: {
    header: 'Retrograde Inversion Combinatorial',
    explanation: 'Rows combinatorial by retrograde inversion.',
  },
  allCombinatorial: {
    header: 'All-Combinatorial',
    explanation:
      'Rows combinatorial by all three transformations in at least one ' +
      'transposition each, with the hexachord prime form.',
  },
}

const SECTION_ORDER: readonly AnthologySectionId[] = [
  'reused',
  'allInterval',
  'selfRetrograde',
  'selfRetrogradeInversion',
  'dyads',
  'trichords',
  'tetrachords',
  'hexachords',
  'transpositionCombinatorial',
  'inversionCombinatorial',
  'retrogradeInversionCombinatorial',
  'allCombinatorial',
]

const DERIVATION_SECTIONS: Record<number, AnthologySectionId> = {
  2: 'dyads',
  3: 'trichords',
  4: 'tetrachords',
  6: 'hexachords',
}

function formatRow(row: readonly number[]): string {
  return `[${row.join(', ')}]`
}

// ─────────────────────────────────────────────────────────────────────────────
// Main Function
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Sort corpus rows into the anthology sections. Each item is a plain-text line
 * ("Composer: Work, [row], ..."); rendering is left to the caller.
 *
 * Rows that are not 12-tone are skipped with a warning.
 */
export function buildAnthology(entries: readonly CorpusEntry[]): AnthologySection[] {
  const items = new Map<AnthologySectionId, string[]>(SECTION_ORDER.map((id) => [id, []]))
  const add = (id: AnthologySectionId, item: string) => items.get(id)?.push(item)

  // P0 -> works using it
  const usages = new Map<string, string[]>()

  for (const entry of entries) {
    const { row } = entry
    const title = `${entry.composer}: ${entry.work}`

    if (!is12tone(row)) {
      console.warn(`Skipping ${title}: not a 12-tone row`, row)
      continue
    }

    const rowKey = formatRow(row)
    usages.set(rowKey, [...(usages.get(rowKey) ?? []), title])

    const line = `${title}, ${rowKey}`

    for (const derivation of getDerivations(row, DERIVATION_SEGMENT_LENGTHS, true)) {
      const section = DERIVATION_SECTIONS[derivation.segmentLength]
      let item = `${line}, pc set ${formatPrimeForm(derivation.cell)}`
      if (derivation.selfRotational) {
        item += `, self-rotational interval pattern ${derivation.rotationInterval}`
      }
      add(section, item)
    }

    if (isAllInterval(row)) add('allInterval', line)
    if (isSelfR(row)) add('selfRetrograde', line)
    if (isSelfRI(row)) add('selfRetrogradeInversion', line)

    if (combinatorialType(row) === 'A') {
      const prime = formatPrimeForm(pitchesToPrime(row.slice(0, 6)))
      add('allCombinatorial', `${line}, ${fullCombinatorialTypes(row)}, ${prime}`)
      continue
    }

    // Semi-combinatorial rows are listed under the first kind that matches
    const t = combinatorialByTransform(row, 'T')
    if (t.length > 0) {
      add('transpositionCombinatorial', `${line}, P0-P${t.join(',')}`)
      continue
    }
    const i = combinatorialByTransform(row, 'I')
    if (i.length > 0) {
      add('inversionCombinatorial', `${line}, P0-I${i.join(',')}`)
      continue
    }
    const ri = combinatorialByTransform(row, 'RI')
    if (ri.length > 0) {
      add('retrogradeInversionCombinatorial', `${line}, P0-RI${ri.join(',')}`)
    }
  }

  for (const [rowKey, titles] of usages) {
    if (titles.length > 1) {
      add('reused', `${rowKey}: ${titles.join('; ')}`)
    }
  }

  return SECTION_ORDER.map((id) => ({
    id,
    ...SECTION_TEXT[id],
    items: items.get(id) ?? [],
  }))
}
