import type { Row } from './pitchClass'

export interface CorpusEntry {
  composer: string
  work: string
  year?: number | string
  source?: string
  /** Row transposed to start on 0 */
  row: Row
}

export type AnthologySectionId =
  | 'reused'
  | 'allInterval'
  | 'selfRetrograde'
  | 'selfRetrogradeInversion'
  | 'dyads'
  | 'trichords'
  | 'tetrachords'
  | 'hexachords'
  | 'transpositionCombinatorial'
  | 'inversionCombinatorial'
  | 'retrogradeInversionCombinatorial'
  | 'allCombinatorial'

export interface AnthologySection {
  id: AnthologySectionId
  header: string
  explanation: string
  items: string[]
}
