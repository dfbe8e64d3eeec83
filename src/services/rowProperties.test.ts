import { describe, it, expect } from 'vitest'
import {
  analyzeRow,
  describeRowProperties,
  formatPrimeForm,
  getDerivations,
  NO_PROPERTIES,
} from './rowProperties'

const CHROMATIC = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11]
const ALL_INTERVAL = [0, 11, 7, 4, 2, 9, 3, 8, 10, 1, 5, 6]

describe('rowProperties', () => {
  describe('formatPrimeForm', () => {
    it('writes a prime form without spaces', () => {
      expect(formatPrimeForm([0, 1, 4])).toBe('(0,1,4)')
      expect(formatPrimeForm([0, 2, 4, 5, 7, 9])).toBe('(0,2,4,5,7,9)')
    })
  })

  describe('getDerivations', () => {
    it('checks dyads, trichords, tetrachords and hexachords', () => {
      const derivations = getDerivations(CHROMATIC)
      expect(derivations.map((d) => d.segmentLength)).toEqual([2, 3, 4, 6])
      expect(derivations.map((d) => d.rotationInterval)).toEqual([2, 3, 4, 6])
    })

    it('skips sizes the row is not derived from', () => {
      // Dyads all ic1, tetrachords all (0,1,2,3); trichords mixed
      const derivations = getDerivations([0, 11, 2, 1, 5, 6, 3, 4, 8, 7, 10, 9])
      expect(derivations.map((d) => d.segmentLength)).toEqual([2, 4, 6])
      expect(derivations.map((d) => d.cell)).toEqual([
        [0, 1],
        [0, 1, 2, 3],
        [0, 1, 2, 3, 6, 7],
      ])
    })

    it('stops at the first self-rotational derivation when asked', () => {
      const derivations = getDerivations(CHROMATIC, [2, 3, 4, 6], true)
      expect(derivations).toHaveLength(1)
      expect(derivations[0].segmentLength).toBe(2)
    })

    it('takes a custom list of sizes', () => {
      expect(getDerivations(CHROMATIC, [4]).map((d) => d.cell)).toEqual([[0, 1, 2, 3]])
    })
  })

  describe('analyzeRow', () => {
    it('collects every property of an all-interval row', () => {
      expect(analyzeRow(ALL_INTERVAL)).toEqual({
        row: ALL_INTERVAL,
        derivations: [
          {
            segmentLength: 6,
            segments: [
              [0, 11, 7, 4, 2, 9],
              [3, 8, 10, 1, 5, 6],
            ],
            cell: [0, 2, 4, 5, 7, 9],
            selfRotational: false,
            rotationInterval: undefined,
          },
        ],
        allInterval: true,
        allTrichord: false,
        selfRetrograde: true,
        selfRetrogradeInversion: false,
        combinatorialType: 'A',
        combinatorialTransforms: { T: [6], I: [5], RI: [11] },
        hexachordPrime: [0, 2, 4, 5, 7, 9],
        hexachordForteClass: '6-32',
      })
    })

    it('copies the row', () => {
      const analysis = analyzeRow(CHROMATIC)
      expect(analysis.row).toEqual(CHROMATIC)
      expect(analysis.row).not.toBe(CHROMATIC)
    })

    it('labels Z-related hexachords', () => {
      const analysis = analyzeRow([0, 9, 1, 3, 4, 11, 2, 8, 7, 5, 10, 6])
      expect(analysis.hexachordForteClass).toBe('6-Z10')
      expect(analysis.combinatorialType).toBe('')
      expect(analysis.derivations).toEqual([])
    })
  })

  describe('describeRowProperties', () => {
    it('summarises the chromatic scale on one line', () => {
      expect(describeRowProperties(CHROMATIC)).toBe(
        '2-note cell (0,1); Self-rotational interval 2; Combinatorial by T6; I11; RI5; Self-retro.inv.'
      )
    })

    it('summarises an all-interval row', () => {
      expect(describeRowProperties(ALL_INTERVAL)).toBe(
        '6-note cell (0,2,4,5,7,9); Combinatorial by T6; I5; RI11; Self-retro.; All-interval'
      )
    })

    it('keeps five properties on one line', () => {
      expect(describeRowProperties([0, 1, 2, 3, 4, 5, 11, 10, 9, 8, 7, 6])).toBe(
        '2-note cell (0,1); 3-note cell (0,1,2); 6-note cell (0,1,2,3,4,5); ' +
          'Combinatorial by T6; I11; RI5; Self-retro.'
      )
    })

    it('breaks longer summaries over lines', () => {
      // Derived at every size, none self-rotational
      expect(describeRowProperties([0, 1, 2, 3, 5, 4, 7, 6, 8, 9, 10, 11])).toBe(
        '2-note cell (0,1);\n' +
          '3-note cell (0,1,2);\n' +
          '4-note cell (0,1,2,3);\n' +
          '6-note cell (0,1,2,3,4,5);\n' +
          'Combinatorial by T6; I11; RI5;\n' +
          'Self-retro.inv.'
      )
    })

    it('reports all-trichord rows', () => {
      expect(describeRowProperties([0, 2, 6, 10, 5, 3, 8, 9, 11, 7, 4, 1])).toBe('All-trichord')
    })

    it('says when there is nothing to report', () => {
      expect(describeRowProperties([0, 4, 10, 9, 3, 8, 5, 11, 1, 7, 6, 2])).toBe(NO_PROPERTIES)
    })
  })
})
