import { describe, it, expect } from 'vitest'
import { SetClassCatalog, setClassCatalog, vectorsEqual } from './setClassCatalog'
import {
  InvalidCardinalityError,
  UnknownForteClassError,
  UnknownIntervalVectorError,
  UnknownPrimeFormError,
} from '../errors'

function binomial(n: number, k: number): number {
  let result = 1
  for (let i = 1; i <= k; i++) {
    result = (result * (n - k + i)) / i
  }
  return result
}

describe('setClassCatalog', () => {
  describe('table contents', () => {
    it('holds 220 set classes across cardinalities 2-10', () => {
      expect(setClassCatalog.entries()).toHaveLength(220)
    })

    it('lists set classes per cardinality in Forte order', () => {
      const counts = [2, 3, 4, 5, 6, 7, 8, 9, 10].map((n) => setClassCatalog.byCardinality(n).length)
      expect(counts).toEqual([6, 12, 29, 38, 50, 38, 29, 12, 6])
      expect(setClassCatalog.byCardinality(3)[0].label).toBe('3-1')
    })

    it('has transformation counts summing to 12 choose n', () => {
      for (const n of [2, 3, 4, 5, 6, 7, 8, 9, 10]) {
        const total = setClassCatalog
          .byCardinality(n)
          .reduce((sum, entry) => sum + entry.transformations, 0)
        expect(total).toBe(binomial(12, n))
      }
    })

    it('has 924 hexachords in total', () => {
      const total = setClassCatalog
        .byCardinality(6)
        .reduce((sum, entry) => sum + entry.transformations, 0)
      expect(total).toBe(924)
    })

    it('gives every hexachord a combinatoriality status', () => {
      for (const entry of setClassCatalog.byCardinality(6)) {
        expect(entry.combinatoriality).toBeDefined()
      }
    })

    it('has exactly six all-combinatorial hexachords', () => {
      const all = setClassCatalog
        .byCardinality(6)
        .filter((entry) => entry.combinatoriality === 'A')
        .map((entry) => entry.label)
      expect(all).toEqual(['6-1', '6-7', '6-8', '6-20', '6-32', '6-35'])
    })

    it('freezes entries', () => {
      const entry = setClassCatalog.forteClassToEntry('3-11')
      expect(Object.isFrozen(entry)).toBe(true)
      expect(Object.isFrozen(entry.prime)).toBe(true)
    })
  })

  describe('hexachord complements', () => {
    const hexachords = setClassCatalog.byCardinality(6)
    // Non-Z hexachords are exactly the self-complementary ones
    const selfComplementary = hexachords.filter((entry) => !entry.label.includes('Z'))

    it('has 20 non-Z hexachords', () => {
      expect(selfComplementary).toHaveLength(20)
    })

    it('has Z-related hexachords sharing their vector with exactly one partner', () => {
      for (const entry of hexachords.filter((e) => e.label.includes('Z'))) {
        const partners = hexachords.filter(
          (other) => other.label !== entry.label && vectorsEqual(other.vector, entry.vector)
        )
        expect(partners).toHaveLength(1)
      }
    })

    it('has non-Z hexachords with a unique vector', () => {
      for (const entry of selfComplementary) {
        const sharing = hexachords.filter((other) => vectorsEqual(other.vector, entry.vector))
        expect(sharing).toHaveLength(1)
      }
    })

    it('has non-Z transformation counts summing to 372', () => {
      const total = selfComplementary.reduce((sum, entry) => sum + entry.transformations, 0)
      expect(total).toBe(372)
    })
  })

  describe('byCardinality', () => {
    it('throws for cardinalities outside 2-10', () => {
      expect(() => setClassCatalog.byCardinality(1)).toThrow(InvalidCardinalityError)
      expect(() => setClassCatalog.byCardinality(11)).toThrow(InvalidCardinalityError)
    })

    it('reports the rejected cardinality', () => {
      try {
        setClassCatalog.byCardinality(12)
        expect.unreachable()
      } catch (err) {
        expect(err).toBeInstanceOf(InvalidCardinalityError)
        if (err instanceof InvalidCardinalityError) {
          expect(err.cardinality).toBe(12)
        }
      }
    })
  })

  describe('candidatesForVector', () => {
    it('finds the single set class for a unique vector', () => {
      const candidates = setClassCatalog.candidatesForVector([0, 0, 1, 1, 1, 0], 3)
      expect(candidates.map((e) => e.label)).toEqual(['3-11'])
    })

    it('finds both members of a Z-related pair', () => {
      const candidates = setClassCatalog.candidatesForVector([1, 1, 1, 1, 1, 1], 4)
      expect(candidates.map((e) => e.label)).toEqual(['4-Z15', '4-Z29'])
    })

    it('returns nothing for a vector no set class has', () => {
      expect(setClassCatalog.candidatesForVector([0, 0, 0, 0, 0, 3], 3)).toEqual([])
    })
  })

  describe('prime form lookups', () => {
    it('maps a prime form to its Forte class', () => {
      expect(setClassCatalog.primeToForteClass([0, 3, 7])).toBe('3-11')
      expect(setClassCatalog.primeToForteClass([0, 1, 4, 6])).toBe('4-Z15')
    })

    it('maps a Forte class back to its prime form', () => {
      expect(setClassCatalog.forteClassToPrime('6-Z10')).toEqual([0, 1, 3, 4, 5, 7])
    })

    it('returns undefined from findByPrime for an unknown prime form', () => {
      expect(setClassCatalog.findByPrime([0, 4, 7])).toBeUndefined()
    })

    it('throws for a prime form that is not in the table', () => {
      // [0, 4, 7] is a major triad, not a prime form
      expect(() => setClassCatalog.primeToForteClass([0, 4, 7])).toThrow(UnknownPrimeFormError)
      expect(() => setClassCatalog.primeToCombinatoriality([0, 4, 7])).toThrow(UnknownPrimeFormError)
    })

    it('throws for an unknown Forte class', () => {
      expect(() => setClassCatalog.forteClassToEntry('6-51')).toThrow(UnknownForteClassError)
      expect(() => setClassCatalog.forteClassToPrime('X')).toThrow(UnknownForteClassError)
    })
  })

  describe('combinatoriality lookups', () => {
    it('reads hexachord status by prime form', () => {
      expect(setClassCatalog.primeToCombinatoriality([0, 1, 2, 3, 4, 5])).toBe('A')
      expect(setClassCatalog.primeToCombinatoriality([0, 1, 3, 4, 5, 8])).toBe('T')
      expect(setClassCatalog.primeToCombinatoriality([0, 1, 3, 5, 7, 9])).toBe('I')
      expect(setClassCatalog.primeToCombinatoriality([0, 1, 2, 4, 5, 6])).toBe('RI')
      expect(setClassCatalog.primeToCombinatoriality([0, 1, 3, 4, 5, 7])).toBe('')
    })

    it('gives an empty status for non-hexachords', () => {
      expect(setClassCatalog.primeToCombinatoriality([0, 1, 2])).toBe('')
    })

    it('reads status by interval vector', () => {
      expect(setClassCatalog.intervalVectorToCombinatoriality([5, 4, 3, 2, 1, 0])).toBe('A')
      expect(setClassCatalog.intervalVectorToCombinatoriality([1, 0, 0, 0, 0, 0])).toBe('')
    })

    it('throws for vectors of unsupported sizes', () => {
      // Sum 10 belongs to a pentachord
      expect(() => setClassCatalog.intervalVectorToCombinatoriality([4, 3, 2, 1, 0, 0])).toThrow(
        UnknownIntervalVectorError
      )
      expect(() => setClassCatalog.intervalVectorToCombinatoriality([1, 0, 0])).toThrow(
        UnknownIntervalVectorError
      )
    })

    it('throws for a vector of the right size that no set class has', () => {
      expect(() => setClassCatalog.intervalVectorToCombinatoriality([0, 0, 0, 0, 0, 3])).toThrow(
        UnknownIntervalVectorError
      )
    })
  })

  describe('table validation', () => {
    it('rejects a table with a missing cardinality', () => {
      expect(() => new SetClassCatalog({ '2': [] })).toThrow()
    })

    it('rejects an entry whose prime form has the wrong size', () => {
      const table: Record<string, unknown[]> = {}
      for (let n = 2; n <= 10; n++) table[String(n)] = []
      table['3'] = [{ label: '3-1', prime: [0, 1], vector: [2, 1, 0, 0, 0, 0], transformations: 12 }]
      expect(() => new SetClassCatalog(table)).toThrow()
    })

    it('accepts a table with every cardinality present', () => {
      const table: Record<string, unknown[]> = {}
      for (let n = 2; n <= 10; n++) table[String(n)] = []
      table['2'] = [{ label: '2-1', prime: [0, 1], vector: [1, 0, 0, 0, 0, 0], transformations: 12 }]
      const catalog = new SetClassCatalog(table)
      expect(catalog.primeToForteClass([0, 1])).toBe('2-1')
      expect(catalog.byCardinality(3)).toEqual([])
    })
  })

  describe('vectorsEqual', () => {
    it('compares element by element', () => {
      expect(vectorsEqual([1, 1, 1, 1, 1, 1], [1, 1, 1, 1, 1, 1])).toBe(true)
      expect(vectorsEqual([1, 1, 1, 1, 1, 1], [1, 1, 1, 1, 1, 0])).toBe(false)
      expect(vectorsEqual([1], [1, 0])).toBe(false)
    })
  })
})
