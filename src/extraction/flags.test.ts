import { describe, expect, it } from 'vitest'
import {
  createReferenceData,
  ISRAEL_FLAG,
  RUSSIA_FLAG,
  UKRAINE_FLAG
} from '../test-support/index'
import { findFlagCountries, getCountryCentroid, resolveFlag } from './flags'

describe('Flag Symbol Resolver', () => {
  const reference = createReferenceData()

  describe('findFlagCountries', () => {
    it('finds a single flag', () => {
      expect(findFlagCountries(`${UKRAINE_FLAG} Air raid alert`, reference)).toEqual(['UKR'])
    })

    it('reports flags in mapping order, not text order', () => {
      const text = `${ISRAEL_FLAG} then ${RUSSIA_FLAG} then ${UKRAINE_FLAG}`

      expect(findFlagCountries(text, reference)).toEqual(['UKR', 'RUS', 'ISR'])
    })

    it('returns an empty list without flags', () => {
      expect(findFlagCountries('No flags here', reference)).toEqual([])
    })
  })

  describe('getCountryCentroid', () => {
    it('returns the registered centroid', () => {
      expect(getCountryCentroid('UKR', reference)).toEqual({ lat: 49.0, lon: 32.0 })
    })

    it('returns null for unknown codes', () => {
      expect(getCountryCentroid('XYZ', reference)).toBeNull()
    })
  })

  describe('resolveFlag', () => {
    it('resolves the first flag by mapping order', () => {
      expect(resolveFlag(`${RUSSIA_FLAG} ${UKRAINE_FLAG}`, reference)).toEqual({
        countryCode: 'UKR',
        centroid: { lat: 49.0, lon: 32.0 }
      })
    })

    it('keeps the match but no centroid when the country is unregistered', () => {
      const sparse = createReferenceData({ centroids: {} })

      expect(resolveFlag(UKRAINE_FLAG, sparse)).toEqual({ countryCode: 'UKR', centroid: null })
    })

    it('returns null when no flag is present', () => {
      expect(resolveFlag('plain text', reference)).toBeNull()
    })
  })
})
