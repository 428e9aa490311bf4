import { describe, expect, it } from 'vitest'
import {
  createMatch,
  createMessage,
  createReferenceData,
  FakeGeocoder,
  UKRAINE_FLAG
} from '../test-support/index'
import type { GeolocationStage, StageOutcome } from '../types'
import { GeolocationPipeline, processMessage, serializeGeolocation } from './index'

const reference = createReferenceData()

function createPipeline(geocoder: FakeGeocoder | null = new FakeGeocoder()): GeolocationPipeline {
  return GeolocationPipeline.create({ reference, geocoder })
}

describe('GeolocationPipeline', () => {
  it('resolves literal coordinates first', async () => {
    const result = await createPipeline().locate({
      text: 'Explosion reported at 50.4501, 30.5234 in Kyiv',
      channel: 'test_channel'
    })

    expect(result).toEqual({
      lat: 50.4501,
      lon: 30.5234,
      confidence: 0.95,
      source: 'coordinates_regex',
      geocodingAttempts: ['Found coordinates: (50.4501, 30.5234)']
    })
  })

  it('resolves a flag to its country centroid', async () => {
    const result = await createPipeline().locate({
      text: `${UKRAINE_FLAG} Air raid alert`,
      channel: 'test_channel'
    })

    expect(result).toEqual({
      lat: 49,
      lon: 32,
      countryCode: 'UKR',
      confidence: 0.85,
      source: 'flag_emoji',
      geocodingAttempts: ['No coordinates found', 'Found flag: UKR']
    })
  })

  it('prefers coordinates over a flag', async () => {
    const result = await createPipeline().locate({
      text: `${UKRAINE_FLAG} Strike at 48.5, 35.0`,
      channel: 'test_channel'
    })

    expect(result.source).toBe('coordinates_regex')
    expect(result.countryCode).toBeUndefined()
  })

  it('geocodes location entities', async () => {
    const geocoder = new FakeGeocoder({
      'Kharkiv, Ukraine': createMatch({
        lat: 49.99,
        lon: 36.23,
        placeName: 'Kharkiv, Kharkiv Oblast, Ukraine'
      })
    })

    const result = await createPipeline(geocoder).locate({
      text: 'Shelling near Kharkiv, Ukraine this morning',
      channel: 'test_channel'
    })

    expect(result.source).toBe('llm_geocoding_city_country')
    expect(result.confidence).toBe(0.8)
    expect(result.placeName).toBe('Kharkiv, Kharkiv Oblast, Ukraine')
    expect(result.geocodingAttempts.slice(0, 4)).toEqual([
      'No coordinates found',
      'No flag found',
      'LLM extracted: Kharkiv, Ukraine',
      'Geocoded successfully: Kharkiv, Kharkiv Oblast, Ukraine'
    ])
  })

  it('falls back to place-name geocoding', async () => {
    const geocoder = new FakeGeocoder({
      Donetsk: createMatch({ lat: 48.0, lon: 37.8, placeName: 'Donetsk, Ukraine', relevance: 0.5 })
    })

    const result = await createPipeline(geocoder).locate({
      text: 'Donetsk shelling overnight',
      channel: 'militarysummary'
    })

    expect(result).toEqual({
      lat: 48,
      lon: 37.8,
      confidence: 0.4,
      source: 'place_name_geocoding',
      placeName: 'Donetsk, Ukraine',
      geocodingAttempts: [
        'No coordinates found',
        'No flag found',
        'LLM extracted: Donetsk',
        'Geocoded successfully: Donetsk, Ukraine',
        'No candidate above 0.3 confidence',
        'Geocoded place: Donetsk'
      ]
    })
  })

  it('sends short emoji-padded text to the place-name fallback', async () => {
    const geocoder = new FakeGeocoder({ Kyiv: createMatch({ relevance: 0.9 }) })

    const result = await createPipeline(geocoder).locate({
      text: 'Kyiv 💥💥💥',
      channel: 'test_channel'
    })

    expect(result).toEqual({
      lat: 50.45,
      lon: 30.52,
      confidence: 0.4,
      source: 'place_name_geocoding',
      placeName: 'Kyiv, Ukraine',
      geocodingAttempts: [
        'No coordinates found',
        'No flag found',
        'Text too short for entity extraction',
        'Geocoded place: Kyiv'
      ]
    })
  })

  it('falls back to the channel country', async () => {
    const result = await createPipeline().locate({
      text: 'no evidence here',
      channel: 'militarysummary'
    })

    expect(result).toEqual({
      lat: 49,
      lon: 32,
      countryCode: 'UKR',
      confidence: 0.2,
      source: 'channel_fallback',
      geocodingAttempts: [
        'No coordinates found',
        'No flag found',
        'No location entities extracted',
        'No place names extracted',
        'Channel fallback: UKR'
      ]
    })
  })

  it('returns a zero-confidence result when nothing matches', async () => {
    const result = await createPipeline().locate({ text: 'ok', channel: 'weather_updates' })

    expect(result).toEqual({
      confidence: 0,
      source: 'none',
      geocodingAttempts: [
        'No coordinates found',
        'No flag found',
        'Text too short for entity extraction',
        'No place names extracted',
        'No channel mapping for weather_updates',
        'No geolocation found'
      ]
    })
  })

  it('skips geocoding stages without a geocoder', async () => {
    const result = await createPipeline(null).locate({
      text: 'Shelling near Kharkiv, Ukraine this morning',
      channel: 'russia_news'
    })

    expect(result.source).toBe('channel_fallback')
    expect(result.geocodingAttempts).toEqual([
      'No coordinates found',
      'No flag found',
      'entities: geocoding disabled',
      'place_name: geocoding disabled',
      'Channel fallback: RUS'
    ])
  })

  it('is idempotent with a deterministic geocoder', async () => {
    const pipeline = createPipeline(
      new FakeGeocoder({ 'Kharkiv, Ukraine': createMatch({ relevance: 0.9 }) })
    )
    const input = { text: 'Shelling near Kharkiv, Ukraine this morning', channel: 'ClashReport' }

    expect(await pipeline.locate(input)).toEqual(await pipeline.locate(input))
  })

  it('keeps confidence in range and always records attempts', async () => {
    const pipeline = createPipeline(
      new FakeGeocoder({ Odesa: createMatch({ placeName: 'Odesa, Ukraine', relevance: 1 }) })
    )
    const inputs = [
      { text: '', channel: '' },
      { text: 'Port of Odesa hit', channel: 'ukraine_world' },
      { text: 'lat: 91.0 lon: 10.0', channel: 'nobody' },
      { text: `${UKRAINE_FLAG}`, channel: 'russia_news' }
    ]

    for (const input of inputs) {
      const result = await pipeline.locate(input)
      expect(result.confidence).toBeGreaterThanOrEqual(0)
      expect(result.confidence).toBeLessThanOrEqual(1)
      expect(result.geocodingAttempts.length).toBeGreaterThan(0)
      expect(result.confidence === 0).toBe(result.source === 'none')
    }
  })

  it('runs custom stages in order and stops at the first match', async () => {
    const calls: string[] = []
    const stage = (name: 'flag' | 'channel', outcome: StageOutcome): GeolocationStage => ({
      name,
      attempt: async () => {
        calls.push(name)
        return outcome
      }
    })
    const pipeline = new GeolocationPipeline([
      stage('flag', {
        match: { lat: 1, lon: 2, confidence: 0.5, source: 'flag_emoji' },
        attempts: ['first']
      }),
      stage('channel', { match: null, attempts: ['second'] })
    ])

    const result = await pipeline.locate({ text: 'x', channel: 'y' })

    expect(calls).toEqual(['flag'])
    expect(result.geocodingAttempts).toEqual(['first'])
  })
})

describe('serializeGeolocation', () => {
  it('writes snake_case keys with nulls for absent values', () => {
    expect(
      serializeGeolocation({
        confidence: 0,
        source: 'none',
        geocodingAttempts: ['No geolocation found']
      })
    ).toEqual({
      lat: null,
      lon: null,
      country_code: null,
      confidence: 0,
      source: 'none',
      place_name: null,
      geocoding_attempts: ['No geolocation found']
    })
  })
})

describe('processMessage', () => {
  it('attaches the result and keeps every original field', async () => {
    const message = createMessage({ text: 'Strike at 48.5, 35.0', views: 1200 })

    const processed = await processMessage(
      message,
      createPipeline(),
      () => new Date('2025-07-01T12:00:00.000Z')
    )

    expect(processed).toEqual({
      channel: 'test_channel',
      link: 'https://t.me/test_channel/1',
      timestamp: '2025-06-28T19:31:17+00:00',
      id: 1,
      text: 'Strike at 48.5, 35.0',
      views: 1200,
      geolocation: {
        lat: 48.5,
        lon: 35,
        country_code: null,
        confidence: 0.95,
        source: 'coordinates_regex',
        place_name: null,
        geocoding_attempts: ['Found coordinates: (48.5, 35)']
      },
      processed_at: '2025-07-01T12:00:00.000Z',
      processing_version: 'enhanced_v1'
    })
  })
})
