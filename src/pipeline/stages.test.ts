import { describe, expect, it } from 'vitest'
import {
  createMatch,
  createReferenceData,
  FakeGeocoder,
  ISRAEL_FLAG,
  RUSSIA_FLAG,
  UKRAINE_FLAG
} from '../test-support/index'
import {
  ChannelFallbackStage,
  CoordinatesStage,
  EntityStage,
  FlagStage,
  PlaceNameStage
} from './stages'

const reference = createReferenceData()

function message(text: string, channel = 'test_channel') {
  return { text, channel }
}

describe('CoordinatesStage', () => {
  const stage = new CoordinatesStage()

  it('matches decimal coordinates with fixed confidence', async () => {
    const outcome = await stage.attempt(message('Impact at 47.8388, 35.1396 overnight'))

    expect(outcome).toEqual({
      match: { lat: 47.8388, lon: 35.1396, confidence: 0.95, source: 'coordinates_regex' },
      attempts: ['Found coordinates: (47.8388, 35.1396)']
    })
  })

  it('reports a miss', async () => {
    expect(await stage.attempt(message('No numbers here'))).toEqual({
      match: null,
      attempts: ['No coordinates found']
    })
  })
})

describe('FlagStage', () => {
  it('uses the centroid of the first flag by mapping order', async () => {
    const stage = new FlagStage(reference)

    const outcome = await stage.attempt(message(`${ISRAEL_FLAG} ${RUSSIA_FLAG} talks`))

    expect(outcome).toEqual({
      match: { lat: 61.5, lon: 105.3, countryCode: 'RUS', confidence: 0.85, source: 'flag_emoji' },
      attempts: ['Found flag: RUS']
    })
  })

  it('yields nothing when the flag country has no centroid', async () => {
    const stage = new FlagStage(createReferenceData({ centroids: {} }))

    expect(await stage.attempt(message(`${UKRAINE_FLAG} update`))).toEqual({
      match: null,
      attempts: ['Found flag: UKR but no centroid']
    })
  })

  it('reports a miss', async () => {
    const stage = new FlagStage(reference)

    expect((await stage.attempt(message('Plain text'))).attempts).toEqual(['No flag found'])
  })
})

describe('EntityStage', () => {
  const kharkiv = createMatch({
    lat: 49.99,
    lon: 36.23,
    placeName: 'Kharkiv, Kharkiv Oblast, Ukraine'
  })

  it('accepts the best geocoded candidate', async () => {
    const stage = new EntityStage(new FakeGeocoder({ 'Kharkiv, Ukraine': kharkiv }))

    const outcome = await stage.attempt(message('Shelling near Kharkiv, Ukraine this morning'))

    expect(outcome.match).toEqual({
      lat: 49.99,
      lon: 36.23,
      placeName: 'Kharkiv, Kharkiv Oblast, Ukraine',
      confidence: 0.8,
      source: 'llm_geocoding_city_country'
    })
    expect(outcome.attempts).toEqual([
      'LLM extracted: Kharkiv, Ukraine',
      'Geocoded successfully: Kharkiv, Kharkiv Oblast, Ukraine',
      'LLM extracted: Shelling',
      'Geocoding failed',
      'LLM extracted: Kharkiv',
      'Geocoding failed',
      'LLM extracted: Ukraine',
      'Geocoding failed'
    ])
  })

  it('raises an accepted confidence to the scorer floor', async () => {
    const stage = new EntityStage(
      new FakeGeocoder({ 'Kharkiv, Ukraine': { ...kharkiv, relevance: 0.5 } })
    )

    const outcome = await stage.attempt(message('Shelling near Kharkiv, Ukraine this morning'))

    expect(outcome.match?.confidence).toBe(0.7)
  })

  it('rejects a best candidate at or below 0.3', async () => {
    const stage = new EntityStage(
      new FakeGeocoder({ Donetsk: createMatch({ placeName: 'Donetsk, Ukraine', relevance: 0.5 }) })
    )

    const outcome = await stage.attempt(message('Donetsk shelling overnight'))

    expect(outcome).toEqual({
      match: null,
      attempts: [
        'LLM extracted: Donetsk',
        'Geocoded successfully: Donetsk, Ukraine',
        'No candidate above 0.3 confidence'
      ]
    })
  })

  it('skips short text without calling the geocoder', async () => {
    const geocoder = new FakeGeocoder()
    const stage = new EntityStage(geocoder)

    const outcome = await stage.attempt(message('Kyiv today'))

    expect(outcome.attempts).toEqual(['Text too short for entity extraction'])
    expect(geocoder.calls).toEqual([])
  })

  it('counts emoji as single characters for the length gate', async () => {
    const geocoder = new FakeGeocoder({ Kyiv: createMatch() })
    const stage = new EntityStage(geocoder)

    const outcome = await stage.attempt(message('Kyiv 💥💥💥'))

    expect(outcome).toEqual({
      match: null,
      attempts: ['Text too short for entity extraction']
    })
    expect(geocoder.calls).toEqual([])
  })

  it('reports text without entities', async () => {
    const stage = new EntityStage(new FakeGeocoder())

    expect((await stage.attempt(message('quiet night everywhere'))).attempts).toEqual([
      'No location entities extracted'
    ])
  })

  it('records that geocoding is disabled', async () => {
    const stage = new EntityStage(null)

    expect(await stage.attempt(message('Shelling near Kharkiv, Ukraine'))).toEqual({
      match: null,
      attempts: ['entities: geocoding disabled']
    })
  })
})

describe('PlaceNameStage', () => {
  it('geocodes only the first place name with fixed confidence', async () => {
    const geocoder = new FakeGeocoder({
      Donetsk: createMatch({ lat: 48.0, lon: 37.8, placeName: 'Donetsk, Ukraine', relevance: 0.2 })
    })
    const stage = new PlaceNameStage(geocoder)

    const outcome = await stage.attempt(message('Donetsk and Mariupol'))

    expect(outcome).toEqual({
      match: {
        lat: 48,
        lon: 37.8,
        placeName: 'Donetsk, Ukraine',
        confidence: 0.4,
        source: 'place_name_geocoding'
      },
      attempts: ['Geocoded place: Donetsk']
    })
    expect(geocoder.calls).toEqual([{ query: 'Donetsk', countryHint: undefined }])
  })

  it('reports a failed lookup', async () => {
    const stage = new PlaceNameStage(new FakeGeocoder())

    expect((await stage.attempt(message('Atlantis rising'))).attempts).toEqual([
      'Place name not geocoded: Atlantis'
    ])
  })

  it('reports text without place names', async () => {
    const stage = new PlaceNameStage(new FakeGeocoder())

    expect((await stage.attempt(message('all quiet'))).attempts).toEqual([
      'No place names extracted'
    ])
  })

  it('records that geocoding is disabled', async () => {
    expect((await new PlaceNameStage(null).attempt(message('Kyiv'))).attempts).toEqual([
      'place_name: geocoding disabled'
    ])
  })
})

describe('ChannelFallbackStage', () => {
  it('uses the channel country centroid', async () => {
    const stage = new ChannelFallbackStage(reference)

    expect(await stage.attempt(message('no evidence', 'middle_east_news'))).toEqual({
      match: {
        lat: 31,
        lon: 34.9,
        countryCode: 'ISR',
        confidence: 0.2,
        source: 'channel_fallback'
      },
      attempts: ['Channel fallback: ISR']
    })
  })

  it('reports unknown channels', async () => {
    const stage = new ChannelFallbackStage(reference)

    expect((await stage.attempt(message('text', 'weather_updates'))).attempts).toEqual([
      'No channel mapping for weather_updates'
    ])
  })

  it('yields nothing when the channel country has no centroid', async () => {
    const stage = new ChannelFallbackStage(createReferenceData({ centroids: {} }))

    expect(await stage.attempt(message('text', 'russia_news'))).toEqual({
      match: null,
      attempts: ['Channel fallback: RUS has no centroid']
    })
  })
})
