/**
 * tg-geolocate Core Library
 *
 * Infer where channel messages are about: literal coordinates, flag emoji,
 * geocoded place names and per-channel country fallbacks.
 *
 * Design principle: no console output and no orchestration. Problems are
 * reported through callbacks; the only side effects are geocoding calls and
 * optional response caching.
 *
 * @license AGPL-3.0
 */

// Cache module
export type { CachedResponse, CacheKeyComponents, ResponseCache } from './caching/index'
export { FilesystemCache, generateCacheKey, generateGeocodeCacheKey } from './caching/index'
// Export module
export {
  COMBINED_GEOJSON_FILENAME,
  type ConvertedMessages,
  convertProcessedLines,
  createCombinedCollection,
  createFileCollection,
  exportToGeoJSON,
  type FeatureCollection,
  formatGeolocationRate,
  type PointFeature,
  toPointFeature
} from './export/geojson'
// Extraction module
export {
  extractCoordinates,
  extractLocationEntities,
  extractPlaceNames,
  findFlagCountries,
  getCountryCentroid,
  isValidCoordinate,
  resolveFlag
} from './extraction/index'
// Geocoder module
export {
  type CandidateGeocode,
  DEFAULT_RATE_LIMIT_MS,
  ENTITY_ACCEPT_THRESHOLD,
  geocodeCandidates,
  MapboxGeocoder,
  type MapboxGeocoderOptions,
  parseGeocodingResponse,
  RateLimiter,
  selectBestCandidate,
  toMapboxCountry
} from './geocoder/index'
// HTTP utilities
export { handleHttpError, handleNetworkError, type HttpResponse, httpFetch } from './http'
// Parser module
export { parseMessageLine, parseMessageStream, toMessageRecord } from './parser/index'
// Pipeline module
export {
  ChannelFallbackStage,
  CoordinatesStage,
  createStages,
  EntityStage,
  FlagStage,
  GeolocationPipeline,
  type PipelineOptions,
  PlaceNameStage,
  PROCESSING_VERSION,
  processMessage,
  serializeGeolocation
} from './pipeline/index'
// Reference data
export {
  DEFAULT_CHANNEL_COUNTRIES,
  DEFAULT_REFERENCE_PATH,
  emptyReferenceData,
  loadReferenceData,
  parseReferenceData,
  resolveChannel
} from './reference/index'
// Confidence scoring
export { scoreConfidence } from './scoring/index'
// Types
export type {
  ApiError,
  ApiErrorType,
  CandidateType,
  Coordinates,
  GeocodeMatch,
  Geocoder,
  GeocoderConfig,
  GeolocationResult,
  GeolocationSource,
  GeolocationStage,
  LocationCandidate,
  MessageRecord,
  MessageText,
  ParseErrorReason,
  ParseLineResult,
  ProcessedMessage,
  ReferenceData,
  Result,
  SerializedGeolocation,
  StageMatch,
  StageName,
  StageOutcome
} from './types'

export const VERSION = '0.1.0'
