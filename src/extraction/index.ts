/**
 * Extraction Module
 *
 * Pure text heuristics: coordinates, flags, location entities and place names.
 * No IO and no API calls.
 */

export { extractCoordinates, isValidCoordinate } from './coordinates'
export { extractLocationEntities } from './entities'
export { type FlagResolution, findFlagCountries, getCountryCentroid, resolveFlag } from './flags'
export { COORDINATE_PATTERNS, ENTITY_PATTERNS, PLACE_NAME_PATTERNS, STOP_WORDS } from './patterns'
export { extractPlaceNames } from './place-names'
