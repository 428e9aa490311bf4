/**
 * Reference Data Types
 */

import type { Coordinates } from './geolocation'

/**
 * Static lookup tables shared read-only by every stage.
 */
export interface ReferenceData {
  /** Flag symbol → country code, in file order */
  readonly flagToCountry: ReadonlyMap<string, string>
  readonly countryCentroids: ReadonlyMap<string, Coordinates>
  /** Channel identifier → country code */
  readonly channelToCountry: ReadonlyMap<string, string>
}
