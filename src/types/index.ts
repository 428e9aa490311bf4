/**
 * Types Index
 *
 * Re-exports all types from domain-specific files.
 */

export * from './common'
export * from './geocoder'
export * from './geolocation'
export * from './message'
export * from './reference'
