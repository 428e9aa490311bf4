/**
 * Message Types
 *
 * Input records as produced by the message source, and the augmented
 * records written after geolocation.
 */

import type { SerializedGeolocation } from './geolocation'

/**
 * One message from a channel dump. Fields beyond the known ones are carried
 * through to the output untouched.
 */
export interface MessageRecord {
  readonly channel: string
  readonly link: string | null
  readonly text: string
  /** ISO-8601 */
  readonly timestamp: string
  readonly id: number
  readonly [field: string]: unknown
}

export interface ProcessedMessage extends MessageRecord {
  readonly geolocation: SerializedGeolocation
  readonly processed_at: string
  readonly processing_version: string
}

export type ParseErrorReason = 'empty' | 'invalid_json' | 'invalid_schema'

export type ParseLineResult =
  | { readonly ok: true; readonly message: MessageRecord }
  | { readonly ok: false; readonly reason: ParseErrorReason; readonly message: string }
