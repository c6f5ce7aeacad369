/**
 * SecretValue constructors and helpers
 */

import type { SecretValue } from '../types.js'

export function mapSecret(entries: Iterable<readonly [string, string]>): SecretValue {
  return { kind: 'map', entries: new Map(entries) }
}

export function textSecret(text: string): SecretValue {
  return { kind: 'text', text }
}

export function binarySecret(bytes: Uint8Array): SecretValue {
  return { kind: 'binary', bytes }
}

/**
 * Human-readable size report used wherever binary content is not embedded
 */
export function describeBinary(bytes: Uint8Array): string {
  return `Binary secret data (${bytes.byteLength} bytes)`
}

/**
 * Field name used when a format needs a key for a plain text secret
 */
export const TEXT_FIELD = 'value'

/**
 * Field name carrying the byte count of a binary secret
 */
export const BINARY_SIZE_FIELD = 'size_bytes'
