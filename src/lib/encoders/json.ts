/**
 * JSON encoder
 */

import type { EncodedOutput, SecretValue } from '../../types.js'
import { BINARY_SIZE_FIELD, TEXT_FIELD } from '../secret-value.js'
import { assertEncodable, toEncodedOutput } from './shared.js'

export const JSON_FILENAME = 'secret.json'

const INDENT = '  '

/**
 * Pretty-print a map secret.
 *
 * Written member by member: JSON.stringify on a plain object would move
 * integer-like keys to the front.
 */
function formatObject(entries: Iterable<readonly [string, string | number]>): string {
  const members: string[] = []
  for (const [key, value] of entries) {
    members.push(`${INDENT}${JSON.stringify(key)}: ${JSON.stringify(value)}`)
  }
  if (members.length === 0) {
    return '{}'
  }
  return `{\n${members.join(',\n')}\n}`
}

export function encodeJson(value: SecretValue): EncodedOutput {
  let body: string
  switch (value.kind) {
    case 'map':
      for (const [key, entry] of value.entries) {
        assertEncodable('json', key, key)
        assertEncodable('json', key, entry)
      }
      body = formatObject(value.entries)
      break
    case 'text':
      assertEncodable('json', TEXT_FIELD, value.text)
      body = JSON.stringify(value.text)
      break
    case 'binary':
      body = formatObject([[BINARY_SIZE_FIELD, value.bytes.byteLength]])
      break
  }
  return toEncodedOutput('json', body, JSON_FILENAME)
}
