/**
 * CSV encoder (RFC 4180, LF line endings)
 */

import type { EncodedOutput, SecretValue } from '../../types.js'
import { BINARY_SIZE_FIELD, TEXT_FIELD } from '../secret-value.js'
import { assertEncodable, toEncodedOutput } from './shared.js'

export const CSV_FILENAME = 'secret.csv'

const HEADER: [string, string] = ['key', 'value']

/**
 * Quote a field holding a comma, quote or line break; inner quotes are doubled
 */
export function escapeCsvField(field: string): string {
  if (/[",\r\n]/.test(field)) {
    return `"${field.replace(/"/g, '""')}"`
  }
  return field
}

function formatRows(rows: Array<[string, string]>): string {
  return [HEADER, ...rows]
    .map(row => row.map(escapeCsvField).join(','))
    .join('\n')
}

export function encodeCsv(value: SecretValue): EncodedOutput {
  let rows: Array<[string, string]>
  switch (value.kind) {
    case 'map':
      rows = []
      for (const [key, entry] of value.entries) {
        assertEncodable('csv', key, key)
        assertEncodable('csv', key, entry)
        rows.push([key, entry])
      }
      break
    case 'text':
      assertEncodable('csv', TEXT_FIELD, value.text)
      rows = [[TEXT_FIELD, value.text]]
      break
    case 'binary':
      rows = [[BINARY_SIZE_FIELD, String(value.bytes.byteLength)]]
      break
  }
  return toEncodedOutput('csv', formatRows(rows), CSV_FILENAME)
}
