/**
 * env / stdout encoder
 *
 * KEY=VALUE lines in map order, values verbatim (no quoting).
 */

import type { EncodedOutput, KeyValueMap, OutputFormat, SecretValue } from '../../types.js'
import { EncodingError } from '../errors.js'
import { TEXT_FIELD, describeBinary } from '../secret-value.js'
import { assertEncodable, toEncodedOutput } from './shared.js'

export const ENV_FILENAME = '.env'

/**
 * Build KEY=VALUE lines. A key holding `=` or a line break would not
 * split back on the first `=`, so it is rejected. Values with line breaks
 * are rejected for env files; console and raw output write them verbatim.
 */
export function envLines(entries: KeyValueMap, format: OutputFormat = 'env'): string[] {
  const lines: string[] = []
  for (const [key, value] of entries) {
    if (/[=\r\n]/.test(key)) {
      throw new EncodingError(format, key, 'env keys cannot contain "=" or line breaks')
    }
    if (format === 'env' && /[\r\n]/.test(value)) {
      throw new EncodingError(format, key, 'env values cannot contain line breaks')
    }
    assertEncodable(format, key, key)
    assertEncodable(format, key, value)
    lines.push(`${key}=${value}`)
  }
  return lines
}

function envBody(value: SecretValue, format: OutputFormat): string {
  switch (value.kind) {
    case 'map':
      return envLines(value.entries, format).join('\n')
    case 'text':
      assertEncodable(format, TEXT_FIELD, value.text)
      return value.text
    case 'binary':
      return describeBinary(value.bytes)
  }
}

export function encodeEnv(value: SecretValue): EncodedOutput {
  return toEncodedOutput('env', envBody(value, 'env'), ENV_FILENAME)
}

/**
 * Console presentation for `--output stdout`
 */
export function encodeStdout(value: SecretValue): EncodedOutput {
  return toEncodedOutput('stdout', envBody(value, 'stdout'), ENV_FILENAME)
}
