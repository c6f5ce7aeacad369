/**
 * Helpers shared by the format encoders
 */

import type { EncodedOutput, OutputFormat } from '../../types.js'
import { EncodingError } from '../errors.js'

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/

/**
 * Every output is UTF-8; unpaired surrogates have no UTF-8 form.
 */
export function assertEncodable(format: OutputFormat, field: string, value: string): void {
  if (LONE_SURROGATE.test(value)) {
    throw new EncodingError(format, field, 'contains an unpaired UTF-16 surrogate')
  }
}

export function toEncodedOutput(format: OutputFormat, body: string, defaultFilename: string): EncodedOutput {
  return {
    format,
    content: Buffer.from(body, 'utf-8'),
    defaultFilename
  }
}
