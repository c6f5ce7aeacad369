/**
 * YAML encoder
 *
 * Block style. Multi-line values use literal block scalars (`|`); values a
 * block scalar cannot carry fall back to double-quoted scalars with escapes.
 */

import { Document, Scalar, isMap, isScalar } from 'yaml'
import type { EncodedOutput, SecretValue } from '../../types.js'
import { EncodingError } from '../errors.js'
import { BINARY_SIZE_FIELD, TEXT_FIELD } from '../secret-value.js'
import { assertEncodable, toEncodedOutput } from './shared.js'

export const YAML_FILENAME = 'secret.yaml'

// C0/C1 controls (tab and LF excepted), DEL, BOM
const NEEDS_ESCAPE = /[\u0000-\u0008\u000B-\u001F\u007F-\u009F\uFEFF]/

type ScalarType = Scalar['type']

/**
 * Style for a value written as a literal block scalar.
 * Throws EncodingError when block style cannot represent it.
 */
export function blockScalarStyle(field: string, value: string): ScalarType {
  if (NEEDS_ESCAPE.test(value)) {
    throw new EncodingError('yaml', field, 'control characters are not allowed in block scalars')
  }
  if (/[ \t]$/m.test(value) || value.trim() === '') {
    throw new EncodingError('yaml', field, 'trailing whitespace is not preserved by block scalars')
  }
  // A root-level block scalar takes its indentation from the first line
  if (/^[ \t]/.test(value)) {
    throw new EncodingError('yaml', field, 'leading whitespace is not preserved by block scalars')
  }
  return Scalar.BLOCK_LITERAL
}

/**
 * Pick the scalar style for one value; undefined keeps the serializer's default
 */
function scalarStyle(field: string, value: string): ScalarType {
  assertEncodable('yaml', field, value)

  if (!value.includes('\n') && !NEEDS_ESCAPE.test(value)) {
    return undefined
  }

  try {
    return blockScalarStyle(field, value)
  } catch (err) {
    if (err instanceof EncodingError) {
      return Scalar.QUOTE_DOUBLE
    }
    throw err
  }
}

function styleScalar(node: unknown, field: string): void {
  if (isScalar(node) && typeof node.value === 'string') {
    node.type = scalarStyle(field, node.value)
  }
}

function buildDocument(value: SecretValue): Document {
  switch (value.kind) {
    case 'map': {
      const doc = new Document(value.entries)
      if (isMap(doc.contents)) {
        for (const pair of doc.contents.items) {
          const key = isScalar(pair.key) ? String(pair.key.value) : ''
          assertEncodable('yaml', key, key)
          styleScalar(pair.value, key)
        }
      }
      return doc
    }
    case 'text': {
      const doc = new Document(value.text)
      styleScalar(doc.contents, TEXT_FIELD)
      return doc
    }
    case 'binary':
      return new Document(new Map([[BINARY_SIZE_FIELD, value.bytes.byteLength]]))
  }
}

export function encodeYaml(value: SecretValue): EncodedOutput {
  const body = buildDocument(value).toString({ lineWidth: 0 })
  return toEncodedOutput('yaml', body, YAML_FILENAME)
}
