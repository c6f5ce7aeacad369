/**
 * Secret Classifier
 *
 * Decides which SecretValue variant a raw fetch result represents.
 * Classification is total: anything that is not binary and not a JSON
 * object ends up as plain text.
 */

import { isMap, isScalar, parseDocument } from 'yaml'
import type { RawSecretResult, SecretValue } from '../types.js'
import { binarySecret, mapSecret, textSecret } from './secret-value.js'

const INTEGER_KEY = /^(?:0|[1-9]\d*)$/

/**
 * Classify a raw secret payload
 */
export function classifySecret(raw: RawSecretResult): SecretValue {
  if (raw.kind === 'binary') {
    const text = decodeUtf8(raw.bytes)
    if (text === undefined) {
      return binarySecret(raw.bytes)
    }
    return classifyText(text)
  }

  return classifyText(raw.text)
}

/**
 * Strict UTF-8 decode; undefined when the bytes are not valid text
 */
export function decodeUtf8(bytes: Uint8Array): string | undefined {
  try {
    return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes)
  } catch {
    return undefined
  }
}

function classifyText(text: string): SecretValue {
  const parsed = parseJsonObject(text)
  if (!parsed) {
    return textSecret(text)
  }

  const keys = Object.keys(parsed)
  const needsSource = keys.some(key => INTEGER_KEY.test(key) || typeof parsed[key] === 'number')
  const layout = needsSource ? readSourceLayout(text, parsed) : undefined

  return mapSecret(
    (layout?.keys ?? keys).map((key): [string, string] => [
      key,
      layout?.numbers.get(key) ?? stringifyMember(parsed[key])
    ])
  )
}

function parseJsonObject(text: string): Record<string, unknown> | undefined {
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch {
    return undefined
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return undefined
  }

  return Object.fromEntries(Object.entries(parsed))
}

/**
 * Scalars become their canonical string form, nested values their compact JSON
 */
function stringifyMember(value: unknown): string {
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'boolean' || value === null) {
    return String(value)
  }
  return JSON.stringify(value)
}

const JSON_NUMBER = /^-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?$/

interface SourceLayout {
  /** Member order as written */
  keys: string[]
  /** Top-level numeric members as written (last duplicate wins) */
  numbers: Map<string, string>
}

/**
 * Member order and number literals as written in the source text.
 *
 * JS objects list integer-like keys first and JSON.parse turns every number
 * into a double, so both are recovered from a YAML parse of the same text
 * (JSON is YAML 1.2). Undefined when the two parses disagree.
 */
function readSourceLayout(text: string, parsed: Record<string, unknown>): SourceLayout | undefined {
  const doc = parseDocument(text, { uniqueKeys: false })
  if (doc.errors.length > 0 || !isMap(doc.contents)) {
    return undefined
  }

  const keys: string[] = []
  const numbers = new Map<string, string>()
  for (const pair of doc.contents.items) {
    if (!isScalar(pair.key)) {
      return undefined
    }
    const key = String(pair.key.value)
    if (!keys.includes(key)) {
      keys.push(key)
    }

    numbers.delete(key)
    const node = pair.value
    if (typeof parsed[key] === 'number' && isScalar(node) && node.range) {
      const literal = text.slice(node.range[0], node.range[1])
      if (JSON_NUMBER.test(literal)) {
        numbers.set(key, literal)
      }
    }
  }

  // Both parses must agree on the key set
  if (keys.length !== Object.keys(parsed).length || !keys.every(key => Object.hasOwn(parsed, key))) {
    return undefined
  }

  return { keys, numbers }
}
