/**
 * Output Router
 *
 * Decides where a rendered secret goes and which payload is written there.
 *
 *   format \ --file |  given                       | absent
 *   ----------------+------------------------------+---------------------------------
 *   stdout          |  raw content -> that file    | console presentation -> stdout
 *   other           |  document -> that file       | document -> default file in cwd
 *
 * stdout + --file is the only cell that changes *which* payload is written.
 */

import path from 'node:path'
import type { EncodedOutput, OutputFormat, SecretValue } from '../types.js'
import { DEFAULT_FILENAMES } from './encoders/index.js'
import { envLines } from './encoders/env.js'
import { TEXT_FIELD } from './secret-value.js'
import { assertEncodable } from './encoders/shared.js'
import type { FileWriter } from './file-writer.js'

export type Route =
  | { target: 'console'; payload: 'presentation' }
  | { target: 'file'; path: string; payload: 'raw' | 'document' }

type FormatClass = 'stdout' | 'document'

type Cell =
  | { target: 'console'; payload: 'presentation' }
  | { target: 'explicit-file'; payload: 'raw' | 'document' }
  | { target: 'default-file'; payload: 'document' }

const DECISION_TABLE: Record<FormatClass, { withPath: Cell; withoutPath: Cell }> = {
  stdout: {
    withPath: { target: 'explicit-file', payload: 'raw' },
    withoutPath: { target: 'console', payload: 'presentation' }
  },
  document: {
    withPath: { target: 'explicit-file', payload: 'document' },
    withoutPath: { target: 'default-file', payload: 'document' }
  }
}

/**
 * Resolve destination and payload for a format and optional explicit path
 */
export function resolveRoute(format: OutputFormat, filePath?: string): Route {
  const formatClass: FormatClass = format === 'stdout' ? 'stdout' : 'document'
  const hasPath = filePath !== undefined && filePath !== ''
  const cell = DECISION_TABLE[formatClass][hasPath ? 'withPath' : 'withoutPath']

  switch (cell.target) {
    case 'console':
      return { target: 'console', payload: 'presentation' }
    case 'explicit-file':
      return { target: 'file', path: filePath ?? '', payload: cell.payload }
    case 'default-file':
      return { target: 'file', path: DEFAULT_FILENAMES[format], payload: 'document' }
  }
}

/**
 * Unformatted secret content written for `--output stdout --file <path>`.
 *
 * Text and binary secrets are written byte for byte. Map secrets are
 * written as KEY=VALUE lines, one per entry.
 */
export function rawContent(value: SecretValue): Uint8Array {
  switch (value.kind) {
    case 'text':
      assertEncodable('stdout', TEXT_FIELD, value.text)
      return Buffer.from(value.text, 'utf-8')
    case 'binary':
      return value.bytes
    case 'map':
      return Buffer.from(envLines(value.entries, 'stdout').map(line => `${line}\n`).join(''), 'utf-8')
  }
}

const NEWLINE = 0x0a

/**
 * Terminate a non-empty text document with a single newline
 */
export function terminateDocument(content: Uint8Array): Uint8Array {
  if (content.byteLength === 0 || content[content.byteLength - 1] === NEWLINE) {
    return content
  }
  return Buffer.concat([content, Buffer.from('\n')])
}

export interface RouteOptions {
  writer: FileWriter
  /** Console sink for the stdout presentation */
  stdout: (chunk: Uint8Array) => void
  /** Base directory for relative paths (default: process.cwd()) */
  cwd?: string
}

export interface RouteOutcome {
  destination: string
  bytesWritten: number
}

/**
 * Bytes that go to the route's destination. May throw EncodingError.
 */
export function selectPayload(route: Route, encoded: EncodedOutput, value: SecretValue): Uint8Array {
  switch (route.payload) {
    case 'raw':
      return rawContent(value)
    case 'document':
    case 'presentation':
      return terminateDocument(encoded.content)
  }
}

/**
 * Write prepared bytes to the route's destination. May throw WriteError.
 */
export function deliver(route: Route, content: Uint8Array, options: RouteOptions): RouteOutcome {
  if (route.target === 'console') {
    if (content.byteLength > 0) {
      options.stdout(content)
    }
    return { destination: 'stdout', bytesWritten: content.byteLength }
  }

  const destination = path.resolve(options.cwd ?? process.cwd(), route.path)
  options.writer.write(destination, content)
  return { destination, bytesWritten: content.byteLength }
}

/**
 * Select the payload and write it to the resolved destination
 */
export function routeOutput(
  route: Route,
  encoded: EncodedOutput,
  value: SecretValue,
  options: RouteOptions
): RouteOutcome {
  return deliver(route, selectPayload(route, encoded, value), options)
}
