/**
 * Render a fetched secret: classify -> encode -> route
 */

import type { OutputRequest, RawSecretResult, RenderResult } from '../types.js'
import { classifySecret } from './classifier.js'
import { encodeSecret } from './encoders/index.js'
import { RenderError, WriteError, isEncodingError } from './errors.js'
import { fsWriter, type FileWriter } from './file-writer.js'
import { deliver, resolveRoute, selectPayload } from './output-router.js'

export interface RenderOptions {
  writer?: FileWriter
  stdout?: (chunk: Uint8Array) => void
  cwd?: string
}

function writeToStdout(chunk: Uint8Array): void {
  process.stdout.write(chunk)
}

/**
 * Render one secret to its destination.
 *
 * @throws RenderError tagged with the failing stage ('encode' or 'write')
 */
export function render(
  request: OutputRequest,
  raw: RawSecretResult,
  options: RenderOptions = {}
): RenderResult {
  const value = classifySecret(raw)
  const route = resolveRoute(request.format, request.filePath)

  let content: Uint8Array
  try {
    content = selectPayload(route, encodeSecret(value, request.format), value)
  } catch (err) {
    if (isEncodingError(err)) {
      throw new RenderError('encode', err)
    }
    throw err
  }

  try {
    const outcome = deliver(route, content, {
      writer: options.writer ?? fsWriter,
      stdout: options.stdout ?? writeToStdout,
      cwd: options.cwd
    })

    return {
      destination: outcome.destination,
      format: request.format,
      secretKind: value.kind,
      bytesWritten: outcome.bytesWritten
    }
  } catch (err) {
    const writeError = err instanceof WriteError
      ? err
      : new WriteError(route.target === 'file' ? route.path : 'stdout', err)
    throw new RenderError('write', writeError)
  }
}
