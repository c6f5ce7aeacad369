/**
 * secretcast CLI - Get Command
 *
 * Fetch one secret and render it in the requested format
 */

import type { OutputFormat, RenderResult } from '../../types.js'
import type { SecretSource } from '../../client.js'
import { render, type RenderOptions } from '../../lib/render.js'
import { MissingSecretNameError } from '../../lib/errors.js'
import * as ui from '../ui.js'
import { c, print } from '../lib/colors.js'

export interface GetContext {
  source: SecretSource
  secretName: string
  format: OutputFormat
  filePath?: string
  verbose: boolean
  jsonOutput: boolean
  /** Overrides for the render step (writer, stdout sink, working directory) */
  renderOptions?: RenderOptions
}

/**
 * Run the get command
 */
export async function runGet(context: GetContext): Promise<RenderResult> {
  const { source, secretName, format, filePath, verbose, jsonOutput } = context

  if (!secretName.trim()) {
    throw new MissingSecretNameError()
  }

  ui.verbose(`Fetching ${secretName}`, verbose)
  const raw = await source.fetch(secretName)
  ui.verbose(`Rendering as ${format}${filePath ? ` to ${filePath}` : ''}`, verbose)

  const result = render({ secretName, format, filePath }, raw, context.renderOptions)

  if (result.destination === 'stdout') {
    return result
  }

  if (jsonOutput) {
    ui.output(JSON.stringify({
      secret: secretName,
      format: result.format,
      kind: result.secretKind,
      destination: result.destination,
      bytes: result.bytesWritten
    }))
  } else if (!ui.isQuiet()) {
    print.success(`Secret written to file: ${c.path(result.destination)}`)
  }

  return result
}
