/**
 * secretcast CLI - List Command
 *
 * List secret names visible to the current credentials
 */

import type { SecretSource } from '../../client.js'
import * as ui from '../ui.js'

export interface ListContext {
  source: SecretSource
  filter?: string
  verbose: boolean
  jsonOutput: boolean
}

/**
 * Run the list command
 */
export async function runList(context: ListContext): Promise<string[]> {
  const { source, filter, verbose, jsonOutput } = context

  ui.verbose(filter ? `Listing secrets matching "${filter}"` : 'Listing secrets', verbose)
  const names = await source.list(filter)

  if (jsonOutput) {
    ui.output(JSON.stringify(names))
    return names
  }

  if (names.length === 0) {
    ui.output('No secrets found.')
    return names
  }

  ui.output('Available secrets:')
  for (const name of names) {
    ui.output(`- ${name}`)
  }
  ui.output('')
  ui.output(`Total: ${names.length} secrets`)

  return names
}
