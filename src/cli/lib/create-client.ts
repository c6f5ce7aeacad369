/**
 * Shared helper for creating the secret source from config and CLI flags
 */

import type { GlobalOptions, SecretcastConfig } from '../../types.js'
import { SecretcastClient, type SecretSource } from '../../client.js'
import * as ui from '../ui.js'

export interface CreateClientOptions {
  options: GlobalOptions
  config: SecretcastConfig
}

/**
 * Create a SecretcastClient
 *
 * Priority for each setting:
 * 1. CLI flag (--region, --profile, --endpoint)
 * 2. SECRETCAST_* environment variable
 * 3. .secretcast.local.yaml / .secretcast.yaml
 * 4. AWS SDK default resolution (AWS_REGION, AWS_PROFILE, shared config)
 */
export function createClientFromConfig({ options, config }: CreateClientOptions): SecretcastClient {
  const region = options.region ?? config.region
  const profile = options.profile ?? config.profile
  const endpoint = options.endpoint ?? config.endpoint

  ui.verbose(`Region: ${region ?? '(sdk default)'}`, options.verbose)
  if (profile) ui.verbose(`Profile: ${profile}`, options.verbose)
  if (endpoint) ui.verbose(`Endpoint: ${endpoint}`, options.verbose)

  return new SecretcastClient({
    region,
    profile,
    endpoint,
    maxAttempts: config.max_attempts
  })
}

/**
 * Execute a function with a SecretcastClient, releasing it afterwards
 *
 * @example
 * ```typescript
 * const raw = await withClient({ options, config }, client => client.fetch('prod/db'))
 * ```
 */
export async function withClient<T>(
  clientOptions: CreateClientOptions,
  fn: (client: SecretSource) => Promise<T>
): Promise<T> {
  const client = createClientFromConfig(clientOptions)
  try {
    return await fn(client)
  } finally {
    client.destroy()
  }
}
