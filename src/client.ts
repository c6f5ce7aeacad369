/**
 * secretcast Client - AWS Secrets Manager source
 *
 * Fetches one secret's payload and lists secret names. SDK failures are
 * mapped to FetchError kinds; nothing here retries beyond the SDK's own
 * retry strategy (`maxAttempts`).
 */

import {
  GetSecretValueCommand,
  SecretsManagerClient,
  paginateListSecrets,
  type GetSecretValueCommandOutput,
  type SecretsManagerClientConfig
} from '@aws-sdk/client-secrets-manager'
import type { RawSecretResult } from './types.js'
import { FetchError, type FetchErrorKind } from './lib/errors.js'

/**
 * Where secrets come from. The CLI uses SecretcastClient; tests use fakes.
 */
export interface SecretSource {
  fetch(secretName: string): Promise<RawSecretResult>
  list(filter?: string): Promise<string[]>
}

export interface SecretcastClientOptions {
  region?: string
  profile?: string
  endpoint?: string
  maxAttempts?: number
  /** Pre-built SDK client (takes precedence over the options above) */
  client?: SecretsManagerClient
}

const NOT_FOUND_ERRORS = new Set(['ResourceNotFoundException'])

const ACCESS_DENIED_ERRORS = new Set([
  'AccessDeniedException',
  'UnrecognizedClientException',
  'InvalidSignatureException',
  'ExpiredTokenException',
  'CredentialsProviderError',
  'InvalidClientTokenId'
])

const NETWORK_ERRORS = new Set([
  'TimeoutError',
  'NetworkingError',
  'RequestTimeout',
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'EPIPE'
])

function readProperty(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null) return undefined
  const property: unknown = Reflect.get(value, key)
  return property
}

/**
 * Map an SDK / transport error onto a FetchError kind
 */
export function classifyFetchError(error: unknown): FetchErrorKind {
  const name = readProperty(error, 'name')
  const code = readProperty(error, 'code')
  const status = readProperty(readProperty(error, '$metadata'), 'httpStatusCode')

  const labels = [name, code].filter((label): label is string => typeof label === 'string')

  if (labels.some(label => NOT_FOUND_ERRORS.has(label))) return 'NotFound'
  if (labels.some(label => ACCESS_DENIED_ERRORS.has(label)) || status === 401 || status === 403) {
    return 'AccessDenied'
  }
  if (labels.some(label => NETWORK_ERRORS.has(label))) return 'NetworkError'
  return 'Other'
}

/**
 * Wrap any failure from the service as a FetchError.
 * Without a secret name the failure is reported as a listing failure.
 */
export function toFetchError(secretName: string | undefined, error: unknown): FetchError {
  if (error instanceof FetchError) {
    return error
  }

  const kind = classifyFetchError(error)
  const reason = error instanceof Error ? error.message : String(error)

  if (secretName === undefined) {
    return new FetchError(kind, `Failed to list secrets: ${reason}`, undefined, error)
  }

  const message = kind === 'NotFound'
    ? `Secret "${secretName}" not found`
    : `Failed to fetch secret "${secretName}": ${reason}`
  return new FetchError(kind, message, secretName, error)
}

/**
 * Convert a GetSecretValue response into a raw payload
 */
export function toRawSecret(secretName: string, output: Pick<GetSecretValueCommandOutput, 'SecretString' | 'SecretBinary'>): RawSecretResult {
  if (output.SecretString !== undefined) {
    return { kind: 'text', text: output.SecretString }
  }
  if (output.SecretBinary !== undefined) {
    return { kind: 'binary', bytes: output.SecretBinary }
  }
  throw new FetchError('Other', `No secret content found for "${secretName}"`, secretName)
}

/**
 * Keep names containing `filter` (case-sensitive) and sort them
 */
export function selectSecretNames(names: Iterable<string>, filter?: string): string[] {
  const selected: string[] = []
  for (const name of names) {
    if (!filter || name.includes(filter)) {
      selected.push(name)
    }
  }
  return selected.sort()
}

export class SecretcastClient implements SecretSource {
  private readonly client: SecretsManagerClient

  constructor(options: SecretcastClientOptions = {}) {
    if (options.client) {
      this.client = options.client
      return
    }

    const config: SecretsManagerClientConfig = {}
    if (options.region) config.region = options.region
    if (options.profile) config.profile = options.profile
    if (options.endpoint) config.endpoint = options.endpoint
    if (options.maxAttempts) config.maxAttempts = options.maxAttempts
    this.client = new SecretsManagerClient(config)
  }

  /**
   * Fetch a secret's current value
   *
   * @throws FetchError
   */
  async fetch(secretName: string): Promise<RawSecretResult> {
    try {
      const output = await this.client.send(new GetSecretValueCommand({ SecretId: secretName }))
      return toRawSecret(secretName, output)
    } catch (err) {
      throw toFetchError(secretName, err)
    }
  }

  /**
   * List secret names across every page, optionally filtered by substring
   */
  async list(filter?: string): Promise<string[]> {
    const names: string[] = []
    try {
      for await (const page of paginateListSecrets({ client: this.client }, {})) {
        for (const entry of page.SecretList ?? []) {
          if (entry.Name) names.push(entry.Name)
        }
      }
    } catch (err) {
      throw toFetchError(undefined, err)
    }
    return selectSecretNames(names, filter)
  }

  /**
   * Release sockets held by the SDK
   */
  destroy(): void {
    this.client.destroy()
  }
}
