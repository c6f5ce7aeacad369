/**
 * Tests for the AWS Secrets Manager source
 */

import { describe, it, expect } from 'vitest'
import { SecretsManagerClient, type ServiceOutputTypes } from '@aws-sdk/client-secrets-manager'
import {
  SecretcastClient,
  classifyFetchError,
  selectSecretNames,
  toFetchError,
  toRawSecret
} from '../src/client.js'
import { FetchError } from '../src/lib/errors.js'

function awsError(name: string, message: string, status?: number): Error {
  const error = new Error(message)
  error.name = name
  return status === undefined ? error : Object.assign(error, { $metadata: { httpStatusCode: status } })
}

/**
 * SDK client whose requests never leave the process: an initialize-step
 * middleware answers every command.
 */
function stubClient(respond: (input: object) => ServiceOutputTypes): SecretsManagerClient {
  const client = new SecretsManagerClient({
    region: 'us-east-1',
    credentials: { accessKeyId: 'test', secretAccessKey: 'test' }
  })
  client.middlewareStack.add(
    () => async args => ({ output: respond(args.input), response: {} }),
    { step: 'initialize', name: 'stubSecretsManager' }
  )
  return client
}

describe('classifyFetchError', () => {
  it('recognizes missing secrets', () => {
    expect(classifyFetchError(awsError('ResourceNotFoundException', 'missing'))).toBe('NotFound')
  })

  it('recognizes credential and permission failures', () => {
    expect(classifyFetchError(awsError('AccessDeniedException', 'denied'))).toBe('AccessDenied')
    expect(classifyFetchError(awsError('CredentialsProviderError', 'no creds'))).toBe('AccessDenied')
    expect(classifyFetchError(awsError('SomethingElse', 'forbidden', 403))).toBe('AccessDenied')
  })

  it('recognizes transport failures by name or code', () => {
    expect(classifyFetchError(awsError('TimeoutError', 'slow'))).toBe('NetworkError')
    expect(classifyFetchError(Object.assign(new Error('connect'), { code: 'ECONNREFUSED' }))).toBe('NetworkError')
  })

  it('classifies everything else as Other', () => {
    expect(classifyFetchError(new Error('boom'))).toBe('Other')
    expect(classifyFetchError('boom')).toBe('Other')
  })
})

describe('toFetchError', () => {
  it('names the missing secret', () => {
    const error = toFetchError('app/db', awsError('ResourceNotFoundException', 'not here'))
    expect(error.kind).toBe('NotFound')
    expect(error.message).toBe('Secret "app/db" not found')
  })

  it('keeps the service message for other failures', () => {
    expect(toFetchError('app/db', new Error('boom')).message).toBe('Failed to fetch secret "app/db": boom')
  })

  it('describes listing failures', () => {
    expect(toFetchError(undefined, new Error('boom')).message).toBe('Failed to list secrets: boom')
  })

  it('passes FetchErrors through', () => {
    const original = new FetchError('Other', 'x')
    expect(toFetchError('app', original)).toBe(original)
  })
})

describe('toRawSecret', () => {
  it('prefers the string payload', () => {
    expect(toRawSecret('app', { SecretString: 'hello' })).toEqual({ kind: 'text', text: 'hello' })
  })

  it('returns the binary payload', () => {
    const bytes = new Uint8Array([1, 2, 3])
    expect(toRawSecret('app', { SecretBinary: bytes })).toEqual({ kind: 'binary', bytes })
  })

  it('fails when neither payload is present', () => {
    expect(() => toRawSecret('app', {})).toThrow('No secret content found for "app"')
  })
})

describe('selectSecretNames', () => {
  it('filters by substring and sorts', () => {
    expect(selectSecretNames(['prod/b', 'dev/a', 'prod/a'], 'prod/')).toEqual(['prod/a', 'prod/b'])
  })

  it('is case-sensitive', () => {
    expect(selectSecretNames(['Prod/a', 'prod/b'], 'prod')).toEqual(['prod/b'])
  })

  it('keeps everything without a filter', () => {
    expect(selectSecretNames(['b', 'a'])).toEqual(['a', 'b'])
  })
})

describe('SecretcastClient', () => {
  it('fetches a string secret', async () => {
    const client = new SecretcastClient({
      client: stubClient(() => ({ SecretString: '{"A":"1"}', $metadata: {} }))
    })

    await expect(client.fetch('app')).resolves.toEqual({ kind: 'text', text: '{"A":"1"}' })
    client.destroy()
  })

  it('maps service errors to FetchError', async () => {
    const client = new SecretcastClient({
      client: stubClient(() => {
        throw awsError('ResourceNotFoundException', "Secrets Manager can't find the specified secret.")
      })
    })

    await expect(client.fetch('missing')).rejects.toThrow('Secret "missing" not found')
    client.destroy()
  })

  it('lists names across pages', async () => {
    const client = new SecretcastClient({
      client: stubClient(input => {
        const token = Reflect.get(input, 'NextToken')
        return token === 'page-2'
          ? { SecretList: [{ Name: 'app/a' }, { Name: 'other' }], $metadata: {} }
          : { SecretList: [{ Name: 'app/c' }, {}], NextToken: 'page-2', $metadata: {} }
      })
    })

    await expect(client.list('app/')).resolves.toEqual(['app/a', 'app/c'])
    client.destroy()
  })
})
