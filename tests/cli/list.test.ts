import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { runList } from '../../src/cli/commands/list.js'
import type { SecretSource } from '../../src/client.js'
import { selectSecretNames } from '../../src/client.js'

function fakeSource(names: string[]): SecretSource {
  return {
    async fetch(name) {
      return { kind: 'text', text: name }
    },
    async list(filter) {
      return selectSecretNames(names, filter)
    }
  }
}

describe('runList', () => {
  let writes: string[]

  beforeEach(() => {
    writes = []
    vi.spyOn(process.stdout, 'write').mockImplementation(chunk => {
      writes.push(String(chunk))
      return true
    })
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('prints names and a total', async () => {
    await runList({ source: fakeSource(['prod/b', 'prod/a']), verbose: false, jsonOutput: false })
    expect(writes.join('')).toBe('Available secrets:\n- prod/a\n- prod/b\n\nTotal: 2 secrets\n')
  })

  it('applies the filter', async () => {
    const names = await runList({
      source: fakeSource(['prod/a', 'dev/a']),
      filter: 'dev',
      verbose: false,
      jsonOutput: false
    })
    expect(names).toEqual(['dev/a'])
  })

  it('says when nothing matches', async () => {
    await runList({ source: fakeSource([]), verbose: false, jsonOutput: false })
    expect(writes.join('')).toBe('No secrets found.\n')
  })

  it('prints a JSON array with --json', async () => {
    await runList({ source: fakeSource(['b', 'a']), verbose: false, jsonOutput: true })
    expect(writes.join('')).toBe('["a","b"]\n')
  })
})
