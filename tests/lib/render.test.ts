import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { render } from '../../src/lib/render.js'
import { RenderError, WriteError, EncodingError } from '../../src/lib/errors.js'
import type { RawSecretResult } from '../../src/types.js'

describe('render', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'secretcast-render-'))
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  const read = (name: string): string => fs.readFileSync(path.join(tempDir, name), 'utf-8')

  it('writes a JSON map secret to .env by default', () => {
    const result = render(
      { secretName: 'app/db', format: 'env' },
      { kind: 'text', text: '{"DB_HOST":"localhost","DB_PORT":"5432"}' },
      { cwd: tempDir }
    )

    expect(read('.env')).toBe('DB_HOST=localhost\nDB_PORT=5432\n')
    expect(result).toEqual({
      destination: path.join(tempDir, '.env'),
      format: 'env',
      secretKind: 'map',
      bytesWritten: 31
    })
  })

  it('writes CSV with escaped fields to an explicit file', () => {
    render(
      { secretName: 'app/notes', format: 'csv', filePath: 'notes.csv' },
      { kind: 'text', text: '{"NOTE":"a,b\\"c"}' },
      { cwd: tempDir }
    )

    expect(read('notes.csv')).toBe('key,value\nNOTE,"a,b""c"\n')
  })

  it('describes a non-UTF-8 binary secret in secret.json', () => {
    const result = render(
      { secretName: 'app/blob', format: 'json' },
      { kind: 'binary', bytes: new Uint8Array(42).fill(0xff) },
      { cwd: tempDir }
    )

    expect(JSON.parse(read('secret.json'))).toEqual({ size_bytes: 42 })
    expect(result.secretKind).toBe('binary')
  })

  it('writes raw text for stdout with --file', () => {
    const result = render(
      { secretName: 'app/greeting', format: 'stdout', filePath: 'out.txt' },
      { kind: 'text', text: 'hello' },
      { cwd: tempDir }
    )

    expect(read('out.txt')).toBe('hello')
    expect(result.bytesWritten).toBe(5)
    expect(result.secretKind).toBe('text')
  })

  it('writes raw binary bytes for stdout with --file', () => {
    const bytes = new Uint8Array([0x00, 0xff, 0x10])
    render({ secretName: 'app/blob', format: 'stdout', filePath: 'blob.bin' }, { kind: 'binary', bytes }, { cwd: tempDir })
    expect([...fs.readFileSync(path.join(tempDir, 'blob.bin'))]).toEqual([0x00, 0xff, 0x10])
  })

  it('reports binary size on the console but writes raw bytes with --file', () => {
    const raw: RawSecretResult = { kind: 'binary', bytes: new Uint8Array([0x00, 0xff, 0x10]) }
    const chunks: string[] = []

    render({ secretName: 'app/blob', format: 'stdout' }, raw, {
      cwd: tempDir,
      stdout: chunk => chunks.push(Buffer.from(chunk).toString('utf-8'))
    })
    const result = render({ secretName: 'app/blob', format: 'stdout', filePath: 'blob.bin' }, raw, { cwd: tempDir })

    expect(chunks).toEqual(['Binary secret data (3 bytes)\n'])
    expect([...fs.readFileSync(path.join(tempDir, 'blob.bin'))]).toEqual([0x00, 0xff, 0x10])
    expect(result.bytesWritten).toBe(3)
  })

  it('prints to the console for stdout without --file', () => {
    const chunks: string[] = []
    const result = render(
      { secretName: 'app/greeting', format: 'stdout' },
      { kind: 'text', text: 'hello' },
      { cwd: tempDir, stdout: chunk => chunks.push(Buffer.from(chunk).toString('utf-8')) }
    )

    expect(chunks).toEqual(['hello\n'])
    expect(result.destination).toBe('stdout')
    expect(fs.readdirSync(tempDir)).toEqual([])
  })

  it('fails at the encode stage without writing anything', () => {
    let caught: unknown
    try {
      render({ secretName: 'app/bad', format: 'env' }, { kind: 'text', text: '{"A=B":"1"}' }, { cwd: tempDir })
    } catch (err) {
      caught = err
    }

    expect(caught).toBeInstanceOf(RenderError)
    if (caught instanceof RenderError) {
      expect(caught.stage).toBe('encode')
      expect(caught.cause).toBeInstanceOf(EncodingError)
      expect(caught.code).toBe('ENCODING_FAILED')
    }
    expect(fs.readdirSync(tempDir)).toEqual([])
  })

  it('fails at the write stage when the directory is missing', () => {
    let caught: unknown
    try {
      render({ secretName: 'app/db', format: 'env', filePath: 'missing/out.env' }, { kind: 'text', text: 'x' }, { cwd: tempDir })
    } catch (err) {
      caught = err
    }

    expect(caught).toBeInstanceOf(RenderError)
    if (caught instanceof RenderError) {
      expect(caught.stage).toBe('write')
      expect(caught.cause).toBeInstanceOf(WriteError)
    }
  })

  it('wraps writer failures in a WriteError naming the path', () => {
    let caught: unknown
    try {
      render({ secretName: 'app/db', format: 'env', filePath: 'x.env' }, { kind: 'text', text: 'x' }, {
        cwd: tempDir,
        writer: {
          write() {
            throw new Error('disk full')
          }
        }
      })
    } catch (err) {
      caught = err
    }

    expect(caught).toBeInstanceOf(RenderError)
    if (caught instanceof RenderError) {
      expect(caught.message).toBe(`Failed to write ${path.join(tempDir, 'x.env')}: disk full`)
    }
  })
})
