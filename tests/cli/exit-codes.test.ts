import { describe, it, expect } from 'vitest'
import {
  EXIT_ACCESS_DENIED,
  EXIT_ENCODING_ERROR,
  EXIT_ERROR,
  EXIT_NETWORK_ERROR,
  EXIT_NOT_FOUND,
  EXIT_USER_ERROR,
  EXIT_WRITE_ERROR,
  exitCodeFor
} from '../../src/cli/lib/exit-codes.js'
import {
  EncodingError,
  FetchError,
  InvalidConfigError,
  InvalidFormatError,
  RenderError,
  WriteError
} from '../../src/lib/errors.js'

describe('exitCodeFor', () => {
  it('maps fetch failures by kind', () => {
    expect(exitCodeFor(new FetchError('NotFound', 'x'))).toBe(EXIT_NOT_FOUND)
    expect(exitCodeFor(new FetchError('AccessDenied', 'x'))).toBe(EXIT_ACCESS_DENIED)
    expect(exitCodeFor(new FetchError('NetworkError', 'x'))).toBe(EXIT_NETWORK_ERROR)
    expect(exitCodeFor(new FetchError('Other', 'x'))).toBe(EXIT_ERROR)
  })

  it('maps render failures by stage', () => {
    expect(exitCodeFor(new RenderError('encode', new EncodingError('env', 'K', 'r')))).toBe(EXIT_ENCODING_ERROR)
    expect(exitCodeFor(new RenderError('write', new WriteError('/x', new Error('e'))))).toBe(EXIT_WRITE_ERROR)
  })

  it('maps input and config problems to the usage code', () => {
    expect(exitCodeFor(new InvalidFormatError('xml', ['env']))).toBe(EXIT_USER_ERROR)
    expect(exitCodeFor(new InvalidConfigError('bad'))).toBe(EXIT_USER_ERROR)
  })

  it('uses 1 for anything else', () => {
    expect(exitCodeFor(new Error('boom'))).toBe(EXIT_ERROR)
    expect(exitCodeFor('boom')).toBe(EXIT_ERROR)
  })
})
