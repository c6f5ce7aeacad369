/**
 * secretcast Error Hierarchy
 *
 * Typed error classes for the CLI and programmatic usage.
 *
 * Hierarchy:
 *   SecretcastError (base)
 *   ├── ConfigError (configuration issues)
 *   │   └── InvalidConfigError
 *   ├── FetchError (remote secret service; kind = NotFound | AccessDenied | NetworkError | Other)
 *   ├── EncodingError (content not representable in the target format)
 *   ├── WriteError (file write failures)
 *   ├── RenderError (encode or write stage failed; wraps EncodingError / WriteError)
 *   └── ValidationError (input validation)
 *       ├── InvalidFormatError
 *       └── MissingSecretNameError
 */

import type { OutputFormat } from '../types.js'

interface ErrorOptions {
  suggestion?: string
  context?: Record<string, unknown>
  cause?: unknown
}

/**
 * Base error class for all secretcast errors
 */
export class SecretcastError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Suggestion for how to fix the error */
  readonly suggestion?: string

  /** Additional context/data about the error */
  readonly context?: Record<string, unknown>

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, { cause: options?.cause })
    this.name = 'SecretcastError'
    this.code = code
    this.suggestion = options?.suggestion
    this.context = options?.context

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Format error for CLI output
   */
  toCliOutput(): string {
    const lines = [`Error: ${this.message}`]
    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`)
    }
    return lines.join('\n')
  }

  /**
   * Convert to JSON for logging/debugging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context
    }
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

export class ConfigError extends SecretcastError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'ConfigError'
  }
}

/**
 * Thrown when .secretcast.yaml has invalid content
 */
export class InvalidConfigError extends ConfigError {
  constructor(message: string, configPath?: string, cause?: unknown) {
    super(
      configPath ? `Invalid config in ${configPath}: ${message}` : `Invalid config: ${message}`,
      'INVALID_CONFIG',
      {
        suggestion: 'Check your .secretcast.yaml syntax',
        context: configPath ? { configPath } : undefined,
        cause
      }
    )
    this.name = 'InvalidConfigError'
  }
}

// =============================================================================
// Fetch Errors
// =============================================================================

export type FetchErrorKind = 'NotFound' | 'AccessDenied' | 'NetworkError' | 'Other'

const FETCH_SUGGESTIONS: Record<FetchErrorKind, string | undefined> = {
  NotFound: 'Use "secretcast list" to see available secrets',
  AccessDenied: 'Check your AWS credentials and the secretsmanager:GetSecretValue permission',
  NetworkError: 'Check your network connection, region and endpoint',
  Other: undefined
}

/**
 * Thrown when the remote secret service cannot return a secret.
 * Surfaced verbatim to the user; never retried by secretcast itself.
 */
export class FetchError extends SecretcastError {
  readonly kind: FetchErrorKind
  readonly secretName?: string

  constructor(kind: FetchErrorKind, message: string, secretName?: string, cause?: unknown) {
    super(message, `FETCH_${kind.replace(/([a-z])([A-Z])/g, '$1_$2').toUpperCase()}`, {
      suggestion: FETCH_SUGGESTIONS[kind],
      context: secretName ? { secretName } : undefined,
      cause
    })
    this.name = 'FetchError'
    this.kind = kind
    this.secretName = secretName
  }
}

// =============================================================================
// Encoding / Write / Render Errors
// =============================================================================

/**
 * Thrown when a field cannot be represented in the target format even after escaping
 */
export class EncodingError extends SecretcastError {
  readonly format: OutputFormat
  readonly field: string

  constructor(format: OutputFormat, field: string, reason: string) {
    super(
      `Cannot encode field "${field}" as ${format}: ${reason}`,
      'ENCODING_FAILED',
      {
        suggestion: format === 'stdout' ? undefined : 'Try another output format with --output',
        context: { format, field }
      }
    )
    this.name = 'EncodingError'
    this.format = format
    this.field = field
  }
}

/**
 * Thrown when writing an output file fails (permission, missing directory, ...)
 */
export class WriteError extends SecretcastError {
  readonly path: string

  constructor(path: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(
      `Failed to write ${path}: ${reason}`,
      'WRITE_FAILED',
      {
        suggestion: 'Check that the directory exists and is writable',
        context: { path },
        cause
      }
    )
    this.name = 'WriteError'
    this.path = path
  }
}

export type RenderStage = 'encode' | 'write'

/**
 * Thrown by render(); `stage` tells which step failed and `cause` holds the original error
 */
export class RenderError extends SecretcastError {
  readonly stage: RenderStage
  override readonly cause: EncodingError | WriteError

  constructor(stage: RenderStage, cause: EncodingError | WriteError) {
    super(cause.message, cause.code, {
      suggestion: cause.suggestion,
      context: { stage, ...cause.context },
      cause
    })
    this.name = 'RenderError'
    this.stage = stage
    this.cause = cause
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

export class ValidationError extends SecretcastError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'ValidationError'
  }
}

/**
 * Thrown when an unknown output format is requested
 */
export class InvalidFormatError extends ValidationError {
  constructor(format: string, validFormats: readonly string[]) {
    super(
      `Invalid output format: "${format}"`,
      'INVALID_FORMAT',
      {
        suggestion: `Valid formats: ${validFormats.join(', ')}`,
        context: { format, validFormats }
      }
    )
    this.name = 'InvalidFormatError'
  }
}

export class MissingSecretNameError extends ValidationError {
  constructor() {
    super('Secret name is required', 'MISSING_SECRET_NAME', {
      suggestion: 'Usage: secretcast get <secret-name>'
    })
    this.name = 'MissingSecretNameError'
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isSecretcastError(error: unknown): error is SecretcastError {
  return error instanceof SecretcastError
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError
}

export function isFetchError(error: unknown): error is FetchError {
  return error instanceof FetchError
}

export function isEncodingError(error: unknown): error is EncodingError {
  return error instanceof EncodingError
}

export function isRenderError(error: unknown): error is RenderError {
  return error instanceof RenderError
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError
}

// =============================================================================
// Error Formatting Helpers
// =============================================================================

/**
 * Format any error for CLI output
 */
export function formatErrorForCli(error: unknown): string {
  if (isSecretcastError(error)) {
    return error.toCliOutput()
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`
  }
  return `Error: ${String(error)}`
}
