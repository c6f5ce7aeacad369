/**
 * secretcast - Type Definitions
 */

// ============================================================================
// Secret Payloads
// ============================================================================

/**
 * Payload exactly as the secret source returned it, before classification.
 *
 * AWS Secrets Manager stores either `SecretString` or `SecretBinary`;
 * the source maps them to `text` and `binary` respectively.
 */
export type RawSecretResult =
  | { kind: 'text'; text: string }
  | { kind: 'binary'; bytes: Uint8Array }

/**
 * Ordered key/value pairs of a JSON-object secret.
 * Iteration order is the member order of the original JSON text.
 */
export type KeyValueMap = Map<string, string>

/**
 * Classified secret payload. Exactly one variant per fetched secret.
 */
export type SecretValue =
  | { kind: 'map'; entries: KeyValueMap }
  | { kind: 'text'; text: string }
  | { kind: 'binary'; bytes: Uint8Array }

export type SecretKind = SecretValue['kind']

// ============================================================================
// Output
// ============================================================================

export type OutputFormat = 'stdout' | 'json' | 'env' | 'yaml' | 'csv'

export const OUTPUT_FORMATS: OutputFormat[] = ['stdout', 'json', 'env', 'yaml', 'csv']

/** Format used when neither the CLI, the environment nor the config names one */
export const DEFAULT_OUTPUT_FORMAT: OutputFormat = 'env'

/**
 * One render operation, built once per invocation from validated CLI input.
 */
export interface OutputRequest {
  readonly secretName: string
  readonly format: OutputFormat
  /** Explicit destination (`--file`). Overrides the format's default filename. */
  readonly filePath?: string
}

/**
 * Bytes produced by an encoder plus the filename used when no path is given.
 * Documents may lack a trailing newline; the router terminates them on write.
 */
export interface EncodedOutput {
  format: OutputFormat
  content: Uint8Array
  defaultFilename: string
}

export interface RenderResult {
  /** `stdout`, or the absolute path of the written file */
  destination: string
  format: OutputFormat
  secretKind: SecretKind
  bytesWritten: number
}

// ============================================================================
// Configuration
// ============================================================================

export interface SecretcastConfig {
  /** AWS region (falls back to the SDK's own resolution when unset) */
  region?: string
  /** Shared config/credentials profile name */
  profile?: string
  /** Custom Secrets Manager endpoint (e.g. a local emulator) */
  endpoint?: string
  /** Default output format for `get` */
  output?: OutputFormat
  /** SDK retry attempts */
  max_attempts?: number
}

// ============================================================================
// CLI Types
// ============================================================================

export interface GlobalOptions {
  region?: string
  profile?: string
  endpoint?: string
  json: boolean
  verbose: boolean
  quiet: boolean
}
