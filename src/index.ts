/**
 * secretcast - render AWS Secrets Manager secrets as env, JSON, YAML or CSV
 *
 * Main library exports for programmatic usage
 */

// Client
export {
  SecretcastClient,
  classifyFetchError,
  toFetchError,
  toRawSecret,
  selectSecretNames
} from './client.js'
export type { SecretSource, SecretcastClientOptions } from './client.js'

// Types
export type {
  RawSecretResult,
  KeyValueMap,
  SecretValue,
  SecretKind,
  OutputFormat,
  OutputRequest,
  EncodedOutput,
  RenderResult,
  SecretcastConfig
} from './types.js'

export { OUTPUT_FORMATS, DEFAULT_OUTPUT_FORMAT } from './types.js'

// Core pipeline
export { classifySecret } from './lib/classifier.js'
export { encodeSecret, ENCODERS, DEFAULT_FILENAMES } from './lib/encoders/index.js'
export { resolveRoute, routeOutput, type Route } from './lib/output-router.js'
export { render, type RenderOptions } from './lib/render.js'
export { writeFileAtomic, fsWriter, type FileWriter } from './lib/file-writer.js'

// Config utilities
export { loadConfig, findConfigFile, parseOutputFormat } from './lib/config-loader.js'

// Errors
export * from './lib/errors.js'
