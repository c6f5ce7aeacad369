/**
 * Encoder registry
 */

import type { EncodedOutput, OutputFormat, SecretValue } from '../../types.js'
import { CSV_FILENAME, encodeCsv } from './csv.js'
import { ENV_FILENAME, encodeEnv, encodeStdout } from './env.js'
import { JSON_FILENAME, encodeJson } from './json.js'
import { YAML_FILENAME, encodeYaml } from './yaml.js'

export type Encoder = (value: SecretValue) => EncodedOutput

export const ENCODERS: Record<OutputFormat, Encoder> = {
  stdout: encodeStdout,
  env: encodeEnv,
  json: encodeJson,
  yaml: encodeYaml,
  csv: encodeCsv
}

/**
 * File written in the working directory when no --file is given
 */
export const DEFAULT_FILENAMES: Record<OutputFormat, string> = {
  stdout: ENV_FILENAME,
  env: ENV_FILENAME,
  json: JSON_FILENAME,
  yaml: YAML_FILENAME,
  csv: CSV_FILENAME
}

export function encodeSecret(value: SecretValue, format: OutputFormat): EncodedOutput {
  return ENCODERS[format](value)
}

export { encodeCsv, escapeCsvField } from './csv.js'
export { encodeEnv, encodeStdout, envLines } from './env.js'
export { encodeJson } from './json.js'
export { encodeYaml, blockScalarStyle } from './yaml.js'
