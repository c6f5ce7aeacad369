/**
 * secretcast Config Loader
 *
 * Loads .secretcast.yaml from the working directory or its parents,
 * merges .secretcast.local.yaml beside it and applies SECRETCAST_* overrides.
 */

import fs from 'node:fs'
import path from 'node:path'
import { parse as parseYaml } from 'yaml'
import { OUTPUT_FORMATS, type OutputFormat, type SecretcastConfig } from '../types.js'
import { InvalidConfigError, InvalidFormatError } from './errors.js'

const CONFIG_FILES = ['.secretcast.yaml', '.secretcast.yml']
const CONFIG_LOCAL_FILE = '.secretcast.local.yaml'
const MAX_SEARCH_DEPTH = 5

/**
 * Expand environment variables in a string
 * Supports: ${VAR}, ${VAR:-default}, $VAR
 */
export function expandEnvVars(str: string, env: NodeJS.ProcessEnv = process.env): string {
  // Handle ${VAR:-default} syntax
  str = str.replace(/\$\{([^}:]+):-([^}]*)\}/g, (_, varName: string, defaultValue: string) => {
    return env[varName] || defaultValue
  })

  // Handle ${VAR} syntax
  str = str.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
    return env[varName] || ''
  })

  // Handle $VAR syntax (word boundary)
  str = str.replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_, varName: string) => {
    return env[varName] || ''
  })

  return str
}

/**
 * Validate an output format name
 */
export function parseOutputFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find(candidate => candidate === value.toLowerCase())
  if (!format) {
    throw new InvalidFormatError(value, OUTPUT_FORMATS)
  }
  return format
}

/**
 * Find the config file by searching up from the start directory
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  let currentDir = path.resolve(startDir)
  let depth = 0

  while (depth < MAX_SEARCH_DEPTH) {
    for (const name of CONFIG_FILES) {
      const candidate = path.join(currentDir, name)
      if (fs.existsSync(candidate)) {
        return candidate
      }
    }

    const parentDir = path.dirname(currentDir)
    if (parentDir === currentDir) {
      // Reached root
      break
    }

    currentDir = parentDir
    depth++
  }

  return null
}

function readString(
  raw: Record<string, unknown>,
  key: string,
  configPath: string,
  env: NodeJS.ProcessEnv
): string | undefined {
  const value = raw[key]
  if (value === undefined || value === null) return undefined
  if (typeof value !== 'string') {
    throw new InvalidConfigError(`"${key}" must be a string`, configPath)
  }
  const expanded = expandEnvVars(value, env).trim()
  return expanded === '' ? undefined : expanded
}

/**
 * Validate parsed YAML into a config object. Unknown keys are ignored.
 */
export function validateConfig(
  raw: unknown,
  configPath: string,
  env: NodeJS.ProcessEnv = process.env
): SecretcastConfig {
  if (raw === null || raw === undefined) {
    return {}
  }
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw new InvalidConfigError('expected a mapping at the top level', configPath)
  }

  const fields = Object.fromEntries(Object.entries(raw))
  const config: SecretcastConfig = {}

  const region = readString(fields, 'region', configPath, env)
  if (region) config.region = region

  const profile = readString(fields, 'profile', configPath, env)
  if (profile) config.profile = profile

  const endpoint = readString(fields, 'endpoint', configPath, env)
  if (endpoint) config.endpoint = endpoint

  const output = readString(fields, 'output', configPath, env)
  if (output) {
    try {
      config.output = parseOutputFormat(output)
    } catch (err) {
      throw new InvalidConfigError(`"output" must be one of ${OUTPUT_FORMATS.join(', ')}`, configPath, err)
    }
  }

  const maxAttempts = fields.max_attempts
  if (maxAttempts !== undefined && maxAttempts !== null) {
    if (typeof maxAttempts !== 'number' || !Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new InvalidConfigError('"max_attempts" must be a positive integer', configPath)
    }
    config.max_attempts = maxAttempts
  }

  return config
}

/**
 * Load a single config file
 */
export function loadConfigFile(
  configPath: string,
  required: boolean = true,
  env: NodeJS.ProcessEnv = process.env
): SecretcastConfig {
  if (!fs.existsSync(configPath)) {
    if (required) {
      throw new InvalidConfigError('file not found', configPath)
    }
    return {}
  }

  const content = fs.readFileSync(configPath, 'utf-8')
  let parsed: unknown
  try {
    parsed = parseYaml(content)
  } catch (err) {
    throw new InvalidConfigError(err instanceof Error ? err.message : String(err), configPath, err)
  }

  return validateConfig(parsed, configPath, env)
}

/**
 * SECRETCAST_* environment overrides
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): SecretcastConfig {
  const config: SecretcastConfig = {}
  if (env.SECRETCAST_REGION) config.region = env.SECRETCAST_REGION
  if (env.SECRETCAST_PROFILE) config.profile = env.SECRETCAST_PROFILE
  if (env.SECRETCAST_ENDPOINT) config.endpoint = env.SECRETCAST_ENDPOINT
  if (env.SECRETCAST_OUTPUT) config.output = parseOutputFormat(env.SECRETCAST_OUTPUT)
  return config
}

export interface LoadedConfig {
  config: SecretcastConfig
  /** Config file that was read, if any */
  configPath: string | null
}

/**
 * Load configuration: file < local file < environment
 */
export function loadConfig(startDir?: string, env: NodeJS.ProcessEnv = process.env): LoadedConfig {
  const configPath = findConfigFile(startDir)

  let config: SecretcastConfig = {}
  if (configPath) {
    config = loadConfigFile(configPath, true, env)

    // Load and merge local config (machine-specific overrides, not committed)
    const localConfigPath = path.join(path.dirname(configPath), CONFIG_LOCAL_FILE)
    config = { ...config, ...loadConfigFile(localConfigPath, false, env) }
  }

  return {
    config: { ...config, ...configFromEnv(env) },
    configPath
  }
}
