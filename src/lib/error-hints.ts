/**
 * Human-readable hints for failed commands.
 */

import { isConfigError, isFetchError, isRenderError, isValidationError } from './errors.js'

export interface ErrorHintOptions {
  command: string[]
  region?: string
  profile?: string
}

function normalizeMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || ''
  }
  return typeof error === 'string' ? error : String(error)
}

function includesAny(message: string, tokens: string[]): boolean {
  return tokens.some(token => message.includes(token))
}

function isTimeoutError(message: string): boolean {
  return includesAny(message, [
    'timeout',
    'timed out',
    'socket hang up',
    'econnreset',
    'etimedout'
  ])
}

function isPermissionError(message: string): boolean {
  return includesAny(message, [
    'access denied',
    'accessdenied',
    'not authorized',
    'security token',
    'credentials',
    'forbidden',
    'expired'
  ])
}

function isConnectivityError(message: string): boolean {
  return includesAny(message, [
    'econnrefused',
    'enotfound',
    'getaddrinfo',
    'network is unreachable',
    'no such host'
  ])
}

/**
 * Build actionable CLI suggestions from an error.
 */
export function buildErrorHints(error: unknown, options: ErrorHintOptions): string[] {
  const message = normalizeMessage(error).toLowerCase()
  const commandLabel = ['secretcast', ...options.command].join(' ')

  // Their suggestion line already says what to change
  if (message.length === 0 || isValidationError(error) || isConfigError(error)) {
    return []
  }

  const hints: string[] = []
  const kind = isFetchError(error) ? error.kind : undefined

  if (kind === 'NotFound') {
    const region = options.region ? ` (region ${options.region})` : ''
    hints.push(`Run "secretcast list" to see the secrets visible to these credentials${region}.`)
  }

  if (kind === 'AccessDenied' || (kind === undefined && isPermissionError(message))) {
    const profile = options.profile ? ` --profile ${options.profile}` : ''
    hints.push(`Permission denied was detected. Run ${commandLabel} -v${profile} once to confirm the credential source.`)
    hints.push('Check AWS_PROFILE / AWS_ACCESS_KEY_ID and the IAM policy for secretsmanager:GetSecretValue and secretsmanager:ListSecrets.')
  }

  if (kind === 'NetworkError' || isConnectivityError(message) || isTimeoutError(message)) {
    hints.push('Connectivity issue detected. Verify the region, any custom --endpoint and your network, then retry.')
  }

  if (isRenderError(error) && error.stage === 'write') {
    hints.push('Use --file to write somewhere else, or --output stdout to print to the console.')
  }

  if (hints.length === 0) {
    hints.push('Re-run with --verbose and share the full command output when reporting this issue.')
  }

  // Keep hints unique and short.
  return [...new Set(hints)]
}
