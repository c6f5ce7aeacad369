/**
 * secretcast CLI - Colors Utility
 *
 * Semantic palette on top of chalk.
 * Supports NO_COLOR and FORCE_COLOR.
 */

import { Chalk } from 'chalk'

// Check if colors should be enabled
const isColorEnabled = (): boolean => {
  // Respect NO_COLOR standard
  if (process.env.NO_COLOR !== undefined) return false
  // Respect FORCE_COLOR
  if (process.env.FORCE_COLOR !== undefined) return true
  // Colors go to stderr alongside messages
  return process.stderr.isTTY ?? false
}

const enabled = isColorEnabled()

const chalk = new Chalk({ level: enabled ? 1 : 0 })

// Semantic colors for secretcast
export const c = {
  path: (text: string) => chalk.underline(text),

  // Status
  success: (text: string) => chalk.green(text),
  error: (text: string) => chalk.red(text),

  // Structure
  muted: (text: string) => chalk.dim(text)
}

// Symbols with colors
export const symbols = {
  success: enabled ? chalk.green('✓') : '[OK]'
}

// Print utilities (stderr: stdout is reserved for secret data)
export const print = {
  success: (msg: string) => console.error(`${symbols.success} ${c.success(msg)}`)
}
