/**
 * CLI UI utilities
 *
 * - stdout: secret data and machine-readable output only
 * - stderr: everything meant for a human
 */

let quiet = false

/**
 * Suppress non-essential messages (errors and data are still written)
 */
export function setQuiet(value: boolean): void {
  quiet = value
}

export function isQuiet(): boolean {
  return quiet
}

/**
 * Output data to stdout (for pipes)
 * Secret content itself goes through render's stdout sink
 */
export function output(data: string): void {
  process.stdout.write(data + '\n')
}

/**
 * Log verbose message (only with verbose flag)
 */
export function verbose(message: string, enabled: boolean): void {
  if (enabled && !quiet) {
    console.error(`[secretcast] ${message}`)
  }
}

/**
 * Log error to stderr (always shown)
 */
export function error(message: string): void {
  console.error(`Error: ${message}`)
}
