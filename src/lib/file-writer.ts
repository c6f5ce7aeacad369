/**
 * Whole-file writer
 *
 * Truncate-then-write semantics, done atomically: the bytes go to a
 * temporary file beside the target which is then renamed over it.
 */

import fs from 'node:fs'
import path from 'node:path'
import { WriteError } from './errors.js'

export interface FileWriter {
  write(filePath: string, content: Uint8Array): void
}

function tempPathFor(filePath: string): string {
  const dir = path.dirname(filePath)
  const base = path.basename(filePath)
  return path.join(dir, `.${base}.${process.pid}.${Date.now().toString(36)}.tmp`)
}

/**
 * Write `content` to `filePath`, leaving either the old file or the new one
 */
export function writeFileAtomic(filePath: string, content: Uint8Array, mode = 0o600): void {
  const tempPath = tempPathFor(filePath)
  try {
    fs.writeFileSync(tempPath, content, { mode })
    fs.renameSync(tempPath, filePath)
  } catch (err) {
    fs.rmSync(tempPath, { force: true })
    throw new WriteError(filePath, err)
  }
}

export const fsWriter: FileWriter = {
  write: (filePath, content) => writeFileAtomic(filePath, content)
}
