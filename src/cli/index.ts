#!/usr/bin/env node
/**
 * secretcast CLI
 *
 * Fetch AWS Secrets Manager secrets and write them as env, JSON, YAML or CSV
 */

import { createProgram } from './program.js'
import * as ui from './ui.js'

const { run } = createProgram()

run(process.argv.slice(2))
  .then(code => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    ui.error(err instanceof Error ? err.message : String(err))
    process.exitCode = 1
  })
