/**
 * secretcast CLI program definition
 *
 * Commands:
 *   get <secret-name> [-o format] [-f path]
 *   list [-f filter]
 */

import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { Command, CommanderError } from 'commander'
import type { GlobalOptions, SecretcastConfig } from '../types.js'
import { DEFAULT_OUTPUT_FORMAT, OUTPUT_FORMATS } from '../types.js'
import type { SecretSource } from '../client.js'
import { loadConfig, parseOutputFormat } from '../lib/config-loader.js'
import { formatErrorForCli } from '../lib/errors.js'
import { buildErrorHints } from '../lib/error-hints.js'
import type { RenderOptions } from '../lib/render.js'
import { withClient } from './lib/create-client.js'
import { EXIT_SUCCESS, EXIT_USER_ERROR, exitCodeFor } from './lib/exit-codes.js'
import { c } from './lib/colors.js'
import { runGet } from './commands/get.js'
import { runList } from './commands/list.js'
import * as ui from './ui.js'

interface RawGlobalOptions {
  region?: string
  profile?: string
  endpoint?: string
  json?: boolean
  verbose?: boolean
  quiet?: boolean
}

interface GetOptions {
  output?: string
  file?: string
}

interface ListOptions {
  filter?: string
}

export type SourceRunner = <T>(
  context: { options: GlobalOptions; config: SecretcastConfig },
  fn: (source: SecretSource) => Promise<T>
) => Promise<T>

export interface ProgramDeps {
  /** Provides the secret source for a command (defaults to an AWS client) */
  withSource?: SourceRunner
  env?: NodeJS.ProcessEnv
  cwd?: string
  renderOptions?: RenderOptions
}

function getPackageVersion(): string {
  let dir = path.dirname(fileURLToPath(import.meta.url))
  for (let i = 0; i < 5; i++) {
    const pkgPath = path.join(dir, 'package.json')
    if (fs.existsSync(pkgPath)) {
      const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'))
      const version = typeof pkg === 'object' && pkg !== null ? Reflect.get(pkg, 'version') : undefined
      return typeof version === 'string' ? version : '0.0.0'
    }
    dir = path.dirname(dir)
  }
  return '0.0.0'
}

function toGlobalOptions(raw: RawGlobalOptions): GlobalOptions {
  return {
    region: raw.region,
    profile: raw.profile,
    endpoint: raw.endpoint,
    json: raw.json ?? false,
    verbose: raw.verbose ?? false,
    quiet: raw.quiet ?? false
  }
}

function reportError(err: unknown, command: string[], options: GlobalOptions): void {
  console.error(c.error(formatErrorForCli(err)))

  if (ui.isQuiet()) return

  for (const hint of buildErrorHints(err, { command, region: options.region, profile: options.profile })) {
    console.error(`  ${c.muted(hint)}`)
  }
}

/**
 * Build the commander program. `run` resolves to the process exit code.
 */
export function createProgram(deps: ProgramDeps = {}): { program: Command; run: (argv: string[]) => Promise<number> } {
  const env = deps.env ?? process.env
  const withSource: SourceRunner = deps.withSource ?? withClient
  let exitCode = EXIT_SUCCESS

  const program = new Command()
  program
    .name('secretcast')
    .description('Fetch AWS Secrets Manager secrets and write them as env, JSON, YAML or CSV')
    .version(getPackageVersion(), '-V, --version')
    .option('--region <region>', 'AWS region')
    .option('--profile <profile>', 'AWS shared-config profile')
    .option('--endpoint <url>', 'Custom Secrets Manager endpoint')
    .option('--json', 'Machine-readable output')
    .option('-v, --verbose', 'Verbose logging on stderr')
    .option('-q, --quiet', 'Suppress non-essential messages')
    .exitOverride()

  const prepare = (): { options: GlobalOptions; config: SecretcastConfig } => {
    const options = toGlobalOptions(program.opts<RawGlobalOptions>())
    ui.setQuiet(options.quiet)
    const { config, configPath } = loadConfig(deps.cwd, env)
    if (configPath) ui.verbose(`Config: ${configPath}`, options.verbose)
    return { options, config }
  }

  const guard = async (command: string[], fn: () => Promise<void>): Promise<void> => {
    const options = toGlobalOptions(program.opts<RawGlobalOptions>())
    try {
      await fn()
    } catch (err) {
      reportError(err, command, options)
      exitCode = exitCodeFor(err)
    }
  }

  program
    .command('get')
    .description('Fetch a secret and render it')
    .argument('<secret-name>', 'Name or ARN of the secret')
    .option('-o, --output <format>', `Output format (${OUTPUT_FORMATS.join(', ')})`)
    .option('-f, --file <path>', 'Write to this file instead of the default')
    .action(async (secretName: string, opts: GetOptions) => {
      await guard(['get', secretName], async () => {
        const context = prepare()
        const format = opts.output !== undefined
          ? parseOutputFormat(opts.output)
          : context.config.output ?? DEFAULT_OUTPUT_FORMAT

        await withSource(context, source => runGet({
          source,
          secretName,
          format,
          filePath: opts.file,
          verbose: context.options.verbose,
          jsonOutput: context.options.json,
          renderOptions: { cwd: deps.cwd, ...deps.renderOptions }
        }))
      })
    })

  program
    .command('list')
    .description('List available secrets')
    .option('-f, --filter <text>', 'Only names containing this text')
    .action(async (opts: ListOptions) => {
      await guard(['list'], async () => {
        const context = prepare()
        await withSource(context, source => runList({
          source,
          filter: opts.filter,
          verbose: context.options.verbose,
          jsonOutput: context.options.json
        }))
      })
    })

  const run = async (argv: string[]): Promise<number> => {
    exitCode = EXIT_SUCCESS
    if (argv.length === 0) {
      program.outputHelp()
      return EXIT_SUCCESS
    }

    try {
      await program.parseAsync(argv, { from: 'user' })
    } catch (err) {
      if (err instanceof CommanderError) {
        return err.exitCode === 0 ? EXIT_SUCCESS : EXIT_USER_ERROR
      }
      throw err
    }
    return exitCode
  }

  return { program, run }
}
