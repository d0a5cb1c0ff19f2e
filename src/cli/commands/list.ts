/**
 * `envkeeper list` command
 *
 * Prints the variables stored in the env file. Values are masked unless
 * `--show-values` is passed.
 *
 * Usage:
 *   envkeeper list                        KEY=*** per line
 *   envkeeper list --show-values          KEY=value per line
 *   envkeeper list --output-format json   {"file":…,"entries":{…}}
 *
 * Exit codes:
 *   0 - Success
 *   1 - System error (env file unreadable)
 *   2 - Usage error (invalid configuration)
 */

import type { Command } from 'commander'
import { ConfigError, EnvStoreError } from '../../core/errors.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import { createFileEnvStore } from '../../modules/env-store/file-env-store.js'
import { formatEntry, maskEntries } from '../utils/masking.js'
import { parseOutputFormat, type OutputFormat } from '../utils/formatting.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('list-cmd')

export const LIST_EXIT_SUCCESS = 0
export const LIST_EXIT_ERROR = 1
export const LIST_EXIT_USAGE_ERROR = 2

export interface ListActionOptions {
  projectRoot: string
  outputFormat: OutputFormat
  showValues: boolean
  file?: string
  env?: NodeJS.ProcessEnv
}

export async function runListAction(options: ListActionOptions): Promise<number> {
  const { projectRoot, outputFormat, showValues } = options

  const configSystem = createConfigSystem({
    projectRoot,
    ...(options.file !== undefined && { cliOverrides: { env_file: options.file } }),
    ...(options.env !== undefined && { env: options.env }),
  })

  try {
    await configSystem.load()
    const envFile = configSystem.resolveEnvFile()
    const entries = await createFileEnvStore(envFile).load()

    if (outputFormat === 'json') {
      const shown = showValues ? Object.fromEntries(entries) : maskEntries(entries)
      process.stdout.write(JSON.stringify({ file: envFile, entries: shown }) + '\n')
      return LIST_EXIT_SUCCESS
    }

    if (entries.size === 0) {
      process.stdout.write(`No variables in ${envFile}.\n`)
      return LIST_EXIT_SUCCESS
    }

    for (const [key, value] of entries) {
      process.stdout.write(formatEntry(key, value, showValues) + '\n')
    }
    return LIST_EXIT_SUCCESS
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`Configuration error: ${err.message}\n`)
      return LIST_EXIT_USAGE_ERROR
    }
    if (err instanceof EnvStoreError) {
      process.stderr.write(`Error: ${err.message}\n`)
      return LIST_EXIT_ERROR
    }
    const message = err instanceof Error ? err.message : String(err)
    process.stderr.write(`Error: ${message}\n`)
    logger.error({ err }, 'runListAction failed')
    return LIST_EXIT_ERROR
  }
}

/**
 * Register the `envkeeper list` command with the CLI program.
 */
export function registerListCommand(program: Command, projectRoot = process.cwd()): void {
  program
    .command('list')
    .description('List the variables in the env file (values masked)')
    .option('-f, --file <path>', 'Env file to read (default: .env)')
    .option('--show-values', 'Print values instead of ***', false)
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (opts: { file?: string; showValues: boolean; outputFormat: string }) => {
      const exitCode = await runListAction({
        projectRoot,
        outputFormat: parseOutputFormat(opts.outputFormat),
        showValues: opts.showValues,
        ...(opts.file !== undefined && { file: opts.file }),
      })
      process.exitCode = exitCode
    })
}
