/**
 * `envkeeper set` command (default)
 *
 * Adds a variable to the env file, or overwrites an existing one after the
 * user confirms and re-enters its current value.
 *
 * Usage:
 *   envkeeper                                  Prompt for key and value
 *   envkeeper set --key "db password"          Prompt for the value only
 *   envkeeper set --key api --value s3cret     No key/value prompts
 *   envkeeper set --file .env.local            Edit another env file
 *   envkeeper set --output-format json         Print the outcome as NDJSON
 *
 * Exit codes:
 *   0 - Success (added, updated, or cancelled by the user)
 *   1 - System error (env file unreadable/unwritable, input closed)
 *   2 - Usage error (invalid --key/--value, invalid configuration)
 */

import type { Command } from 'commander'
import type { Readable, Writable } from 'stream'
import { ConfigError, EnvkeeperError } from '../../core/errors.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { PartialEnvkeeperConfig } from '../../modules/config/config-schema.js'
import { normalizeKey } from '../../modules/env-key/key-normalizer.js'
import { validateValue } from '../../modules/env-key/value-validator.js'
import type { InputValidator } from '../../modules/env-key/types.js'
import { createFileEnvStore } from '../../modules/env-store/file-env-store.js'
import { createEnvUpdater } from '../../modules/env-update/env-updater-impl.js'
import type { UpsertOutcome } from '../../modules/env-update/env-updater.js'
import { ReadlinePrompter } from '../utils/line-prompter.js'
import type { LinePrompter } from '../utils/line-prompter.js'
import { TerminalConfirmationPrompter } from '../utils/terminal-confirmation.js'
import { parseOutputFormat, parseAttempts, type OutputFormat } from '../utils/formatting.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('set-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const SET_EXIT_SUCCESS = 0
export const SET_EXIT_ERROR = 1
export const SET_EXIT_USAGE_ERROR = 2

// ---------------------------------------------------------------------------
// Prompt text
// ---------------------------------------------------------------------------

export const KEY_PROMPT = 'Variable key (e.g. db password): '
export const VALUE_PROMPT = 'Variable value (Latin script only): '

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SetActionOptions {
  projectRoot: string
  outputFormat: OutputFormat
  /** Raw key; skips the key prompt when given */
  key?: string
  /** Raw value; skips the value prompt when given */
  value?: string
  /** Env file override (--file) */
  file?: string
  /** Confirmation attempt override (--attempts) */
  attempts?: number
  /** Override for testing — environment used for ENVKEEPER_* overrides */
  env?: NodeJS.ProcessEnv
  /** Override for testing — answer source (default: process.stdin) */
  input?: Readable
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface AcceptedInput {
  raw: string
  data: string
}

/**
 * Ask until the validator accepts the answer. Each rejection is reported
 * and the question repeated; there is no retry limit.
 */
async function promptUntilValid(
  prompter: LinePrompter,
  question: string,
  validator: InputValidator,
): Promise<AcceptedInput> {
  for (;;) {
    const raw = await prompter.ask(question)
    const result = validator(raw)
    if (result.success) return { raw, data: result.data }
    prompter.say(`Error: ${result.error.message}`)
  }
}

function outcomeMessage(outcome: UpsertOutcome): string {
  switch (outcome.status) {
    case 'added':
      return `Variable ${outcome.key} added.`
    case 'updated':
      return `Variable ${outcome.key} updated.`
    case 'cancelled':
      return outcome.reason === 'declined' ? 'Update cancelled.' : 'Too many attempts. Update rejected.'
  }
}

function writeJsonOutcome(outcome: UpsertOutcome, file: string): void {
  const line = JSON.stringify({
    event: 'env:upsert',
    timestamp: new Date().toISOString(),
    data: { ...outcome, file },
  })
  process.stdout.write(line + '\n')
}

// ---------------------------------------------------------------------------
// runSetAction — testable core logic
// ---------------------------------------------------------------------------

/**
 * Core action for the set command.
 *
 * Returns the exit code. Separated from Commander integration for testability.
 */
export async function runSetAction(options: SetActionOptions): Promise<number> {
  const { projectRoot, outputFormat } = options

  const cliOverrides: PartialEnvkeeperConfig = {
    ...(options.file !== undefined && { env_file: options.file }),
    ...(options.attempts !== undefined && { confirm_attempts: options.attempts }),
  }
  const configSystem = createConfigSystem({
    projectRoot,
    cliOverrides,
    ...(options.env !== undefined && { env: options.env }),
  })

  try {
    await configSystem.load()
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`Configuration error: ${err.message}\n`)
      return SET_EXIT_USAGE_ERROR
    }
    throw err
  }

  const envFile = configSystem.resolveEnvFile()
  const { confirm_attempts: maxAttempts } = configSystem.getConfig()

  // Validate flag input up front: a bad flag is a usage error, not a re-prompt
  let presetKey: AcceptedInput | undefined
  if (options.key !== undefined) {
    const result = normalizeKey(options.key)
    if (!result.success) {
      process.stderr.write(`Error: ${result.error.message}\n`)
      return SET_EXIT_USAGE_ERROR
    }
    presetKey = { raw: options.key.trim(), data: result.data }
  }

  let presetValue: string | undefined
  if (options.value !== undefined) {
    const result = validateValue(options.value)
    if (!result.success) {
      process.stderr.write(`Error: ${result.error.message}\n`)
      return SET_EXIT_USAGE_ERROR
    }
    presetValue = result.data
  }

  // Keep stdout clean for the JSON line
  const promptOutput: Writable = outputFormat === 'json' ? process.stderr : process.stdout
  const prompter = new ReadlinePrompter(options.input ?? process.stdin, promptOutput)

  try {
    const key = presetKey ?? (await promptUntilValid(prompter, KEY_PROMPT, normalizeKey))
    const value = presetValue ?? (await promptUntilValid(prompter, VALUE_PROMPT, validateValue)).data

    const updater = createEnvUpdater({
      store: createFileEnvStore(envFile),
      prompter: new TerminalConfirmationPrompter(prompter),
      maxAttempts,
    })

    const outcome = await updater.upsert({ rawKey: key.raw, key: key.data, value })

    if (outputFormat === 'json') {
      writeJsonOutcome(outcome, envFile)
    } else {
      process.stdout.write(outcomeMessage(outcome) + '\n')
    }
    return SET_EXIT_SUCCESS
  } catch (err) {
    if (err instanceof EnvkeeperError) {
      process.stderr.write(`Error: ${err.message}\n`)
      return SET_EXIT_ERROR
    }
    const message = err instanceof Error ? err.message : String(err)
    process.stderr.write(`Error: ${message}\n`)
    logger.error({ err }, 'runSetAction failed')
    return SET_EXIT_ERROR
  } finally {
    prompter.close()
  }
}

// ---------------------------------------------------------------------------
// registerSetCommand
// ---------------------------------------------------------------------------

/**
 * Register the `envkeeper set` command with the CLI program.
 *
 * @param program     - Commander program instance
 * @param projectRoot - Project root directory (defaults to process.cwd())
 */
export function registerSetCommand(program: Command, projectRoot = process.cwd()): void {
  program
    .command('set', { isDefault: true })
    .description('Add a variable to the env file, or update it after confirmation')
    .option('-k, --key <key>', 'Variable key as free text (e.g. "db password")')
    .option('--value <value>', 'Variable value (Latin script only)')
    .option('-f, --file <path>', 'Env file to edit (default: .env)')
    .option('--attempts <count>', 'Confirmation attempts before an update is rejected', parseAttempts)
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(
      async (opts: {
        key?: string
        value?: string
        file?: string
        attempts?: number
        outputFormat: string
      }) => {
        const exitCode = await runSetAction({
          projectRoot,
          outputFormat: parseOutputFormat(opts.outputFormat),
          ...(opts.key !== undefined && { key: opts.key }),
          ...(opts.value !== undefined && { value: opts.value }),
          ...(opts.file !== undefined && { file: opts.file }),
          ...(opts.attempts !== undefined && { attempts: opts.attempts }),
        })
        process.exitCode = exitCode
      },
    )
}
