/**
 * EnvUpdater implementation — read the store, add or confirm-then-overwrite,
 * write the store.
 *
 * Confirmation protocol for an existing key:
 *   1. ask whether to change it; anything but "yes" (case-insensitive) cancels
 *   2. ask for the current value, up to `maxAttempts` times, compared exactly
 *   3. on a match, overwrite and save; otherwise cancel without writing
 *
 * Re-entering the current value is friction against accidental overwrites,
 * not authentication.
 */

import { createLogger } from '../../utils/logger.js'
import type { EnvStore } from '../env-store/env-store.js'
import type {
  ConfirmationPrompter,
  EnvUpdater,
  UpsertOutcome,
  UpsertRequest,
} from './env-updater.js'

const logger = createLogger('env-update')

/** Number of re-entry attempts granted before an overwrite is rejected */
export const DEFAULT_CONFIRM_ATTEMPTS = 3

const AFFIRMATIVE_ANSWER = 'yes'

export interface EnvUpdaterDeps {
  store: EnvStore
  prompter: ConfirmationPrompter
  maxAttempts?: number
}

export class EnvUpdaterImpl implements EnvUpdater {
  private readonly _store: EnvStore
  private readonly _prompter: ConfirmationPrompter
  private readonly _maxAttempts: number

  constructor(deps: EnvUpdaterDeps) {
    this._store = deps.store
    this._prompter = deps.prompter
    this._maxAttempts = deps.maxAttempts ?? DEFAULT_CONFIRM_ATTEMPTS
  }

  async upsert(request: UpsertRequest): Promise<UpsertOutcome> {
    const { rawKey, key, value } = request
    const entries = await this._store.load()

    const currentValue = entries.get(key)
    if (currentValue === undefined) {
      entries.set(key, value)
      await this._store.save(entries)
      logger.info({ key, file: this._store.location }, 'Variable added')
      return { status: 'added', key }
    }

    const answer = await this._prompter.askOverwrite(rawKey)
    if (answer.trim().toLowerCase() !== AFFIRMATIVE_ANSWER) {
      logger.info({ key }, 'Overwrite declined')
      return { status: 'cancelled', key, reason: 'declined' }
    }

    if (!(await this._confirmCurrentValue(currentValue))) {
      logger.info({ key, attempts: this._maxAttempts }, 'Overwrite rejected after failed confirmations')
      return { status: 'cancelled', key, reason: 'attempts-exceeded' }
    }

    entries.set(key, value)
    await this._store.save(entries)
    logger.info({ key, file: this._store.location }, 'Variable updated')
    return { status: 'updated', key }
  }

  private async _confirmCurrentValue(currentValue: string): Promise<boolean> {
    for (let attempt = 1; attempt <= this._maxAttempts; attempt++) {
      const candidate = await this._prompter.askCurrentValue(attempt, this._maxAttempts)
      if (candidate === currentValue) return true
      this._prompter.notifyMismatch(attempt, this._maxAttempts)
    }
    return false
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new EnvUpdater instance.
 *
 * @example
 * const updater = createEnvUpdater({ store: createFileEnvStore('.env'), prompter })
 * const outcome = await updater.upsert({ rawKey: 'db password', key: 'DB_PASSWORD_KEY', value: 's3cret' })
 */
export function createEnvUpdater(deps: EnvUpdaterDeps): EnvUpdater {
  return new EnvUpdaterImpl(deps)
}
