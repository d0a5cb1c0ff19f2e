/**
 * EnvUpdater interface — guarded add-or-update of a single env variable.
 *
 * Create an instance via `createEnvUpdater()` from env-updater-impl.ts.
 */

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

/**
 * Supplies the answers the confirmation protocol needs. The CLI backs this
 * with a terminal; tests back it with a scripted fake.
 */
export interface ConfirmationPrompter {
  /**
   * Tell the user the key already exists and ask whether to change it.
   * @param rawKey - The key exactly as the user typed it
   * @returns The raw yes/no answer
   */
  askOverwrite(rawKey: string): Promise<string>

  /** Ask the user to re-enter the currently stored value */
  askCurrentValue(attempt: number, maxAttempts: number): Promise<string>

  /** Report that a re-entered value did not match */
  notifyMismatch(attempt: number, maxAttempts: number): void
}

// ---------------------------------------------------------------------------
// Request / outcome
// ---------------------------------------------------------------------------

export interface UpsertRequest {
  /** Unmodified key input, used only when asking for confirmation */
  rawKey: string
  /** Canonical key produced by `normalizeKey` */
  key: string
  /** Value produced by `validateValue` */
  value: string
}

export type CancelReason = 'declined' | 'attempts-exceeded'

export type UpsertOutcome =
  | { status: 'added'; key: string }
  | { status: 'updated'; key: string }
  | { status: 'cancelled'; key: string; reason: CancelReason }

export type UpsertStatus = UpsertOutcome['status']

// ---------------------------------------------------------------------------
// EnvUpdater
// ---------------------------------------------------------------------------

export interface EnvUpdater {
  /**
   * Add the variable, or overwrite it after the confirmation protocol.
   *
   * Writes the store at most once, and only for `added` / `updated`.
   * @throws {EnvStoreError} if the store cannot be read or written.
   */
  upsert(request: UpsertRequest): Promise<UpsertOutcome>
}
