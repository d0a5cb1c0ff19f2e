/**
 * EnvStore interface — public contract for reading and rewriting an env file.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create a file-backed instance via `createFileEnvStore()` from file-env-store.ts.
 */

import type { EnvEntries } from './env-format.js'

export interface EnvStore {
  /** Location shown to the user and recorded in logs */
  readonly location: string

  /**
   * Load every entry. An absent backing file is created empty.
   * @throws {EnvStoreError} if the file cannot be opened or read.
   */
  load(): Promise<EnvEntries>

  /**
   * Replace the stored contents with `entries`.
   * @throws {EnvStoreError} on any write failure.
   */
  save(entries: ReadonlyMap<string, string>): Promise<void>
}
