/**
 * env-update module — barrel exports
 */

export type {
  EnvUpdater,
  ConfirmationPrompter,
  UpsertRequest,
  UpsertOutcome,
  UpsertStatus,
  CancelReason,
} from './env-updater.js'
export type { EnvUpdaterDeps } from './env-updater-impl.js'
export { EnvUpdaterImpl, createEnvUpdater, DEFAULT_CONFIRM_ATTEMPTS } from './env-updater-impl.js'
