/**
 * Built-in defaults, overridden by:
 *   project file → environment variables → CLI flags
 */

import type { EnvkeeperConfig } from './config-schema.js'
import { DEFAULT_CONFIRM_ATTEMPTS } from '../env-update/env-updater-impl.js'

/** Project config file name, looked up in the working directory */
export const CONFIG_FILE_NAME = '.envkeeper.yaml'

export const DEFAULT_CONFIG: EnvkeeperConfig = {
  env_file: '.env',
  confirm_attempts: DEFAULT_CONFIRM_ATTEMPTS,
}
