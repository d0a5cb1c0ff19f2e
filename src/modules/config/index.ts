/**
 * Barrel exports for the config module.
 */

export { createConfigSystem, ConfigSystemImpl } from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  EnvkeeperConfigSchema,
  PartialEnvkeeperConfigSchema,
  MAX_CONFIRM_ATTEMPTS,
} from './config-schema.js'
export type { EnvkeeperConfig, PartialEnvkeeperConfig } from './config-schema.js'
export { DEFAULT_CONFIG, CONFIG_FILE_NAME } from './defaults.js'
