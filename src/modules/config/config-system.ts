/**
 * ConfigSystem interface — public contract for envkeeper configuration.
 *
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { EnvkeeperConfig, PartialEnvkeeperConfig } from './config-schema.js'

export interface ConfigSystemOptions {
  /** Directory holding `.envkeeper.yaml` and the default env file (default: cwd) */
  projectRoot?: string
  /** Environment to read ENVKEEPER_* overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv
  /** Highest-priority values, typically from CLI flags */
  cliOverrides?: PartialEnvkeeperConfig
}

/**
 * Provides the merged, validated configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < project file < env vars < CLI flags
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources.
   * @throws {ConfigError} if the project file is unreadable or the result is invalid.
   */
  load(): Promise<void>

  /**
   * Return the merged configuration.
   * @throws {ConfigError} if `load()` has not been called.
   */
  getConfig(): EnvkeeperConfig

  /** Absolute path of the env file to edit */
  resolveEnvFile(): string

  readonly isLoaded: boolean
}
