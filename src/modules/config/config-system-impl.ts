/**
 * ConfigSystem implementation — loads configuration in hierarchy order.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → project config   (./.envkeeper.yaml)
 *     → environment vars (ENVKEEPER_* prefixed)
 *     → CLI flag overrides (ConfigSystemOptions.cliOverrides)
 */

import { readFile } from 'fs/promises'
import { join, resolve } from 'path'
import yaml from 'js-yaml'
import type { ZodIssue } from 'zod'
import { createLogger } from '../../utils/logger.js'
import { ConfigError } from '../../core/errors.js'
import {
  EnvkeeperConfigSchema,
  PartialEnvkeeperConfigSchema,
  type EnvkeeperConfig,
  type PartialEnvkeeperConfig,
} from './config-schema.js'
import { CONFIG_FILE_NAME, DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'

const logger = createLogger('config')

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/** Map of ENVKEEPER_ environment variable names to config keys */
const ENV_VAR_MAP: Record<string, keyof EnvkeeperConfig> = {
  ENVKEEPER_ENV_FILE: 'env_file',
  ENVKEEPER_CONFIRM_ATTEMPTS: 'confirm_attempts',
}

/** Config keys whose env values are read as integers */
const NUMERIC_KEYS: ReadonlySet<keyof EnvkeeperConfig> = new Set(['confirm_attempts'])

/**
 * Read ENVKEEPER_ variables and return a partial config overlay.
 * Invalid values are logged and ignored.
 */
function readEnvOverrides(env: NodeJS.ProcessEnv): PartialEnvkeeperConfig {
  const overrides: Record<string, unknown> = {}

  for (const [envKey, configKey] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined || rawValue === '') continue
    overrides[configKey] =
      NUMERIC_KEYS.has(configKey) && /^\d+$/.test(rawValue) ? parseInt(rawValue, 10) : rawValue
  }

  const parsed = PartialEnvkeeperConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: EnvkeeperConfig | null = null
  private readonly _projectRoot: string
  private readonly _env: NodeJS.ProcessEnv
  private readonly _cliOverrides: PartialEnvkeeperConfig

  constructor(options: ConfigSystemOptions = {}) {
    this._projectRoot = resolve(options.projectRoot ?? process.cwd())
    this._env = options.env ?? process.env
    this._cliOverrides = options.cliOverrides ?? {}
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  async load(): Promise<void> {
    const projectConfig = await this._loadYamlFile(join(this._projectRoot, CONFIG_FILE_NAME))

    const merged = {
      ...DEFAULT_CONFIG,
      ...projectConfig,
      ...readEnvOverrides(this._env),
      ...this._cliOverrides,
    }

    const result = EnvkeeperConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(`Configuration validation failed:\n${formatIssues(result.error.issues)}`, {
        issues: result.error.issues,
      })
    }

    this._config = result.data
    logger.debug({ config: this._config }, 'Configuration loaded')
  }

  getConfig(): EnvkeeperConfig {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().')
    }
    return this._config
  }

  resolveEnvFile(): string {
    return resolve(this._projectRoot, this.getConfig().env_file)
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _loadYamlFile(filePath: string): Promise<PartialEnvkeeperConfig> {
    let raw: string
    try {
      raw = await readFile(filePath, 'utf-8')
    } catch (err) {
      if (isMissingFile(err)) return {}
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Failed to read config file at ${filePath}: ${message}`, { filePath })
    }

    let parsed: unknown
    try {
      parsed = yaml.load(raw)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Invalid YAML in ${filePath}: ${message}`, { filePath })
    }

    // An empty file loads as undefined
    if (parsed === undefined || parsed === null) return {}

    const result = PartialEnvkeeperConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(`Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`, {
        filePath,
        issues: result.error.issues,
      })
    }
    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigSystem instance.
 *
 * @example
 * const config = createConfigSystem({ cliOverrides: { env_file: '.env.local' } })
 * await config.load()
 * const envPath = config.resolveEnvFile()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
