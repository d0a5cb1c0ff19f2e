/**
 * Error definitions for envkeeper
 * Provides the structured error hierarchy for all store, prompt and config operations
 */

/** Base error class for all envkeeper errors */
export class EnvkeeperError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'EnvkeeperError'
    this.code = code
    this.context = context
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EnvkeeperError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Codes carried by validation rejections */
export type EnvValidationCode = 'INVALID_CHARACTERS' | 'FORBIDDEN_SCRIPT'

/**
 * Rejection produced by the key normalizer or the value validator.
 * Returned as a value, never thrown.
 */
export class EnvValidationError extends EnvkeeperError {
  public override readonly code: EnvValidationCode

  constructor(code: EnvValidationCode, message: string, context: Record<string, unknown> = {}) {
    super(message, code, context)
    this.code = code
    this.name = 'EnvValidationError'
  }
}

/** Error thrown when the env file cannot be opened, read or written */
export class EnvStoreError extends EnvkeeperError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'ENV_STORE_IO', context)
    this.name = 'EnvStoreError'
  }
}

/** Error thrown when configuration is invalid or unreadable */
export class ConfigError extends EnvkeeperError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when the input channel closes while a prompt is waiting */
export class PromptClosedError extends EnvkeeperError {
  constructor(question: string) {
    super('Input closed before an answer was given', 'PROMPT_CLOSED', { question })
    this.name = 'PromptClosedError'
  }
}
