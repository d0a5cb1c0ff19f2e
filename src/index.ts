/**
 * envkeeper - Main module exports
 * Public API surface for embedding the guarded env update flow
 */

// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger } from './utils/logger.js'
export type { LoggerOptions } from './utils/logger.js'

// Key normalization and value validation
export * from './modules/env-key/index.js'

// Env file store
export * from './modules/env-store/index.js'

// Guarded update
export * from './modules/env-update/index.js'

// Configuration
export * from './modules/config/index.js'

// CLI building blocks
export { ReadlinePrompter } from './cli/utils/line-prompter.js'
export type { LinePrompter } from './cli/utils/line-prompter.js'
export { TerminalConfirmationPrompter } from './cli/utils/terminal-confirmation.js'
export { MASKED_VALUE } from './cli/utils/masking.js'
