/**
 * env-key module — barrel exports
 */

export type { ValidationResult, InputValidator } from './types.js'
export { normalizeKey, KEY_SUFFIX } from './key-normalizer.js'
export { validateValue } from './value-validator.js'
