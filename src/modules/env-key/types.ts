/**
 * Shared result type for key normalization and value validation.
 */

import type { EnvValidationError } from '../../core/errors.js'

/**
 * Outcome of a normalizer or validator call. Same shape as zod's
 * `safeParse` result so callers narrow on `success`.
 */
export type ValidationResult =
  | { success: true; data: string }
  | { success: false; error: EnvValidationError }

/** A function that turns raw user input into a validated string or a rejection */
export type InputValidator = (raw: string) => ValidationResult
