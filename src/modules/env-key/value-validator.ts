/**
 * Value validator — values are trimmed and must not contain Cyrillic letters.
 */

import { EnvValidationError } from '../../core/errors.js'
import type { ValidationResult } from './types.js'

const CYRILLIC_LETTER = /[а-яА-ЯёЁ]/

export function validateValue(raw: string): ValidationResult {
  const trimmed = raw.trim()

  if (CYRILLIC_LETTER.test(trimmed)) {
    return {
      success: false,
      error: new EnvValidationError(
        'FORBIDDEN_SCRIPT',
        'Value must use Latin script only (no Cyrillic letters)',
      ),
    }
  }

  return { success: true, data: trimmed }
}
