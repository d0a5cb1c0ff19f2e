/**
 * Key normalizer — turns free-form key text into a canonical env key.
 *
 * "  db password " → "DB_PASSWORD_KEY"
 */

import { EnvValidationError } from '../../core/errors.js'
import type { ValidationResult } from './types.js'

/** Suffix every canonical key ends with */
export const KEY_SUFFIX = '_KEY'

const CANONICAL_KEY_CHARS = /^[A-Z_]+$/

/** ASCII-only upper-casing; `ß` or `ﬁ` must not expand into Latin letters */
function toAsciiUpperCase(text: string): string {
  return text.replace(/[a-z]/g, (letter) => letter.toUpperCase())
}

/**
 * Normalize a raw key.
 *
 * Steps: trim, spaces → underscores, ASCII upper-case, reject anything outside
 * `[A-Z_]`, then append `_KEY` unless already present.
 */
export function normalizeKey(raw: string): ValidationResult {
  const candidate = toAsciiUpperCase(raw.trim().replaceAll(' ', '_'))

  if (!CANONICAL_KEY_CHARS.test(candidate)) {
    return {
      success: false,
      error: new EnvValidationError(
        'INVALID_CHARACTERS',
        'Key may only contain Latin letters, spaces and underscores (no digits or special characters)',
        { raw },
      ),
    }
  }

  return {
    success: true,
    data: candidate.endsWith(KEY_SUFFIX) ? candidate : `${candidate}${KEY_SUFFIX}`,
  }
}
