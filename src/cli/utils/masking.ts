/**
 * Secret masking for CLI output and pino logger redaction.
 *
 * Env values are secrets by default: they never appear in logs and are only
 * printed by `envkeeper list --show-values`.
 */

/** Placeholder shown instead of a real value */
export const MASKED_VALUE = '***'

/**
 * Pino redaction paths for every field the modules log a value under.
 * Pass this array to the `pino({ redact: ... })` option.
 */
export const PINO_REDACT_PATHS: string[] = [
  'value',
  'currentValue',
  'candidate',
  '*.value',
  '*.currentValue',
  '*.candidate',
]

/**
 * Render a single store entry as a `KEY=VALUE` display line.
 *
 * @param showValue - When false, the value is replaced with `***`
 */
export function formatEntry(key: string, value: string, showValue: boolean): string {
  return `${key}=${showValue ? value : MASKED_VALUE}`
}

/**
 * Return a copy of the entries with every value replaced by `***`.
 */
export function maskEntries(entries: ReadonlyMap<string, string>): Record<string, string> {
  const masked: Record<string, string> = {}
  for (const key of entries.keys()) {
    masked[key] = MASKED_VALUE
  }
  return masked
}
