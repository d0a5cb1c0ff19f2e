/**
 * CLI option parsing helpers shared by the commands.
 */

import { InvalidArgumentError } from 'commander'

export type OutputFormat = 'human' | 'json'

/** Anything other than "json" falls back to human output */
export function parseOutputFormat(raw: string): OutputFormat {
  return raw === 'json' ? 'json' : 'human'
}

/**
 * Commander argument parser for `--attempts`. Range checks are left to the
 * config schema so every source reports them the same way.
 */
export function parseAttempts(raw: string): number {
  if (!/^\d+$/.test(raw.trim())) {
    throw new InvalidArgumentError('Expected a whole number.')
  }
  return parseInt(raw, 10)
}
