/**
 * Flat `KEY=VALUE` text format used by env files.
 *
 * Reading skips blank lines, `#` comment lines and lines without `=`.
 * Writing emits one `KEY=VALUE` line per entry plus a trailing newline;
 * comments and blank lines are not reproduced.
 */

/** In-memory view of an env file, keyed by variable name */
export type EnvEntries = Map<string, string>

// ASCII whitespace only, so byte-per-char strings trim the same as text
const EDGE_WHITESPACE = /^[ \t\n\v\f\r]+|[ \t\n\v\f\r]+$/g

function trimEdges(text: string): string {
  return text.replace(EDGE_WHITESPACE, '')
}

/**
 * Parse env file text into entries.
 *
 * Splits on the first `=` only, trims ASCII whitespace off both halves,
 * and lets a later duplicate key overwrite an earlier one.
 */
export function parseEnvContent(content: string): EnvEntries {
  const entries: EnvEntries = new Map()

  for (const rawLine of content.split('\n')) {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine
    if (trimEdges(line) === '' || line.startsWith('#')) continue

    const separator = line.indexOf('=')
    if (separator === -1) continue

    const key = trimEdges(line.slice(0, separator))
    entries.set(key, trimEdges(line.slice(separator + 1)))
  }

  return entries
}

/**
 * Serialize entries back to env file text.
 */
export function serializeEnvMap(entries: ReadonlyMap<string, string>): string {
  const lines: string[] = []
  for (const [key, value] of entries) {
    lines.push(`${key}=${value}`)
  }
  return lines.join('\n') + '\n'
}
