/**
 * Unit tests for `src/cli/commands/set.ts`
 *
 * Drives runSetAction against a temporary project directory, with answers
 * scripted through an in-memory input stream.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync, readFileSync, writeFileSync, existsSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { Readable } from 'stream'

vi.mock('../../../utils/logger.js', () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}))

import {
  runSetAction,
  KEY_PROMPT,
  VALUE_PROMPT,
  SET_EXIT_SUCCESS,
  SET_EXIT_ERROR,
  SET_EXIT_USAGE_ERROR,
} from '../set.js'
import type { SetActionOptions } from '../set.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const KEY_ERROR = 'Error: Key may only contain Latin letters, spaces and underscores (no digits or special characters)\n'
const VALUE_ERROR = 'Error: Value must use Latin script only (no Cyrillic letters)\n'
const OVERWRITE_PROMPT = 'Key "db password" already exists. Do you want to change its value? (yes/no): '

function confirmPrompt(attempt: number, max: number): string {
  return `Enter the current value to confirm (attempt ${String(attempt)} of ${String(max)}): `
}

function answers(...lines: string[]): Readable {
  return Readable.from(lines.length > 0 ? [Buffer.from(lines.map((l) => `${l}\n`).join(''))] : [])
}

let projectRoot: string
let envPath: string
let stdout: string
let stderr: string

function options(overrides: Partial<SetActionOptions> = {}): SetActionOptions {
  return {
    projectRoot,
    outputFormat: 'human',
    env: {},
    input: answers(),
    ...overrides,
  }
}

beforeEach(() => {
  projectRoot = mkdtempSync(join(tmpdir(), 'envkeeper-set-test-'))
  envPath = join(projectRoot, '.env')
  stdout = ''
  stderr = ''
  vi.spyOn(process.stdout, 'write').mockImplementation((data: string | Uint8Array) => {
    stdout += typeof data === 'string' ? data : data.toString()
    return true
  })
  vi.spyOn(process.stderr, 'write').mockImplementation((data: string | Uint8Array) => {
    stderr += typeof data === 'string' ? data : data.toString()
    return true
  })
})

afterEach(() => {
  vi.restoreAllMocks()
  rmSync(projectRoot, { recursive: true, force: true })
})

// ---------------------------------------------------------------------------
// Adding
// ---------------------------------------------------------------------------

describe('adding a new variable', () => {
  it('prompts for key and value, then writes the canonical key', async () => {
    const exitCode = await runSetAction(options({ input: answers('db password', 'secret123') }))

    expect(exitCode).toBe(SET_EXIT_SUCCESS)
    expect(stdout).toBe(`${KEY_PROMPT}${VALUE_PROMPT}Variable DB_PASSWORD_KEY added.\n`)
    expect(stderr).toBe('')
    expect(readFileSync(envPath, 'utf-8')).toBe('DB_PASSWORD_KEY=secret123\n')
  })

  it('re-asks after each invalid key or value', async () => {
    const exitCode = await runSetAction(
      options({ input: answers('db2', 'дб', 'db password', 'пароль', 'secret') }),
    )

    expect(exitCode).toBe(SET_EXIT_SUCCESS)
    expect(stdout).toBe(
      KEY_PROMPT +
        KEY_ERROR +
        KEY_PROMPT +
        KEY_ERROR +
        KEY_PROMPT +
        VALUE_PROMPT +
        VALUE_ERROR +
        VALUE_PROMPT +
        'Variable DB_PASSWORD_KEY added.\n',
    )
    expect(readFileSync(envPath, 'utf-8')).toBe('DB_PASSWORD_KEY=secret\n')
  })

  it('drops comments and blank lines from the rewritten file', async () => {
    writeFileSync(envPath, '# database\n\nAPI_KEY=abc\n', 'utf-8')
    await runSetAction(options({ key: 'db password', value: 'x' }))
    expect(readFileSync(envPath, 'utf-8')).toBe('API_KEY=abc\nDB_PASSWORD_KEY=x\n')
  })

  it('skips both prompts when --key and --value are given', async () => {
    const exitCode = await runSetAction(options({ key: ' api token ', value: ' tok-1 ' }))

    expect(exitCode).toBe(SET_EXIT_SUCCESS)
    expect(stdout).toBe('Variable API_TOKEN_KEY added.\n')
    expect(readFileSync(envPath, 'utf-8')).toBe('API_TOKEN_KEY=tok-1\n')
  })

  it('writes to the file given with --file', async () => {
    await runSetAction(options({ key: 'api', value: 'v', file: 'custom.env' }))
    expect(readFileSync(join(projectRoot, 'custom.env'), 'utf-8')).toBe('API_KEY=v\n')
    expect(existsSync(envPath)).toBe(false)
  })

  it('prints a JSON line with --output-format json', async () => {
    const exitCode = await runSetAction(options({ key: 'api', value: 'v', outputFormat: 'json' }))

    expect(exitCode).toBe(SET_EXIT_SUCCESS)
    const lines = stdout.trim().split('\n')
    expect(lines).toHaveLength(1)
    const parsed = JSON.parse(lines[0] ?? '') as { event: string; data: Record<string, unknown> }
    expect(parsed.event).toBe('env:upsert')
    expect(parsed.data).toEqual({ status: 'added', key: 'API_KEY', file: envPath })
  })
})

// ---------------------------------------------------------------------------
// Updating
// ---------------------------------------------------------------------------

describe('updating an existing variable', () => {
  beforeEach(() => {
    writeFileSync(envPath, '# secrets\n\nDB_PASSWORD_KEY=old\nAPI_KEY=abc\n', 'utf-8')
  })

  it('updates after "yes" and a correct second attempt', async () => {
    const exitCode = await runSetAction(
      options({ input: answers('db password', 'new', 'yes', 'wrong', 'old') }),
    )

    expect(exitCode).toBe(SET_EXIT_SUCCESS)
    expect(stdout).toBe(
      KEY_PROMPT +
        VALUE_PROMPT +
        OVERWRITE_PROMPT +
        confirmPrompt(1, 3) +
        'Value does not match.\n' +
        confirmPrompt(2, 3) +
        'Variable DB_PASSWORD_KEY updated.\n',
    )
    expect(readFileSync(envPath, 'utf-8')).toBe('DB_PASSWORD_KEY=new\nAPI_KEY=abc\n')
  })

  it('cancels on any answer other than yes and leaves the file untouched', async () => {
    const exitCode = await runSetAction(options({ input: answers('db password', 'new', 'no') }))

    expect(exitCode).toBe(SET_EXIT_SUCCESS)
    expect(stdout.endsWith(`${OVERWRITE_PROMPT}Update cancelled.\n`)).toBe(true)
    expect(readFileSync(envPath, 'utf-8')).toBe('# secrets\n\nDB_PASSWORD_KEY=old\nAPI_KEY=abc\n')
  })

  it('rejects the update after the configured number of wrong attempts', async () => {
    const exitCode = await runSetAction(
      options({ attempts: 2, input: answers('db password', 'new', 'YES', 'a', 'b') }),
    )

    expect(exitCode).toBe(SET_EXIT_SUCCESS)
    expect(stdout.endsWith(
      confirmPrompt(1, 2) +
        'Value does not match.\n' +
        confirmPrompt(2, 2) +
        'Value does not match.\n' +
        'Too many attempts. Update rejected.\n',
    )).toBe(true)
    expect(readFileSync(envPath, 'utf-8')).toBe('# secrets\n\nDB_PASSWORD_KEY=old\nAPI_KEY=abc\n')
  })

  it('reads the attempt limit from the project config file', async () => {
    writeFileSync(join(projectRoot, '.envkeeper.yaml'), 'confirm_attempts: 1\n', 'utf-8')
    await runSetAction(options({ input: answers('db password', 'new', 'yes', 'a') }))
    expect(stdout.endsWith(`${confirmPrompt(1, 1)}Value does not match.\nToo many attempts. Update rejected.\n`)).toBe(true)
  })
})

// ---------------------------------------------------------------------------
// Failures
// ---------------------------------------------------------------------------

describe('failures', () => {
  it('returns a usage error for an invalid --key without touching the file', async () => {
    const exitCode = await runSetAction(options({ key: 'db-2' }))

    expect(exitCode).toBe(SET_EXIT_USAGE_ERROR)
    expect(stderr).toBe(KEY_ERROR)
    expect(existsSync(envPath)).toBe(false)
  })

  it('returns a usage error for an invalid --value', async () => {
    const exitCode = await runSetAction(options({ key: 'db', value: 'ключ' }))

    expect(exitCode).toBe(SET_EXIT_USAGE_ERROR)
    expect(stderr).toBe(VALUE_ERROR)
  })

  it('returns a usage error for an invalid configuration', async () => {
    const exitCode = await runSetAction(options({ attempts: 0 }))

    expect(exitCode).toBe(SET_EXIT_USAGE_ERROR)
    expect(stderr.startsWith('Configuration error: Configuration validation failed:\n')).toBe(true)
  })

  it('returns an error when input ends before a value is given', async () => {
    const exitCode = await runSetAction(options({ input: answers('db password') }))

    expect(exitCode).toBe(SET_EXIT_ERROR)
    expect(stderr).toBe('Error: Input closed before an answer was given\n')
    expect(existsSync(envPath)).toBe(false)
  })

  it('returns an error when the env file cannot be opened', async () => {
    const exitCode = await runSetAction(options({ key: 'db', value: 'x', file: 'missing/dir/.env' }))

    expect(exitCode).toBe(SET_EXIT_ERROR)
    expect(stderr.startsWith(`Error: Cannot read ${join(projectRoot, 'missing', 'dir', '.env')}: `)).toBe(true)
  })
})
