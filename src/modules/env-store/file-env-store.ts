/**
 * FileEnvStore — EnvStore backed by a `.env` style file on disk.
 *
 * The file is read in full on load and truncated and rewritten in full on
 * save. There is no locking and no atomic replace: a concurrent writer can
 * lose updates, and a failed write can leave the file truncated.
 *
 * Entries are handed out as UTF-8 text. The bytes each line was read with are
 * kept, and an entry whose value is unchanged at save time is written back
 * with those bytes, so non-UTF-8 content in other entries survives a rewrite.
 */

import { open, writeFile } from 'fs/promises'
import { constants } from 'fs'
import { resolve } from 'path'
import { EnvStoreError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { parseEnvContent, serializeEnvMap } from './env-format.js'
import type { EnvEntries } from './env-format.js'
import type { EnvStore } from './env-store.js'

const logger = createLogger('env-store')

const FILE_MODE = 0o644

/** One byte per char; env-format works on these strings unchanged */
const BYTE_ENCODING = 'latin1'

interface LoadedLine {
  value: string
  rawKey: string
  rawValue: string
}

function bytesToText(bytes: string): string {
  return Buffer.from(bytes, BYTE_ENCODING).toString('utf-8')
}

function textToBytes(text: string): string {
  return Buffer.from(text, 'utf-8').toString(BYTE_ENCODING)
}

function describeIoError(err: unknown): { message: string; errno?: string } {
  if (err instanceof Error) {
    const errno = 'code' in err && typeof err.code === 'string' ? err.code : undefined
    return errno !== undefined ? { message: err.message, errno } : { message: err.message }
  }
  return { message: String(err) }
}

export class FileEnvStore implements EnvStore {
  readonly location: string
  private readonly _loaded = new Map<string, LoadedLine>()

  constructor(filePath: string) {
    this.location = resolve(filePath)
  }

  async load(): Promise<EnvEntries> {
    let content: string
    try {
      const handle = await open(this.location, constants.O_RDONLY | constants.O_CREAT, FILE_MODE)
      try {
        content = await handle.readFile(BYTE_ENCODING)
      } finally {
        await handle.close()
      }
    } catch (err) {
      const { message, errno } = describeIoError(err)
      logger.debug({ file: this.location, errno }, 'Failed to read env file')
      throw new EnvStoreError(`Cannot read ${this.location}: ${message}`, {
        file: this.location,
        errno,
      })
    }

    this._loaded.clear()
    const entries: EnvEntries = new Map()
    for (const [rawKey, rawValue] of parseEnvContent(content)) {
      const key = bytesToText(rawKey)
      const value = bytesToText(rawValue)
      this._loaded.set(key, { value, rawKey, rawValue })
      entries.set(key, value)
    }
    logger.debug({ file: this.location, entries: entries.size }, 'Env file loaded')
    return entries
  }

  async save(entries: ReadonlyMap<string, string>): Promise<void> {
    const rawEntries = new Map<string, string>()
    for (const [key, value] of entries) {
      const loaded = this._loaded.get(key)
      if (loaded !== undefined && loaded.value === value) {
        rawEntries.set(loaded.rawKey, loaded.rawValue)
      } else {
        rawEntries.set(textToBytes(key), textToBytes(value))
      }
    }

    try {
      await writeFile(this.location, serializeEnvMap(rawEntries), {
        encoding: BYTE_ENCODING,
        mode: FILE_MODE,
      })
    } catch (err) {
      const { message, errno } = describeIoError(err)
      logger.debug({ file: this.location, errno }, 'Failed to write env file')
      throw new EnvStoreError(`Cannot write ${this.location}: ${message}`, {
        file: this.location,
        errno,
      })
    }
    logger.debug({ file: this.location, entries: entries.size }, 'Env file saved')
  }
}

/**
 * Create a file-backed EnvStore.
 *
 * @example
 * const store = createFileEnvStore('.env')
 * const entries = await store.load()
 */
export function createFileEnvStore(filePath: string): EnvStore {
  return new FileEnvStore(filePath)
}
