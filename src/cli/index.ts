#!/usr/bin/env node
/**
 * envkeeper CLI - Main entry point
 * Provides the `envkeeper` command-line interface
 */

import { Command } from 'commander'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { readFile } from 'fs/promises'
import { createLogger } from '../utils/logger.js'
import { registerSetCommand } from './commands/set.js'
import { registerListCommand } from './commands/list.js'

const logger = createLogger('cli')

/** Resolve the package version relative to this file (src/ or dist/) */
async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  const paths = [resolve(here, '../../package.json'), resolve(here, '../package.json')]

  for (const pkgPath of paths) {
    try {
      const content = await readFile(pkgPath, 'utf-8')
      const pkg = JSON.parse(content) as { version?: string; name?: string }
      if (pkg.name === 'envkeeper') {
        return pkg.version ?? '0.0.0'
      }
    } catch {
      // Try next path
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(projectRoot = process.cwd()): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('envkeeper')
    .description('Add or update a variable in a .env file, guarded against accidental overwrites')
    .version(version, '-v, --version', 'Output the current version')

  registerSetCommand(program, projectRoot)
  registerListCommand(program, projectRoot)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`)
    process.exit(1)
  }
}

void main()
