#!/usr/bin/env node
/**
 * propkit CLI - Main entry point
 * Provides the `propkit` command-line interface over properties files
 */

import { Command } from 'commander'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { readFile } from 'fs/promises'
import { z } from 'zod'
import { createLogger } from '../utils/logger.js'
import { registerGetCommand } from './commands/get.js'
import { registerSetCommand } from './commands/set.js'
import { registerUnsetCommand } from './commands/unset.js'
import { registerListCommand } from './commands/list.js'

const logger = createLogger('cli')

const PackageJsonSchema = z.object({ version: z.string().optional() })

/** Resolve the package.json path relative to this file */
async function getPackageVersion(): Promise<string> {
  const __dirname = dirname(fileURLToPath(import.meta.url))
  // dist/cli/index.js and src/cli/index.ts both sit two levels below the root
  const pkgPath = resolve(__dirname, '../../package.json')
  try {
    const content = await readFile(pkgPath, 'utf-8')
    const pkg = PackageJsonSchema.safeParse(JSON.parse(content))
    return (pkg.success ? pkg.data.version : undefined) ?? '0.0.0'
  } catch (err) {
    logger.debug({ err, pkgPath }, 'Could not read package version')
    return '0.0.0'
  }
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('propkit')
    .description('Read and write key = value properties files')
    .version(version, '-v, --version', 'Output the current version')

  registerGetCommand(program)
  registerSetCommand(program)
  registerUnsetCommand(program)
  registerListCommand(program)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

// Errors are handled internally by main() which calls process.exit(1)
void main()
