/**
 * `propkit get <file> <key>` — print a property value.
 *
 * A single value prints on one line; with `--list`, each list element prints
 * on its own line. Asking for the wrong kind is reported as not found.
 */

import type { Command } from 'commander'
import { EXIT_ERROR, EXIT_SUCCESS } from '../utils/exit-codes.js'
import { openSettings, reportError } from '../utils/settings-file.js'

export interface GetOptions {
  list?: boolean
}

export function runGet(filePath: string, key: string, opts: GetOptions = {}): number {
  try {
    const settings = openSettings(filePath)
    const lines = opts.list === true ? settings.propertySlice(key) : settings.property(key)
    if (lines === undefined) {
      const kind = opts.list === true ? 'list property' : 'property'
      process.stderr.write(`Error: ${kind} "${key}" not found in ${filePath}\n`)
      return EXIT_ERROR
    }
    const output = typeof lines === 'string' ? [lines] : lines
    process.stdout.write(output.map((line) => `${line}\n`).join(''))
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err)
  }
}

export function registerGetCommand(program: Command): void {
  program
    .command('get <file> <key>')
    .description('Print the value stored under a key')
    .option('--list', 'Read the key as a list, one element per line')
    .action((file: string, key: string, opts: { list?: boolean }) => {
      process.exit(runGet(file, key, { list: opts.list === true }))
    })
}
