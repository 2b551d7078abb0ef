/**
 * `propkit unset <file> <key>` — remove a property and save the file.
 */

import type { Command } from 'commander'
import { EXIT_ERROR, EXIT_SUCCESS } from '../utils/exit-codes.js'
import { openSettings, reportError } from '../utils/settings-file.js'

export function runUnset(filePath: string, key: string): number {
  try {
    const settings = openSettings(filePath)
    if (!settings.removeProperty(key)) {
      process.stderr.write(`Error: property "${key}" not found in ${filePath}\n`)
      return EXIT_ERROR
    }
    settings.storeToFile(filePath)
    process.stdout.write(`Removed ${key}\n`)
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err)
  }
}

export function registerUnsetCommand(program: Command): void {
  program
    .command('unset <file> <key>')
    .description('Remove a key and save the file')
    .action((file: string, key: string) => {
      process.exit(runUnset(file, key))
    })
}
