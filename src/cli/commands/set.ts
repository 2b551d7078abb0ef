/**
 * `propkit set <file> <key> <values...>` — store a property and save the file.
 *
 * One value is stored as a single value; several values, or `--list`, store
 * a list. The file is created when it does not exist.
 */

import type { Command } from 'commander'
import { EXIT_SUCCESS } from '../utils/exit-codes.js'
import { openSettings, reportError } from '../utils/settings-file.js'

export interface SetOptions {
  list?: boolean
}

export function runSet(
  filePath: string,
  key: string,
  values: string[],
  opts: SetOptions = {}
): number {
  try {
    const settings = openSettings(filePath, { createIfMissing: true })
    const asList = opts.list === true || values.length > 1
    const [first = ''] = values
    if (asList) {
      settings.setPropertySlice(key, values)
    } else {
      settings.setProperty(key, first)
    }
    settings.storeToFile(filePath)
    process.stdout.write(`Set ${key} = ${asList ? values.join(',') : first}\n`)
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err)
  }
}

export function registerSetCommand(program: Command): void {
  program
    .command('set <file> <key> <values...>')
    .description('Store a value (or a list, given several values) and save the file')
    .option('--list', 'Store as a list even when only one value is given')
    .action((file: string, key: string, values: string[], opts: { list?: boolean }) => {
      process.exit(runSet(file, key, values, { list: opts.list === true }))
    })
}
