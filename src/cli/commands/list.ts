/**
 * `propkit list <file>` — print every property.
 *
 * `--format properties` (default) prints the canonical, key-sorted file form;
 * `--format json` prints an object with lists as arrays.
 */

import type { Command } from 'commander'
import type { Settings } from '../../modules/settings/settings.js'
import { EXIT_INVALID, EXIT_SUCCESS } from '../utils/exit-codes.js'
import { openSettings, reportError } from '../utils/settings-file.js'

export const LIST_FORMATS = ['properties', 'json'] as const
export type ListFormat = (typeof LIST_FORMATS)[number]

export interface ListOptions {
  format?: ListFormat
}

function isListFormat(value: string): value is ListFormat {
  return LIST_FORMATS.some((format) => format === value)
}

function toJson(settings: Settings): Record<string, string | string[]> {
  const result: Record<string, string | string[]> = {}
  for (const key of settings.propertyNames()) {
    const value = settings.property(key) ?? settings.propertySlice(key)
    if (value !== undefined) result[key] = value
  }
  return result
}

export function runList(filePath: string, opts: ListOptions = {}): number {
  try {
    const settings = openSettings(filePath)
    if (opts.format === 'json') {
      process.stdout.write(JSON.stringify(toJson(settings), null, 2) + '\n')
    } else {
      process.stdout.write(settings.store())
    }
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err)
  }
}

export function registerListCommand(program: Command): void {
  program
    .command('list <file>')
    .description('Print all properties')
    .option('--format <format>', 'Output format: properties (default) or json', 'properties')
    .action((file: string, opts: { format: string }) => {
      if (!isListFormat(opts.format)) {
        process.stderr.write(`Error: unknown format "${opts.format}" (expected ${LIST_FORMATS.join(' or ')})\n`)
        process.exit(EXIT_INVALID)
      }
      process.exit(runList(file, { format: opts.format }))
    })
}
