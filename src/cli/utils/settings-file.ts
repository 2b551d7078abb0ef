/**
 * Helpers shared by the CLI commands: open a settings file and map errors
 * to exit codes and stderr messages.
 */

import { existsSync } from 'fs'
import {
  InvalidKeyError,
  InvalidValueError,
  ParseError,
  SettingsIoError,
} from '../../core/errors.js'
import { builder } from '../../modules/builder/settings-builder.js'
import type { Settings } from '../../modules/settings/settings.js'
import { createLogger } from '../../utils/logger.js'
import { EXIT_ERROR, EXIT_INVALID } from './exit-codes.js'

const logger = createLogger('cli')

export interface OpenSettingsOptions {
  /** Start from an empty table when the file does not exist yet */
  createIfMissing?: boolean
}

/**
 * Build a properties store and load `filePath` into it.
 * @throws {SettingsIoError | ParseError}
 */
export function openSettings(filePath: string, opts: OpenSettingsOptions = {}): Settings {
  const settings = builder().fileTypeProperties().atomicWrites().build()
  if (opts.createIfMissing === true && !existsSync(filePath)) {
    return settings
  }
  settings.loadFromFile(filePath)
  return settings
}

/** Print `err` to stderr and return the matching exit code. */
export function reportError(err: unknown): number {
  if (err instanceof InvalidKeyError || err instanceof InvalidValueError || err instanceof ParseError) {
    process.stderr.write(`Error: ${err.message}\n`)
    return EXIT_INVALID
  }
  if (err instanceof SettingsIoError) {
    process.stderr.write(`Error: ${err.message}\n`)
    return EXIT_ERROR
  }
  const message = err instanceof Error ? err.message : String(err)
  logger.error({ err }, 'Unexpected CLI failure')
  process.stderr.write(`Error: ${message}\n`)
  return EXIT_ERROR
}
