/**
 * SettingsBuilder — selects a file format and constructs a settings store.
 *
 * @example
 * const settings = builder().fileTypeProperties().build()
 * settings.setProperty('HttpPort', '8081')
 * settings.storeToFile('config.properties')
 */

import { getCodec } from '../codec/codec-registry.js'
import type { FileType } from '../codec/types.js'
import type { Settings } from '../settings/settings.js'
import { SettingsStore } from '../settings/settings-store.js'

const DEFAULT_FILE_TYPE: FileType = 'properties'

export class SettingsBuilder {
  private _fileType: FileType = DEFAULT_FILE_TYPE
  private _atomicWrites = false

  /** Persist as `key = value` properties text. */
  fileTypeProperties(): this {
    this._fileType = 'properties'
    return this
  }

  /** Write through a temporary file and rename it over the target. */
  atomicWrites(enabled = true): this {
    this._atomicWrites = enabled
    return this
  }

  /** Create a new, empty store. Each call returns an independent instance. */
  build(): Settings {
    return new SettingsStore({
      codec: getCodec(this._fileType),
      atomicWrites: this._atomicWrites,
    })
  }
}

export function builder(): SettingsBuilder {
  return new SettingsBuilder()
}
