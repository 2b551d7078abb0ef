/**
 * Codec lookup by file type.
 */

import { SettingsError } from '../../core/errors.js'
import type { SettingsCodec } from './codec.js'
import { propertiesCodec } from './properties-codec.js'
import type { FileType } from './types.js'

export function getCodec(fileType: FileType): SettingsCodec {
  switch (fileType) {
    case 'properties':
      return propertiesCodec
    default:
      throw new SettingsError(`Unsupported settings file type: ${String(fileType)}`, 'UNSUPPORTED_FILE_TYPE', {
        fileType,
      })
  }
}
