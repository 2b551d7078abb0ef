/**
 * Barrel exports for the codec module.
 */

export type { SettingsCodec } from './codec.js'
export { getCodec } from './codec-registry.js'
export { propertiesCodec, parseProperties, serializeProperties } from './properties-codec.js'
export { singleValue, listValue, FILE_TYPES } from './types.js'
export type {
  SingleValue,
  ListValue,
  PropertyValue,
  SettingsTable,
  ReadonlySettingsTable,
  DuplicateKeyWarning,
  ParseWarning,
  ParseResult,
  FileType,
} from './types.js'
