/**
 * propkit - Main module exports
 * Public API surface for the settings library
 */

// Errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, logger } from './utils/logger.js'
export type { LoggerOptions } from './utils/logger.js'

// Builder
export { builder, SettingsBuilder } from './modules/builder/index.js'

// Settings store
export type { Settings, SettingsStoreOptions } from './modules/settings/index.js'
export {
  SettingsStore,
  PropertyKeySchema,
  PropertyValueSchema,
  PropertyValuesSchema,
} from './modules/settings/index.js'

// Codecs
export type {
  SettingsCodec,
  SingleValue,
  ListValue,
  PropertyValue,
  SettingsTable,
  ReadonlySettingsTable,
  DuplicateKeyWarning,
  ParseWarning,
  ParseResult,
  FileType,
} from './modules/codec/index.js'
export {
  getCodec,
  propertiesCodec,
  parseProperties,
  serializeProperties,
  singleValue,
  listValue,
  FILE_TYPES,
} from './modules/codec/index.js'
