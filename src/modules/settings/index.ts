/**
 * Barrel exports for the settings module.
 */

export type { Settings } from './settings.js'
export { SettingsStore } from './settings-store.js'
export type { SettingsStoreOptions } from './settings-store.js'
export { PropertyKeySchema, PropertyValueSchema, PropertyValuesSchema } from './validation.js'
