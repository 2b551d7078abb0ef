export { SettingsBuilder, builder } from './settings-builder.js'
