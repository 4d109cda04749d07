/**
 * Configuration module exports
 */

export {
  resolveSettings,
  loadSettingsFile,
  parseSettingsFile,
  getDefaultSettingsPath,
  SettingsFileError,
  DEFAULT_API_URL,
  DEFAULT_REGION,
  DEFAULT_TIMEOUT_MS,
  type ScfSettings,
  type SettingsFile,
  type SettingsOverrides,
  type SettingSource,
} from './settings.js';
