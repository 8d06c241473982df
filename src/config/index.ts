/**
 * Configuration Module
 *
 * Exports runtime settings and their helpers.
 */

export {
  getSetting,
  setSetting,
  resetSettings,
  getAllSettings,
  ENV_PREFIX,
  SETTING_KEYS,
  LogLevelName,
  type Settings,
  type SettingKey,
} from './settings';
