/**
 * Settings
 *
 * Typed runtime configuration for the stimulus timeline tooling.
 *
 * Features:
 * - Default values defined in code
 * - Environment variable overrides (`STIMULUS_<KEY>`), validated with zod
 * - Runtime overrides for embedding applications and tests
 *
 * @example
 * ```typescript
 * import { getSetting, setSetting } from '@/config/settings';
 *
 * const limit = getSetting('RECENT_TESTS_LIMIT');
 * setSetting('LOG_LEVEL', 'debug');
 * ```
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';

// =============================================================================
// Types
// =============================================================================

export const LogLevelName = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export type LogLevelName = z.infer<typeof LogLevelName>;

/**
 * All available settings
 */
export interface Settings {
  /**
   * Minimum level processed by the logger
   * @default 'warn'
   */
  LOG_LEVEL: LogLevelName;
  /**
   * Directory holding per-user state such as the recent tests list
   * @default ~/.stimulus-timeline
   */
  DATA_DIR: string;
  /**
   * Maximum entries kept in the recent tests list
   * @default 10
   */
  RECENT_TESTS_LIMIT: number;
  /**
   * Sample rate used by the tone generator (Hz)
   * @default 44100
   */
  TONE_SAMPLE_RATE: number;
}

export type SettingKey = keyof Settings;

// =============================================================================
// Constants
// =============================================================================

/** Prefix for environment overrides, e.g. STIMULUS_LOG_LEVEL=debug */
export const ENV_PREFIX = 'STIMULUS_';

const DEFAULT_SETTINGS: Settings = {
  LOG_LEVEL: 'warn',
  DATA_DIR: join(homedir(), '.stimulus-timeline'),
  RECENT_TESTS_LIMIT: 10,
  TONE_SAMPLE_RATE: 44100,
};

export const SETTING_KEYS: readonly SettingKey[] = [
  'LOG_LEVEL',
  'DATA_DIR',
  'RECENT_TESTS_LIMIT',
  'TONE_SAMPLE_RATE',
] as const;

/** Parsers for raw environment strings */
const ENV_SCHEMAS: { [K in SettingKey]: z.ZodType<Settings[K], z.ZodTypeDef, unknown> } = {
  LOG_LEVEL: z.string().trim().toLowerCase().pipe(LogLevelName),
  DATA_DIR: z.string().trim().min(1),
  RECENT_TESTS_LIMIT: z.coerce.number().int().min(1).max(100),
  TONE_SAMPLE_RATE: z.coerce.number().int().min(8000).max(192000),
};

// =============================================================================
// Module State
// =============================================================================

let overrides: Partial<Settings> = {};

// =============================================================================
// Private Helpers
// =============================================================================

/**
 * Read and validate an environment override. Invalid values are ignored.
 */
function getEnvOverride<K extends SettingKey>(key: K): Settings[K] | undefined {
  const raw = process.env[`${ENV_PREFIX}${key}`];
  if (raw === undefined || raw === '') {
    return undefined;
  }

  const result = ENV_SCHEMAS[key].safeParse(raw);
  return result.success ? result.data : undefined;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Get the current value of a setting
 *
 * Priority:
 * 1. Environment variable (STIMULUS_<KEY>)
 * 2. Runtime override
 * 3. Default value
 */
export function getSetting<K extends SettingKey>(key: K): Settings[K] {
  const envValue = getEnvOverride(key);
  if (envValue !== undefined) {
    return envValue;
  }

  const override = overrides[key];
  if (override !== undefined) {
    return override;
  }

  return DEFAULT_SETTINGS[key];
}

/**
 * Override a setting for the lifetime of the process
 */
export function setSetting<K extends SettingKey>(key: K, value: Settings[K]): void {
  overrides = { ...overrides, [key]: value };
}

/**
 * Drop all runtime overrides
 */
export function resetSettings(): void {
  overrides = {};
}

/**
 * Snapshot of every setting with its effective value
 */
export function getAllSettings(): Settings {
  return {
    LOG_LEVEL: getSetting('LOG_LEVEL'),
    DATA_DIR: getSetting('DATA_DIR'),
    RECENT_TESTS_LIMIT: getSetting('RECENT_TESTS_LIMIT'),
    TONE_SAMPLE_RATE: getSetting('TONE_SAMPLE_RATE'),
  };
}
