/**
 * Stimulus Timeline
 *
 * Public entry point: the timeline model, export formats, the editor store
 * and the supporting services.
 */

export * from './types';
export * from './core';
export * from './export';
export * from './stores';
export * from './services';
export * from './utils';
export { getSetting, setSetting, resetSettings, getAllSettings, type SettingKey, type Settings } from './config';
export { validateStimulusEvent, assertValidStimulusEvent, type StimulusInput } from './schemas';
