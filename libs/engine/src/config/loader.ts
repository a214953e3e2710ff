/**
 * Live configuration loader
 */

import * as fs from 'node:fs/promises';
import type { ConfigDocument, ConfigSettings } from '@fieldsign/ipc';
import { SETTINGS_DEFAULTS } from '@fieldsign/ipc';
import { validateConfig, describeError } from '@fieldsign/updater';
import { ConfigLoadError } from '../errors';

/** Live settings with the engine defaults filled in */
export type EngineSettings = ConfigSettings & {
  debounce_time: number;
  poll_interval: number;
  default_combo_hold_time: number;
};

export interface LiveConfig extends ConfigDocument {
  settings: EngineSettings;
}

function numberOr(value: ConfigSettings[string] | undefined, fallback: number): number {
  return typeof value === 'number' ? value : fallback;
}

export function applySettingDefaults(settings: ConfigSettings): EngineSettings {
  return {
    ...settings,
    debounce_time: numberOr(settings.debounce_time, SETTINGS_DEFAULTS.debounce_time),
    poll_interval: numberOr(settings.poll_interval, SETTINGS_DEFAULTS.poll_interval),
    default_combo_hold_time: numberOr(settings.default_combo_hold_time, SETTINGS_DEFAULTS.default_combo_hold_time),
  };
}

/**
 * Read, validate and default the live config.json
 */
export async function loadLiveConfig(configPath: string): Promise<LiveConfig> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigLoadError(configPath, describeError(err));
  }

  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (err) {
    throw new ConfigLoadError(configPath, `invalid JSON (${describeError(err)})`);
  }

  const result = validateConfig(doc);
  if (!result.valid) {
    throw new ConfigLoadError(configPath, result.error.message);
  }

  return { ...result.config, settings: applySettingDefaults(result.config.settings) };
}
