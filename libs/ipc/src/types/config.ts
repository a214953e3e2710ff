/**
 * Configuration document types for FieldSign
 *
 * A configuration document drives the signage engine: which inputs exist,
 * which media each input combination shows, and which system actions it
 * fires. The same shape is used for the live config.json and for the
 * config.json inside an update package.
 */

import type { BUTTON_MODES, MEDIA_MODES, ACTION_MODES, CONFIG_SECTIONS } from '../constants';

export type ConfigSection = (typeof CONFIG_SECTIONS)[number];

export type ButtonMode = (typeof BUTTON_MODES)[number];

export type MediaMode = (typeof MEDIA_MODES)[number];

export type ActionMode = (typeof ACTION_MODES)[number];

/** A single button name or a combination of buttons pressed together */
export type ButtonReference = string | string[];

/**
 * Physical input definition
 */
export interface ButtonDefinition {
  /** Numeric input identifier (e.g. GPIO pin) */
  value: number;
  mode: ButtonMode;
  [extra: string]: unknown;
}

/**
 * Media shown on the display
 */
export interface MediaDefinition {
  mode: MediaMode;
  /**
   * Image file, text file or slideshow directory. Paths of the form
   * `assets/<relpath>` refer into an update package's asset tree.
   */
  path: string;
  button?: ButtonReference;
  /** Seconds the combination must be held (falls back to default_combo_hold_time) */
  hold_time?: number;
  [extra: string]: unknown;
}

/**
 * System action fired by an input combination
 */
export interface ActionDefinition {
  mode: ActionMode;
  button?: ButtonReference;
  hold_time?: number;
  [extra: string]: unknown;
}

export type SettingValue = string | number | boolean | null;

export type ConfigSettings = Record<string, SettingValue>;

/**
 * Full configuration document
 */
export interface ConfigDocument {
  buttons: Record<string, ButtonDefinition>;
  media: Record<string, MediaDefinition>;
  actions: Record<string, ActionDefinition>;
  settings: ConfigSettings;
}
