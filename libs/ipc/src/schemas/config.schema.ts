/**
 * Zod schemas for FieldSign configuration documents
 *
 * Entry schemas pass unknown fields through untouched so a document can be
 * validated, rewritten and written back without losing data.
 */

import { z } from 'zod';
import { BUTTON_MODES, MEDIA_MODES, ACTION_MODES } from '../constants';

/**
 * A section is a mapping of entry name to entry
 */
export const ConfigSectionSchema = z.record(z.string(), z.unknown());

/**
 * Button reference: a single name or a non-empty combination
 */
export const ButtonReferenceSchema = z.union([z.string(), z.array(z.string()).nonempty()]);

export const ButtonDefinitionSchema = z
  .object({
    value: z.number().int(),
    mode: z.enum(BUTTON_MODES),
  })
  .passthrough();

export const MediaDefinitionSchema = z
  .object({
    mode: z.enum(MEDIA_MODES),
    path: z.string(),
    button: ButtonReferenceSchema.optional(),
    hold_time: z.number().optional(),
  })
  .passthrough();

export const ActionDefinitionSchema = z
  .object({
    mode: z.enum(ACTION_MODES),
    button: ButtonReferenceSchema.optional(),
    hold_time: z.number().optional(),
  })
  .passthrough();

export const SettingValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

/**
 * Settings the engine reads; anything else is a free-form scalar
 */
export const SettingsSchema = z
  .object({
    debounce_time: z.number().optional(),
    poll_interval: z.number().optional(),
    default_combo_hold_time: z.number().optional(),
    default_media_name: z.string().optional(),
    image_flash_duty_cycle: z.number().optional(),
    image_flash_duration: z.number().optional(),
    scroll_text_speed: z.number().int().optional(),
    scroll_text_font_size: z.number().int().optional(),
    scroll_text_font_color: z.string().optional(),
    scroll_text_bg_color: z.string().nullable().optional(),
  })
  .catchall(SettingValueSchema);

// Inferred types from schemas
export type ButtonDefinitionOutput = z.output<typeof ButtonDefinitionSchema>;
export type MediaDefinitionOutput = z.output<typeof MediaDefinitionSchema>;
export type ActionDefinitionOutput = z.output<typeof ActionDefinitionSchema>;
export type SettingsOutput = z.output<typeof SettingsSchema>;

/**
 * Manifest stored next to a backup snapshot
 */
export const SnapshotManifestSchema = z.object({
  createdAt: z.string(),
  hadConfig: z.boolean(),
  hadAssets: z.boolean(),
  configHash: z.string(),
  assetsHash: z.string(),
  packagePath: z.string().optional(),
});
