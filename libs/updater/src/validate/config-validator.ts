/**
 * Config validator — fail-fast schema check of a configuration document
 *
 * Sections are checked in a fixed order (buttons, media, actions, settings)
 * and entries in document order; the first violation found is reported.
 */

import type { z } from 'zod';
import type {
  ConfigDocument,
  ButtonDefinition,
  MediaDefinition,
  ActionDefinition,
  ButtonReference,
  ConfigSettings,
  ConfigSection,
} from '@fieldsign/ipc';
import {
  ConfigSectionSchema,
  ButtonDefinitionSchema,
  MediaDefinitionSchema,
  ActionDefinitionSchema,
  SettingsSchema,
} from '@fieldsign/ipc';
import { SchemaInvalidError } from '../errors';

export type ValidationResult =
  | { valid: true; config: ConfigDocument }
  | { valid: false; error: SchemaInvalidError };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function issueError(base: string, error: z.ZodError): SchemaInvalidError {
  const issue = error.issues[0];
  if (!issue) return new SchemaInvalidError(base, 'Invalid value');
  const field = [base, ...issue.path.map(String)].join('.');
  return new SchemaInvalidError(field, issue.message);
}

function checkButtonReference(
  field: string,
  reference: ButtonReference | undefined,
  buttons: ReadonlySet<string>,
): void {
  if (reference === undefined) return;
  const names = typeof reference === 'string' ? [reference] : reference;
  for (const name of names) {
    if (!buttons.has(name)) {
      throw new SchemaInvalidError(field, `References unknown button '${name}'`);
    }
  }
}

function readSection(doc: Record<string, unknown>, section: ConfigSection): Record<string, unknown> {
  if (!(section in doc)) {
    throw new SchemaInvalidError(section, `Missing required section '${section}'`);
  }
  const parsed = ConfigSectionSchema.safeParse(doc[section]);
  if (!parsed.success) {
    throw new SchemaInvalidError(section, `Section '${section}' must be an object`);
  }
  return parsed.data;
}

function parseSections(doc: unknown): Record<ConfigSection, Record<string, unknown>> {
  if (!isPlainObject(doc)) {
    throw new SchemaInvalidError('(root)', 'Configuration must be an object');
  }
  return {
    buttons: readSection(doc, 'buttons'),
    media: readSection(doc, 'media'),
    actions: readSection(doc, 'actions'),
    settings: readSection(doc, 'settings'),
  };
}

/**
 * Parse and validate a configuration document, throwing SchemaInvalidError
 * on the first violation. Unknown entry fields are kept.
 */
export function parseConfig(doc: unknown): ConfigDocument {
  const sections = parseSections(doc);

  const buttons: Record<string, ButtonDefinition> = {};
  for (const [name, entry] of Object.entries(sections.buttons)) {
    const parsed = ButtonDefinitionSchema.safeParse(entry);
    if (!parsed.success) throw issueError(`buttons.${name}`, parsed.error);
    buttons[name] = parsed.data;
  }

  const buttonNames = new Set(Object.keys(buttons));

  const media: Record<string, MediaDefinition> = {};
  for (const [name, entry] of Object.entries(sections.media)) {
    const parsed = MediaDefinitionSchema.safeParse(entry);
    if (!parsed.success) throw issueError(`media.${name}`, parsed.error);
    checkButtonReference(`media.${name}.button`, parsed.data.button, buttonNames);
    media[name] = parsed.data;
  }

  const actions: Record<string, ActionDefinition> = {};
  for (const [name, entry] of Object.entries(sections.actions)) {
    const parsed = ActionDefinitionSchema.safeParse(entry);
    if (!parsed.success) throw issueError(`actions.${name}`, parsed.error);
    checkButtonReference(`actions.${name}.button`, parsed.data.button, buttonNames);
    actions[name] = parsed.data;
  }

  const parsedSettings = SettingsSchema.safeParse(sections.settings);
  if (!parsedSettings.success) throw issueError('settings', parsedSettings.error);
  const settings: ConfigSettings = {};
  for (const [key, value] of Object.entries(parsedSettings.data)) {
    if (value !== undefined) settings[key] = value;
  }

  return { buttons, media, actions, settings };
}

/**
 * Validate a configuration document without throwing
 */
export function validateConfig(doc: unknown): ValidationResult {
  try {
    return { valid: true, config: parseConfig(doc) };
  } catch (err) {
    if (err instanceof SchemaInvalidError) return { valid: false, error: err };
    throw err;
  }
}
