/**
 * Validate command
 *
 * Checks a configuration document against the schema without touching
 * anything on disk.
 */

import * as fs from 'node:fs/promises';
import { Command } from 'commander';
import { validateConfig, describeError } from '@fieldsign/updater';

export interface ValidationReport {
  path: string;
  valid: boolean;
  /** Dotted location of the first problem; `(file)` when unreadable */
  field?: string;
  reason?: string;
}

export async function validateFile(configPath: string): Promise<ValidationReport> {
  let doc: unknown;
  try {
    doc = JSON.parse(await fs.readFile(configPath, 'utf-8'));
  } catch (err) {
    return { path: configPath, valid: false, field: '(file)', reason: describeError(err) };
  }

  const result = validateConfig(doc);
  if (result.valid) return { path: configPath, valid: true };
  return { path: configPath, valid: false, field: result.error.field, reason: result.error.reason };
}

export function createValidateCommand(): Command {
  return new Command('validate')
    .description('Validate a configuration file')
    .argument('<config>', 'Path to config.json')
    .option('-j, --json', 'Output as JSON')
    .action(async (configPath: string, options: { json?: boolean }) => {
      const report = await validateFile(configPath);
      if (options.json) {
        console.log(JSON.stringify(report, null, 2));
      } else if (report.valid) {
        console.log(`✓ ${configPath} is valid`);
      } else {
        console.log(`✗ ${configPath}: ${report.field}: ${report.reason}`);
      }
      if (!report.valid) process.exitCode = 1;
    });
}
