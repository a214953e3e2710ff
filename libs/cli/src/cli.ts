#!/usr/bin/env node
/**
 * FieldSign CLI
 *
 * Operator tooling for signage devices: check configs and update packages
 * before they go on a drive, and inspect a device's update state.
 *
 * @example
 * ```bash
 * fieldsign validate ./config.json
 * fieldsign plan /media/usb/signage_update_package
 * fieldsign devices
 * fieldsign status --config /opt/signage/engine/config.json
 * ```
 */

import { Command } from 'commander';
import { describeError } from '@fieldsign/updater';
import {
  createValidateCommand,
  createPlanCommand,
  createDevicesCommand,
  createStatusCommand,
} from './commands';
import { VERSION } from './version';

/**
 * Create and configure the main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('fieldsign')
    .description('FieldSign - signage config and update tooling')
    .version(VERSION, '-V, --version', 'Output the version number')
    .addHelpText(
      'after',
      `
Examples:
  $ fieldsign validate config.json      Check a config file
  $ fieldsign plan ./package            Dry run of an update package
  $ fieldsign devices                   List removable partitions
  $ fieldsign status                    Show live config and last backup
`
    );

  program.addCommand(createValidateCommand());
  program.addCommand(createPlanCommand());
  program.addCommand(createDevicesCommand());
  program.addCommand(createStatusCommand());

  return program;
}

async function main(): Promise<void> {
  try {
    await createProgram().parseAsync(process.argv);
  } catch (err) {
    console.error('Error:', describeError(err));
    process.exit(1);
  }
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
}
