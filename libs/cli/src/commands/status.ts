/**
 * Status command
 *
 * Shows the live layout, whether the live config loads, and the last
 * backup snapshot.
 */

import * as path from 'node:path';
import { Command } from 'commander';
import type { LiveLayout, SnapshotManifest } from '@fieldsign/ipc';
import { CONFIG_FILE, DEFAULT_ENGINE_DIR } from '@fieldsign/ipc';
import { layoutFromConfigPath, BackupService, NodeFileOps } from '@fieldsign/updater';
import { validateFile } from './validate';
import type { ValidationReport } from './validate';

export interface UpdaterStatus {
  layout: LiveLayout;
  config: ValidationReport;
  assetsPresent: boolean;
  stagingLeftover: boolean;
  snapshot: SnapshotManifest | null;
}

export async function collectStatus(configPath: string, assetSubdir?: string): Promise<UpdaterStatus> {
  const layout = layoutFromConfigPath(configPath, assetSubdir);
  const files = new NodeFileOps();
  return {
    layout,
    config: await validateFile(layout.configFile),
    assetsPresent: await files.isDirectory(layout.assetsDir),
    stagingLeftover: await files.exists(layout.stagingDir),
    snapshot: await new BackupService(layout, files).read(),
  };
}

function showStatus(status: UpdaterStatus): void {
  const { layout, config, snapshot } = status;
  console.log('FieldSign Status');
  console.log('================\n');

  console.log(`Config:   ${config.valid ? '✓' : '✗'} ${layout.configFile}${config.valid ? '' : ` (${config.field}: ${config.reason})`}`);
  console.log(`Assets:   ${status.assetsPresent ? '✓' : '✗'} ${layout.assetsDir}`);
  console.log(`Staging:  ${status.stagingLeftover ? '⚠ leftover from an interrupted update' : '○ clean'}`);
  if (snapshot) {
    console.log(`Snapshot: ✓ ${snapshot.createdAt}${snapshot.packagePath ? ` from ${snapshot.packagePath}` : ''}`);
  } else {
    console.log('Snapshot: ○ none');
  }
}

export function createStatusCommand(): Command {
  return new Command('status')
    .description('Show live config, assets and last backup')
    .option('-c, --config <path>', 'Live config.json', path.join(process.cwd(), DEFAULT_ENGINE_DIR, CONFIG_FILE))
    .option('-a, --asset-subdir <name>', 'Asset directory beside config.json')
    .option('-j, --json', 'Output as JSON')
    .action(async (options: { config: string; assetSubdir?: string; json?: boolean }) => {
      const status = await collectStatus(options.config, options.assetSubdir);
      if (options.json) {
        console.log(JSON.stringify(status, null, 2));
      } else {
        showStatus(status);
      }
    });
}
