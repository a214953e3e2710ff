/**
 * Live application layout resolution
 */

import * as path from 'node:path';
import type { LiveLayout } from '@fieldsign/ipc';
import {
  CONFIG_FILE,
  DEFAULT_ENGINE_DIR,
  DEFAULT_ASSET_SUBDIR,
  STAGING_DIR_NAME,
  BACKUP_DIR_NAME,
} from '@fieldsign/ipc';

export interface LayoutOptions {
  appRoot: string;
  /** Directory under appRoot holding config.json (default: `engine`) */
  engineDir?: string;
  /** Asset directory under engineDir (default: `image_sets`) */
  assetSubdir?: string;
}

export function resolveLiveLayout(options: LayoutOptions): LiveLayout {
  const appRoot = path.resolve(options.appRoot);
  const engineDir = options.engineDir ?? DEFAULT_ENGINE_DIR;
  const assetSubdir = options.assetSubdir ?? DEFAULT_ASSET_SUBDIR;
  const assetsDir = path.join(appRoot, engineDir, assetSubdir);

  return {
    appRoot,
    configFile: path.join(appRoot, engineDir, CONFIG_FILE),
    assetsDir,
    assetPrefix: path.relative(appRoot, assetsDir).split(path.sep).join('/'),
    stagingDir: path.join(appRoot, STAGING_DIR_NAME),
    backupDir: path.join(appRoot, BACKUP_DIR_NAME),
  };
}

/**
 * Derive the layout from the live config path. The app root is the parent
 * of the directory holding the config file.
 */
export function layoutFromConfigPath(configPath: string, assetSubdir?: string): LiveLayout {
  const configDir = path.dirname(path.resolve(configPath));
  const layout = resolveLiveLayout({
    appRoot: path.dirname(configDir),
    engineDir: path.basename(configDir),
    assetSubdir,
  });
  return { ...layout, configFile: path.resolve(configPath) };
}
