/**
 * Update engine state types
 */

/**
 * States of a single update run.
 *
 * `idle` is both the start and the terminal state. Anything from `staging`
 * onwards that fails passes through `rolling-back`.
 */
export type UpdaterState =
  | 'idle'
  | 'locating'
  | 'locating-package'
  | 'pre-validating'
  | 'staging'
  | 'rewriting'
  | 'post-validating'
  | 'backing-up'
  | 'committing'
  | 'cleaning-up'
  | 'rolling-back';

/**
 * Resolved paths of the live application and the updater's working dirs
 */
export interface LiveLayout {
  /** Application root directory */
  appRoot: string;
  /** Live config.json */
  configFile: string;
  /** Live asset directory */
  assetsDir: string;
  /**
   * Prefix written into rewritten media paths: the asset directory relative
   * to appRoot, always with forward slashes (e.g. `engine/image_sets`)
   */
  assetPrefix: string;
  /** Staging directory */
  stagingDir: string;
  /** Backup snapshot directory */
  backupDir: string;
}

/**
 * Manifest written next to a backup snapshot
 */
export interface SnapshotManifest {
  createdAt: string;
  /** Whether a live config.json existed when the snapshot was taken */
  hadConfig: boolean;
  /** Whether a live asset directory existed when the snapshot was taken */
  hadAssets: boolean;
  /** SHA-256 of the config file content (empty string when absent) */
  configHash: string;
  /** SHA-256 over sorted (relative path, content) pairs of the asset tree */
  assetsHash: string;
  /** Update package the snapshot was taken for */
  packagePath?: string;
}
