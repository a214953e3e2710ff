/**
 * Staging area — disposable mirror of the live layout for one update run
 */

import * as path from 'node:path';
import type { ConfigDocument, LiveLayout } from '@fieldsign/ipc';
import { CONFIG_FILE } from '@fieldsign/ipc';
import type { FileOps } from '../fs/file-ops';
import { AssetMissingError, IOFailureError } from '../errors';

export class StagingArea {
  readonly root: string;
  /** Staged config, renamed over the live config at commit */
  readonly configFile: string;
  /** Staged asset tree, same path relative to root as the live one to appRoot */
  readonly assetsDir: string;
  /** Where the live asset tree is set aside while the staged one moves in */
  readonly retiredAssetsDir: string;

  constructor(
    layout: LiveLayout,
    private readonly files: FileOps,
  ) {
    this.root = layout.stagingDir;
    this.configFile = path.join(this.root, `${CONFIG_FILE}.tmp`);
    this.assetsDir = path.join(this.root, path.relative(layout.appRoot, layout.assetsDir));
    this.retiredAssetsDir = path.join(this.root, '.retired-assets');
  }

  /** Remove any leftover from an aborted run and create an empty tree */
  async reset(): Promise<void> {
    try {
      await this.files.remove(this.root);
      await this.files.mkdir(this.assetsDir);
    } catch (err) {
      throw new IOFailureError('create staging directory', this.root, err);
    }
  }

  /**
   * Copy one package asset into the staged asset tree, keeping its relative
   * path. Backslash separators in the relative path are treated as `/`.
   */
  async copyAsset(relativePath: string, packageAssetsDir: string): Promise<string> {
    const segments = relativePath.split(/[\\/]+/).filter(Boolean);
    const source = path.join(packageAssetsDir, ...segments);
    const dest = path.join(this.assetsDir, ...segments);

    const inside = path.relative(packageAssetsDir, source);
    if (segments.length === 0 || inside === '..' || inside.startsWith(`..${path.sep}`) || path.isAbsolute(inside)) {
      throw new AssetMissingError(source);
    }
    if (!(await this.files.isFile(source))) {
      throw new AssetMissingError(source);
    }

    try {
      await this.files.copyFile(source, dest);
    } catch (err) {
      throw new IOFailureError('copy asset', source, err);
    }
    return dest;
  }

  async writeConfig(doc: ConfigDocument): Promise<void> {
    try {
      await this.files.writeFile(this.configFile, `${JSON.stringify(doc, null, 2)}\n`);
    } catch (err) {
      throw new IOFailureError('write staged config', this.configFile, err);
    }
  }

  /** Read the staged config back as untyped JSON */
  async readConfig(): Promise<unknown> {
    let raw: Buffer;
    try {
      raw = await this.files.readFile(this.configFile);
    } catch (err) {
      throw new IOFailureError('read staged config', this.configFile, err);
    }
    try {
      return JSON.parse(raw.toString('utf-8'));
    } catch (err) {
      throw new IOFailureError('parse staged config', this.configFile, err);
    }
  }

  async discard(): Promise<void> {
    try {
      await this.files.remove(this.root);
    } catch (err) {
      throw new IOFailureError('remove staging directory', this.root, err);
    }
  }
}
