/**
 * Backup service — snapshot of the live config and asset tree
 *
 * Stores a verbatim copy at {backupDir}/config.json.bak and
 * {backupDir}/{assetSubdir}.bak, plus a manifest with SHA-256 hashes so a
 * restore can be checked against what was saved. Only the most recent
 * snapshot is kept: creating one replaces the previous one.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as crypto from 'node:crypto';
import type { LiveLayout, SnapshotManifest } from '@fieldsign/ipc';
import { BACKUP_SUFFIX, SNAPSHOT_MANIFEST_FILE, SnapshotManifestSchema } from '@fieldsign/ipc';
import type { FileOps } from '../fs/file-ops';
import { NodeFileOps } from '../fs/file-ops';

export function hashContent(content: Buffer): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}

async function collectRecursive(dir: string, base: string, result: Map<string, Buffer>): Promise<void> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      await collectRecursive(fullPath, base, result);
    } else if (entry.isFile()) {
      const relativePath = path.relative(base, fullPath).split(path.sep).join('/');
      result.set(relativePath, await fs.readFile(fullPath));
    }
  }
}

/**
 * SHA-256 over sorted (relative path + content) pairs of every file in a
 * directory tree. Empty directories do not contribute.
 */
export async function hashTree(dir: string): Promise<string> {
  const files = new Map<string, Buffer>();
  await collectRecursive(dir, dir, files);

  const hasher = crypto.createHash('sha256');
  const sorted = [...files.entries()].sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
  for (const [relativePath, content] of sorted) {
    hasher.update(relativePath);
    hasher.update(content);
  }
  return hasher.digest('hex');
}

function hashesEqual(expected: string, actual: string): boolean {
  const a = Buffer.from(expected, 'hex');
  const b = Buffer.from(actual, 'hex');
  if (a.length !== b.length) return false;
  return crypto.timingSafeEqual(a, b);
}

export class BackupService {
  readonly backupDir: string;
  readonly configBackup: string;
  readonly assetsBackup: string;
  readonly manifestPath: string;

  constructor(
    private readonly layout: LiveLayout,
    private readonly files: FileOps = new NodeFileOps(),
  ) {
    this.backupDir = layout.backupDir;
    this.configBackup = path.join(this.backupDir, `${path.basename(layout.configFile)}${BACKUP_SUFFIX}`);
    this.assetsBackup = path.join(this.backupDir, `${path.basename(layout.assetsDir)}${BACKUP_SUFFIX}`);
    this.manifestPath = path.join(this.backupDir, SNAPSHOT_MANIFEST_FILE);
  }

  /**
   * Replace any previous snapshot with a copy of the current live config
   * and asset directory. Missing live items are recorded as absent.
   */
  async create(packagePath?: string): Promise<SnapshotManifest> {
    await this.files.remove(this.backupDir);
    await this.files.mkdir(this.backupDir);

    const hadConfig = await this.files.isFile(this.layout.configFile);
    let configHash = '';
    if (hadConfig) {
      await this.files.copyFile(this.layout.configFile, this.configBackup);
      configHash = hashContent(await this.files.readFile(this.configBackup));
    }

    const hadAssets = await this.files.isDirectory(this.layout.assetsDir);
    let assetsHash = '';
    if (hadAssets) {
      await this.files.copyDir(this.layout.assetsDir, this.assetsBackup);
      assetsHash = await hashTree(this.assetsBackup);
    }

    const manifest: SnapshotManifest = {
      createdAt: new Date().toISOString(),
      hadConfig,
      hadAssets,
      configHash,
      assetsHash,
      packagePath,
    };
    await this.files.writeFile(this.manifestPath, `${JSON.stringify(manifest, null, 2)}\n`);
    return manifest;
  }

  /** Load the snapshot manifest, or null when there is no usable snapshot */
  async read(): Promise<SnapshotManifest | null> {
    let raw: Buffer;
    try {
      raw = await this.files.readFile(this.manifestPath);
    } catch {
      return null;
    }
    try {
      const parsed = SnapshotManifestSchema.safeParse(JSON.parse(raw.toString('utf-8')));
      return parsed.success ? parsed.data : null;
    } catch {
      return null;
    }
  }

  /**
   * Put the snapshot back in place of the live config and asset directory,
   * then verify the restored content against the manifest hashes.
   * Throws when there is no snapshot or the restored content differs.
   */
  async restore(): Promise<void> {
    const manifest = await this.read();
    if (!manifest) {
      throw new Error(`No backup snapshot found at ${this.backupDir}`);
    }

    const { configFile, assetsDir } = this.layout;

    if (manifest.hadConfig) {
      const restoring = `${configFile}.restore`;
      await this.files.copyFile(this.configBackup, restoring);
      await this.files.move(restoring, configFile);
    } else {
      await this.files.remove(configFile);
    }

    await this.files.remove(assetsDir);
    if (manifest.hadAssets) {
      await this.files.copyDir(this.assetsBackup, assetsDir);
    }

    if (manifest.hadConfig) {
      const restoredHash = hashContent(await this.files.readFile(configFile));
      if (!hashesEqual(manifest.configHash, restoredHash)) {
        throw new Error(`Restored config ${configFile} does not match the snapshot`);
      }
    }
    if (manifest.hadAssets) {
      const restoredHash = await hashTree(assetsDir);
      if (!hashesEqual(manifest.assetsHash, restoredHash)) {
        throw new Error(`Restored assets ${assetsDir} do not match the snapshot`);
      }
    }
  }
}
