/**
 * Package locator — finds a well-formed update package on mounted media
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { PACKAGE_DIR_NAME, CONFIG_FILE, PACKAGE_ASSETS_DIR } from '@fieldsign/ipc';

/** An update package found on removable media */
export interface UpdatePackage {
  /** Package directory */
  root: string;
  configPath: string;
  assetsDir: string;
}

async function statKind(target: string): Promise<'file' | 'dir' | null> {
  try {
    const stat = await fs.stat(target);
    if (stat.isFile()) return 'file';
    if (stat.isDirectory()) return 'dir';
    return null;
  } catch {
    return null;
  }
}

export class PackageLocator {
  constructor(readonly packageDirName: string = PACKAGE_DIR_NAME) {}

  /**
   * Look for `<mountPath>/<packageDirName>/` holding config.json and an
   * assets/ directory. A missing or malformed package yields null.
   */
  async find(mountPath: string): Promise<UpdatePackage | null> {
    if (!mountPath || (await statKind(mountPath)) !== 'dir') return null;

    const root = path.join(mountPath, this.packageDirName);
    const configPath = path.join(root, CONFIG_FILE);
    const assetsDir = path.join(root, PACKAGE_ASSETS_DIR);

    if ((await statKind(root)) !== 'dir') return null;
    if ((await statKind(configPath)) !== 'file') return null;
    if ((await statKind(assetsDir)) !== 'dir') return null;

    return { root, configPath, assetsDir };
  }
}
