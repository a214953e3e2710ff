/**
 * Filesystem operations used by staging, backup and commit
 *
 * Every live-visible mutation the updater performs goes through this
 * interface, so a caller can substitute an implementation (for example one
 * that fails on a chosen step).
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

export interface FileOps {
  exists(target: string): Promise<boolean>;
  isFile(target: string): Promise<boolean>;
  isDirectory(target: string): Promise<boolean>;
  readFile(target: string): Promise<Buffer>;
  /** Write a file, creating parent directories */
  writeFile(target: string, data: string | Buffer): Promise<void>;
  /** Copy a single file, creating parent directories */
  copyFile(source: string, dest: string): Promise<void>;
  /** Recursively copy a directory tree to a destination that must not exist */
  copyDir(source: string, dest: string): Promise<void>;
  /** Rename, falling back to copy + remove when crossing devices */
  move(source: string, dest: string): Promise<void>;
  /** Recursive, no error when missing */
  remove(target: string): Promise<void>;
  /** Recursive, no error when present */
  mkdir(target: string): Promise<void>;
  /** Entry names of a directory */
  readdir(target: string): Promise<string[]>;
}

export class NodeFileOps implements FileOps {
  async exists(target: string): Promise<boolean> {
    try {
      await fs.lstat(target);
      return true;
    } catch {
      return false;
    }
  }

  async isFile(target: string): Promise<boolean> {
    try {
      return (await fs.stat(target)).isFile();
    } catch {
      return false;
    }
  }

  async isDirectory(target: string): Promise<boolean> {
    try {
      return (await fs.stat(target)).isDirectory();
    } catch {
      return false;
    }
  }

  async readFile(target: string): Promise<Buffer> {
    return fs.readFile(target);
  }

  async writeFile(target: string, data: string | Buffer): Promise<void> {
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, data);
  }

  async copyFile(source: string, dest: string): Promise<void> {
    await fs.mkdir(path.dirname(dest), { recursive: true });
    await fs.copyFile(source, dest);
  }

  async copyDir(source: string, dest: string): Promise<void> {
    await fs.mkdir(dest, { recursive: true });
    const entries = await fs.readdir(source, { withFileTypes: true });
    for (const entry of entries) {
      const from = path.join(source, entry.name);
      const to = path.join(dest, entry.name);
      if (entry.isDirectory()) {
        await this.copyDir(from, to);
      } else if (entry.isFile()) {
        await fs.copyFile(from, to);
      } else if (entry.isSymbolicLink()) {
        await fs.symlink(await fs.readlink(from), to);
      }
    }
  }

  async move(source: string, dest: string): Promise<void> {
    await fs.mkdir(path.dirname(dest), { recursive: true });
    try {
      await fs.rename(source, dest);
    } catch (err) {
      if (!isErrnoCode(err, 'EXDEV')) throw err;
      // Different filesystem: no atomic rename available
      if ((await fs.stat(source)).isDirectory()) {
        await fs.rm(dest, { recursive: true, force: true });
        await this.copyDir(source, dest);
      } else {
        await fs.copyFile(source, dest);
      }
      await fs.rm(source, { recursive: true, force: true });
    }
  }

  async remove(target: string): Promise<void> {
    await fs.rm(target, { recursive: true, force: true });
  }

  async mkdir(target: string): Promise<void> {
    await fs.mkdir(target, { recursive: true });
  }

  async readdir(target: string): Promise<string[]> {
    return fs.readdir(target);
  }
}

export function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
