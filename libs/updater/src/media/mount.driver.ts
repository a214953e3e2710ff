/**
 * System mount driver — mkdir/mount/umount/rmdir through child processes
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { MOUNT_PATH, UMOUNT_PATH } from '@fieldsign/ipc';
import type { MountDriver } from './types';

const execFileAsync = promisify(execFile);

export interface SystemMountDriverOptions {
  /** Prefix privileged commands with sudo (default: true) */
  sudo?: boolean;
  mountPath?: string;
  umountPath?: string;
  /** Per-command timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
}

/**
 * Extract the most useful message from a failed child process
 */
function commandError(command: string, err: unknown): Error {
  let detail = err instanceof Error ? err.message : String(err);
  if (err instanceof Error && 'stderr' in err && typeof err.stderr === 'string' && err.stderr.trim()) {
    detail = err.stderr.trim();
  }
  return new Error(`${command} failed: ${detail}`);
}

export class SystemMountDriver implements MountDriver {
  private readonly sudo: boolean;
  private readonly mountPath: string;
  private readonly umountPath: string;
  private readonly timeoutMs: number;

  constructor(options?: SystemMountDriverOptions) {
    this.sudo = options?.sudo ?? true;
    this.mountPath = options?.mountPath ?? MOUNT_PATH;
    this.umountPath = options?.umountPath ?? UMOUNT_PATH;
    this.timeoutMs = options?.timeoutMs ?? 30_000;
  }

  private async run(command: string, args: string[]): Promise<void> {
    const [file, argv]: [string, string[]] = this.sudo ? ['sudo', [command, ...args]] : [command, args];
    try {
      await execFileAsync(file, argv, { encoding: 'utf-8', timeout: this.timeoutMs });
    } catch (err) {
      throw commandError([command, ...args].join(' '), err);
    }
  }

  async createMountDir(target: string): Promise<void> {
    await this.run('mkdir', ['-p', target]);
  }

  async mount(device: string, target: string): Promise<void> {
    await this.run(this.mountPath, [device, target]);
  }

  async unmount(target: string): Promise<void> {
    await this.run(this.umountPath, [target]);
  }

  async removeMountDir(target: string): Promise<void> {
    await this.run('rmdir', [target]);
  }

  /**
   * A path is a mount point when it sits on a different device than its
   * parent, or is its own parent (filesystem root).
   */
  async isMountPoint(target: string): Promise<boolean> {
    try {
      const stat = await fs.lstat(target);
      if (!stat.isDirectory()) return false;
      const parent = await fs.stat(path.join(target, '..'));
      return stat.dev !== parent.dev || stat.ino === parent.ino;
    } catch {
      return false;
    }
  }
}
