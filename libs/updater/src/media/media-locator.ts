/**
 * Media locator — finds and mounts a removable storage partition
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { DEFAULT_MOUNT_BASE } from '@fieldsign/ipc';
import type { BlockDeviceProbe, MountDriver, MediaLocatorOptions, RemovablePartitions } from './types';
import { LsblkProbe, findRemovablePartitions } from './lsblk';
import { SystemMountDriver } from './mount.driver';
import { describeError } from '../errors';

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

async function isEmptyDir(target: string): Promise<boolean> {
  try {
    return (await fs.readdir(target)).length === 0;
  } catch {
    return false;
  }
}

export class MediaLocator {
  readonly mountBase: string;
  private readonly probe: BlockDeviceProbe;
  private readonly driver: MountDriver;

  constructor(options?: MediaLocatorOptions) {
    this.mountBase = path.resolve(options?.mountBase ?? DEFAULT_MOUNT_BASE);
    this.probe = options?.probe ?? new LsblkProbe();
    this.driver = options?.driver ?? new SystemMountDriver();
  }

  /** Mount directory for a device: `<mountBase>/<device basename>` */
  mountPointFor(device: string): string {
    return path.join(this.mountBase, path.basename(device));
  }

  /**
   * Return the mount point of a removable partition, mounting the first
   * unmounted one when none is mounted yet. Null when nothing usable exists
   * or mounting failed.
   */
  async locate(): Promise<string | null> {
    let partitions: RemovablePartitions;
    try {
      partitions = findRemovablePartitions(await this.probe.list());
    } catch (err) {
      console.error(`[MediaLocator] Failed to list block devices: ${describeError(err)}`);
      return null;
    }

    if (partitions.mounted.length > 0) {
      return partitions.mounted[0].mountpoint;
    }

    const device = partitions.unmounted[0];
    if (!device) return null;

    const target = this.mountPointFor(device);
    let createdDir = false;

    if (!(await pathExists(target))) {
      try {
        await this.driver.createMountDir(target);
        createdDir = true;
      } catch (err) {
        console.error(`[MediaLocator] Error creating mount point ${target}: ${describeError(err)}`);
        return null;
      }
    }

    try {
      await this.driver.mount(device, target);
      return target;
    } catch (err) {
      console.error(`[MediaLocator] Error mounting ${device}: ${describeError(err)}`);
      if (createdDir) {
        try {
          await this.driver.removeMountDir(target);
        } catch (cleanupErr) {
          console.warn(`[MediaLocator] Could not remove unused mount point ${target}: ${describeError(cleanupErr)}`);
        }
      }
      return null;
    }
  }

  /**
   * Unmount a mount point. True when it is no longer mounted (including when
   * it never was). Mount directories under mountBase are removed afterwards
   * if empty; failing to remove one is not an error.
   */
  async unmount(mountPath: string): Promise<boolean> {
    if (!mountPath || !(await this.driver.isMountPoint(mountPath))) {
      return true;
    }

    try {
      await this.driver.unmount(mountPath);
    } catch (err) {
      console.error(`[MediaLocator] Error unmounting ${mountPath}: ${describeError(err)}`);
      return false;
    }

    if (this.isManaged(mountPath) && (await isEmptyDir(mountPath))) {
      try {
        await this.driver.removeMountDir(mountPath);
      } catch (err) {
        console.warn(`[MediaLocator] Could not remove mount point directory ${mountPath}: ${describeError(err)}`);
      }
    }

    return true;
  }

  private isManaged(mountPath: string): boolean {
    const relative = path.relative(this.mountBase, path.resolve(mountPath));
    return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
  }
}
