/**
 * lsblk-backed block device probe
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { z } from 'zod';
import { LSBLK_PATH } from '@fieldsign/ipc';
import type { BlockDevice, BlockDeviceProbe, RemovablePartitions } from './types';

const execFileAsync = promisify(execFile);

/** Older util-linux releases print RM as "1"/"0" instead of a boolean */
const RemovableFlagSchema = z.union([z.boolean(), z.enum(['0', '1']).transform((v) => v === '1')]);

interface LsblkDevice {
  name: string;
  mountpoint?: string | null;
  rm?: boolean;
  type?: string;
  children?: LsblkDevice[];
}

const LsblkDeviceSchema: z.ZodType<LsblkDevice, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    name: z.string(),
    mountpoint: z.string().nullable().optional(),
    rm: RemovableFlagSchema.optional(),
    type: z.string().optional(),
    children: z.array(LsblkDeviceSchema).optional(),
  }),
);

const LsblkOutputSchema = z.object({
  blockdevices: z.array(LsblkDeviceSchema).default([]),
});

function toBlockDevice(device: LsblkDevice): BlockDevice {
  return {
    name: device.name,
    mountpoint: device.mountpoint ?? null,
    removable: device.rm ?? false,
    type: device.type ?? 'unknown',
    children: (device.children ?? []).map(toBlockDevice),
  };
}

/**
 * Parse `lsblk -o NAME,MOUNTPOINT,RM,TYPE -p -J` output
 */
export function parseLsblkOutput(stdout: string): BlockDevice[] {
  const parsed = LsblkOutputSchema.parse(JSON.parse(stdout));
  return parsed.blockdevices.map(toBlockDevice);
}

/**
 * Partitions of removable disks, in listing order
 */
export function findRemovablePartitions(devices: BlockDevice[]): RemovablePartitions {
  const result: RemovablePartitions = { mounted: [], unmounted: [] };

  for (const device of devices) {
    if (!device.removable) continue;
    for (const child of device.children) {
      if (child.type !== 'part') continue;
      if (child.mountpoint) {
        result.mounted.push({ device: child.name, mountpoint: child.mountpoint });
      } else {
        result.unmounted.push(child.name);
      }
    }
  }

  return result;
}

export class LsblkProbe implements BlockDeviceProbe {
  constructor(private readonly lsblkPath: string = LSBLK_PATH) {}

  async list(): Promise<BlockDevice[]> {
    const { stdout } = await execFileAsync(this.lsblkPath, ['-o', 'NAME,MOUNTPOINT,RM,TYPE', '-p', '-J'], {
      encoding: 'utf-8',
      timeout: 10_000,
    });
    return parseLsblkOutput(stdout);
  }
}
