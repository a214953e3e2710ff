/**
 * Removable media types — block device listing and OS mount primitives
 */

/** A block device as reported by the OS, with its partitions as children */
export interface BlockDevice {
  /** Full device path (e.g. /dev/sda1) */
  name: string;
  mountpoint: string | null;
  removable: boolean;
  /** Device type (`disk`, `part`, `rom`, ...) */
  type: string;
  children: BlockDevice[];
}

/**
 * Source of the current block device tree
 */
export interface BlockDeviceProbe {
  list(): Promise<BlockDevice[]>;
}

/**
 * OS mount primitives. Implementations throw on failure.
 */
export interface MountDriver {
  createMountDir(target: string): Promise<void>;
  mount(device: string, target: string): Promise<void>;
  unmount(target: string): Promise<void>;
  removeMountDir(target: string): Promise<void>;
  /** Whether a filesystem is currently mounted at `target` */
  isMountPoint(target: string): Promise<boolean>;
}

export interface MediaLocatorOptions {
  /** Base directory for mount points this locator creates (default: /mnt/signage_usb_update) */
  mountBase?: string;
  probe?: BlockDeviceProbe;
  driver?: MountDriver;
}

/** Removable partitions split by mount state */
export interface RemovablePartitions {
  mounted: Array<{ device: string; mountpoint: string }>;
  unmounted: string[];
}
