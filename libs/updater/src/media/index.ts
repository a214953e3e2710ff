export { MediaLocator } from './media-locator';
export { LsblkProbe, parseLsblkOutput, findRemovablePartitions } from './lsblk';
export { SystemMountDriver } from './mount.driver';
export type { SystemMountDriverOptions } from './mount.driver';
export type {
  BlockDevice,
  BlockDeviceProbe,
  MountDriver,
  MediaLocatorOptions,
  RemovablePartitions,
} from './types';
