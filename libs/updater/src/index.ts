/**
 * @fieldsign/updater — transactional config and asset update from removable media
 *
 * @packageDocumentation
 */

// Coordinator
export { UpdateCoordinator, ALREADY_RUNNING_MESSAGE, STOPPED_MESSAGE } from './update';
export type { UpdateCoordinatorOptions, UpdateOutcome, StatusSink, MediaSource } from './update';

// Media
export { MediaLocator, LsblkProbe, SystemMountDriver, parseLsblkOutput, findRemovablePartitions } from './media';
export type {
  BlockDevice,
  BlockDeviceProbe,
  MountDriver,
  MediaLocatorOptions,
  RemovablePartitions,
  SystemMountDriverOptions,
} from './media';

// Package
export { PackageLocator } from './package';
export type { UpdatePackage } from './package';

// Validation, assets, rewriting
export { validateConfig, parseConfig } from './validate';
export type { ValidationResult } from './validate';
export { gatherAssets } from './assets';
export { rewritePaths, rewritePath, listPassThroughPaths, toPortable } from './rewrite';
export type { PathRewriter } from './rewrite';

// Staging and backup
export { StagingArea } from './staging';
export { BackupService, hashTree, hashContent } from './backup';

// Filesystem
export { NodeFileOps, isErrnoCode } from './fs/file-ops';
export type { FileOps } from './fs/file-ops';

// Layout
export { resolveLiveLayout, layoutFromConfigPath } from './layout';
export type { LayoutOptions } from './layout';

// Events
export type { UpdateEvent } from './events';
export { UPDATE_EVENT } from './events';

// Errors
export {
  UpdaterError,
  MediaNotFoundError,
  PackageNotFoundError,
  SchemaInvalidError,
  AssetMissingError,
  IOFailureError,
  CommitFailureError,
  RollbackFailureError,
  describeError,
} from './errors';
