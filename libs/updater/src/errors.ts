/**
 * Typed error classes for the updater library
 */

export class UpdaterError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'UpdaterError';
    this.code = code;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export class MediaNotFoundError extends UpdaterError {
  constructor() {
    super('No removable drive found or it could not be mounted', 'MEDIA_NOT_FOUND');
    this.name = 'MediaNotFoundError';
  }
}

export class PackageNotFoundError extends UpdaterError {
  public readonly mountPath: string;

  constructor(mountPath: string, packageDirName: string) {
    super(`No valid '${packageDirName}/' found on the drive at ${mountPath}`, 'PACKAGE_NOT_FOUND');
    this.name = 'PackageNotFoundError';
    this.mountPath = mountPath;
  }
}

export class SchemaInvalidError extends UpdaterError {
  /** Dotted location of the offending value, e.g. `media.intro.mode` */
  public readonly field: string;
  public readonly reason: string;

  constructor(field: string, reason: string) {
    super(`Invalid configuration at '${field}': ${reason}`, 'SCHEMA_INVALID');
    this.name = 'SchemaInvalidError';
    this.field = field;
    this.reason = reason;
  }
}

export class AssetMissingError extends UpdaterError {
  public readonly path: string;

  constructor(assetPath: string) {
    super(`Asset '${assetPath}' referenced by the package config is not in the package`, 'ASSET_MISSING');
    this.name = 'AssetMissingError';
    this.path = assetPath;
  }
}

export class IOFailureError extends UpdaterError {
  public readonly operation: string;
  public readonly path: string;
  public readonly cause: unknown;

  constructor(operation: string, targetPath: string, cause: unknown) {
    super(`Failed to ${operation} '${targetPath}': ${describeError(cause)}`, 'IO_FAILURE');
    this.name = 'IOFailureError';
    this.operation = operation;
    this.path = targetPath;
    this.cause = cause;
  }
}

export class CommitFailureError extends UpdaterError {
  public readonly cause: unknown;

  constructor(cause: unknown) {
    super(`Commit failed: ${describeError(cause)}`, 'COMMIT_FAILED');
    this.name = 'CommitFailureError';
    this.cause = cause;
  }
}

export class RollbackFailureError extends UpdaterError {
  public readonly cause: unknown;
  /** The failure that made the rollback necessary */
  public readonly original: UpdaterError;

  constructor(cause: unknown, original: UpdaterError) {
    super(`Rollback failed: ${describeError(cause)}. System might be in an inconsistent state`, 'ROLLBACK_FAILED');
    this.name = 'RollbackFailureError';
    this.cause = cause;
    this.original = original;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
