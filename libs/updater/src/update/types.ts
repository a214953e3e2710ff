import type { LiveLayout } from '@fieldsign/ipc';
import type { FileOps } from '../fs/file-ops';
import type { MediaLocator } from '../media/media-locator';
import type { PackageLocator } from '../package/package-locator';
import type { PathRewriter } from '../rewrite/path-rewriter';
import type { BackupService } from '../backup/backup.service';
import type { UpdaterError } from '../errors';

/** Receives every human-readable status line of an update run */
export type StatusSink = (message: string) => void;

/** Parts of MediaLocator the coordinator relies on */
export type MediaSource = Pick<MediaLocator, 'locate' | 'unmount'>;

export type UpdateOutcome =
  | {
      success: true;
      mountPath: string;
      packagePath: string;
      assetsCopied: number;
    }
  | {
      success: false;
      error: UpdaterError;
      /** Live files were restored from the snapshot */
      rolledBack: boolean;
      /** Rollback itself failed; live files may be inconsistent */
      critical: boolean;
    };

export interface UpdateCoordinatorOptions {
  layout: LiveLayout;
  mediaLocator?: MediaSource;
  packageLocator?: PackageLocator;
  files?: FileOps;
  rewriter?: PathRewriter;
  statusSink?: StatusSink;
  backup?: BackupService;
}
