/**
 * Update coordinator — runs one update from removable media end to end
 *
 * A run walks locating → pre-validating → staging → rewriting →
 * post-validating → backing-up → committing → cleaning-up and returns to
 * idle. Failures from staging onward pass through rolling-back. Only one
 * run is active at a time; requests made meanwhile are rejected.
 */

import { EventEmitter } from 'node:events';
import * as crypto from 'node:crypto';
import * as path from 'node:path';
import type { ConfigDocument, LiveLayout, UpdaterState } from '@fieldsign/ipc';
import { ASSET_PREFIX } from '@fieldsign/ipc';
import type { FileOps } from '../fs/file-ops';
import { NodeFileOps } from '../fs/file-ops';
import { MediaLocator } from '../media/media-locator';
import { PackageLocator } from '../package/package-locator';
import type { UpdatePackage } from '../package/package-locator';
import { parseConfig } from '../validate/config-validator';
import { gatherAssets } from '../assets/asset-resolver';
import { rewritePaths, listPassThroughPaths } from '../rewrite/path-rewriter';
import type { PathRewriter } from '../rewrite/path-rewriter';
import { StagingArea } from '../staging/staging-area';
import { BackupService } from '../backup/backup.service';
import {
  UpdaterError,
  MediaNotFoundError,
  PackageNotFoundError,
  SchemaInvalidError,
  AssetMissingError,
  IOFailureError,
  CommitFailureError,
  RollbackFailureError,
  describeError,
} from '../errors';
import type { UpdateEvent } from '../events';
import { UPDATE_EVENT } from '../events';
import type { MediaSource, StatusSink, UpdateCoordinatorOptions, UpdateOutcome } from './types';

export const ALREADY_RUNNING_MESSAGE = 'Update process is already running.';
export const STOPPED_MESSAGE = 'Updater is stopped; update request ignored.';

interface RunContext {
  runId: string;
  mountPath: string | null;
  commitStarted: boolean;
}

function toUpdaterError(err: unknown): UpdaterError {
  if (err instanceof UpdaterError) return err;
  return new UpdaterError(describeError(err), 'UNEXPECTED');
}

export class UpdateCoordinator extends EventEmitter {
  readonly layout: LiveLayout;
  private readonly media: MediaSource;
  private readonly packages: PackageLocator;
  private readonly files: FileOps;
  private readonly rewriter: PathRewriter;
  private readonly statusSink: StatusSink | undefined;
  private readonly backup: BackupService;
  private readonly staging: StagingArea;

  private _state: UpdaterState = 'idle';
  private stopped = false;
  private current: Promise<UpdateOutcome> | null = null;
  private lastOutcome: UpdateOutcome | null = null;

  constructor(options: UpdateCoordinatorOptions) {
    super();
    this.layout = options.layout;
    this.files = options.files ?? new NodeFileOps();
    this.media = options.mediaLocator ?? new MediaLocator();
    this.packages = options.packageLocator ?? new PackageLocator();
    this.rewriter = options.rewriter ?? rewritePaths;
    this.statusSink = options.statusSink;
    this.backup = options.backup ?? new BackupService(this.layout, this.files);
    this.staging = new StagingArea(this.layout, this.files);
  }

  get state(): UpdaterState {
    return this._state;
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  /**
   * Start an update run in the background. Returns false, with a status
   * message, when a run is already active or the coordinator is stopped.
   */
  requestUpdate(): boolean {
    if (this.stopped) {
      this.emitEvent({ type: 'update:rejected', reason: 'stopped' });
      this.status(null, STOPPED_MESSAGE);
      return false;
    }
    if (this._state !== 'idle' || this.current) {
      this.emitEvent({ type: 'update:rejected', reason: 'already-running' });
      this.status(null, ALREADY_RUNNING_MESSAGE);
      return false;
    }

    const runId = crypto.randomUUID();
    this.emitEvent({ type: 'update:requested', runId });

    const run = this.run(runId)
      .catch((err: unknown): UpdateOutcome => {
        console.error(`[Updater] Update run aborted: ${describeError(err)}`);
        this._state = 'idle';
        return { success: false, error: toUpdaterError(err), rolledBack: false, critical: false };
      })
      .then((outcome) => {
        this.lastOutcome = outcome;
        this.current = null;
        return outcome;
      });
    this.current = run;
    return true;
  }

  /** Outcome of the active run, or of the last finished one */
  async whenIdle(): Promise<UpdateOutcome | null> {
    if (this.current) return this.current;
    return this.lastOutcome;
  }

  /**
   * Refuse further runs and wait for an active run to reach a terminal
   * state. The active run is not interrupted.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    if (this.current) {
      await this.current;
    }
  }

  private emitEvent(event: UpdateEvent): void {
    try {
      this.emit(UPDATE_EVENT, event);
    } catch (err) {
      console.warn(`[Updater] Update event listener failed on ${event.type}: ${describeError(err)}`);
    }
  }

  private status(runId: string | null, message: string): void {
    console.log(`[Updater] ${message}`);
    if (this.statusSink) {
      try {
        this.statusSink(message);
      } catch (err) {
        console.warn(`[Updater] Status sink failed: ${describeError(err)}`);
      }
    }
    this.emitEvent({ type: 'update:status', runId, message });
  }

  private transition(runId: string, to: UpdaterState): void {
    const from = this._state;
    this._state = to;
    this.emitEvent({ type: 'update:state', runId, from, to });
  }

  private async run(runId: string): Promise<UpdateOutcome> {
    const ctx: RunContext = { runId, mountPath: null, commitStarted: false };
    let outcome: UpdateOutcome;

    try {
      outcome = await this.execute(ctx);
    } catch (err) {
      outcome = await this.fail(ctx, toUpdaterError(err));
    } finally {
      if (ctx.mountPath) {
        await this.releaseMedia(ctx.runId, ctx.mountPath);
      }
      this.transition(runId, 'idle');
      this.status(runId, 'Update process finished.');
    }

    return outcome;
  }

  private async execute(ctx: RunContext): Promise<UpdateOutcome> {
    const { runId } = ctx;

    // Locating
    this.transition(runId, 'locating');
    this.status(runId, 'Searching for removable drive...');
    const mountPath = await this.media.locate();
    if (!mountPath) {
      throw new MediaNotFoundError();
    }
    ctx.mountPath = mountPath;
    this.status(runId, `Drive found at ${mountPath}`);

    this.transition(runId, 'locating-package');
    const pkg = await this.packages.find(mountPath);
    if (!pkg) {
      throw new PackageNotFoundError(mountPath, this.packages.packageDirName);
    }
    this.status(runId, `Update package found at ${pkg.root}`);

    // PreValidating
    this.transition(runId, 'pre-validating');
    this.status(runId, 'Validating package configuration...');
    const packageConfig = parseConfig(await this.readPackageConfig(pkg));

    // Staging
    this.transition(runId, 'staging');
    this.status(runId, 'Staging new assets...');
    await this.staging.reset();
    const assets = [...gatherAssets(packageConfig).keys()];
    for (const [index, relativePath] of assets.entries()) {
      await this.staging.copyAsset(relativePath, pkg.assetsDir);
      this.emitEvent({ type: 'update:asset-copied', runId, relativePath, index: index + 1, total: assets.length });
    }
    this.status(runId, `Staged ${assets.length} asset(s)`);

    // Rewriting
    this.transition(runId, 'rewriting');
    this.status(runId, 'Rewriting asset paths...');
    for (const entry of listPassThroughPaths(packageConfig)) {
      console.warn(`[Updater] Media '${entry.media}' path '${entry.path}' is outside '${ASSET_PREFIX}' and is kept as is`);
    }
    const rewritten = this.rewriter(packageConfig, this.layout.assetPrefix);
    await this.staging.writeConfig(rewritten);

    // PostValidating
    this.transition(runId, 'post-validating');
    this.status(runId, 'Validating rewritten configuration...');
    parseConfig(await this.staging.readConfig());

    // BackingUp
    this.transition(runId, 'backing-up');
    this.status(runId, 'Backing up current configuration...');
    try {
      await this.backup.create(pkg.root);
    } catch (err) {
      throw new IOFailureError('back up live files to', this.layout.backupDir, err);
    }

    // Committing
    this.transition(runId, 'committing');
    this.status(runId, 'Applying update...');
    ctx.commitStarted = true;
    try {
      await this.commit();
    } catch (err) {
      throw new CommitFailureError(err);
    }

    // CleaningUp
    this.transition(runId, 'cleaning-up');
    try {
      await this.staging.discard();
    } catch (err) {
      console.warn(`[Updater] Cleanup failed: ${describeError(err)}`);
    }

    this.status(runId, 'Update successful!');
    this.emitEvent({ type: 'update:completed', runId, packagePath: pkg.root, assetsCopied: assets.length });
    return { success: true, mountPath, packagePath: pkg.root, assetsCopied: assets.length };
  }

  private async readPackageConfig(pkg: UpdatePackage): Promise<unknown> {
    let raw: Buffer;
    try {
      raw = await this.files.readFile(pkg.configPath);
    } catch (err) {
      throw new IOFailureError('read package config', pkg.configPath, err);
    }
    try {
      return JSON.parse(raw.toString('utf-8'));
    } catch (err) {
      throw new SchemaInvalidError('(root)', `Not valid JSON: ${describeError(err)}`);
    }
  }

  /**
   * Assets move before the config: set the live tree aside, move the staged
   * tree into place, rename the staged config over the live one, then check
   * every asset the new live config references.
   */
  private async commit(): Promise<void> {
    const { assetsDir, configFile, appRoot, assetPrefix } = this.layout;

    if (await this.files.exists(assetsDir)) {
      await this.files.move(assetsDir, this.staging.retiredAssetsDir);
    }
    await this.files.move(this.staging.assetsDir, assetsDir);
    await this.files.move(this.staging.configFile, configFile);

    const live: ConfigDocument = parseConfig(JSON.parse((await this.files.readFile(configFile)).toString('utf-8')));
    for (const reference of gatherAssets(live, `${assetPrefix}/`).values()) {
      const target = path.join(appRoot, ...reference.split('/'));
      if (!(await this.files.isFile(target))) {
        throw new AssetMissingError(target);
      }
    }
  }

  private async fail(ctx: RunContext, error: UpdaterError): Promise<UpdateOutcome> {
    const { runId } = ctx;
    const reachedStaging = !['idle', 'locating', 'locating-package', 'pre-validating'].includes(this._state);

    this.status(runId, `Update failed: ${error.message}`);

    let rolledBack = false;
    if (reachedStaging) {
      this.transition(runId, 'rolling-back');
      this.status(runId, 'Rolling back...');

      // Staging holds the set-aside live assets until the restore succeeds
      if (ctx.commitStarted) {
        this.status(runId, 'Restoring previous configuration...');
        try {
          await this.backup.restore();
          rolledBack = true;
          this.status(runId, 'Previous configuration restored');
        } catch (err) {
          const critical = new RollbackFailureError(err, error);
          console.error(`[Updater] CRITICAL: ${critical.message}`);
          this.status(runId, `CRITICAL: ${critical.message}`);
          this.emitEvent({ type: 'update:critical', runId, error: critical.message });
          this.emitEvent({ type: 'update:failed', runId, code: critical.code, error: critical.message, rolledBack: false });
          console.error(`[Updater] Previous assets left at ${this.staging.retiredAssetsDir}`);
          return { success: false, error: critical, rolledBack: false, critical: true };
        }
      }

      try {
        await this.staging.discard();
      } catch (err) {
        console.warn(`[Updater] Could not remove staging area: ${describeError(err)}`);
      }
    }

    this.emitEvent({ type: 'update:failed', runId, code: error.code, error: error.message, rolledBack });
    return { success: false, error, rolledBack, critical: false };
  }

  private async releaseMedia(runId: string, mountPath: string): Promise<void> {
    let success: boolean;
    try {
      success = await this.media.unmount(mountPath);
    } catch (err) {
      console.error(`[Updater] Unmount of ${mountPath} threw: ${describeError(err)}`);
      success = false;
    }
    this.emitEvent({ type: 'update:unmounted', runId, mountPath, success });
    this.status(runId, success ? `Drive unmounted from ${mountPath}` : `Could not unmount drive at ${mountPath}`);
  }
}
