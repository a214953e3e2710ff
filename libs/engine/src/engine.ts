/**
 * Engine — wires the live config, action dispatch and the updater
 *
 * A `load_config` action starts an update; after a successful update the
 * live config is reloaded into the dispatcher.
 */

import type { LiveLayout } from '@fieldsign/ipc';
import { UpdateCoordinator, UPDATE_EVENT, layoutFromConfigPath, describeError } from '@fieldsign/updater';
import type { MediaSource, PathRewriter, FileOps, UpdateEvent, UpdateOutcome } from '@fieldsign/updater';
import type { LiveConfig } from './config/loader';
import { loadLiveConfig } from './config/loader';
import { ActionDispatcher } from './actions/dispatcher';
import type { DispatchResult, DisplayPowerHandler } from './actions/dispatcher';
import { ConsoleDisplay } from './display/console-display';

export interface EngineOptions {
  /** Live config.json; its directory's parent is the app root */
  configPath: string;
  /** Asset directory beside config.json (default: `image_sets`) */
  assetSubdir?: string;
  display?: ConsoleDisplay;
  mediaLocator?: MediaSource;
  displayPower?: DisplayPowerHandler;
  files?: FileOps;
  rewriter?: PathRewriter;
}

export class SignageEngine {
  readonly layout: LiveLayout;
  readonly updater: UpdateCoordinator;
  readonly display: ConsoleDisplay;
  readonly dispatcher: ActionDispatcher;
  private config: LiveConfig;
  private reloading: Promise<void> | null = null;

  private constructor(options: EngineOptions, config: LiveConfig) {
    this.config = config;
    this.layout = layoutFromConfigPath(options.configPath, options.assetSubdir);
    this.display = options.display ?? new ConsoleDisplay();
    this.updater = new UpdateCoordinator({
      layout: this.layout,
      mediaLocator: options.mediaLocator,
      files: options.files,
      rewriter: options.rewriter,
      statusSink: this.display.sink,
    });
    this.dispatcher = new ActionDispatcher(config, {
      requestUpdate: () => this.updater.requestUpdate(),
      displayPower: options.displayPower,
    });

    this.updater.on(UPDATE_EVENT, (event: UpdateEvent) => {
      if (event.type === 'update:completed') {
        this.reloading = this.reload();
      }
    });
  }

  /** Load the live config and build an engine around it */
  static async create(options: EngineOptions): Promise<SignageEngine> {
    const config = await loadLiveConfig(options.configPath);
    console.log(`[Engine] Loaded ${Object.keys(config.media).length} media and ${Object.keys(config.actions).length} action(s)`);
    return new SignageEngine(options, config);
  }

  get currentConfig(): LiveConfig {
    return this.config;
  }

  /** Feed a pressed-button combination to the dispatcher */
  press(buttons: string[]): Promise<DispatchResult[]> {
    return this.dispatcher.press(buttons);
  }

  /**
   * Wait for an active update and the reload that follows it
   */
  async whenSettled(): Promise<UpdateOutcome | null> {
    const outcome = await this.updater.whenIdle();
    if (this.reloading) await this.reloading;
    return outcome;
  }

  async stop(): Promise<void> {
    await this.updater.stop();
    if (this.reloading) await this.reloading;
  }

  private async reload(): Promise<void> {
    try {
      this.config = await loadLiveConfig(this.layout.configFile);
      this.dispatcher.setConfig(this.config);
      this.display.show('Configuration reloaded');
    } catch (err) {
      console.error(`[Engine] Reload after update failed: ${describeError(err)}`);
      this.display.show('Reload failed; keeping previous configuration');
    }
  }
}
