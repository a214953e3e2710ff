/**
 * Action dispatcher — maps pressed buttons to media and actions
 */

import type { ActionDefinition, ButtonReference, ConfigDocument, MediaDefinition } from '@fieldsign/ipc';

/** Display output control behind `hdmi_control` actions */
export interface DisplayPowerHandler {
  /** Flip the output; resolves to whether it is now on */
  toggle(): Promise<boolean>;
}

export interface ActionDispatcherOptions {
  /** Starts an update run; false when one is already active */
  requestUpdate: () => boolean;
  displayPower?: DisplayPowerHandler;
  /** Called when a media entry is selected */
  onMedia?: (name: string, media: MediaDefinition) => void;
}

export type DispatchResult =
  | { action: string; mode: 'load_config'; accepted: boolean }
  | { action: string; mode: 'hdmi_control'; outputOn: boolean };

/**
 * Logs and tracks output state without touching hardware
 */
export class LoggingDisplayPower implements DisplayPowerHandler {
  private on = true;

  async toggle(): Promise<boolean> {
    this.on = !this.on;
    console.log(`[Action] HDMI output ${this.on ? 'on' : 'off'}`);
    return this.on;
  }
}

/** Sorted, de-duplicated button names of a reference */
export function buttonSet(reference: ButtonReference | undefined): string[] {
  if (reference === undefined) return [];
  const names = typeof reference === 'string' ? [reference] : reference;
  return [...new Set(names)].sort();
}

function sameSet(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((name, i) => name === b[i]);
}

export class ActionDispatcher {
  private config: ConfigDocument;
  private readonly requestUpdate: () => boolean;
  private readonly displayPower: DisplayPowerHandler;
  private readonly onMedia?: (name: string, media: MediaDefinition) => void;
  private _currentMedia: string | null = null;

  constructor(config: ConfigDocument, options: ActionDispatcherOptions) {
    this.config = config;
    this.requestUpdate = options.requestUpdate;
    this.displayPower = options.displayPower ?? new LoggingDisplayPower();
    this.onMedia = options.onMedia;
  }

  get currentMedia(): string | null {
    return this._currentMedia;
  }

  /** Swap in a freshly loaded config; the current media selection is dropped */
  setConfig(config: ConfigDocument): void {
    this.config = config;
    this._currentMedia = null;
  }

  /** Media entries whose button set equals the pressed set exactly */
  mediaForButtons(pressed: string[]): string[] {
    return this.matching(this.config.media, pressed);
  }

  /** Action entries whose button set equals the pressed set exactly */
  actionsForButtons(pressed: string[]): string[] {
    return this.matching(this.config.actions, pressed);
  }

  /**
   * Handle a button combination: select matching media, then run matching
   * actions in config order.
   */
  async press(pressed: string[]): Promise<DispatchResult[]> {
    for (const name of this.mediaForButtons(pressed)) {
      this.selectMedia(name);
    }

    const results: DispatchResult[] = [];
    for (const name of this.actionsForButtons(pressed)) {
      results.push(await this.dispatch(name));
    }
    return results;
  }

  /** Run a named action entry */
  async dispatch(name: string): Promise<DispatchResult> {
    const action: ActionDefinition | undefined = this.config.actions[name];
    if (!action) {
      throw new Error(`Unknown action '${name}'`);
    }

    switch (action.mode) {
      case 'load_config': {
        console.log(`[Action] ${name}: loading configuration from removable media`);
        return { action: name, mode: 'load_config', accepted: this.requestUpdate() };
      }
      case 'hdmi_control': {
        const outputOn = await this.displayPower.toggle();
        return { action: name, mode: 'hdmi_control', outputOn };
      }
    }
  }

  private selectMedia(name: string): void {
    const media = this.config.media[name];
    if (!media) return;
    if (this._currentMedia && this._currentMedia !== name) {
      console.log(`[Media] Stopping: ${this._currentMedia}`);
    }
    this._currentMedia = name;
    console.log(`[Media] ${media.mode}: ${media.path}`);
    this.onMedia?.(name, media);
  }

  private matching(entries: Record<string, { button?: ButtonReference }>, pressed: string[]): string[] {
    const target = buttonSet(pressed);
    if (target.length === 0) return [];
    return Object.entries(entries)
      .filter(([, entry]) => sameSet(buttonSet(entry.button), target))
      .map(([name]) => name);
  }
}
