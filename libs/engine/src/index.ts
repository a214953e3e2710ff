/**
 * @fieldsign/engine — live config, action dispatch and updater wiring
 *
 * @packageDocumentation
 */

export { SignageEngine } from './engine';
export type { EngineOptions } from './engine';

export { loadLiveConfig, applySettingDefaults } from './config/loader';
export type { LiveConfig, EngineSettings } from './config/loader';

export { ActionDispatcher, LoggingDisplayPower, buttonSet } from './actions/dispatcher';
export type { ActionDispatcherOptions, DisplayPowerHandler, DispatchResult } from './actions/dispatcher';

export { ConsoleDisplay } from './display/console-display';
export type { ConsoleDisplayOptions } from './display/console-display';

export { ConfigLoadError } from './errors';
