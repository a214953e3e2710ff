/**
 * CLI Commands
 *
 * Exports all command creator functions for registration in the main CLI.
 */

export { createValidateCommand, validateFile } from './validate';
export type { ValidationReport } from './validate';
export { createPlanCommand, planUpdate } from './plan';
export type { UpdatePlan, PlannedAsset } from './plan';
export { createDevicesCommand } from './devices';
export { createStatusCommand, collectStatus } from './status';
export type { UpdaterStatus } from './status';
