/**
 * Update lifecycle event types
 */

import type { UpdaterState } from '@fieldsign/ipc';

export type UpdateEvent =
  | { type: 'update:requested'; runId: string }
  | { type: 'update:rejected'; reason: 'already-running' | 'stopped' }
  | { type: 'update:state'; runId: string; from: UpdaterState; to: UpdaterState }
  | { type: 'update:status'; runId: string | null; message: string }
  | { type: 'update:asset-copied'; runId: string; relativePath: string; index: number; total: number }
  | { type: 'update:completed'; runId: string; packagePath: string; assetsCopied: number }
  | { type: 'update:failed'; runId: string; code: string; error: string; rolledBack: boolean }
  | { type: 'update:critical'; runId: string; error: string }
  | { type: 'update:unmounted'; runId: string; mountPath: string; success: boolean };

/** EventEmitter channel carrying every UpdateEvent */
export const UPDATE_EVENT = 'update-event';
