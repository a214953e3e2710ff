/**
 * Re-export all types
 */

export * from './config';
export * from './updater';
