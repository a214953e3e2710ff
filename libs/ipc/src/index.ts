/**
 * FieldSign IPC Library
 *
 * Shared types, schemas, and constants for the updater, the engine and the
 * operator CLI.
 *
 * @packageDocumentation
 */

// Types
export * from './types/index';

// Schemas
export * from './schemas/index';

// Constants
export * from './constants';
