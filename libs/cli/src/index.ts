/**
 * FieldSign CLI Library
 *
 * @packageDocumentation
 */

export { VERSION } from './version';
export { createProgram } from './cli';
export * from './commands';
