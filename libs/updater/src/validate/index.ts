export { validateConfig, parseConfig } from './config-validator';
export type { ValidationResult } from './config-validator';
