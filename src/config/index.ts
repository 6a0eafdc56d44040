export { ConfigManager } from './manager.js';
export { parseConfig, validateConfig, isConfig } from './schema.js';
export type { ValidationError, ValidationResult } from './schema.js';
