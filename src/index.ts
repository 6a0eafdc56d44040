/**
 * polaris-client - Imply Polaris REST client and table renderers
 * Programmatic API exports
 */

// Types
export type { Config, Credentials } from './types/config.js';
export { DEFAULT_CONFIG, ENV_VARS } from './types/config.js';

// Config
export { ConfigManager, parseConfig, validateConfig, isConfig } from './config/index.js';
export type { ValidationError, ValidationResult } from './config/index.js';

// Tables
export * from './table/index.js';

// Display
export * from './display/index.js';

// REST client
export * from './client/index.js';

// Utils
export { pad, padded } from './utils/pad.js';
export { createLogger, logger, isLogLevel, LOG_LEVELS } from './utils/logger.js';
export type { Logger, LogLevel, LogEntry } from './utils/logger.js';
export { resolveConfigPath, getDefaultConfigDir, getDefaultConfigPath } from './utils/config-path.js';
