export type { Config, Credentials } from './config.js';
export { DEFAULT_CONFIG, ENV_VARS } from './config.js';
