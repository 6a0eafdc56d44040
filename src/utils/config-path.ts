/**
 * Config path resolution utility
 * Priority:
 * 1) --config <path> (passed as argument)
 * 2) POLARIS_CONFIG environment variable
 * 3) OS standard config location
 */

import { homedir, platform } from 'os';
import { join } from 'path';

export const APP_DIR_NAME = 'polaris';

export function getDefaultConfigDir(): string {
  const home = homedir();
  const os = platform();

  switch (os) {
    case 'win32':
      // Windows: %APPDATA%\polaris
      return join(process.env.APPDATA || join(home, 'AppData', 'Roaming'), APP_DIR_NAME);
    case 'darwin':
      // macOS: ~/Library/Application Support/polaris
      return join(home, 'Library', 'Application Support', APP_DIR_NAME);
    default:
      // Linux and others: ~/.config/polaris
      return join(process.env.XDG_CONFIG_HOME || join(home, '.config'), APP_DIR_NAME);
  }
}

export function getDefaultConfigPath(): string {
  return join(getDefaultConfigDir(), 'config.json');
}

export interface ConfigPathOptions {
  configPath?: string; // --config argument
}

export function resolveConfigPath(options: ConfigPathOptions = {}): string {
  if (options.configPath) {
    return options.configPath;
  }

  const envPath = process.env.POLARIS_CONFIG;
  if (envPath) {
    return envPath;
  }

  return getDefaultConfigPath();
}
