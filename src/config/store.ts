/**
 * Config file storage
 *
 * The file holds the OAuth client secret, so it is written owner-only
 * (0600) and replaced atomically through a temp file in the same directory.
 */

import { promises as fs } from 'fs';
import { dirname, join } from 'path';
import { randomUUID } from 'crypto';
import type { Config } from '../types/index.js';

/**
 * Serialized form of a config: pretty JSON with a trailing newline
 */
export function serializeConfig(config: Config): string {
  return JSON.stringify(config, null, 2) + '\n';
}

export async function writeConfigFile(configPath: string, config: Config): Promise<void> {
  const dir = dirname(configPath);
  await fs.mkdir(dir, { recursive: true });

  const tmpPath = join(dir, `.config-${randomUUID()}.tmp`);
  try {
    await fs.writeFile(tmpPath, serializeConfig(config), { encoding: 'utf-8', mode: 0o600 });
    await fs.rename(tmpPath, configPath);
  } catch (error) {
    await fs.rm(tmpPath, { force: true });
    throw error;
  }
}

/**
 * Raw config text, or null when there is no config file yet
 */
export async function readConfigText(configPath: string): Promise<string | null> {
  try {
    return await fs.readFile(configPath, 'utf-8');
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

export async function configFileExists(configPath: string): Promise<boolean> {
  return (await readConfigText(configPath)) !== null;
}
