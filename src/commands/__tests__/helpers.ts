/**
 * Shared setup for command tests: a temporary config file with test
 * credentials, captured console output and reset global options
 */

import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { vi } from 'vitest';
import { ENV_VARS } from '../../types/index.js';
import { setOutputOptions } from '../../utils/output.js';
import { setSessionOptions } from '../session.js';

export interface CommandFixture {
  dir: string;
  configPath: string;
  stdout: string[];
  stderr: string[];
  cleanup: () => Promise<void>;
}

export const TEST_CONFIG = {
  version: 1,
  org: 'acme',
  clientId: 'test-client',
  clientSecret: 'test-secret',
};

export async function setupCommandFixture(config: object | null = TEST_CONFIG): Promise<CommandFixture> {
  const dir = await mkdtemp(join(tmpdir(), 'polaris-cmd-'));
  const configPath = join(dir, 'config.json');
  if (config !== null) {
    await writeFile(configPath, JSON.stringify(config));
  }

  for (const name of Object.values(ENV_VARS)) {
    vi.stubEnv(name, '');
  }

  const stdout: string[] = [];
  const stderr: string[] = [];
  vi.spyOn(console, 'log').mockImplementation((line?: unknown) => {
    stdout.push(String(line));
  });
  vi.spyOn(console, 'error').mockImplementation((line?: unknown) => {
    stderr.push(String(line));
  });

  return {
    dir,
    configPath,
    stdout,
    stderr,
    cleanup: async () => {
      vi.restoreAllMocks();
      vi.unstubAllEnvs();
      vi.unstubAllGlobals();
      setOutputOptions({ json: false, verbose: false });
      setSessionOptions({ html: false, trace: false });
      process.exitCode = undefined;
      await rm(dir, { recursive: true, force: true });
    },
  };
}
