/**
 * Config commands
 */

import { Command } from 'commander';
import { ConfigManager } from '../config/index.js';
import type { Config } from '../types/index.js';
import { getOutputOptions, maskSecret, output, outputError, outputSuccess } from '../utils/output.js';

interface InitOptions {
  force?: boolean;
  org?: string;
  clientId?: string;
  domain?: string;
  project?: string;
}

/**
 * Copy of the config with the client secret masked
 */
export function maskConfig(config: Config): Config {
  if (config.clientSecret === undefined) {
    return { ...config };
  }
  return { ...config, clientSecret: maskSecret(config.clientSecret) };
}

export function createConfigCommand(getConfigPath: () => string): Command {
  const cmd = new Command('config').description('Manage polaris configuration');

  cmd
    .command('path')
    .description('Show the config file path')
    .action(() => {
      const configPath = getConfigPath();
      output({ path: configPath }, configPath);
    });

  cmd
    .command('init')
    .description('Initialize a new config file')
    .option('-f, --force', 'Overwrite existing config')
    .option('--org <org>', 'Organization name')
    .option('--client-id <id>', 'OAuth client ID')
    .option('--domain <domain>', 'Environment prefix (blank for production)')
    .option('--project <name>', 'Project used for SQL queries')
    .action(async (options: InitOptions) => {
      try {
        const manager = new ConfigManager(getConfigPath());
        const values: Omit<Config, 'version'> = {};
        if (options.org !== undefined) values.org = options.org;
        if (options.clientId !== undefined) values.clientId = options.clientId;
        if (options.domain !== undefined) values.domain = options.domain;
        if (options.project !== undefined) values.project = options.project;
        const result = await manager.init(options.force, values);

        if (result.created) {
          outputSuccess(`Config created at: ${result.path}`, { path: result.path });
        } else {
          output(
            { exists: true, path: result.path },
            `Config already exists at: ${result.path}\nUse --force to overwrite.`
          );
        }
      } catch (error) {
        outputError('Failed to initialize config', error);
        process.exitCode = 1;
      }
    });

  cmd
    .command('show')
    .description('Show current config (client secret masked)')
    .action(async () => {
      try {
        const manager = new ConfigManager(getConfigPath());
        const masked = maskConfig(await manager.load());

        if (getOutputOptions().json) {
          output(masked);
        } else {
          console.log(JSON.stringify(masked, null, 2));
        }
      } catch (error) {
        outputError('Failed to load config', error);
        process.exitCode = 1;
      }
    });

  cmd
    .command('validate')
    .description('Validate the config file')
    .action(async () => {
      try {
        const manager = new ConfigManager(getConfigPath());
        const result = await manager.validate();

        if (result.valid) {
          outputSuccess('Config is valid');
        } else {
          output(
            { valid: false, errors: result.errors },
            `Config validation failed:\n${result.errors.map((e) => `  - ${e.path}: ${e.message}`).join('\n')}`
          );
          process.exitCode = 1;
        }
      } catch (error) {
        outputError('Failed to validate config', error);
        process.exitCode = 1;
      }
    });

  return cmd;
}
