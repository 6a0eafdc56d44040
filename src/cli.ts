#!/usr/bin/env node
/**
 * polaris CLI
 * Imply Polaris tables, projects and SQL from the terminal
 *
 * Command structure:
 *   polaris tables     # List, inspect, create, drop, insert into tables
 *   polaris projects   # List and inspect projects
 *   polaris sql        # Run a SQL query
 *   polaris config     # Configuration
 */

import { Command } from 'commander';
import { createRequire } from 'module';
import { resolveConfigPath } from './utils/config-path.js';
import { setOutputOptions } from './utils/output.js';
import {
  createConfigCommand,
  createProjectsCommand,
  createSqlCommand,
  createTablesCommand,
  setSessionOptions,
} from './commands/index.js';

// Read version from package.json
const require = createRequire(import.meta.url);
const packageJson: { version: string } = require('../package.json');
const VERSION = packageJson.version;

const program = new Command();

// Global state for config path
let globalConfigPath: string | undefined;

function getConfigPath(): string {
  return resolveConfigPath({ configPath: globalConfigPath });
}

const HELP_HEADER = `
polaris - Imply Polaris client
Query and manage Polaris tables from the terminal.

Commands:
  tables        List, show, create, drop and push to tables
  projects      List and show projects
  sql           Run a SQL query in a project
  config        Configuration management

Credentials come from the config file, overridden by POLARIS_ORG,
POLARIS_CLIENT_ID, POLARIS_CLIENT_SECRET, POLARIS_DOMAIN and POLARIS_PROJECT.
`;

program
  .name('polaris')
  .description('Imply Polaris REST client')
  .version(VERSION)
  .option('-c, --config <path>', 'Path to config file')
  .option('--json', 'Output in JSON format')
  .option('-v, --verbose', 'Verbose output')
  .option('--html', 'Render tables as HTML fragments')
  .option('--trace', 'Log HTTP requests to stderr')
  .addHelpText('before', HELP_HEADER)
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts();
    globalConfigPath = opts.config;
    setOutputOptions({
      json: opts.json,
      verbose: opts.verbose,
    });
    setSessionOptions({
      html: opts.html,
      trace: opts.trace,
    });
  });

program.addCommand(createTablesCommand(getConfigPath));
program.addCommand(createProjectsCommand(getConfigPath));
program.addCommand(createSqlCommand(getConfigPath));
program.addCommand(createConfigCommand(getConfigPath));

await program.parseAsync();
