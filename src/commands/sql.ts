/**
 * sql command - run one SQL statement
 */

import { Command } from 'commander';
import { getOutputOptions, output } from '../utils/output.js';
import { withSpinner } from '../utils/spinner.js';
import { openSession, runAction } from './session.js';

export function createSqlCommand(getConfigPath: () => string): Command {
  return new Command('sql')
    .description('Run a SQL query and print the result rows')
    .argument('<statement>', 'SQL statement (quote it)')
    .option('-p, --project <name>', 'Project to query (default: config, then inferred)')
    .action(async (statement: string, options: { project?: string }) => {
      await runAction('Query failed', async () => {
        const { client, credentials } = await openSession(getConfigPath);
        const rows = await withSpinner('Running query...', async () => {
          const project = options.project ?? credentials.project;
          if (project !== undefined) {
            await client.setProject(project);
          }
          return client.sql(statement);
        });

        if (getOutputOptions().json) {
          output(rows);
        } else {
          client.show().renderQueryResults(rows);
        }
      });
    });
}
