/**
 * Tables commands
 */

import { Command } from 'commander';
import { readFile } from 'fs/promises';
import { DETAIL_LABELS, SCHEMA_COLUMNS, SUMMARY_LABELS } from '../client/table.js';
import { getOutputOptions, output, outputSuccess } from '../utils/output.js';
import { withSpinner } from '../utils/spinner.js';
import { parseEvents } from './parse-events.js';
import { openSession, runAction } from './session.js';

export function createTablesCommand(getConfigPath: () => string): Command {
  const cmd = new Command('tables').description('Manage Polaris tables');

  cmd
    .command('list')
    .description('List tables')
    .option('-d, --details', 'Show full details for every table')
    .action(async (options: { details?: boolean }) => {
      await runAction('Failed to list tables', async () => {
        const { client } = await openSession(getConfigPath);
        const show = client.show();

        if (options.details) {
          const details = await withSpinner('Fetching tables...', () => client.allTableDetails());
          if (getOutputOptions().json) {
            output(details);
          } else {
            show.renderTableDetails(details);
          }
          return;
        }

        const summaries = await withSpinner('Fetching tables...', () => client.allTableSummaries());
        if (getOutputOptions().json) {
          output(summaries);
        } else {
          show.renderTables(summaries);
        }
      });
    });

  cmd
    .command('show')
    .description('Show one table')
    .argument('<name>', 'Table name')
    .option('-d, --details', 'Include status, size and row count')
    .action(async (name: string, options: { details?: boolean }) => {
      await runAction(`Failed to show table '${name}'`, async () => {
        const { client } = await openSession(getConfigPath);
        const info = await withSpinner(`Fetching table ${name}...`, async () => {
          const table = await client.tableForName(name);
          return options.details ? table.details() : table.summary();
        });

        if (getOutputOptions().json) {
          output(info);
        } else {
          client.show().display.showObject(info, options.details ? DETAIL_LABELS : SUMMARY_LABELS);
        }
      });
    });

  cmd
    .command('schema')
    .description('Show the columns of a table')
    .argument('<name>', 'Table name')
    .option('-i, --input', 'Show the push input schema instead')
    .action(async (name: string, options: { input?: boolean }) => {
      await runAction(`Failed to read schema for '${name}'`, async () => {
        const { client } = await openSession(getConfigPath);
        const columns = await withSpinner(`Fetching schema for ${name}...`, async () => {
          const table = await client.tableForName(name);
          return options.input ? ((await table.inputSchema()) ?? []) : table.schema();
        });

        if (getOutputOptions().json) {
          output(columns);
          return;
        }
        const display = client.show().display;
        if (columns.length === 0) {
          display.message(`Table '${name}' has no input schema.`);
          return;
        }
        display.showObjectList(columns, SCHEMA_COLUMNS);
      });
    });

  cmd
    .command('create')
    .description('Create an empty table')
    .argument('<name>', 'Table name')
    .action(async (name: string) => {
      await runAction(`Failed to create table '${name}'`, async () => {
        const { client } = await openSession(getConfigPath);
        const table = await withSpinner(`Creating table ${name}...`, () => client.createTable(name));
        outputSuccess(`Table '${table.name}' created (ID ${table.id})`, { name: table.name, id: table.id });
      });
    });

  cmd
    .command('drop')
    .description('Drop a table and its data')
    .argument('<name>', 'Table name')
    .action(async (name: string) => {
      await runAction(`Failed to drop table '${name}'`, async () => {
        const { client } = await openSession(getConfigPath);
        const table = await withSpinner(`Dropping table ${name}...`, async () => {
          const found = await client.tableForName(name);
          await found.drop();
          return found;
        });
        outputSuccess(`Table '${table.name}' dropped`, { name: table.name, id: table.id });
      });
    });

  cmd
    .command('insert')
    .description('Push events from a file (JSON array, JSON object or JSON Lines)')
    .argument('<name>', 'Table name')
    .argument('<file>', 'Events file')
    .action(async (name: string, file: string) => {
      await runAction(`Failed to insert into '${name}'`, async () => {
        const events = parseEvents(await readFile(file, 'utf-8'));
        if (events.length === 0) {
          output({ inserted: 0 }, `No events found in ${file}`);
          return;
        }

        const { client } = await openSession(getConfigPath);
        await withSpinner(`Pushing ${events.length} event(s)...`, async () => {
          const table = await client.tableForName(name);
          await table.insert(events);
        });
        outputSuccess(`Pushed ${events.length} event(s) to '${name}'`, { inserted: events.length });
      });
    });

  cmd
    .command('push')
    .description('Enable, disable or report the push endpoint of a table')
    .argument('<name>', 'Table name')
    .option('--enable', 'Enable the push endpoint')
    .option('--disable', 'Disable the push endpoint')
    .action(async (name: string, options: { enable?: boolean; disable?: boolean }) => {
      await runAction(`Failed to update push endpoint for '${name}'`, async () => {
        if (options.enable && options.disable) {
          throw new Error('Use only one of --enable and --disable');
        }

        const { client } = await openSession(getConfigPath);
        const table = await withSpinner(`Resolving table ${name}...`, () => client.tableForName(name));

        if (options.enable) {
          await withSpinner('Enabling push...', () => table.enablePush());
          outputSuccess(`Push enabled for '${name}'`, { pushEnabled: true });
        } else if (options.disable) {
          await withSpinner('Disabling push...', () => table.disablePush());
          outputSuccess(`Push disabled for '${name}'`, { pushEnabled: false });
        } else {
          const enabled = await withSpinner('Checking push...', () => table.isPushEnabled());
          output({ name, pushEnabled: enabled }, `Push is ${enabled ? 'enabled' : 'disabled'} for '${name}'`);
        }
      });
    });

  return cmd;
}
