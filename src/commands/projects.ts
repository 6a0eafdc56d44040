/**
 * Projects commands
 */

import { Command } from 'commander';
import { DEFAULT_PROJECT } from '../client/endpoints.js';
import { getOutputOptions, output } from '../utils/output.js';
import { withSpinner } from '../utils/spinner.js';
import { openSession, runAction } from './session.js';

export function createProjectsCommand(getConfigPath: () => string): Command {
  const cmd = new Command('projects').description('Inspect Polaris projects');

  cmd
    .command('list')
    .description('List projects with plan, size and state')
    .action(async () => {
      await runAction('Failed to list projects', async () => {
        const { client } = await openSession(getConfigPath);
        const projects = await withSpinner('Fetching projects...', () => client.projects());
        if (getOutputOptions().json) {
          output(projects);
        } else {
          client.show().renderProjects(projects);
        }
      });
    });

  cmd
    .command('show')
    .description('Show one project')
    .argument('[name]', 'Project name (case-insensitive)', DEFAULT_PROJECT)
    .action(async (name: string) => {
      await runAction(`Failed to show project '${name}'`, async () => {
        const { client } = await openSession(getConfigPath);
        const project = await withSpinner(`Fetching project ${name}...`, () => client.project(name));
        if (!getOutputOptions().json) {
          client.show().renderProject(name, project);
          return;
        }
        if (project === null) {
          throw new Error(`Project ${name} is undefined`);
        }
        output(project);
      });
    });

  return cmd;
}
