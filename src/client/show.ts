/**
 * Show - renders Polaris information through a Display
 *
 * Intended for interactive use; switch to HTML output in notebook-like
 * hosts with asHtml().
 */

import type { Display } from '../display/display.js';
import type { Row } from '../table/types.js';
import type { PolarisClient } from './client.js';
import { DEFAULT_PROJECT } from './endpoints.js';
import type { Project, QueryRow, TableDetails, TableSummary } from './types.js';

export const PROJECT_HEADERS = ['Name', 'ID', 'Plan', 'Size (MB)', 'State'];

export const PROJECT_LABELS = {
  name: 'Name',
  uid: 'ID',
  plan: 'Plan',
  maxMb: 'Size Limit (MB)',
  currentMb: 'Current Size (MB)',
  desiredState: 'Desired State',
  state: 'Actual State',
};

/**
 * Bytes to megabytes, rounded to three decimals
 */
export function toMb(bytes: number): number {
  return Math.round(bytes / 1000) / 1000;
}

export class Show {
  constructor(
    private readonly client: PolarisClient,
    readonly display: Display
  ) {}

  getClient(): PolarisClient {
    return this.client;
  }

  asText(): void {
    this.display.text();
  }

  asHtml(): void {
    this.display.html();
  }

  object(obj: Record<string, unknown>): void {
    this.display.showObject(obj);
  }

  async tables(): Promise<void> {
    this.renderTables(await this.client.allTableSummaries());
  }

  renderTables(summaries: readonly TableSummary[]): void {
    const rows: Row[] = summaries.map((t) => [t.name]);
    this.display.showTable(rows, ['Table']);
  }

  async tableDetails(): Promise<void> {
    this.renderTableDetails(await this.client.allTableDetails());
  }

  renderTableDetails(details: readonly TableDetails[]): void {
    if (details.length === 0) {
      this.display.message('No tables defined.');
      return;
    }
    this.display.showObjectList(details);
  }

  async projects(): Promise<void> {
    this.renderProjects(await this.client.projects());
  }

  renderProjects(projects: readonly Project[]): void {
    if (projects.length === 0) {
      this.display.message('No projects available.');
      return;
    }
    const rows: Row[] = projects.map((p) => [
      p.metadata.name,
      p.metadata.uid,
      p.spec.plan,
      p.status.currentBytes === undefined ? undefined : toMb(p.status.currentBytes),
      p.status.state,
    ]);
    this.display.showTable(rows, PROJECT_HEADERS);
  }

  async project(name: string = DEFAULT_PROJECT): Promise<void> {
    this.renderProject(name, await this.client.project(name));
  }

  renderProject(name: string, project: Project | null): void {
    if (project === null) {
      this.display.alert(`Project ${name} is undefined`);
      return;
    }
    const details: Record<string, unknown> = {
      ...project.metadata,
      ...project.spec,
      ...project.status,
    };
    if (typeof project.status.maxBytes === 'number') {
      details.maxMb = toMb(project.status.maxBytes);
    }
    if (typeof project.status.currentBytes === 'number') {
      details.currentMb = toMb(project.status.currentBytes);
    }
    this.display.showObject(details, PROJECT_LABELS);
  }

  async sql(stmt: string): Promise<void> {
    this.renderQueryResults(await this.client.sql(stmt));
  }

  renderQueryResults(results: readonly QueryRow[]): void {
    if (results.length === 0) {
      this.display.message('Query returned no results.');
      return;
    }
    this.display.showObjectList(results);
  }
}
