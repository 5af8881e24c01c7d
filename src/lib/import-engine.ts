/**
 * Import engine: assigns global IDs, then creates milestones and issues
 */

import chalk from 'chalk';
import { IdAssigner } from './id-assigner';
import { IdRegistry } from './id-registry';
import { TrackerClient } from './tracker';
import { RegistryResult, errorMessage } from './errors';
import { BacklogItem, ImportResult, ParsedBacklog, RegistryRecord } from './types';

const TITLE_PREVIEW_LENGTH = 60;
const RULE = '='.repeat(60);

/**
 * Prefix the item body with its global ID
 */
export function buildIssueBody(globalId: string, body: string): string {
  return `**Global ID:** \`${globalId}\`\n\n---\n\n${body}`;
}

/**
 * Print ID counts per project-component group
 */
export function printRegistrySummary(registry: IdRegistry): void {
  const summary = registry.summarize();
  if (summary.length === 0) {
    console.log('No issues in registry yet');
    return;
  }

  console.log(chalk.bold('\nGlobal ID Summary:'));
  console.log(RULE);
  for (const { key, count } of summary) {
    console.log(`${key}: ${count} issues`);
  }
  console.log(RULE);
}

export class ImportEngine {
  private assigner: IdAssigner;
  private registry: IdRegistry;
  private tracker: TrackerClient;

  constructor(assigner: IdAssigner, registry: IdRegistry, tracker: TrackerClient) {
    this.assigner = assigner;
    this.registry = registry;
    this.tracker = tracker;
  }

  async run(backlog: ParsedBacklog): Promise<ImportResult> {
    const result: ImportResult = { assigned: [], created: [], milestones: [], errors: [] };

    // Every ID is assigned before the first remote call
    console.log('Assigning global IDs...');
    const items = [...backlog.epics, ...backlog.tasks];
    const assigned = items.map((item) => {
      const globalId = this.assigner.assignId(item);
      console.log(`  ${globalId}: ${item.title.slice(0, TITLE_PREVIEW_LENGTH)}`);
      result.assigned.push({ globalId, title: item.title, isEpic: item.isEpic });
      return { item, globalId };
    });

    printRegistrySummary(this.registry);

    if (this.tracker.live) {
      this.registry.persist();
      console.log(chalk.gray(`\nSaved registry to ${this.registry.filePath}`));
    }

    console.log(`\nCreating ${backlog.milestones.length} milestones...`);
    const milestoneNumbers = new Map<string, number>();
    for (const milestone of backlog.milestones) {
      try {
        const number = await this.tracker.ensureMilestone(milestone);
        milestoneNumbers.set(milestone.title, number);
        result.milestones.push({ title: milestone.title, number });
      } catch (error) {
        const message = errorMessage(error);
        console.error(chalk.red(`  Failed to create milestone ${milestone.title}: ${message}`));
        result.errors.push({ target: `milestone ${milestone.title}`, error: message });
      }
    }

    const epics = assigned.filter(({ item }) => item.isEpic);
    const tasks = assigned.filter(({ item }) => !item.isEpic);

    if (epics.length > 0) {
      console.log(`\nCreating ${epics.length} epics...`);
      for (const { item, globalId } of epics) {
        await this.createItem(item, globalId, milestoneNumbers, result);
      }
    }

    console.log(`\nCreating ${tasks.length} issues...`);
    for (const { item, globalId } of tasks) {
      await this.createItem(item, globalId, milestoneNumbers, result);
    }

    return result;
  }

  /**
   * Create one item on the tracker. Failures are recorded, never thrown.
   */
  private async createItem(
    item: BacklogItem,
    globalId: string,
    milestoneNumbers: Map<string, number>,
    result: ImportResult
  ): Promise<void> {
    if (!this.tracker.live) {
      console.log(
        chalk.gray(`  [DRY RUN] Would create ${item.isEpic ? 'epic' : 'issue'}: ${globalId}`)
      );
    }

    let remoteNumber: number;
    try {
      remoteNumber = await this.tracker.createIssue({
        title: item.title,
        body: buildIssueBody(globalId, item.body),
        labels: item.labels,
        localNumber: item.localNumber,
        milestoneNumber: item.milestone ? milestoneNumbers.get(item.milestone) : undefined,
      });
    } catch (error) {
      const message = errorMessage(error);
      console.error(chalk.red(`  Failed to create ${item.title}: ${message}`));
      result.errors.push({ target: globalId, error: message });
      return;
    }

    result.created.push({ globalId, remoteNumber });

    if (!this.tracker.live) {
      return;
    }

    console.log(chalk.green(`  Created ${globalId} (#${remoteNumber})`));

    let updated: RegistryResult<RegistryRecord>;
    try {
      updated = this.assigner.recordRemoteNumber(globalId, remoteNumber);
    } catch (error) {
      const message = `Created #${remoteNumber} but could not save the registry: ${errorMessage(error)}`;
      console.error(chalk.red(`  ${message}`));
      result.errors.push({ target: globalId, error: message });
      return;
    }

    if (!updated.ok) {
      console.warn(chalk.yellow(`  ⚠ ${updated.error.message}`));
      result.errors.push({ target: globalId, error: updated.error.message });
    }
  }
}
