/**
 * Issue tracker backends: GitHub for live runs, a no-op tracker for dry runs
 */

import chalk from 'chalk';
import { GitHubClient } from './github-client';
import { errorMessage } from './errors';
import { Milestone } from './types';

export const DRY_RUN_MILESTONE_NUMBER = 999;

export interface IssueDraft {
  title: string;
  body: string;
  labels: string[];
  localNumber: number;
  milestoneNumber?: number;
}

export interface TrackerClient {
  /** False when nothing is written to the tracker */
  readonly live: boolean;

  verifyAccess(): Promise<boolean>;

  /** Reuse a milestone with the same title or create it */
  ensureMilestone(milestone: Milestone): Promise<number>;

  /** Create an issue and return the tracker's issue number */
  createIssue(draft: IssueDraft): Promise<number>;
}

export class GitHubTracker implements TrackerClient {
  readonly live = true;
  private github: GitHubClient;

  constructor(github: GitHubClient) {
    this.github = github;
  }

  verifyAccess(): Promise<boolean> {
    return this.github.verifyAccess();
  }

  async ensureMilestone(milestone: Milestone): Promise<number> {
    const existing = await this.github.findMilestone(milestone.title);
    if (existing !== null) {
      console.log(chalk.gray(`  Milestone exists: ${milestone.title} (#${existing})`));
      return existing;
    }

    const number = await this.github.createMilestone(milestone.title, milestone.description);
    console.log(chalk.green(`  Created milestone: ${milestone.title} (#${number})`));
    return number;
  }

  async createIssue(draft: IssueDraft): Promise<number> {
    if (draft.labels.length > 0) {
      await this.github.ensureLabels(draft.labels);
    }

    const issueNumber = await this.github.createIssue(draft.title, draft.body, draft.labels);

    // The issue exists at this point; a milestone failure only warrants a warning
    if (draft.milestoneNumber !== undefined) {
      try {
        await this.github.setIssueMilestone(issueNumber, draft.milestoneNumber);
        console.log(chalk.gray(`    → Added to milestone #${draft.milestoneNumber}`));
      } catch (error) {
        console.warn(
          chalk.yellow(`    ⚠ Milestone assignment failed for #${issueNumber}: ${errorMessage(error)}`)
        );
      }
    }

    return issueNumber;
  }
}

export class DryRunTracker implements TrackerClient {
  readonly live = false;

  async verifyAccess(): Promise<boolean> {
    return true;
  }

  async ensureMilestone(milestone: Milestone): Promise<number> {
    console.log(chalk.gray(`  [DRY RUN] Would create milestone: ${milestone.title}`));
    return DRY_RUN_MILESTONE_NUMBER;
  }

  async createIssue(draft: IssueDraft): Promise<number> {
    return draft.localNumber;
  }
}
