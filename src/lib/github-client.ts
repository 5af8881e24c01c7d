/**
 * GitHub API client wrapper using Octokit
 */

import { Octokit } from '@octokit/rest';

const DEFAULT_LABEL_COLOR = 'ededed';

export class GitHubClient {
  private octokit: Octokit;
  private owner: string;
  private repo: string;
  private labelCache: Set<string> | null = null;

  constructor(token: string, repoFullName: string) {
    this.octokit = new Octokit({
      auth: token,
      log: {
        debug: () => {},
        info: () => {},
        warn: () => {},
        error: console.error,
      },
    });

    const parts = repoFullName.split('/');
    if (parts.length !== 2 || !parts[0] || !parts[1]) {
      throw new Error(`Invalid repo format: ${repoFullName}. Expected "owner/repo"`);
    }
    this.owner = parts[0];
    this.repo = parts[1];
  }

  get fullName(): string {
    return `${this.owner}/${this.repo}`;
  }

  /**
   * Create a new issue and return its number
   */
  async createIssue(title: string, body: string, labels: string[]): Promise<number> {
    const { data } = await this.octokit.issues.create({
      owner: this.owner,
      repo: this.repo,
      title,
      body,
      labels,
    });

    return data.number;
  }

  /**
   * Attach an issue to a milestone
   */
  async setIssueMilestone(issueNumber: number, milestoneNumber: number): Promise<void> {
    await this.octokit.issues.update({
      owner: this.owner,
      repo: this.repo,
      issue_number: issueNumber,
      milestone: milestoneNumber,
    });
  }

  /**
   * Find a milestone (open or closed) by exact title
   */
  async findMilestone(title: string): Promise<number | null> {
    const milestones = await this.octokit.paginate(this.octokit.issues.listMilestones, {
      owner: this.owner,
      repo: this.repo,
      state: 'all',
      per_page: 100,
    });

    const match = milestones.find((m) => m.title === title);
    return match ? match.number : null;
  }

  /**
   * Create a milestone and return its number
   */
  async createMilestone(title: string, description: string): Promise<number> {
    const { data } = await this.octokit.issues.createMilestone({
      owner: this.owner,
      repo: this.repo,
      title,
      description,
    });

    return data.number;
  }

  /**
   * Verify GitHub token has correct permissions
   */
  async verifyAccess(): Promise<boolean> {
    try {
      await this.octokit.repos.get({
        owner: this.owner,
        repo: this.repo,
      });
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Fetch existing label names once per client. Names are lowercased since
   * GitHub compares labels case-insensitively.
   */
  private async fetchLabelCache(): Promise<Set<string>> {
    if (this.labelCache) return this.labelCache;

    const labels = await this.octokit.paginate(this.octokit.issues.listLabelsForRepo, {
      owner: this.owner,
      repo: this.repo,
      per_page: 100,
    });

    this.labelCache = new Set(labels.map((label) => label.name.toLowerCase()));
    return this.labelCache;
  }

  /**
   * Create any labels in the list that the repository does not have yet
   */
  async ensureLabels(labels: string[]): Promise<void> {
    const existing = await this.fetchLabelCache();

    for (const name of labels) {
      if (existing.has(name.toLowerCase())) continue;

      await this.octokit.issues.createLabel({
        owner: this.owner,
        repo: this.repo,
        name,
        color: DEFAULT_LABEL_COLOR,
      });
      existing.add(name.toLowerCase());
    }
  }
}
