#!/usr/bin/env node

/**
 * Backlog Import CLI
 *
 * Imports a markdown backlog into GitHub with stable global IDs
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import path from 'path';
import { GitHubClient } from './lib/github-client';
import { Classifier, DEFAULT_TAXONOMY, loadTaxonomy } from './lib/classifier';
import { IdRegistry } from './lib/id-registry';
import { IdAssigner } from './lib/id-assigner';
import { ImportEngine, printRegistrySummary } from './lib/import-engine';
import { DryRunTracker, GitHubTracker, TrackerClient } from './lib/tracker';
import { readBacklogFile } from './lib/backlog-parser';
import { loadConfig, loadEnvFiles, getGitHubToken } from './lib/config';
import { RegistryError, errorMessage } from './lib/errors';
import { ImportResult } from './lib/types';

loadEnvFiles();
const CONFIG = loadConfig();

interface ImportOptions {
  live?: boolean;
  registry?: string;
  taxonomy?: string;
}

/**
 * Print a fatal error and exit
 */
function fail(message: string, hints: string[] = []): never {
  console.error(chalk.red(`Error: ${message}`));
  for (const hint of hints) {
    console.error(chalk.gray(hint));
  }
  process.exit(1);
}

/**
 * Load the registry, exiting before any assignment if it is corrupt
 */
function openRegistry(registryFile: string): IdRegistry {
  try {
    return IdRegistry.load(registryFile);
  } catch (error) {
    if (error instanceof RegistryError && error.kind === 'CorruptState') {
      fail(error.message, ['Fix or move the registry file; no IDs were assigned.']);
    }
    throw error;
  }
}

/**
 * Build the tracker for live or dry-run mode
 */
async function createTracker(repo: string, live: boolean): Promise<TrackerClient> {
  if (!live) {
    return new DryRunTracker();
  }

  const token = getGitHubToken();
  if (!token) {
    fail('No GitHub authentication found', [
      'Either run:',
      '  gh auth login',
      'Or set GITHUB_TOKEN env var (for CI/CD)',
    ]);
  }

  const tracker = new GitHubTracker(new GitHubClient(token, repo));
  const spinner = ora('Verifying GitHub access...').start();
  const hasAccess = await tracker.verifyAccess();

  if (!hasAccess) {
    spinner.fail('GitHub access verification failed');
    fail('Unable to access repository', [
      `Repo: ${repo}`,
      'Check your gh auth or GITHUB_TOKEN permissions',
    ]);
  }

  spinner.succeed('GitHub access verified');
  return tracker;
}

function printImportResult(result: ImportResult): void {
  console.log(chalk.bold('\n━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━'));
  console.log(chalk.bold.cyan('Import Results'));
  console.log(chalk.bold('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━\n'));

  console.log(chalk.green(`✓ Assigned IDs: ${result.assigned.length}`));
  console.log(chalk.green(`✓ Milestones: ${result.milestones.length}`));
  console.log(chalk.green(`✓ Issues: ${result.created.length}`));

  if (result.errors.length > 0) {
    console.log(chalk.red(`✗ Errors: ${result.errors.length}`));
    for (const err of result.errors) {
      console.log(chalk.red(`  ${err.target}: ${err.error}`));
    }
  }

  console.log();
}

function printNextSteps(repo: string, markdownFile: string, live: boolean, registryFile: string): void {
  console.log(chalk.bold('NEXT STEPS:'));
  if (!live) {
    console.log('1. Review the global IDs above');
    console.log('2. If the project code is MISC, add the repository to the taxonomy file');
    console.log('3. Run with --live to create the issues');
    console.log(chalk.gray(`4. Command: backlog-import import ${markdownFile} ${repo} --live`));
  } else {
    console.log(`1. Issues created in ${repo}`);
    console.log(`2. Registry saved to ${registryFile}`);
    console.log('3. Add the issues to a project board manually or via GitHub Actions');
  }
}

const program = new Command();

program
  .name('backlog-import')
  .description('Import a markdown backlog into GitHub issues with global IDs')
  .version('1.0.0');

program
  .command('import', { isDefault: true })
  .description('Assign global IDs and create milestones, epics and issues')
  .argument('<markdown-file>', 'Backlog markdown file')
  .argument('[repo]', 'GitHub repository (owner/repo); defaults to GITHUB_REPO or the origin remote')
  .option('--live', 'Actually create milestones and issues (default is a dry run)')
  .option('--registry <path>', 'Registry file', CONFIG.registryFile)
  .option('--taxonomy <path>', 'Custom taxonomy JSON file')
  .action(async (markdownFile: string, repoArg: string | undefined, options: ImportOptions) => {
    const repo = repoArg || CONFIG.repo;
    if (!repo) {
      fail('Could not determine GitHub repository', [
        'Pass it as an argument, set GITHUB_REPO, or add a GitHub origin remote.',
      ]);
    }

    const live = Boolean(options.live);
    const registryFile = path.resolve(options.registry || CONFIG.registryFile);
    const taxonomyFile = options.taxonomy ? path.resolve(options.taxonomy) : CONFIG.taxonomyFile;

    const registry = openRegistry(registryFile);
    const classifier = new Classifier(taxonomyFile ? loadTaxonomy(taxonomyFile) : DEFAULT_TAXONOMY);
    const assigner = new IdAssigner(repo, registry, classifier);

    console.log(chalk.bold(`Starting GitHub import for ${repo}`));
    console.log(`Reading from: ${markdownFile}`);
    console.log(`Project Code: ${assigner.projectCode}`);
    console.log(`Mode: ${live ? chalk.red('LIVE') : chalk.yellow('DRY RUN')}\n`);

    const backlog = readBacklogFile(path.resolve(markdownFile));
    const tracker = await createTracker(repo, live);
    const engine = new ImportEngine(assigner, registry, tracker);

    const result = await engine.run(backlog);

    printImportResult(result);
    printNextSteps(repo, markdownFile, live, registryFile);
  });

program
  .command('summary')
  .description('Show global ID counts per project and component')
  .option('--registry <path>', 'Registry file', CONFIG.registryFile)
  .action((options: { registry: string }) => {
    const registry = openRegistry(path.resolve(options.registry));
    printRegistrySummary(registry);
  });

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`\nError: ${errorMessage(error)}`));
  process.exit(1);
});
