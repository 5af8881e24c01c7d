/**
 * Backlog Import - Programmatic API
 *
 * Export all classes and types for programmatic usage
 */

export {
  Classifier,
  DEFAULT_TAXONOMY,
  MISC_CODE,
  TaxonomySchema,
  loadTaxonomy,
  resolveComponentCode,
  resolveProjectCode,
} from './lib/classifier';
export type { Taxonomy } from './lib/classifier';
export { IdRegistry, DEFAULT_REGISTRY_FILE } from './lib/id-registry';
export { IdAssigner, formatGlobalId } from './lib/id-assigner';
export { parseBacklog, readBacklogFile, parseLabels, buildTaskBody } from './lib/backlog-parser';
export { GitHubClient } from './lib/github-client';
export { GitHubTracker, DryRunTracker } from './lib/tracker';
export type { TrackerClient, IssueDraft } from './lib/tracker';
export { ImportEngine, buildIssueBody, printRegistrySummary } from './lib/import-engine';
export { loadConfig } from './lib/config';
export type { ImportConfig } from './lib/config';
export { RegistryError } from './lib/errors';
export type { RegistryResult } from './lib/errors';

export * from './lib/types';
