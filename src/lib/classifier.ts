/**
 * Label and repository classifier for global ID prefixes
 *
 * Both lookup tables are ordered lists: the first matching entry wins, so the
 * order in the taxonomy file is part of its meaning.
 */

import fs from 'fs';
import chalk from 'chalk';
import { z } from 'zod';
import defaultTaxonomyJson from '../data/taxonomy.json';

export const MISC_CODE = 'MISC';

const CodeSchema = z.string().regex(/^[A-Z0-9]+$/, 'codes must be uppercase alphanumeric');

export const TaxonomySchema = z.object({
  projects: z.array(z.object({ match: z.string().min(1), code: CodeSchema })),
  components: z.array(z.object({ label: z.string().min(1), code: CodeSchema })),
  heuristics: z.array(
    z.object({ contains: z.array(z.string().min(1)).min(1), code: CodeSchema })
  ),
});

export type Taxonomy = z.infer<typeof TaxonomySchema>;

export const DEFAULT_TAXONOMY: Taxonomy = TaxonomySchema.parse(defaultTaxonomyJson);

/**
 * Load a custom taxonomy file, replacing the built-in tables
 */
export function loadTaxonomy(filePath: string): Taxonomy {
  const content = fs.readFileSync(filePath, 'utf-8');
  const parsed = TaxonomySchema.safeParse(JSON.parse(content));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid taxonomy file ${filePath}: ${issue.path.join('.')} ${issue.message}`);
  }
  return parsed.data;
}

export class Classifier {
  private readonly taxonomy: Taxonomy;

  constructor(taxonomy: Taxonomy = DEFAULT_TAXONOMY) {
    this.taxonomy = taxonomy;
  }

  /**
   * Map a repository ("owner/name" or "name") to its project code.
   * Warns and returns MISC when nothing matches.
   */
  resolveProjectCode(repoIdentifier: string): string {
    const segment = repoIdentifier.split('/').pop() ?? '';

    if (segment) {
      const exact = this.taxonomy.projects.find((p) => p.match === segment);
      if (exact) {
        return exact.code;
      }

      const partial = this.taxonomy.projects.find(
        (p) => segment.includes(p.match) || p.match.includes(segment)
      );
      if (partial) {
        return partial.code;
      }
    }

    console.warn(
      chalk.yellow(`⚠ Repository "${repoIdentifier}" has no project code, using ${MISC_CODE}`)
    );
    console.warn(chalk.gray('  Add it to the taxonomy file to give it a project code'));
    return MISC_CODE;
  }

  /**
   * Map an ordered label list to a component code
   */
  resolveComponentCode(labels: string[]): string {
    for (const label of labels) {
      const normalized = label.toLowerCase().trim();
      const entry = this.taxonomy.components.find((c) => c.label.toLowerCase() === normalized);
      if (entry) {
        return entry.code;
      }
    }

    // Fall back to keywords anywhere in the label text
    const labelText = labels.join(' ').toLowerCase();
    const heuristic = this.taxonomy.heuristics.find((h) =>
      h.contains.some((needle) => labelText.includes(needle.toLowerCase()))
    );

    return heuristic ? heuristic.code : MISC_CODE;
  }
}

const defaultClassifier = new Classifier();

export function resolveProjectCode(repoIdentifier: string): string {
  return defaultClassifier.resolveProjectCode(repoIdentifier);
}

export function resolveComponentCode(labels: string[]): string {
  return defaultClassifier.resolveComponentCode(labels);
}
