/**
 * Assigns global IDs ({PROJECT}-{COMPONENT}-{NNN}) to backlog items
 */

import { Classifier } from './classifier';
import { IdRegistry } from './id-registry';
import { RegistryError, RegistryResult } from './errors';
import { BacklogItem, RegistryRecord } from './types';

export function formatGlobalId(prefix: string, sequence: number): string {
  return `${prefix}-${String(sequence).padStart(3, '0')}`;
}

export class IdAssigner {
  readonly sourceRepo: string;
  readonly projectCode: string;
  private registry: IdRegistry;
  private classifier: Classifier;

  constructor(sourceRepo: string, registry: IdRegistry, classifier: Classifier = new Classifier()) {
    this.sourceRepo = sourceRepo;
    this.registry = registry;
    this.classifier = classifier;
    this.projectCode = classifier.resolveProjectCode(sourceRepo);
  }

  /**
   * Give the item the next free ID under its prefix and register it.
   *
   * Counting and inserting are not atomic, so all calls against one
   * registry must run one after another.
   */
  assignId(item: BacklogItem): string {
    if (item.globalId) {
      throw new RegistryError(
        'AlreadyAssigned',
        `"${item.title}" already has global ID ${item.globalId}`
      );
    }

    const component = this.classifier.resolveComponentCode(item.labels);
    const prefix = `${this.projectCode}-${component}`;
    const globalId = formatGlobalId(prefix, this.registry.countByPrefix(prefix) + 1);

    const record: RegistryRecord = {
      globalId,
      project: this.projectCode,
      component,
      localNumber: item.localNumber,
      sourceRepo: this.sourceRepo,
      remoteNumber: null,
      title: item.title,
      labels: [...item.labels],
      milestone: item.milestone ?? null,
      status: 'open',
    };

    const inserted = this.registry.insert(record);
    if (!inserted.ok) {
      throw inserted.error;
    }

    item.globalId = globalId;
    return globalId;
  }

  /**
   * Store the tracker's issue number for an assigned ID
   */
  recordRemoteNumber(globalId: string, remoteNumber: number): RegistryResult<RegistryRecord> {
    return this.registry.updateRemoteNumber(globalId, remoteNumber);
  }
}
