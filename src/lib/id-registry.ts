/**
 * Durable registry of assigned global IDs, stored as a JSON document
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { RegistryRecord, RegistrySummaryEntry } from './types';
import { RegistryError, RegistryResult, ok, fail, errorMessage } from './errors';

export const DEFAULT_REGISTRY_FILE = 'global_registry.json';

// On-disk field names are shared with registries written by earlier importer versions
const StoredRecordSchema = z.object({
  global_id: z.string().min(1),
  project: z.string(),
  component: z.string(),
  local_number: z.number().int(),
  github_repo: z.string(),
  github_number: z.number().int().nullable(),
  title: z.string(),
  labels: z.array(z.string()),
  milestone: z.string().nullable(),
  status: z.string().default('open'),
}).passthrough();

const KNOWN_FIELDS = new Set(Object.keys(StoredRecordSchema.shape));

const StoredRegistrySchema = z.record(StoredRecordSchema);

type StoredRecord = z.infer<typeof StoredRecordSchema>;

function fromStored(stored: StoredRecord): RegistryRecord {
  const record: RegistryRecord = {
    globalId: stored.global_id,
    project: stored.project,
    component: stored.component,
    localNumber: stored.local_number,
    sourceRepo: stored.github_repo,
    remoteNumber: stored.github_number,
    title: stored.title,
    labels: [...stored.labels],
    milestone: stored.milestone,
    status: stored.status,
  };

  const extra = Object.entries(stored).filter(([key]) => !KNOWN_FIELDS.has(key));
  if (extra.length > 0) {
    record.extra = Object.fromEntries(extra);
  }
  return record;
}

function toStored(record: RegistryRecord): unknown {
  const fields: Record<string, unknown> = {
    ...record.extra,
    component: record.component,
    github_number: record.remoteNumber,
    github_repo: record.sourceRepo,
    global_id: record.globalId,
    labels: [...record.labels],
    local_number: record.localNumber,
    milestone: record.milestone,
    project: record.project,
    status: record.status,
    title: record.title,
  };

  return sortKeys(fields);
}

// Object keys are emitted in sorted order at every depth
function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((entry) => sortKeys(entry));
  }
  if (typeof value !== 'object' || value === null) {
    return value;
  }

  const sorted: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value).sort(([a], [b]) => compareText(a, b))) {
    sorted[key] = sortKeys(entry);
  }
  return sorted;
}

function cloneRecord(record: RegistryRecord): RegistryRecord {
  const copy: RegistryRecord = { ...record, labels: [...record.labels] };
  if (record.extra) {
    copy.extra = { ...record.extra };
  }
  return copy;
}

// Non-ASCII characters are written as \uXXXX escapes, matching registries written by earlier importer versions
function escapeNonAscii(json: string): string {
  return json.replace(
    /[\u0080-\uffff]/g,
    (char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`
  );
}

export class IdRegistry {
  readonly filePath: string;
  private entries: Map<string, RegistryRecord>;

  private constructor(filePath: string, entries: Map<string, RegistryRecord>) {
    this.filePath = filePath;
    this.entries = entries;
  }

  /**
   * Load the registry from disk. A missing file yields an empty registry;
   * an unreadable one throws a CorruptState error.
   */
  static load(filePath: string = DEFAULT_REGISTRY_FILE): IdRegistry {
    if (!fs.existsSync(filePath)) {
      return new IdRegistry(filePath, new Map());
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      throw new RegistryError(
        'CorruptState',
        `Registry ${filePath} is not valid JSON: ${errorMessage(error)}`
      );
    }

    const parsed = StoredRegistrySchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new RegistryError(
        'CorruptState',
        `Registry ${filePath} has an invalid entry at ${issue.path.join('.')}: ${issue.message}`
      );
    }

    const entries = new Map<string, RegistryRecord>();
    for (const [key, stored] of Object.entries(parsed.data)) {
      if (key !== stored.global_id) {
        throw new RegistryError(
          'CorruptState',
          `Registry ${filePath} key "${key}" does not match its global_id "${stored.global_id}"`
        );
      }
      entries.set(key, fromStored(stored));
    }

    return new IdRegistry(filePath, entries);
  }

  get size(): number {
    return this.entries.size;
  }

  has(globalId: string): boolean {
    return this.entries.has(globalId);
  }

  get(globalId: string): RegistryRecord | undefined {
    const record = this.entries.get(globalId);
    return record ? cloneRecord(record) : undefined;
  }

  /** All records, ordered by global ID */
  records(): RegistryRecord[] {
    return this.sortedRecords().map(cloneRecord);
  }

  /**
   * Count IDs starting with the given text. The match is textual, so
   * "VICS-RUST" also counts "VICS-RUST2-001".
   */
  countByPrefix(prefix: string): number {
    let count = 0;
    for (const globalId of this.entries.keys()) {
      if (globalId.startsWith(prefix)) {
        count++;
      }
    }
    return count;
  }

  /**
   * Add a new record. Existing records are never overwritten.
   */
  insert(record: RegistryRecord): RegistryResult<RegistryRecord> {
    if (this.entries.has(record.globalId)) {
      return fail('DuplicateId', `Global ID ${record.globalId} is already registered`);
    }

    const stored = cloneRecord(record);
    this.entries.set(record.globalId, stored);
    return ok(cloneRecord(stored));
  }

  /**
   * Record the issue number the tracker assigned and persist the registry
   */
  updateRemoteNumber(globalId: string, remoteNumber: number): RegistryResult<RegistryRecord> {
    const record = this.entries.get(globalId);
    if (!record) {
      return fail('NotFound', `Global ID ${globalId} is not in the registry`);
    }

    if (record.remoteNumber !== remoteNumber) {
      record.remoteNumber = remoteNumber;
      this.persist();
    }

    return ok(cloneRecord(record));
  }

  /**
   * Write the registry next to its target, then rename over it
   */
  persist(): void {
    const document: Record<string, unknown> = {};
    for (const record of this.sortedRecords()) {
      document[record.globalId] = toStored(record);
    }

    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const tempFile = `${this.filePath}.${process.pid}.tmp`;
    fs.writeFileSync(tempFile, escapeNonAscii(JSON.stringify(document, null, 2)), 'utf-8');
    fs.renameSync(tempFile, this.filePath);
  }

  /**
   * Count records per "{project}-{component}" group, sorted by group
   */
  summarize(): RegistrySummaryEntry[] {
    const groups = new Map<string, number>();
    for (const record of this.entries.values()) {
      const key = `${record.project}-${record.component}`;
      groups.set(key, (groups.get(key) ?? 0) + 1);
    }

    return Array.from(groups.entries())
      .sort(([a], [b]) => compareText(a, b))
      .map(([key, count]) => ({ key, count }));
  }

  private sortedRecords(): RegistryRecord[] {
    return Array.from(this.entries.values()).sort((a, b) => compareText(a.globalId, b.globalId));
  }
}

// Code-unit order, independent of locale
function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
