/**
 * Shared types for the backlog import system
 */

export interface BacklogItem {
  localNumber: number;
  title: string;
  body: string;
  labels: string[];
  milestone?: string;
  epic?: string; // title of the parent epic, informational only
  estimatedTime?: string;
  isEpic: boolean;
  globalId?: string;
}

export interface Milestone {
  title: string;
  duration: string;
  description: string;
}

export interface ParsedBacklog {
  milestones: Milestone[];
  epics: BacklogItem[];
  tasks: BacklogItem[];
}

export interface RegistryRecord {
  globalId: string;
  project: string;
  component: string;
  localNumber: number;
  sourceRepo: string;
  remoteNumber: number | null;
  title: string;
  labels: string[];
  milestone: string | null;
  status: string;
  extra?: Record<string, unknown>; // stored fields this version does not interpret
}

export interface RegistrySummaryEntry {
  key: string; // "{project}-{component}"
  count: number;
}

export type RegistryErrorKind =
  | 'CorruptState'
  | 'DuplicateId'
  | 'NotFound'
  | 'AlreadyAssigned';

export interface ImportResult {
  assigned: Array<{ globalId: string; title: string; isEpic: boolean }>;
  created: Array<{ globalId: string; remoteNumber: number }>;
  milestones: Array<{ title: string; number: number }>;
  errors: Array<{ target: string; error: string }>;
}
