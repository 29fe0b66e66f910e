/**
 * Core value types shared by the parser, transformer, engine and mapping log.
 */

export interface ImageReference {
  /** Slash-delimited path, including a registry host when one was given */
  repository: string;
  tag: string;
}

export const TRANSFORM_POLICIES = ['flatten-full', 'last-segment-only'] as const;

/**
 * How a source repository path becomes a target repository name.
 * - flatten-full: every path separator becomes '-' (abc/nginx -> abc-nginx)
 * - last-segment-only: only the final component is kept (langgenius/dify-api -> dify-api)
 */
export type TransformPolicy = typeof TRANSFORM_POLICIES[number];

export interface TargetImage {
  /** Registry base without scheme or trailing slash */
  registry: string;
  name: string;
  tag: string;
}

export type MappingOutcome = 'success' | 'failed';

export interface MappingRecord {
  source: string;
  /** Serialized target, or null when the source line could not be parsed */
  target: string | null;
  timestamp: string;
  outcome: MappingOutcome;
  reason?: string;
}

export interface StepAttempts {
  pull: number;
  tag: number;
  push: number;
}

export interface SyncEntryResult {
  /** Position of the entry in the manifest */
  index: number;
  record: MappingRecord;
  attempts: StepAttempts;
}

export type SkipReason = 'cancelled' | 'fresh';

export interface SkippedEntry {
  index: number;
  source: string;
  target: string | null;
  reason: SkipReason;
}

export interface NameCollisionWarning {
  type: 'name-collision';
  target: string;
  source: string;
  previousSource: string;
  message: string;
}

export interface SyncReport {
  startedAt: string;
  finishedAt: string;
  /** Final outcome of every attempted entry, in manifest order */
  records: MappingRecord[];
  entries: SyncEntryResult[];
  skipped: SkippedEntry[];
  warnings: NameCollisionWarning[];
  counts: {
    succeeded: number;
    failed: number;
    skipped: number;
  };
}
