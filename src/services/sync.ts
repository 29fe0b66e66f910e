import {
  ImageReference,
  MappingRecord,
  NameCollisionWarning,
  SkippedEntry,
  StepAttempts,
  SyncEntryResult,
  SyncReport,
  TransformPolicy,
} from '../models/image';
import { RegistryClient } from '../adapters/registry/types';
import { EntryGate } from './entryGate';
import { MalformedReferenceError, errorMessage } from './errors';
import { SyncManifest } from './manifest';
import { MappingLog, historyKey, latestSuccesses } from './mappingLog';
import { formatTarget, normalizeRegistry, toTargetImage } from './nameTransformer';
import { formatReference, parseReference } from './reference';
import { DEFAULT_RETRY_POLICY, RetryPolicy, Sleeper, isRetryable, withRetry } from './retry';

export type PlannedEntry =
  | { kind: 'malformed'; index: number; raw: string; reason: string }
  | { kind: 'transfer'; index: number; raw: string; source: string; repository: string; target: string };

export interface SyncPlan {
  registry: string;
  entries: PlannedEntry[];
  warnings: NameCollisionWarning[];
}

/**
 * Resolve every manifest line to a source/target pair, in manifest order.
 *
 * Collisions are decided here, before any transfer, so precedence follows
 * the manifest regardless of how many workers run.
 */
export function planSync(manifest: SyncManifest, targetRegistry: string, policy: TransformPolicy): SyncPlan {
  const registry = normalizeRegistry(targetRegistry);
  const entries: PlannedEntry[] = [];
  const warnings: NameCollisionWarning[] = [];
  const claimed = new Map<string, string>();

  manifest.forEach((raw, index) => {
    const ref = parseEntry(raw);
    if (ref instanceof MalformedReferenceError) {
      entries.push({ kind: 'malformed', index, raw, reason: ref.message });
      return;
    }

    const source = formatReference(ref);
    const target = formatTarget(toTargetImage(ref, registry, policy));

    const previous = claimed.get(target);
    if (previous === undefined) {
      claimed.set(target, ref.repository);
    } else if (previous !== ref.repository) {
      warnings.push({
        type: 'name-collision',
        target,
        source,
        previousSource: previous,
        message: `${source} maps to ${target}, already claimed by ${previous}; the later push overwrites it`,
      });
    }

    entries.push({ kind: 'transfer', index, raw, source, repository: ref.repository, target });
  });

  return { registry, entries, warnings };
}

function parseEntry(raw: string): ImageReference | MalformedReferenceError {
  try {
    return parseReference(raw);
  } catch (err) {
    if (err instanceof MalformedReferenceError) return err;
    throw err;
  }
}

export interface SyncEngineOptions {
  targetRegistry: string;
  policy: TransformPolicy;
  client: RegistryClient;
  /** Records are appended here as entries finish */
  log?: MappingLog;
  retry?: Partial<RetryPolicy>;
  /** Workers transferring in parallel; 1 keeps the run sequential */
  concurrency?: number;
  /** Transfer even when a fresh successful record exists */
  force?: boolean;
  /** How long a prior success stays fresh when force is off; 0 never skips */
  freshnessWindowMs?: number;
  /** Once aborted, no new entry starts; in-flight entries finish */
  signal?: AbortSignal;
  sleep?: Sleeper;
  now?: () => Date;
}

/**
 * Mirrors every manifest entry into the target registry: pull, tag, push,
 * cleanup. One entry's failure never stops the others; every outcome ends
 * up in the report and the mapping log.
 */
export class SyncEngine {
  private client: RegistryClient;
  private log?: MappingLog;
  private retry: RetryPolicy;
  private concurrency: number;
  private force: boolean;
  private freshnessWindowMs: number;
  private signal?: AbortSignal;
  private sleep?: Sleeper;
  private now: () => Date;
  private gate = new EntryGate();

  constructor(private options: SyncEngineOptions) {
    this.client = options.client;
    this.log = options.log;
    this.retry = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
    this.force = options.force ?? false;
    this.freshnessWindowMs = options.freshnessWindowMs ?? 0;
    this.signal = options.signal;
    this.sleep = options.sleep;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Run one sync over the manifest. Throws only ConfigurationError (no target
   * registry), before anything is transferred.
   */
  async sync(manifest: SyncManifest): Promise<SyncReport> {
    const startedAt = this.now().toISOString();
    const plan = planSync(manifest, this.options.targetRegistry, this.options.policy);

    for (const warning of plan.warnings) {
      console.warn(`[Sync] Name collision: ${warning.message}`);
    }

    const fresh = await this.loadFreshness();
    const results: SyncEntryResult[] = [];
    const skipped: SkippedEntry[] = [];
    const total = plan.entries.length;
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < total) {
        const entry = plan.entries[next++];

        if (this.signal?.aborted) {
          skipped.push(skipOf(entry, 'cancelled'));
          continue;
        }

        if (entry.kind === 'transfer' && this.isFresh(fresh, entry)) {
          console.log(`[Sync] (${entry.index + 1}/${total}) ${entry.source} is fresh, skipping`);
          skipped.push(skipOf(entry, 'fresh'));
          continue;
        }

        const result = await this.runEntry(entry, total);
        results.push(result);
        await this.append(result.record);
      }
    };

    const workers = Array.from({ length: Math.min(this.concurrency, Math.max(total, 1)) }, () => worker());
    await Promise.all(workers);

    if (this.signal?.aborted && skipped.some(s => s.reason === 'cancelled')) {
      console.warn('[Sync] Run cancelled; remaining entries were not started');
    }

    results.sort((a, b) => a.index - b.index);
    skipped.sort((a, b) => a.index - b.index);
    const records = results.map(r => r.record);
    const succeeded = records.filter(r => r.outcome === 'success').length;

    return {
      startedAt,
      finishedAt: this.now().toISOString(),
      records,
      entries: results,
      skipped,
      warnings: plan.warnings,
      counts: {
        succeeded,
        failed: records.length - succeeded,
        skipped: skipped.length,
      },
    };
  }

  private async runEntry(entry: PlannedEntry, total: number): Promise<SyncEntryResult> {
    const attempts: StepAttempts = { pull: 0, tag: 0, push: 0 };
    const position = `(${entry.index + 1}/${total})`;

    if (entry.kind === 'malformed') {
      console.error(`[Sync] ${position} ${entry.reason}`);
      return { index: entry.index, attempts, record: this.record(entry.raw, null, entry.reason) };
    }

    console.log(`[Sync] ${position} ${entry.source} -> ${entry.target}`);
    const refs = [entry.target, entry.source];
    await this.gate.enter(refs);
    const failure = await this.transfer(entry.source, entry.target, attempts);

    // Claims are dropped before cleanup so an exclusive section can wait for the other workers
    const release = this.gate.leave(refs);
    await this.cleanup(entry.source, entry.target, release.removable);
    release.done();

    if (failure) {
      console.error(`[Sync] ${position} Failed: ${failure}`);
    } else {
      console.log(`[Sync] ${position} Mirrored ${entry.source} to ${entry.target}`);
    }

    return { index: entry.index, attempts, record: this.record(entry.source, entry.target, failure) };
  }

  /** Returns the failure reason, or null on success */
  private async transfer(source: string, target: string, attempts: StepAttempts): Promise<string | null> {
    const steps: Array<[keyof StepAttempts, () => Promise<void>]> = [
      ['pull', () => this.client.pull(source)],
      ['tag', () => this.client.tag(source, target)],
      ['push', () => this.client.push(target)],
    ];

    for (const [step, run] of steps) {
      const result = await withRetry(run, {
        policy: this.retry,
        sleep: this.sleep,
        onRetry: (attempt, delay, error) => {
          console.warn(
            `[Sync] ${step} failed (attempt ${attempt}/${this.retry.maxAttempts}), retrying in ${delay}ms: ${errorMessage(error)}`,
          );
        },
      });
      attempts[step] = result.attempts;

      if (!result.ok) {
        return isRetryable(result.error)
          ? `${step} failed after ${result.attempts} attempts: ${errorMessage(result.error)}`
          : `${step} failed: ${errorMessage(result.error)}`;
      }
    }
    return null;
  }

  private async cleanup(source: string, target: string, removable: readonly string[]): Promise<void> {
    if (!this.client.cleanup) return;
    try {
      await this.client.cleanup(source, target, {
        removable,
        exclusive: <T>(fn: () => Promise<T>) => this.gate.exclusive(fn),
      });
    } catch (err) {
      console.warn(`[Sync] Cleanup after ${source} failed: ${errorMessage(err)}`);
    }
  }

  private record(source: string, target: string | null, failure: string | null): MappingRecord {
    const record: MappingRecord = {
      source,
      target,
      timestamp: this.now().toISOString(),
      outcome: failure ? 'failed' : 'success',
    };
    if (failure) {
      record.reason = failure;
    }
    return record;
  }

  private async append(record: MappingRecord): Promise<void> {
    if (!this.log) return;
    try {
      await this.log.append(record);
    } catch (err) {
      console.error(`[MappingLog] Failed to record ${record.source}: ${errorMessage(err)}`);
    }
  }

  private async loadFreshness(): Promise<Map<string, MappingRecord>> {
    if (this.force || this.freshnessWindowMs <= 0 || !this.log) {
      return new Map();
    }
    try {
      return latestSuccesses(await this.log.load());
    } catch (err) {
      console.warn(`[Sync] Cannot read mapping log, transferring everything: ${errorMessage(err)}`);
      return new Map();
    }
  }

  private isFresh(fresh: Map<string, MappingRecord>, entry: { source: string; target: string }): boolean {
    const prior = fresh.get(historyKey(entry.source, entry.target));
    if (!prior) return false;
    return this.now().getTime() - Date.parse(prior.timestamp) < this.freshnessWindowMs;
  }
}

function skipOf(entry: PlannedEntry, reason: SkippedEntry['reason']): SkippedEntry {
  return entry.kind === 'transfer'
    ? { index: entry.index, source: entry.source, target: entry.target, reason }
    : { index: entry.index, source: entry.raw, target: null, reason };
}

/**
 * Mirror a manifest with a one-off engine.
 */
export function sync(
  manifest: SyncManifest,
  targetRegistry: string,
  policy: TransformPolicy,
  client: RegistryClient,
  options: Omit<SyncEngineOptions, 'targetRegistry' | 'policy' | 'client'> = {},
): Promise<SyncReport> {
  return new SyncEngine({ ...options, targetRegistry, policy, client }).sync(manifest);
}
