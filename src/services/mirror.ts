import * as path from 'path';
import { MirrorConfig } from '../config';
import { createRegistryClient, RegistryClient } from '../adapters/registry';
import { SyncReport } from '../models/image';
import { loadManifest, SyncManifest } from './manifest';
import { MappingLog } from './mappingLog';
import { normalizeRegistry } from './nameTransformer';
import { SyncEngine } from './sync';

export interface MirrorRunOptions {
  signal?: AbortSignal;
  /** Defaults to the docker client built from config */
  client?: RegistryClient;
}

export function createMappingLog(config: MirrorConfig): MappingLog {
  return new MappingLog(path.resolve(config.log_file));
}

export function createSyncEngine(config: MirrorConfig, options: MirrorRunOptions = {}): SyncEngine {
  return new SyncEngine({
    targetRegistry: config.target.registry,
    policy: config.target.policy,
    client: options.client ?? createRegistryClient(config),
    log: createMappingLog(config),
    retry: {
      maxAttempts: config.retry.max_attempts,
      baseDelayMs: config.retry.base_delay_ms,
      maxDelayMs: config.retry.max_delay_ms,
    },
    concurrency: config.concurrency,
    force: config.force,
    freshnessWindowMs: config.freshness_window * 1000,
    signal: options.signal,
  });
}

/**
 * Mirror a single image (single-image mode).
 */
export function mirrorImage(config: MirrorConfig, image: string, options: MirrorRunOptions = {}): Promise<SyncReport> {
  return createSyncEngine(config, options).sync([image]);
}

/**
 * Mirror every image of an already loaded manifest.
 */
export function mirrorManifest(config: MirrorConfig, manifest: SyncManifest, options: MirrorRunOptions = {}): Promise<SyncReport> {
  return createSyncEngine(config, options).sync(manifest);
}

/**
 * Load the configured manifest and mirror it (catalog mode).
 * Throws ConfigurationError or ManifestUnreadableError before any transfer.
 */
export async function mirrorCatalog(config: MirrorConfig, options: MirrorRunOptions = {}): Promise<SyncReport> {
  normalizeRegistry(config.target.registry);
  const manifest = await loadManifest(path.resolve(config.manifest));
  return mirrorManifest(config, manifest, options);
}

export function summarizeReport(report: SyncReport): string {
  const { succeeded, failed, skipped } = report.counts;
  return `${succeeded} succeeded, ${failed} failed, ${skipped} skipped`;
}
