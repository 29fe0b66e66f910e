import { z } from 'zod';
import { TRANSFORM_POLICIES } from '../models/image';

export const TargetConfigSchema = z.object({
  registry: z.string().default('').describe('Target registry base, e.g. registry.example.com/mirror. Supports ${ENV_VAR}'),
  policy: z.enum(TRANSFORM_POLICIES).default('flatten-full').describe('How source repository paths become target names'),
});

export const RetryConfigSchema = z.object({
  max_attempts: z.number().int().min(1).max(10).default(3).describe('Attempts per pull/tag/push step, including the first'),
  base_delay_ms: z.number().int().min(0).default(1000).describe('Backoff after the first failed attempt; doubles each retry'),
  max_delay_ms: z.number().int().min(0).default(30000).describe('Upper bound for a single backoff'),
});

export const CleanupConfigSchema = z.object({
  enabled: z.boolean().default(true).describe('Remove pulled and tagged images after each entry'),
  prune: z.boolean().default(false).describe('Also prune unused containers, images, volumes and networks after each entry'),
});

export const DockerConfigSchema = z.object({
  binary: z.string().default('docker').describe('Container CLI used for pull/tag/push'),
  socket_path: z.string().default('/var/run/docker.sock').describe('Docker Engine API socket used for cleanup'),
});

export const MirrorConfigSchema = z.object({
  target: TargetConfigSchema.default({}).describe('Where images are mirrored to'),
  manifest: z.string().default('config/target-images.txt').describe('Image list used by catalog syncs'),
  log_file: z.string().default('logs/image-mappings.json').describe('Append-only mapping log'),
  retry: RetryConfigSchema.default({}).describe('Retry policy for transient transfer failures'),
  concurrency: z.number().int().min(1).max(16).default(1).describe('Entries transferred in parallel'),
  cleanup: CleanupConfigSchema.default({}).describe('Local cleanup between entries'),
  force: z.boolean().default(false).describe('Always transfer, ignoring the freshness window'),
  freshness_window: z.number().int().min(0).default(0).describe('Seconds a prior successful mirror stays fresh when force is off (0 = never skip)'),
  timeout_minutes: z.number().positive().optional().describe('Stop starting new entries after this long'),
  schedule: z.string().optional().describe('Cron expression for `image-mirror schedule`'),
  docker: DockerConfigSchema.default({}).describe('Container runtime settings'),
});

export type MirrorConfig = z.infer<typeof MirrorConfigSchema>;
