import { ConfigurationError } from '../services/errors';
import { normalizeRegistry } from '../services/nameTransformer';
import { mirrorCatalog } from '../services/mirror';
import { startSyncScheduler, stopSyncScheduler } from '../services/scheduler';
import { parseArgs, resolveConfig } from './args';
import { EXIT_OK } from './utils';

/**
 * `image-mirror schedule` — stay in the foreground and run a catalog sync on
 * every tick of the configured cron schedule.
 */
export async function runSchedule(args: string[]): Promise<number> {
  const parsed = parseArgs(args);
  const config = resolveConfig(parsed);

  if (!config.schedule) {
    throw new ConfigurationError('No schedule configured (set `schedule` in mirror.yaml, e.g. "0 0 * * 0")');
  }
  normalizeRegistry(config.target.registry);

  const controller = new AbortController();
  await startSyncScheduler(config.schedule, () => mirrorCatalog(config, { signal: controller.signal }));

  await new Promise<void>(resolve => {
    const shutdown = (name: string) => {
      console.log(`[Scheduler] Received ${name}, shutting down`);
      controller.abort();
      resolve();
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  });

  await stopSyncScheduler();
  return EXIT_OK;
}
