import cron, { ScheduledTask } from 'node-cron';
import { SyncReport } from '../models/image';
import { ConfigurationError } from './errors';
import { summarizeReport } from './mirror';

let scheduledTask: ScheduledTask | null = null;

/**
 * Run catalog syncs on a cron schedule. A run still in progress when the
 * next tick fires is not overlapped.
 */
export async function startSyncScheduler(schedule: string, runSync: () => Promise<SyncReport>): Promise<ScheduledTask> {
  if (!cron.validate(schedule)) {
    throw new ConfigurationError(`Invalid cron expression for schedule: "${schedule}"`);
  }

  await stopSyncScheduler();

  const task = cron.schedule(schedule, async () => {
    const startTime = new Date().toISOString();
    console.log(`[Scheduler] Starting scheduled sync at ${startTime}`);

    try {
      const report = await runSync();
      console.log(`[Scheduler] Sync complete — ${summarizeReport(report)}`);
    } catch (error) {
      console.error('[Scheduler] Sync failed with error:', error);
    }
  }, { name: 'catalog-sync', noOverlap: true });

  scheduledTask = task;
  console.log(`[Scheduler] Started (schedule: "${schedule}")`);
  return task;
}

export async function stopSyncScheduler(): Promise<void> {
  if (scheduledTask) {
    const task = scheduledTask;
    scheduledTask = null;
    await task.stop();
    console.log('[Scheduler] Stopped');
  }
}
