import { SyncReport } from '../models/image';
import { normalizeRegistry } from '../services/nameTransformer';
import { mirrorCatalog, mirrorImage, summarizeReport } from '../services/mirror';
import { ConfigurationError } from '../services/errors';
import { parseArgs, resolveConfig } from './args';
import { EXIT_FAILURES, EXIT_OK, NC, YELLOW, fail, header, info, success, warn } from './utils';

/** Where termination signals arrive; the process itself outside tests */
export interface SignalSource {
  on(event: 'SIGINT' | 'SIGTERM', listener: () => void): unknown;
  off(event: 'SIGINT' | 'SIGTERM', listener: () => void): unknown;
}

/**
 * Abort signal for one run: SIGINT/SIGTERM and the optional timeout stop new
 * entries from starting. A second signal exits immediately.
 */
export function createRunSignal(
  timeoutMinutes?: number,
  signals: SignalSource = process,
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();

  const handler = (name: string) => () => {
    if (controller.signal.aborted) {
      console.error(`\nReceived ${name} again, exiting`);
      process.exit(130);
    }
    console.error(`\n${YELLOW}Received ${name}: finishing in-flight images, no new ones will start${NC}`);
    controller.abort();
  };
  const onInt = handler('SIGINT');
  const onTerm = handler('SIGTERM');
  signals.on('SIGINT', onInt);
  signals.on('SIGTERM', onTerm);

  const timer = timeoutMinutes
    ? setTimeout(() => {
      console.error(`\n${YELLOW}Run timeout of ${timeoutMinutes} minute(s) reached; no new images will start${NC}`);
      controller.abort();
    }, timeoutMinutes * 60_000)
    : undefined;
  timer?.unref();

  return {
    signal: controller.signal,
    dispose: () => {
      signals.off('SIGINT', onInt);
      signals.off('SIGTERM', onTerm);
      if (timer) clearTimeout(timer);
    },
  };
}

/**
 * Print every entry's outcome and the summary; returns the exit code.
 */
export function printReport(report: SyncReport): number {
  header('Sync report');

  for (const record of report.records) {
    if (record.outcome === 'success') {
      success(`${record.source} -> ${record.target}`);
    } else {
      fail(`${record.source}: ${record.reason ?? 'failed'}`);
    }
  }
  for (const entry of report.skipped) {
    warn(`${entry.source} skipped (${entry.reason})`);
  }
  for (const warning of report.warnings) {
    warn(`Name collision: ${warning.message}`);
  }

  console.log('');
  info(summarizeReport(report));
  console.log('');

  const cancelled = report.skipped.filter(entry => entry.reason === 'cancelled').length;
  if (report.counts.failed > 0) {
    console.error(`${report.counts.failed} image(s) failed to mirror`);
  }
  if (cancelled > 0) {
    console.error(`${cancelled} image(s) not mirrored: run cancelled`);
  }
  return report.counts.failed > 0 || cancelled > 0 ? EXIT_FAILURES : EXIT_OK;
}

/** `image-mirror sync` — catalog mode */
export async function runSync(args: string[]): Promise<number> {
  const parsed = parseArgs(args);
  if (parsed.positionals.length > 0) {
    throw new ConfigurationError(`Unexpected argument '${parsed.positionals[0]}' (use "image-mirror mirror <image>" for a single image)`);
  }

  const config = resolveConfig(parsed);
  normalizeRegistry(config.target.registry);

  const { signal, dispose } = createRunSignal(config.timeout_minutes);
  try {
    return printReport(await mirrorCatalog(config, { signal }));
  } finally {
    dispose();
  }
}

/** `image-mirror mirror <image>` — single-image mode */
export async function runMirror(args: string[]): Promise<number> {
  const parsed = parseArgs(args);
  const [image, ...rest] = parsed.positionals;
  if (!image || rest.length > 0) {
    throw new ConfigurationError('Usage: image-mirror mirror <image> [options]');
  }

  const config = resolveConfig(parsed);
  normalizeRegistry(config.target.registry);

  const { signal, dispose } = createRunSignal(config.timeout_minutes);
  try {
    return printReport(await mirrorImage(config, image, { signal }));
  } finally {
    dispose();
  }
}
