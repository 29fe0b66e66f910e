import * as path from 'path';
import { loadManifest } from '../services/manifest';
import { planSync } from '../services/sync';
import { parseArgs, resolveConfig } from './args';
import { BOLD, EXIT_FAILURES, EXIT_OK, NC, fail, header, info, warn } from './utils';

/**
 * `image-mirror plan [image]` — show where each image would be mirrored
 * without pulling or pushing anything.
 */
export async function runPlan(args: string[]): Promise<number> {
  const parsed = parseArgs(args);
  const config = resolveConfig(parsed);

  const manifest = parsed.positionals.length > 0
    ? parsed.positionals
    : await loadManifest(path.resolve(config.manifest));

  const plan = planSync(manifest, config.target.registry, config.target.policy);

  header(`Plan (${config.target.policy} -> ${plan.registry})`);

  let malformed = 0;
  for (const entry of plan.entries) {
    if (entry.kind === 'malformed') {
      malformed++;
      fail(entry.reason);
      continue;
    }
    console.log(`  ${BOLD}Source:${NC} ${entry.source}`);
    console.log(`  ${BOLD}Target:${NC} ${entry.target}`);
    console.log('  ---');
  }

  for (const warning of plan.warnings) {
    warn(`Name collision: ${warning.message}`);
  }

  console.log('');
  info(`${plan.entries.length} image(s), ${malformed} malformed, ${plan.warnings.length} collision(s)`);
  console.log('');

  return malformed > 0 ? EXIT_FAILURES : EXIT_OK;
}
