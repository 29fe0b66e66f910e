#!/usr/bin/env node
import { runSync, runMirror } from './cli/run';
import { runPlan } from './cli/plan';
import { runLog } from './cli/log';
import { runSchedule } from './cli/schedule';
import { runConfig } from './cli/config';
import { runExtract, runMigrate } from './cli/compose';
import { exitCodeFor } from './cli/utils';
import { VERSION } from './version';

const command = process.argv[2];
const args = process.argv.slice(3);

const run = (fn: (args: string[]) => Promise<number>) =>
  fn(args)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`\n\x1b[31mError:\x1b[0m ${message}\n`);
      process.exitCode = exitCodeFor(err);
    });

switch (command) {
  case 'sync':
    run(runSync);
    break;

  case 'mirror':
    run(runMirror);
    break;

  case 'plan':
    run(runPlan);
    break;

  case 'log':
    run(runLog);
    break;

  case 'schedule':
    run(runSchedule);
    break;

  case 'config':
    run(runConfig);
    break;

  case 'extract':
    run(runExtract);
    break;

  case 'migrate':
    run(runMigrate);
    break;

  case '--version':
  case '-v':
    console.log(VERSION);
    break;

  case undefined:
  case '--help':
  case '-h':
    console.log('');
    console.log(`  \x1b[1mimage-mirror\x1b[0m v${VERSION}`);
    console.log('');
    console.log('  Usage: image-mirror <command> [options]');
    console.log('');
    console.log('  Commands:');
    console.log('    sync [--force]           Mirror every image in the manifest (catalog mode)');
    console.log('    mirror <image> [--force] Mirror a single image');
    console.log('    plan [image...]          Show source -> target mapping without transferring');
    console.log('    log [--tail n] [--json]  Show the mapping log');
    console.log('    schedule                 Run catalog syncs on the configured cron schedule');
    console.log('    config [--json]          Show the resolved configuration');
    console.log('    extract <compose>        List the images a compose file uses');
    console.log('    migrate <compose>        Rewrite compose images to their mirrors (--output <path>)');
    console.log('');
    console.log('  Options:');
    console.log('    --config <path>          Path to mirror.yaml');
    console.log('    --manifest <path>        Image list (default config/target-images.txt)');
    console.log('    --registry <base>        Target registry base');
    console.log('    --policy <policy>        flatten-full | last-segment-only');
    console.log('    --concurrency <n>        Images transferred in parallel (default 1)');
    console.log('    --retries <n>            Attempts per pull/tag/push step (default 3)');
    console.log('    --log-file <path>        Mapping log (default logs/image-mappings.json)');
    console.log('');
    console.log('  Exit status: 0 all mirrored, 1 some images failed, 2 manifest unreadable, 3 configuration error');
    console.log('');
    console.log('  Environment:');
    console.log('    MIRROR_CONFIG            Path to mirror.yaml (auto-detected if not set)');
    console.log('');
    break;

  default:
    console.error(`Unknown command: ${command}`);
    console.error('Run "image-mirror --help" for usage.');
    process.exitCode = 1;
}
