import * as path from 'path';
import { ConfigurationError, ManifestUnreadableError } from '../services/errors';
import { extractImages, loadCompose, migrateComposeFile } from '../services/compose';
import { loadManifest, SyncManifest } from '../services/manifest';
import { parseArgs, resolveConfig } from './args';
import { EXIT_OK, header, info, success, warn } from './utils';

function composePathOf(positionals: string[], usage: string): string {
  const [composePath, ...rest] = positionals;
  if (!composePath || rest.length > 0) {
    throw new ConfigurationError(`Usage: ${usage}`);
  }
  return composePath;
}

/** `image-mirror extract <compose>` — list the images a compose file uses */
export async function runExtract(args: string[]): Promise<number> {
  const parsed = parseArgs(args);
  const composePath = composePathOf(parsed.positionals, 'image-mirror extract <compose-file>');

  const images = extractImages(await loadCompose(composePath), composePath);
  if (parsed.switches.has('json')) {
    console.log(JSON.stringify(images));
  } else {
    images.forEach(image => console.log(image));
  }
  return EXIT_OK;
}

/**
 * `image-mirror migrate <compose> [--output path]` — point a compose file at
 * the mirrored images. Only images in the manifest are rewritten; without a
 * readable manifest every image is.
 */
export async function runMigrate(args: string[]): Promise<number> {
  const parsed = parseArgs(args);
  const composePath = composePathOf(parsed.positionals, 'image-mirror migrate <compose-file> [--output <path>]');
  const config = resolveConfig(parsed);

  let catalog: SyncManifest | undefined;
  try {
    catalog = await loadManifest(path.resolve(config.manifest));
  } catch (err) {
    if (!(err instanceof ManifestUnreadableError)) throw err;
    warn(`${err.message}; migrating every image`);
  }

  const { outputPath, changes } = await migrateComposeFile(composePath, {
    registry: config.target.registry,
    policy: config.target.policy,
    catalog,
    output: parsed.options.get('output'),
  });

  header('Compose migration');
  for (const change of changes) {
    success(`${change.service} (${change.field}): ${change.image} -> ${change.target}`);
  }
  console.log('');
  info(`${changes.length} image(s) rewritten, written to ${outputPath}`);
  console.log('');
  return EXIT_OK;
}
