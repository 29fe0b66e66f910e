import * as fs from 'fs/promises';
import { ManifestUnreadableError } from './errors';

/** Raw reference lines in file order. Loaded once per run and never mutated. */
export type SyncManifest = readonly string[];

/**
 * Parse manifest text: one reference per line, `#` full-line comments and
 * blank lines dropped. Malformed references are kept for the engine to report.
 */
export function parseManifest(text: string): SyncManifest {
  return text
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line !== '' && !line.startsWith('#'));
}

export async function loadManifest(manifestPath: string): Promise<SyncManifest> {
  let content: string;
  try {
    content = await fs.readFile(manifestPath, 'utf-8');
  } catch (err) {
    throw new ManifestUnreadableError(manifestPath, err);
  }
  return parseManifest(content);
}
