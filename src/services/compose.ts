import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { ImageReference, TransformPolicy } from '../models/image';
import { ComposeFileError, MalformedReferenceError, errorMessage } from './errors';
import { SyncManifest } from './manifest';
import { formatTarget, normalizeRegistry, toTargetImage } from './nameTransformer';
import { formatReference, parseReference } from './reference';

export type ComposeDocument = Record<string, unknown>;

export interface ComposeImageUse {
  service: string;
  field: 'image' | 'build.image';
  image: string;
}

export interface ComposeChange extends ComposeImageUse {
  target: string;
}

export interface MigrateOptions {
  registry: string;
  policy: TransformPolicy;
  /** Only images listed here (by full reference or repository) are rewritten; all when absent */
  catalog?: SyncManifest;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Service definitions of a compose document. Files without a top-level
 * `services` key are the legacy format, where services sit at the root.
 */
function servicesOf(doc: ComposeDocument, composePath: string): Record<string, unknown> {
  const services = 'services' in doc ? doc.services : doc;
  if (!isRecord(services)) {
    throw new ComposeFileError(composePath, 'no services mapping');
  }
  return services;
}

/** A reference the sync engine could mirror; interpolated values are left alone */
function mirrorable(image: unknown): ImageReference | null {
  if (typeof image !== 'string' || image.includes('$')) return null;
  try {
    return parseReference(image);
  } catch (err) {
    if (err instanceof MalformedReferenceError) return null;
    throw err;
  }
}

function imageUses(doc: ComposeDocument, composePath: string): Array<ComposeImageUse & { holder: Record<string, unknown> }> {
  const uses: Array<ComposeImageUse & { holder: Record<string, unknown> }> = [];

  for (const [service, definition] of Object.entries(servicesOf(doc, composePath))) {
    if (!isRecord(definition)) continue;

    if (typeof definition.image === 'string' && mirrorable(definition.image)) {
      uses.push({ service, field: 'image', image: definition.image, holder: definition });
    }
    const build = definition.build;
    if (isRecord(build) && typeof build.image === 'string' && mirrorable(build.image)) {
      uses.push({ service, field: 'build.image', image: build.image, holder: build });
    }
  }
  return uses;
}

export function parseCompose(text: string, composePath: string): ComposeDocument {
  let doc: unknown;
  try {
    doc = yaml.load(text);
  } catch (err) {
    throw new ComposeFileError(composePath, `invalid YAML: ${errorMessage(err)}`);
  }
  if (!isRecord(doc)) {
    throw new ComposeFileError(composePath, 'not a YAML mapping');
  }
  return doc;
}

export async function loadCompose(composePath: string): Promise<ComposeDocument> {
  let text: string;
  try {
    text = await fs.readFile(composePath, 'utf-8');
  } catch (err) {
    throw new ComposeFileError(composePath, errorMessage(err));
  }
  return parseCompose(text, composePath);
}

/**
 * Distinct images referenced by `services.*.image` and
 * `services.*.build.image`, sorted.
 */
export function extractImages(doc: ComposeDocument, composePath = '<compose>'): string[] {
  const images = new Set(imageUses(doc, composePath).map(use => use.image));
  return [...images].sort();
}

/**
 * Rewrite images in place to their mirrored names. Returns what changed.
 */
export function migrateCompose(doc: ComposeDocument, options: MigrateOptions, composePath = '<compose>'): ComposeChange[] {
  const registry = normalizeRegistry(options.registry);
  const selected = options.catalog ? catalogKeys(options.catalog) : null;
  const changes: ComposeChange[] = [];

  for (const { holder, ...use } of imageUses(doc, composePath)) {
    const ref = mirrorable(use.image);
    if (!ref) continue;
    if (selected && !selected.has(formatReference(ref)) && !selected.has(ref.repository)) continue;

    const target = formatTarget(toTargetImage(ref, registry, options.policy));
    holder.image = target;
    changes.push({ ...use, target });
  }
  return changes;
}

/** Full references and bare repositories of every parseable catalog line */
function catalogKeys(catalog: SyncManifest): Set<string> {
  const keys = new Set<string>();
  for (const line of catalog) {
    const ref = mirrorable(line);
    if (!ref) continue;
    keys.add(formatReference(ref));
    keys.add(ref.repository);
  }
  return keys;
}

/** `docker-compose.yml` -> `docker-compose.migrated.yml` */
export function migratedPath(composePath: string): string {
  const ext = path.extname(composePath);
  return `${composePath.slice(0, composePath.length - ext.length)}.migrated${ext}`;
}

/**
 * Migrate a compose file and write the result beside it (or to output).
 */
export async function migrateComposeFile(
  composePath: string,
  options: MigrateOptions & { output?: string },
): Promise<{ outputPath: string; changes: ComposeChange[] }> {
  const doc = await loadCompose(composePath);
  const changes = migrateCompose(doc, options, composePath);
  const outputPath = options.output ?? migratedPath(composePath);

  await fs.writeFile(outputPath, yaml.dump(doc, { lineWidth: -1, noRefs: true }), 'utf-8');
  return { outputPath, changes };
}
