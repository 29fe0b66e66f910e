import { ImageReference, TargetImage, TransformPolicy, TRANSFORM_POLICIES } from '../models/image';
import { ConfigurationError } from './errors';

export function isTransformPolicy(value: string): value is TransformPolicy {
  return (TRANSFORM_POLICIES as readonly string[]).includes(value);
}

/**
 * Map a source repository path to a target repository name.
 *
 * last-segment-only drops org and registry prefixes, so `a/web` and `b/web`
 * both become `web`. The sync engine reports such collisions.
 */
export function transformName(repository: string, policy: TransformPolicy): string {
  switch (policy) {
    case 'flatten-full':
      // A host port colon is flattened too, otherwise the name is not a valid repository
      return repository.replace(/[/:]/g, '-');
    case 'last-segment-only':
      return repository.slice(repository.lastIndexOf('/') + 1);
    default:
      throw new ConfigurationError(`Unsupported transform policy: ${String(policy)}`);
  }
}

/**
 * Normalize a registry base: drop any scheme and trailing slashes.
 * Throws ConfigurationError when nothing is left.
 */
export function normalizeRegistry(base: string | undefined): string {
  const registry = (base ?? '')
    .trim()
    .replace(/^https?:\/\//, '')
    .replace(/\/+$/, '');

  if (!registry) {
    throw new ConfigurationError('Target registry is not configured (set target.registry or --registry)');
  }
  return registry;
}

export function toTargetImage(ref: ImageReference, registry: string, policy: TransformPolicy): TargetImage {
  return {
    registry: normalizeRegistry(registry),
    name: transformName(ref.repository, policy),
    tag: ref.tag,
  };
}

export function formatTarget(target: TargetImage): string {
  return `${target.registry}/${target.name}:${target.tag}`;
}
