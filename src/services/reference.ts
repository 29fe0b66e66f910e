import { ImageReference } from '../models/image';
import { MalformedReferenceError } from './errors';

export const DEFAULT_TAG = 'latest';

/** Docker tag grammar: word character first, up to 128 characters */
const TAG_RE = /^[A-Za-z0-9_][A-Za-z0-9_.-]{0,127}$/;

/** First path component of the form host:port */
const HOST_PORT_RE = /^[^:]+:\d+$/;

/**
 * Parse a raw image reference such as `abc/nginx:1234`, `ollama/ollama` or
 * `ghcr.io/astral-sh/uv:latest` into repository and tag.
 *
 * The tag separator is the last ':' after the last '/', so a registry port
 * (`localhost:5000/app`) is never read as a tag.
 */
export function parseReference(raw: string): ImageReference {
  const input = raw.trim();
  if (!input) {
    throw new MalformedReferenceError(raw, 'reference is empty');
  }

  const lastSlash = input.lastIndexOf('/');
  const lastColon = input.lastIndexOf(':');

  let repository = input;
  let tag = DEFAULT_TAG;

  if (lastColon > lastSlash) {
    repository = input.slice(0, lastColon);
    tag = input.slice(lastColon + 1);
    if (!tag) {
      throw new MalformedReferenceError(raw, 'tag is empty');
    }
    if (!TAG_RE.test(tag)) {
      throw new MalformedReferenceError(raw, `invalid tag '${tag}'`);
    }
  }

  if (!repository) {
    throw new MalformedReferenceError(raw, 'repository is empty');
  }

  validateRepository(raw, repository);
  return { repository, tag };
}

function validateRepository(raw: string, repository: string): void {
  if (/\s/.test(repository)) {
    throw new MalformedReferenceError(raw, 'repository contains whitespace');
  }
  if (repository.includes('@')) {
    throw new MalformedReferenceError(raw, 'digest references are not supported');
  }

  const components = repository.split('/');
  if (components.some(c => c === '')) {
    throw new MalformedReferenceError(raw, 'repository has an empty path component');
  }

  components.forEach((component, i) => {
    if (!component.includes(':')) return;
    // Only a registry host may carry a colon, and only when a path follows it
    const isHostPort = i === 0 && components.length > 1 && HOST_PORT_RE.test(component);
    if (!isHostPort) {
      throw new MalformedReferenceError(raw, `unexpected ':' in '${component}'`);
    }
  });
}

export function formatReference(ref: ImageReference): string {
  return `${ref.repository}:${ref.tag}`;
}
