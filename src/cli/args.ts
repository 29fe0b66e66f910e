import { loadConfig, validateConfig, MirrorConfig } from '../config';
import { ConfigurationError } from '../services/errors';
import { isTransformPolicy } from '../services/nameTransformer';

const VALUE_OPTIONS = new Set([
  'config',
  'manifest',
  'registry',
  'policy',
  'concurrency',
  'retries',
  'log-file',
  'tail',
  'output',
]);

const SWITCH_OPTIONS = new Set(['force', 'json']);

export interface ParsedArgs {
  positionals: string[];
  options: Map<string, string>;
  switches: Set<string>;
}

/**
 * Split CLI arguments into positionals, `--name value` / `--name=value`
 * options and boolean switches. Unknown options are rejected.
 */
export function parseArgs(args: string[]): ParsedArgs {
  const parsed: ParsedArgs = { positionals: [], options: new Map(), switches: new Set() };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith('--')) {
      parsed.positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    const inline = eq === -1 ? undefined : arg.slice(eq + 1);

    if (SWITCH_OPTIONS.has(name) && inline === undefined) {
      parsed.switches.add(name);
      continue;
    }

    if (VALUE_OPTIONS.has(name)) {
      const value = inline ?? args[i + 1];
      if (value === undefined || (inline === undefined && value.startsWith('--'))) {
        throw new ConfigurationError(`Missing value for --${name}`);
      }
      if (inline === undefined) i++;
      parsed.options.set(name, value);
      continue;
    }

    throw new ConfigurationError(`Unknown option: ${arg}`);
  }

  return parsed;
}

export function parsePositiveInt(name: string, value: string): number {
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new ConfigurationError(`--${name} must be a positive integer, got '${value}'`);
  }
  return Number(value);
}

/**
 * Load mirror.yaml and apply CLI overrides. The result is validated again so
 * flag values obey the same bounds as the file; environment references were
 * already resolved by loadConfig and are not expanded a second time.
 */
export function resolveConfig(args: ParsedArgs): MirrorConfig {
  const config = loadConfig(args.options.get('config'));
  const opt = (name: string) => args.options.get(name);

  const policy = opt('policy');
  if (policy !== undefined && !isTransformPolicy(policy)) {
    throw new ConfigurationError(`--policy must be one of flatten-full, last-segment-only, got '${policy}'`);
  }

  const concurrency = opt('concurrency');
  const retries = opt('retries');

  return validateConfig({
    ...config,
    target: {
      registry: opt('registry') ?? config.target.registry,
      policy: policy ?? config.target.policy,
    },
    manifest: opt('manifest') ?? config.manifest,
    log_file: opt('log-file') ?? config.log_file,
    concurrency: concurrency !== undefined ? parsePositiveInt('concurrency', concurrency) : config.concurrency,
    retry: {
      ...config.retry,
      max_attempts: retries !== undefined ? parsePositiveInt('retries', retries) : config.retry.max_attempts,
    },
    force: args.switches.has('force') || config.force,
  });
}
