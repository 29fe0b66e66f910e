import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { ConfigurationError, errorMessage } from '../services/errors';
import { MirrorConfigSchema, MirrorConfig } from './schema';

/**
 * Find mirror.yaml.
 * Priority: explicit path > MIRROR_CONFIG env > ./mirror.yaml > ./config/mirror.yaml
 * Returns null when no file exists; defaults and CLI flags then apply.
 */
export function findConfigPath(explicit?: string): string | null {
  if (explicit) {
    return explicit;
  }
  if (process.env.MIRROR_CONFIG) {
    return process.env.MIRROR_CONFIG;
  }

  const cwd = process.cwd();
  const candidates = [
    path.join(cwd, 'mirror.yaml'),
    path.join(cwd, 'config', 'mirror.yaml'),
  ];

  return candidates.find(candidate => fs.existsSync(candidate)) ?? null;
}

/**
 * Load and validate configuration. Environment references in
 * target.registry are resolved, so the registry can come from a CI secret.
 */
export function loadConfig(explicitPath?: string): MirrorConfig {
  const configPath = findConfigPath(explicitPath);
  const rawConfig = configPath ? readYaml(configPath) : {};
  return parseConfig(rawConfig);
}

/**
 * Validate a raw document and resolve environment references in
 * target.registry.
 */
export function parseConfig(rawConfig: unknown): MirrorConfig {
  const config = validateConfig(rawConfig);
  return {
    ...config,
    target: { ...config.target, registry: resolveEnvValue(config.target.registry) },
  };
}

/**
 * Validate without interpolation, for values that are already resolved
 * (CLI overrides applied to a loaded configuration).
 */
export function validateConfig(rawConfig: unknown): MirrorConfig {
  const parseResult = MirrorConfigSchema.safeParse(rawConfig ?? {});

  if (!parseResult.success) {
    const errors = parseResult.error.errors
      .map(e => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new ConfigurationError(`Invalid configuration:\n${errors}`);
  }
  return parseResult.data;
}

function readYaml(configPath: string): unknown {
  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(`Cannot read configuration file '${configPath}': ${errorMessage(err)}`);
  }

  try {
    return yaml.load(content);
  } catch (err) {
    throw new ConfigurationError(`Invalid YAML in '${configPath}': ${errorMessage(err)}`);
  }
}

/** Allowed env var name pattern — prevents access to arbitrary process vars */
const SAFE_ENV_NAME = /^[A-Z][A-Z0-9_]*$/;

/**
 * Interpolate ${ENV_VAR} and ${ENV_VAR:default}.
 * Single-pass only — resolved values are NOT re-expanded.
 */
export function resolveEnvValue(template: string): string {
  return template.replace(/\$\{([^}:]+)(?::([^}]*))?\}/g, (match: string, envVar: string, defaultValue?: string) => {
    if (!SAFE_ENV_NAME.test(envVar)) return match;
    return process.env[envVar] || defaultValue || '';
  });
}
