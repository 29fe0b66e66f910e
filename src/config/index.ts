export * from './schema';
export { findConfigPath, loadConfig, parseConfig, resolveEnvValue, validateConfig } from './loader';
