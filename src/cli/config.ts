import * as yaml from 'js-yaml';
import { findConfigPath } from '../config';
import { parseArgs, resolveConfig } from './args';
import { DIM, EXIT_OK, NC, header } from './utils';

/** `image-mirror config [--json]` — print the resolved configuration */
export async function runConfig(args: string[]): Promise<number> {
  const parsed = parseArgs(args);
  const config = resolveConfig(parsed);

  if (parsed.switches.has('json')) {
    console.log(JSON.stringify(config, null, 2));
    return EXIT_OK;
  }

  const source = findConfigPath(parsed.options.get('config')) ?? 'defaults (no mirror.yaml found)';
  header('Configuration');
  console.log(`${DIM}# source: ${source}${NC}`);
  console.log(yaml.dump(config, { lineWidth: 120 }).trimEnd());
  console.log('');
  return EXIT_OK;
}
