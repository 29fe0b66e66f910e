import { createMappingLog } from '../services/mirror';
import { parseArgs, parsePositiveInt, resolveConfig } from './args';
import { DIM, EXIT_OK, GREEN, NC, RED, info } from './utils';

/** `image-mirror log [--tail n] [--json]` — print mapping records */
export async function runLog(args: string[]): Promise<number> {
  const parsed = parseArgs(args);
  const config = resolveConfig(parsed);
  const log = createMappingLog(config);

  let records = await log.load();
  const tail = parsed.options.get('tail');
  if (tail !== undefined) {
    records = records.slice(-parsePositiveInt('tail', tail));
  }

  if (parsed.switches.has('json')) {
    for (const record of records) {
      console.log(JSON.stringify(record));
    }
    return EXIT_OK;
  }

  if (records.length === 0) {
    info(`No mapping records in ${log.filePath}`);
    return EXIT_OK;
  }

  for (const record of records) {
    const outcome = record.outcome === 'success' ? `${GREEN}ok${NC}  ` : `${RED}fail${NC}`;
    const target = record.target ?? '-';
    const reason = record.reason ? ` ${DIM}(${record.reason})${NC}` : '';
    console.log(`${DIM}${record.timestamp}${NC} ${outcome} ${record.source} -> ${target}${reason}`);
  }
  return EXIT_OK;
}
