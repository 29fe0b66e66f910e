import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { MappingRecord } from '../models/image';
import { parseConcatenatedJson } from '../utils/concatenatedJson';
import { isErrnoException } from './errors';
import { withFileLock } from './fileLock';

const MappingRecordSchema = z.object({
  source: z.string(),
  target: z.string().nullable(),
  timestamp: z.string(),
  // Records written before outcomes were tracked only ever described successful pushes
  outcome: z.enum(['success', 'failed']).default('success'),
  reason: z.string().optional(),
});

/**
 * Append-only store of mapping records, one JSON object per line.
 */
export class MappingLog {
  constructor(readonly filePath: string) {}

  /**
   * Append one record with a single write. Prior content is never rewritten;
   * if the file does not end in a newline (interrupted write) one is added
   * first so the new record stays independently parseable.
   */
  async append(record: MappingRecord): Promise<void> {
    const line = JSON.stringify(record) + '\n';

    await withFileLock(this.filePath, async () => {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      const prefix = (await this.endsWithNewline()) ? '' : '\n';
      await fs.appendFile(this.filePath, prefix + line, 'utf-8');
    });
  }

  /** Read every readable record in file order. A missing file is an empty log. */
  async load(): Promise<MappingRecord[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return [];
      throw err;
    }

    const { values, corrupt } = parseConcatenatedJson(content);
    const records: MappingRecord[] = [];
    let skipped = corrupt;

    for (const value of values) {
      const result = MappingRecordSchema.safeParse(value);
      if (result.success) {
        records.push(result.data);
      } else {
        skipped++;
      }
    }

    if (skipped > 0) {
      console.warn(`[MappingLog] Skipped ${skipped} unreadable record(s) in ${this.filePath}`);
    }
    return records;
  }

  /** Most recent successful record for this exact source and target */
  async findLatestSuccess(source: string, target: string): Promise<MappingRecord | undefined> {
    const records = await this.load();
    return latestSuccesses(records).get(historyKey(source, target));
  }

  private async endsWithNewline(): Promise<boolean> {
    let handle: fs.FileHandle;
    try {
      handle = await fs.open(this.filePath, 'r');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return true;
      throw err;
    }

    try {
      const { size } = await handle.stat();
      if (size === 0) return true;
      const last = Buffer.alloc(1);
      await handle.read(last, 0, 1, size - 1);
      return last[0] === 0x0a;
    } finally {
      await handle.close();
    }
  }
}

export function historyKey(source: string, target: string): string {
  return `${source} -> ${target}`;
}

/** Index the newest success per source/target pair */
export function latestSuccesses(records: MappingRecord[]): Map<string, MappingRecord> {
  const latest = new Map<string, MappingRecord>();
  for (const record of records) {
    if (record.outcome !== 'success' || record.target === null) continue;
    // An unparseable timestamp can never be compared, so it never counts as fresh
    if (Number.isNaN(Date.parse(record.timestamp))) continue;
    const key = historyKey(record.source, record.target);
    const current = latest.get(key);
    if (!current || Date.parse(record.timestamp) >= Date.parse(current.timestamp)) {
      latest.set(key, record);
    }
  }
  return latest;
}
