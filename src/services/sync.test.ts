import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { SyncEngine, SyncEngineOptions, planSync, sync } from './sync';
import { MappingLog } from './mappingLog';
import { ConfigurationError, PermanentTransferError, TransientTransferError } from './errors';
import { CleanupContext, RegistryClient } from '../adapters/registry/types';

const REGISTRY = 'registry.example.com/mirror';
const NOW = new Date('2024-05-01T12:00:00.000Z');

/**
 * In-process RegistryClient: records every call and throws queued errors.
 */
class FakeRegistryClient implements RegistryClient {
  calls: string[] = [];
  failures = new Map<string, Error[]>();
  inFlight = 0;
  maxInFlight = 0;
  onPull?: (reference: string) => void;
  pullDelayMs = 0;

  failNext(call: string, ...errors: Error[]): void {
    this.failures.set(call, errors);
  }

  async pull(reference: string): Promise<void> {
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      this.onPull?.(reference);
      if (this.pullDelayMs > 0) {
        await new Promise(resolve => setTimeout(resolve, this.pullDelayMs));
      }
      this.call(`pull ${reference}`);
    } finally {
      this.inFlight--;
    }
  }

  async tag(source: string, target: string): Promise<void> {
    this.call(`tag ${source} ${target}`);
  }

  async push(reference: string): Promise<void> {
    this.call(`push ${reference}`);
  }

  async cleanup(source: string): Promise<void> {
    this.calls.push(`cleanup ${source}`);
  }

  private call(call: string): void {
    this.calls.push(call);
    const error = this.failures.get(call)?.shift();
    if (error) throw error;
  }
}

describe('planSync', () => {
  it('should resolve targets in manifest order', () => {
    const plan = planSync(['abc/nginx:1234', 'ollama/ollama'], `https://${REGISTRY}/`, 'flatten-full');

    expect(plan.registry).toBe(REGISTRY);
    expect(plan.entries).toEqual([
      { kind: 'transfer', index: 0, raw: 'abc/nginx:1234', source: 'abc/nginx:1234', repository: 'abc/nginx', target: `${REGISTRY}/abc-nginx:1234` },
      { kind: 'transfer', index: 1, raw: 'ollama/ollama', source: 'ollama/ollama:latest', repository: 'ollama/ollama', target: `${REGISTRY}/ollama-ollama:latest` },
    ]);
    expect(plan.warnings).toEqual([]);
  });

  it('should flag a target already claimed by another repository', () => {
    const plan = planSync(['a/web', 'b/web'], REGISTRY, 'last-segment-only');

    expect(plan.warnings).toEqual([
      {
        type: 'name-collision',
        target: `${REGISTRY}/web:latest`,
        source: 'b/web:latest',
        previousSource: 'a/web',
        message: `b/web:latest maps to ${REGISTRY}/web:latest, already claimed by a/web; the later push overwrites it`,
      },
    ]);
  });

  it('should not flag the same repository listed twice', () => {
    expect(planSync(['a/web', 'a/web:latest'], REGISTRY, 'last-segment-only').warnings).toEqual([]);
  });

  it('should not flag different tags of colliding names', () => {
    expect(planSync(['a/web:1', 'b/web:2'], REGISTRY, 'last-segment-only').warnings).toEqual([]);
  });
});

describe('SyncEngine', () => {
  let dir: string;
  let log: MappingLog;
  let client: FakeRegistryClient;
  const sleep = vi.fn(async (_ms: number) => {});

  function engine(overrides: Partial<SyncEngineOptions> = {}): SyncEngine {
    return new SyncEngine({
      targetRegistry: REGISTRY,
      policy: 'flatten-full',
      client,
      log,
      sleep,
      now: () => NOW,
      ...overrides,
    });
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'sync-engine-'));
    log = new MappingLog(path.join(dir, 'image-mappings.json'));
    client = new FakeRegistryClient();
    sleep.mockClear();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should pull, tag, push and clean up each entry in order', async () => {
    const report = await engine().sync(['abc/nginx:1234']);

    expect(client.calls).toEqual([
      'pull abc/nginx:1234',
      `tag abc/nginx:1234 ${REGISTRY}/abc-nginx:1234`,
      `push ${REGISTRY}/abc-nginx:1234`,
      'cleanup abc/nginx:1234',
    ]);
    expect(report.records).toEqual([
      { source: 'abc/nginx:1234', target: `${REGISTRY}/abc-nginx:1234`, timestamp: NOW.toISOString(), outcome: 'success' },
    ]);
    expect(report.counts).toEqual({ succeeded: 1, failed: 0, skipped: 0 });
  });

  it('should isolate a malformed entry', async () => {
    const report = await engine().sync(['nginx:latest', 'bad::ref', 'redis:6-alpine']);

    expect(report.records.map(r => r.outcome)).toEqual(['success', 'failed', 'success']);
    expect(report.records[1]).toEqual({
      source: 'bad::ref',
      target: null,
      timestamp: NOW.toISOString(),
      outcome: 'failed',
      reason: "Malformed image reference 'bad::ref': unexpected ':' in 'bad:'",
    });
    expect(report.records[2].target).toBe(`${REGISTRY}/redis:6-alpine`);
    expect(report.counts).toEqual({ succeeded: 2, failed: 1, skipped: 0 });
    expect(client.calls.filter(c => c.startsWith('pull'))).toEqual(['pull nginx:latest', 'pull redis:6-alpine']);
  });

  it('should warn on a name collision and log both mappings', async () => {
    const report = await engine({ policy: 'last-segment-only' }).sync(['a/web', 'b/web']);

    expect(report.warnings).toHaveLength(1);
    expect(report.warnings[0].previousSource).toBe('a/web');
    expect(console.warn).toHaveBeenCalledWith(`[Sync] Name collision: ${report.warnings[0].message}`);

    const logged = await log.load();
    expect(logged.map(r => r.target)).toEqual([`${REGISTRY}/web:latest`, `${REGISTRY}/web:latest`]);
    expect(logged.map(r => r.source)).toEqual(['a/web:latest', 'b/web:latest']);
  });

  it('should retry transient failures and log only the final outcome', async () => {
    client.failNext('pull nginx:latest', new TransientTransferError('timeout'), new TransientTransferError('timeout'));

    const report = await engine().sync(['nginx:latest']);

    expect(report.entries[0].attempts).toEqual({ pull: 3, tag: 1, push: 1 });
    expect(report.records).toHaveLength(1);
    expect(report.records[0].outcome).toBe('success');
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
    await expect(log.load()).resolves.toHaveLength(1);
  });

  it('should fail an entry once retries are exhausted and continue', async () => {
    client.failNext(
      'pull nginx:latest',
      new TransientTransferError('i/o timeout'),
      new TransientTransferError('i/o timeout'),
      new TransientTransferError('i/o timeout'),
    );

    const report = await engine().sync(['nginx:latest', 'redis:6-alpine']);

    expect(report.records[0]).toMatchObject({
      outcome: 'failed',
      reason: 'pull failed after 3 attempts: i/o timeout',
    });
    expect(report.entries[0].attempts).toEqual({ pull: 3, tag: 0, push: 0 });
    expect(report.records[1].outcome).toBe('success');
    expect(client.calls).toContain('cleanup nginx:latest');
  });

  it('should not retry permanent failures', async () => {
    client.failNext(
      `push ${REGISTRY}/nginx:latest`,
      new PermanentTransferError('denied: requested access to the resource is denied'),
    );

    const report = await engine().sync(['nginx:latest']);

    expect(report.records[0].reason).toBe('push failed: denied: requested access to the resource is denied');
    expect(report.entries[0].attempts).toEqual({ pull: 1, tag: 1, push: 1 });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should honour the configured attempt bound', async () => {
    client.failNext('pull nginx:latest', new TransientTransferError('reset'), new TransientTransferError('reset'));

    const report = await engine({ retry: { maxAttempts: 2 } }).sync(['nginx:latest']);

    expect(report.records[0].reason).toBe('pull failed after 2 attempts: reset');
  });

  it('should keep an entry successful when cleanup fails', async () => {
    client.cleanup = async () => {
      throw new Error('socket hang up');
    };

    const report = await engine().sync(['nginx:latest']);

    expect(report.records[0].outcome).toBe('success');
    expect(console.warn).toHaveBeenCalledWith('[Sync] Cleanup after nginx:latest failed: socket hang up');
  });

  it('should fail with ConfigurationError before transferring when no registry is set', async () => {
    await expect(engine({ targetRegistry: '  ' }).sync(['nginx:latest'])).rejects.toBeInstanceOf(ConfigurationError);
    expect(client.calls).toEqual([]);
  });

  it('should produce equal reports when a catalog is forced twice', async () => {
    const manifest = ['nginx:latest', 'redis:6-alpine', 'ollama/ollama'];

    const first = await engine({ force: true }).sync(manifest);
    const second = await engine({ force: true }).sync(manifest);

    expect(first.counts).toEqual({ succeeded: 3, failed: 0, skipped: 0 });
    expect(second.counts).toEqual(first.counts);
    expect(second.records).toEqual(first.records);
    await expect(log.load()).resolves.toHaveLength(6);
  });

  it('should stop starting entries once cancelled', async () => {
    const controller = new AbortController();
    client.onPull = () => controller.abort();

    const report = await engine({ signal: controller.signal }).sync(['nginx:latest', 'redis:6-alpine', 'ollama/ollama']);

    expect(report.records).toHaveLength(1);
    expect(report.records[0].outcome).toBe('success');
    expect(report.skipped).toEqual([
      { index: 1, source: 'redis:6-alpine', target: `${REGISTRY}/redis:6-alpine`, reason: 'cancelled' },
      { index: 2, source: 'ollama/ollama:latest', target: `${REGISTRY}/ollama-ollama:latest`, reason: 'cancelled' },
    ]);
    expect(report.counts).toEqual({ succeeded: 1, failed: 0, skipped: 2 });
  });

  it('should bound parallel transfers and keep manifest order in the report', async () => {
    client.pullDelayMs = 5;
    const manifest = ['a:1', 'b:1', 'c:1', 'd:1', 'e:1'];

    const report = await engine({ concurrency: 2 }).sync(manifest);

    expect(client.maxInFlight).toBe(2);
    expect(report.records.map(r => r.source)).toEqual(manifest);
    expect(report.counts.succeeded).toBe(5);
  });

  it('should skip entries mirrored within the freshness window unless forced', async () => {
    await log.append({
      source: 'nginx:latest',
      target: `${REGISTRY}/nginx:latest`,
      timestamp: '2024-05-01T11:00:00.000Z',
      outcome: 'success',
    });
    const window = 2 * 60 * 60 * 1000;

    const lazy = await engine({ freshnessWindowMs: window }).sync(['nginx:latest', 'redis:6-alpine']);
    expect(lazy.skipped).toEqual([
      { index: 0, source: 'nginx:latest', target: `${REGISTRY}/nginx:latest`, reason: 'fresh' },
    ]);
    expect(lazy.records.map(r => r.source)).toEqual(['redis:6-alpine']);

    const forced = await engine({ freshnessWindowMs: window, force: true }).sync(['nginx:latest']);
    expect(forced.records.map(r => r.source)).toEqual(['nginx:latest']);
  });

  it('should transfer again once a prior success is older than the window', async () => {
    await log.append({
      source: 'nginx:latest',
      target: `${REGISTRY}/nginx:latest`,
      timestamp: '2024-04-01T00:00:00.000Z',
      outcome: 'success',
    });

    const report = await engine({ freshnessWindowMs: 60 * 60 * 1000 }).sync(['nginx:latest']);

    expect(report.skipped).toEqual([]);
    expect(report.counts.succeeded).toBe(1);
  });
});

/**
 * Local image store shared by all workers, like a single Docker daemon.
 */
class ImageStoreClient implements RegistryClient {
  images = new Set<string>();
  removed: string[] = [];
  prunes = 0;
  pruneAll = false;
  tagDelaysMs: number[] = [];

  async pull(reference: string): Promise<void> {
    this.images.add(reference);
  }

  async tag(source: string, target: string): Promise<void> {
    const delay = this.tagDelaysMs.shift() ?? 0;
    if (delay > 0) {
      await new Promise(resolve => setTimeout(resolve, delay));
    }
    if (!this.images.has(source)) {
      throw new PermanentTransferError(`No such image: ${source}`);
    }
    this.images.add(target);
  }

  async push(reference: string): Promise<void> {
    if (!this.images.has(reference)) {
      throw new PermanentTransferError(`No such image: ${reference}`);
    }
  }

  async cleanup(_source: string, _target: string, context: CleanupContext): Promise<void> {
    for (const ref of context.removable) {
      this.images.delete(ref);
      this.removed.push(ref);
    }
    if (this.pruneAll) {
      await context.exclusive(async () => {
        this.images.clear();
        this.prunes++;
      });
    }
  }
}

describe('SyncEngine with a shared image store', () => {
  let store: ImageStoreClient;

  beforeEach(() => {
    store = new ImageStoreClient();
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should not prune images another worker is still tagging', async () => {
    store.pruneAll = true;
    store.tagDelaysMs = [0, 20];

    const report = await sync(['fast:1', 'slow:1'], REGISTRY, 'flatten-full', store, { concurrency: 2 });

    expect(report.records.map(r => [r.source, r.outcome])).toEqual([
      ['fast:1', 'success'],
      ['slow:1', 'success'],
    ]);
    expect(store.prunes).toBe(2);
    expect(store.images.size).toBe(0);
  });

  it('should remove a shared source only after its last user finishes', async () => {
    store.tagDelaysMs = [0, 20];

    const report = await sync(['nginx:1', 'nginx:1'], REGISTRY, 'flatten-full', store, { concurrency: 2 });

    expect(report.counts).toEqual({ succeeded: 2, failed: 0, skipped: 0 });
    expect(store.removed).toEqual([`${REGISTRY}/nginx:1`, 'nginx:1']);
  });
});

describe('sync', () => {
  it('should run a one-off engine without a mapping log', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const client = new FakeRegistryClient();

    const report = await sync(['nginx:latest'], REGISTRY, 'last-segment-only', client);

    expect(report.records[0].target).toBe(`${REGISTRY}/nginx:latest`);
    vi.restoreAllMocks();
  });
});
