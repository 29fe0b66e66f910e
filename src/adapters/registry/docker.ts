import Docker from 'dockerode';
import { execFile } from 'child_process';
import { promisify } from 'util';
import { PermanentTransferError, TransientTransferError } from '../../services/errors';
import { CleanupContext, RegistryClient } from './types';

const execFileAsync = promisify(execFile);

export type CommandRunner = (binary: string, args: string[]) => Promise<{ stdout: string; stderr: string }>;

const runCommand: CommandRunner = async (binary, args) => {
  const { stdout, stderr } = await execFileAsync(binary, args, { maxBuffer: 16 * 1024 * 1024 });
  return { stdout, stderr };
};

/** Docker daemon / registry messages that another attempt will not change */
const PERMANENT_PATTERNS = [
  /not found/i,
  /manifest unknown/i,
  /does not exist/i,
  /unauthorized/i,
  /authentication required/i,
  /denied/i,
  /invalid reference format/i,
  /repository name must/i,
  /no such image/i,
];

/** The part of the Docker Engine API cleanup uses; a dockerode instance satisfies it */
export interface DockerEngine {
  getImage(name: string): { remove(options: { force: boolean }): Promise<unknown> };
  pruneContainers(): Promise<unknown>;
  pruneImages(options: { filters: { dangling: string[] } }): Promise<unknown>;
  pruneVolumes(): Promise<unknown>;
  pruneNetworks(): Promise<unknown>;
}

export interface DockerRegistryClientOptions {
  /** CLI used for pull/tag/push; any docker-compatible CLI works */
  binary?: string;
  socketPath?: string;
  /** Remove the pulled and tagged images after each entry */
  removeImages?: boolean;
  /** Prune unused containers, images, volumes and networks after each entry */
  prune?: boolean;
  runner?: CommandRunner;
  docker?: DockerEngine;
}

/**
 * RegistryClient backed by the docker CLI, so pushes use the credentials of
 * a prior `docker login`. Local cleanup goes through the Engine API.
 */
export class DockerRegistryClient implements RegistryClient {
  private binary: string;
  private removeImages: boolean;
  private prune: boolean;
  private runner: CommandRunner;
  private docker: DockerEngine;

  constructor(options: DockerRegistryClientOptions = {}) {
    this.binary = options.binary ?? 'docker';
    this.removeImages = options.removeImages ?? true;
    this.prune = options.prune ?? false;
    this.runner = options.runner ?? runCommand;
    this.docker = options.docker ?? new Docker({ socketPath: options.socketPath ?? '/var/run/docker.sock' });
  }

  async pull(reference: string): Promise<void> {
    await this.exec('pull', [reference]);
  }

  async tag(source: string, target: string): Promise<void> {
    await this.exec('tag', [source, target]);
  }

  async push(reference: string): Promise<void> {
    await this.exec('push', [reference]);
  }

  /**
   * Remove this entry's images that no other worker still uses, then prune
   * once no transfer is running.
   */
  async cleanup(_source: string, _target: string, context: CleanupContext): Promise<void> {
    if (this.removeImages) {
      for (const ref of context.removable) {
        await this.removeImage(ref);
      }
    }

    if (this.prune) {
      await context.exclusive(() => this.pruneUnused());
    }
  }

  /** Equivalent of `docker system prune -af --volumes` */
  private async pruneUnused(): Promise<void> {
    await this.docker.pruneContainers();
    await this.docker.pruneImages({ filters: { dangling: ['false'] } });
    await this.docker.pruneVolumes();
    await this.docker.pruneNetworks();
  }

  private async removeImage(ref: string): Promise<void> {
    try {
      await this.docker.getImage(ref).remove({ force: true });
    } catch (err) {
      if (!isNotFound(err)) throw err;
    }
  }

  private async exec(command: 'pull' | 'tag' | 'push', args: string[]): Promise<void> {
    try {
      await this.runner(this.binary, [command, ...args]);
    } catch (err) {
      throw classifyDockerFailure(`${this.binary} ${command} ${args.join(' ')}`, err);
    }
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'statusCode' in err && err.statusCode === 404;
}

/**
 * Map a failed CLI invocation to a transfer error. Known registry refusals
 * are permanent, a missing binary is permanent, anything else (timeouts,
 * resets, 5xx, rate limits) is treated as transient.
 */
export function classifyDockerFailure(command: string, err: unknown): TransientTransferError | PermanentTransferError {
  const stderr = err instanceof Error && 'stderr' in err && typeof err.stderr === 'string' ? err.stderr : '';
  const fallback = err instanceof Error ? err.message : String(err);
  const detail = lastLine(stderr) || fallback;
  const message = `${command}: ${detail}`;

  if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
    return new PermanentTransferError(`${command}: executable not found`, err);
  }
  if (PERMANENT_PATTERNS.some(p => p.test(detail))) {
    return new PermanentTransferError(message, err);
  }
  return new TransientTransferError(message, err);
}

function lastLine(text: string): string {
  const lines = text.trim().split('\n').map(l => l.trim()).filter(Boolean);
  return lines.length > 0 ? lines[lines.length - 1] : '';
}
