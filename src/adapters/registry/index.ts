import { MirrorConfig } from '../../config';
import { DockerRegistryClient } from './docker';
import { RegistryClient } from './types';

export * from './types';
export { DockerRegistryClient, classifyDockerFailure } from './docker';
export type { CommandRunner, DockerEngine, DockerRegistryClientOptions } from './docker';

/**
 * Create the registry client for a run from configuration
 */
export function createRegistryClient(config: MirrorConfig): RegistryClient {
  return new DockerRegistryClient({
    binary: config.docker.binary,
    socketPath: config.docker.socket_path,
    removeImages: config.cleanup.enabled,
    prune: config.cleanup.enabled && config.cleanup.prune,
  });
}
