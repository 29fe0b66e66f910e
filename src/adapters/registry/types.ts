/**
 * Capability the sync engine drives to move one image between registries.
 *
 * Implementations reject with TransientTransferError for failures worth
 * retrying (network, timeouts, 5xx) and PermanentTransferError for the rest
 * (image not found, auth rejected). Authentication is the environment's job.
 */
export interface RegistryClient {
  pull(reference: string): Promise<void>;
  tag(source: string, target: string): Promise<void>;
  push(reference: string): Promise<void>;
  /**
   * Release local state held for one entry (pulled layers, tags) before the
   * worker takes the next entry.
   */
  cleanup?(source: string, target: string, context: CleanupContext): Promise<void>;
}

/**
 * What one entry's cleanup may touch while other workers keep transferring.
 */
export interface CleanupContext {
  /** This entry's references that no other in-flight entry still uses */
  removable: readonly string[];
  /** Run fn once no other entry is transferring; new entries wait for it */
  exclusive<T>(fn: () => Promise<T>): Promise<T>;
}
