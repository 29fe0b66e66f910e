const queues = new Map<string, Promise<void>>();

/**
 * Run fn with exclusive access to key. Waiters are served in arrival order,
 * so two appends to the same file never interleave.
 */
export async function withFileLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
  const previous = queues.get(key) ?? Promise.resolve();

  let release!: () => void;
  const current = new Promise<void>(r => { release = r; });
  const tail = previous.then(() => current);
  queues.set(key, tail);

  await previous;
  try {
    return await fn();
  } finally {
    release();
    if (queues.get(key) === tail) {
      queues.delete(key);
    }
  }
}
