export class MalformedReferenceError extends Error {
  constructor(public readonly reference: string, detail: string) {
    super(`Malformed image reference '${reference}': ${detail}`);
    this.name = 'MalformedReferenceError';
  }
}

/** Network-class failure (timeout, reset, 5xx, rate limit). Retried with backoff. */
export class TransientTransferError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = 'TransientTransferError';
  }
}

/** Failure that another attempt will not fix (image not found, auth rejected). */
export class PermanentTransferError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = 'PermanentTransferError';
  }
}

export class ManifestUnreadableError extends Error {
  constructor(public readonly manifestPath: string, public cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot read manifest '${manifestPath}': ${detail}`);
    this.name = 'ManifestUnreadableError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** Compose file that cannot be read, is not YAML, or has no services mapping */
export class ComposeFileError extends Error {
  constructor(public readonly composePath: string, detail: string) {
    super(`Cannot use compose file '${composePath}': ${detail}`);
    this.name = 'ComposeFileError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
