/**
 * Storage backend contract.
 *
 * A backend stores opaque bytes under their content hash. It knows nothing
 * about versions, reference counts or verification; the ContentStore layers
 * those on top. Backends report failures as BackendError so the caller can
 * tell a retryable hiccup from a lost or damaged object.
 */

export type BackendErrorKind =
  /** Timeout, 5xx, connection reset. Worth retrying. */
  | 'transient'
  /** The backend has no object under this key. */
  | 'not-found'
  /** The backend reports the stored object is damaged. */
  | 'corrupt'
  /** Anything retrying will not fix (bad credentials, rejected request). */
  | 'permanent';

export class BackendError extends Error {
  readonly kind: BackendErrorKind;
  readonly backend: string;
  readonly statusCode?: number;

  constructor(backend: string, kind: BackendErrorKind, message: string, statusCode?: number) {
    super(message);
    this.name = 'BackendError';
    this.backend = backend;
    this.kind = kind;
    this.statusCode = statusCode;
  }
}

export interface StorageBackend {
  /** Stable identifier recorded on every StorageObject this backend holds. */
  readonly name: string;
  write(hash: string, bytes: Buffer): Promise<void>;
  read(hash: string): Promise<Buffer>;
  exists(hash: string): Promise<boolean>;
  /** Deleting a missing object is not an error. */
  delete(hash: string): Promise<void>;
}

/** Map an HTTP status from a storage service onto a failure kind. */
export function classifyHttpStatus(statusCode: number): BackendErrorKind {
  if (statusCode === 404 || statusCode === 410) return 'not-found';
  if (statusCode === 408 || statusCode === 429 || statusCode >= 500) return 'transient';
  if (statusCode === 422) return 'corrupt';
  return 'permanent';
}

export function isBackendError(err: unknown, kind?: BackendErrorKind): err is BackendError {
  return err instanceof BackendError && (kind === undefined || err.kind === kind);
}
