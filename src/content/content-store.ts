/**
 * Content-addressed storage over pluggable backends.
 *
 * Bytes are keyed by their SHA-256. A write is only usable once the bytes
 * read back from the backend hash to the same value; an object that ever
 * fails that check is quarantined and never served again. Identical content
 * is stored once and shared through a reference count that versions retain
 * and release.
 *
 * A per-hash lock orders registration, repair and reclamation of a single
 * object. It is independent of the per-artifact locks in the data model, so
 * backend I/O never runs while an artifact is locked.
 */

import { createHash } from 'crypto';
import {
  RegistryError,
  backendRejectedError,
  backendUnavailableError,
  contentTooLargeError,
  quarantinedError,
  storageNotFoundError,
} from '../domain/errors';
import { HASH_ALGORITHM, StorageObject, StorageObjectStatus } from '../domain/storage-object';
import { AuditService, SYSTEM_ACTOR } from '../audit/audit-service';
import { KeyedLock } from '../storage/keyed-lock';
import { StorageObjectStore } from '../storage/store';
import { logger } from '../logger';
import { BackendError, StorageBackend, isBackendError } from './backend';
import { RetryPolicy, withRetry } from './retry';

export function hashContent(bytes: Buffer): string {
  return createHash(HASH_ALGORITHM).update(bytes).digest('hex');
}

/**
 * Raised when a put is cancelled. `persisted` tells the caller which side of
 * the write the cancellation landed on: false means nothing reached the
 * backend; true means the write completed and the object is registered
 * without references, so garbage collection will reclaim it.
 */
export class StorageCancelledError extends Error {
  readonly persisted: boolean;
  readonly hash: string;

  constructor(hash: string, persisted: boolean) {
    super(persisted ? `Upload of ${hash} cancelled after it was stored` : `Upload of ${hash} cancelled before it was stored`);
    this.name = 'StorageCancelledError';
    this.hash = hash;
    this.persisted = persisted;
  }
}

/** Read-back produced different bytes from what was written. */
class IntegrityMismatchError extends Error {
  constructor(
    readonly expected: string,
    readonly actual: string,
  ) {
    super(`Read-back hash ${actual} does not match ${expected}`);
    this.name = 'IntegrityMismatchError';
  }
}

export interface ContentStoreOptions {
  backends: StorageBackend[];
  /** Backend for new writes; the first backend when omitted. */
  defaultBackend?: string;
  maxContentBytes: number;
  retry: RetryPolicy;
  audit?: AuditService;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export interface PutOptions {
  backend?: string;
  signal?: AbortSignal;
}

export interface PutResult {
  object: StorageObject;
  /** True when identical verified content already existed and no write happened. */
  deduplicated: boolean;
}

export class ContentStore {
  private backends = new Map<string, StorageBackend>();
  private defaultBackend: string;
  private locks = new KeyedLock();
  private log = logger.child({ component: 'content-store' });
  private now: () => Date;

  constructor(
    private objects: StorageObjectStore,
    private options: ContentStoreOptions,
  ) {
    if (options.backends.length === 0) {
      throw new Error('ContentStore needs at least one storage backend');
    }
    for (const backend of options.backends) {
      this.backends.set(backend.name, backend);
    }
    this.now = options.now ?? (() => new Date());
    this.defaultBackend = options.defaultBackend ?? options.backends[0].name;
    if (!this.backends.has(this.defaultBackend)) {
      throw new Error(`Unknown default storage backend: ${this.defaultBackend}`);
    }
  }

  get maxContentBytes(): number {
    return this.options.maxContentBytes;
  }

  backendNames(): string[] {
    return [...this.backends.keys()];
  }

  async describe(hash: string): Promise<StorageObject | null> {
    return this.objects.get(hash);
  }

  async put(bytes: Buffer, options: PutOptions = {}): Promise<PutResult> {
    if (bytes.length > this.options.maxContentBytes) {
      throw new RegistryError(contentTooLargeError(bytes.length, this.options.maxContentBytes));
    }
    const hash = hashContent(bytes);
    const backend = this.backend(options.backend ?? this.defaultBackend);
    if (options.signal?.aborted) throw new StorageCancelledError(hash, false);

    return this.locks.run(hash, async (): Promise<PutResult> => {
      const now = this.now().toISOString();
      const existing = await this.objects.get(hash);
      if (existing?.status === StorageObjectStatus.Verified) {
        // A fresh upload restarts the grace period for a follow-up reference.
        const refreshed = await this.objects.update(hash, { lastUploadedAt: now });
        return { object: refreshed ?? existing, deduplicated: true };
      }
      if (options.signal?.aborted) throw new StorageCancelledError(hash, false);

      if (existing?.status === StorageObjectStatus.Quarantined) {
        // Stays quarantined until the rewrite verifies.
        await this.objects.update(hash, { lastUploadedAt: now });
      } else {
        // Registered before the first byte moves so an interrupted write is
        // still visible to garbage collection.
        await this.objects.put({
          hash,
          backend: backend.name,
          size: bytes.length,
          status: StorageObjectStatus.Pending,
          refCount: existing?.refCount ?? 0,
          createdAt: existing?.createdAt ?? now,
          lastUploadedAt: now,
        });
      }

      const object = await this.writeVerified(backend, hash, bytes);
      if (existing?.status === StorageObjectStatus.Quarantined) {
        this.log.info('Quarantined content repaired by re-upload', { hash, backend: backend.name });
      }
      if (options.signal?.aborted) throw new StorageCancelledError(hash, true);
      return { object, deduplicated: false };
    });
  }

  async get(hash: string): Promise<Buffer> {
    const record = await this.objects.get(hash);
    if (!record || record.status === StorageObjectStatus.Pending) {
      throw new RegistryError(storageNotFoundError(hash));
    }
    if (record.status === StorageObjectStatus.Quarantined) {
      throw new RegistryError(quarantinedError(hash));
    }

    const bytes = await this.readChecked(record);
    if (!bytes) throw new RegistryError(quarantinedError(hash));
    return bytes;
  }

  /**
   * Re-read the object and compare hashes; a failed check quarantines it.
   * Quarantined objects report false without I/O, as only a re-upload
   * repairs them.
   */
  async verify(hash: string): Promise<boolean> {
    const record = await this.objects.get(hash);
    if (!record) throw new RegistryError(storageNotFoundError(hash));
    if (record.status === StorageObjectStatus.Quarantined) return false;
    const bytes = await this.readChecked(record);
    if (!bytes) return false;
    await this.objects.update(hash, {
      lastVerifiedAt: this.now().toISOString(),
      status: StorageObjectStatus.Verified,
    });
    return true;
  }

  /** Add a reference. Only verified objects may be referenced. */
  async retain(hash: string): Promise<StorageObject> {
    return this.locks.run(hash, async () => {
      const record = await this.objects.get(hash);
      if (!record || record.status === StorageObjectStatus.Pending) {
        throw new RegistryError(storageNotFoundError(hash));
      }
      if (record.status === StorageObjectStatus.Quarantined) {
        throw new RegistryError(quarantinedError(hash));
      }
      const updated = await this.objects.update(hash, { refCount: record.refCount + 1 });
      if (!updated) throw new RegistryError(storageNotFoundError(hash));
      return updated;
    });
  }

  /** Drop a reference; the object is reclaimed when none remain. */
  async release(hash: string): Promise<void> {
    await this.locks.run(hash, async () => {
      const record = await this.objects.get(hash);
      if (!record) return;
      const refCount = Math.max(0, record.refCount - 1);
      if (refCount > 0) {
        await this.objects.update(hash, { refCount });
        return;
      }
      await this.objects.update(hash, { refCount: 0 });
      await this.reclaim(record);
    });
  }

  /**
   * Reclaim objects nobody references that are older than the grace period:
   * abandoned uploads, interrupted writes and reclamations that failed.
   */
  async collectGarbage(options: { olderThanMs: number; now?: Date }): Promise<string[]> {
    const now = options.now ?? this.now();
    const cutoff = new Date(now.getTime() - options.olderThanMs).toISOString();
    const candidates = await this.objects.listUnreferenced(cutoff);
    const reclaimed: string[] = [];

    for (const candidate of candidates) {
      const done = await this.locks.run(candidate.hash, async () => {
        const current = await this.objects.get(candidate.hash);
        // Retained or uploaded again since it was listed.
        if (!current || current.refCount > 0 || current.lastUploadedAt >= cutoff) return false;
        return this.reclaim(current);
      });
      if (done) reclaimed.push(candidate.hash);
    }

    if (reclaimed.length > 0) {
      this.log.info('Garbage collection reclaimed content', { count: reclaimed.length });
    }
    return reclaimed;
  }

  private backend(name: string): StorageBackend {
    const backend = this.backends.get(name);
    if (!backend) throw new RegistryError(backendRejectedError(name, 'backend is not configured'));
    return backend;
  }

  private retrying<T>(backend: StorageBackend, operation: string, fn: () => Promise<T>, retryMismatch = false): Promise<T> {
    return withRetry(fn, this.options.retry, {
      // A just-written object may not be readable yet on an eventually consistent store.
      isRetryable: (err) =>
        isBackendError(err, 'transient') ||
        (retryMismatch && (isBackendError(err, 'not-found') || err instanceof IntegrityMismatchError)),
      onRetry: (err, attempt, delayMs) =>
        this.log.warn('Storage operation failed, retrying', {
          backend: backend.name,
          operation,
          attempt,
          delayMs,
          error: err instanceof Error ? err.message : String(err),
        }),
      sleep: this.options.sleep,
    });
  }

  /** Write, read back and compare; marks the record verified or quarantined. */
  private async writeVerified(backend: StorageBackend, hash: string, bytes: Buffer): Promise<StorageObject> {
    try {
      await this.retrying(
        backend,
        'write',
        async () => {
          await backend.write(hash, bytes);
          const readBack = hashContent(await backend.read(hash));
          if (readBack !== hash) throw new IntegrityMismatchError(hash, readBack);
        },
        true,
      );
    } catch (err) {
      if (err instanceof IntegrityMismatchError || isBackendError(err, 'corrupt')) {
        await this.quarantine(hash, err.message);
        throw new RegistryError(quarantinedError(hash));
      }
      throw this.translate(backend, err);
    }

    const now = this.now().toISOString();
    const verified = await this.objects.update(hash, {
      status: StorageObjectStatus.Verified,
      backend: backend.name,
      size: bytes.length,
      lastVerifiedAt: now,
    });
    if (!verified) throw new RegistryError(storageNotFoundError(hash));
    return verified;
  }

  /** Read and hash-check an object. Returns null after quarantining it. */
  private async readChecked(record: StorageObject): Promise<Buffer | null> {
    const backend = this.backend(record.backend);
    let bytes: Buffer;
    try {
      bytes = await this.retrying(backend, 'read', () => backend.read(record.hash));
    } catch (err) {
      if (isBackendError(err, 'corrupt') || isBackendError(err, 'not-found')) {
        await this.quarantine(record.hash, err.message);
        return null;
      }
      throw this.translate(backend, err);
    }

    const actual = hashContent(bytes);
    if (actual !== record.hash) {
      await this.quarantine(record.hash, `stored bytes hash to ${actual}`);
      return null;
    }
    return bytes;
  }

  private async quarantine(hash: string, reason: string): Promise<void> {
    await this.objects.update(hash, { status: StorageObjectStatus.Quarantined });
    this.log.error('Content failed integrity verification; quarantined', { hash, reason });
    await this.options.audit?.record({
      actorId: SYSTEM_ACTOR,
      action: 'content.quarantined',
      resourceId: hash,
      outcome: 'failure',
      details: { reason },
    });
  }

  /** Delete bytes and record. Caller holds the hash lock. */
  private async reclaim(record: StorageObject): Promise<boolean> {
    const backend = this.backends.get(record.backend);
    if (!backend) {
      this.log.warn('Cannot reclaim content on unconfigured backend', { hash: record.hash, backend: record.backend });
      return false;
    }
    try {
      await this.retrying(backend, 'delete', () => backend.delete(record.hash));
    } catch (err) {
      // The record stays with no references; garbage collection retries later.
      this.log.warn('Failed to reclaim content', {
        hash: record.hash,
        error: err instanceof Error ? err.message : String(err),
      });
      return false;
    }
    await this.objects.delete(record.hash);
    await this.options.audit?.record({
      actorId: SYSTEM_ACTOR,
      action: 'content.reclaimed',
      resourceId: record.hash,
      details: { backend: record.backend, size: record.size },
    });
    return true;
  }

  private translate(backend: StorageBackend, err: unknown): RegistryError {
    if (err instanceof RegistryError) return err;
    if (err instanceof BackendError && err.kind === 'permanent') {
      return new RegistryError(backendRejectedError(backend.name, err.message));
    }
    const message = err instanceof Error ? err.message : String(err);
    return new RegistryError(backendUnavailableError(backend.name, this.options.retry.maxAttempts, message));
  }
}
