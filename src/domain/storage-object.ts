/**
 * Content-addressed storage objects.
 *
 * One record per distinct content hash; versions sharing identical bytes
 * share the record and bump its reference count.
 */

export enum StorageObjectStatus {
  /** Written, read-back verification not yet complete. */
  Pending = 'pending',
  Verified = 'verified',
  /** Failed integrity verification. Never served. */
  Quarantined = 'quarantined',
}

export interface StorageObject {
  /** Lowercase hex SHA-256 of the bytes. */
  hash: string;
  backend: string;
  size: number;
  status: StorageObjectStatus;
  /** Live versions referencing this object. */
  refCount: number;
  createdAt: string;
  /** Most recent put of these bytes; the garbage-collection grace period runs from here. */
  lastUploadedAt: string;
  lastVerifiedAt?: string;
}

export const HASH_ALGORITHM = 'sha256';

export function isContentHash(value: string): boolean {
  return /^[0-9a-f]{64}$/.test(value);
}

export function contentUrn(backend: string, hash: string): string {
  return `urn:registry:contents:${backend}:${hash}`;
}
