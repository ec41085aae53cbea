/**
 * Persistence layer interfaces.
 *
 * Backends must provide two atomic primitives: per-artifact sequence
 * assignment (`versions.append`) and ownership swap
 * (`grants.transferOwnership`). Counters (`recordEvent`,
 * `incrementReproRequests`) must not lose concurrent increments. Everything
 * else is plain CRUD.
 */

import { Artifact, ArtifactPatch } from '../domain/artifact';
import { AuditRecord } from '../domain/audit';
import { AccessGrant } from '../domain/grant';
import { StorageObject } from '../domain/storage-object';
import { ArtifactTag } from '../domain/tag';
import { Version, VersionDraft, VersionEventType } from '../domain/version';

export interface ListOptions {
  limit?: number;
  offset?: number;
}

export interface ListResult<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
  hasMore: boolean;
}

/** Fields the store itself may rewrite besides client metadata. */
export type ArtifactUpdate = ArtifactPatch & { sharingKey?: string };

export type ArtifactUpdateResult =
  | { status: 'updated'; artifact: Artifact }
  | { status: 'not-found' }
  | { status: 'conflict'; currentRevision: number };

export interface ArtifactStore {
  /** Store the artifact together with its owner grant. */
  create(artifact: Artifact, owner: AccessGrant): Promise<Artifact>;
  getById(id: string): Promise<Artifact | null>;
  /**
   * Apply `update` and bump the revision. With `expectedRevision`, refuse the
   * write when the stored revision differs.
   */
  update(id: string, update: ArtifactUpdate, expectedRevision?: number): Promise<ArtifactUpdateResult>;
  /** Remove the artifact, its grants and its versions. Returns the removed versions. */
  delete(id: string): Promise<Version[] | null>;
  /** Public artifacts plus those `principalId` holds any grant on, newest first. */
  listVisible(principalId: string | undefined, options?: ListOptions): Promise<ListResult<Artifact>>;
  /** Count one reproduction request. Leaves the revision alone. */
  incrementReproRequests(id: string): Promise<Artifact | null>;
}

export type TombstoneResult =
  | { status: 'tombstoned'; version: Version }
  | { status: 'not-found' }
  | { status: 'already-tombstoned'; version: Version };

export interface VersionStore {
  /**
   * Atomically assign the artifact's next sequence number and store the
   * version. Returns null when the artifact does not exist.
   */
  append(artifactId: string, draft: VersionDraft): Promise<Version | null>;
  getBySequence(artifactId: string, sequence: number): Promise<Version | null>;
  listByArtifact(artifactId: string, options?: { includeTombstoned?: boolean }): Promise<Version[]>;
  tombstone(artifactId: string, sequence: number, at: string): Promise<TombstoneResult>;
  /** Increment a usage counter on a live version. */
  recordEvent(artifactId: string, sequence: number, eventType: VersionEventType): Promise<Version | null>;
  /** Mark the link to `urn` verified. Null when the version or the link is missing. */
  verifyLink(artifactId: string, sequence: number, urn: string, at: string): Promise<Version | null>;
}

export type OwnershipTransferResult =
  | { status: 'transferred'; previousOwner: AccessGrant; newOwner: AccessGrant }
  | { status: 'not-found' }
  | { status: 'not-owner' };

export interface GrantStore {
  listByArtifact(artifactId: string): Promise<AccessGrant[]>;
  get(artifactId: string, principalId: string): Promise<AccessGrant | null>;
  /** Create or replace a non-owner grant. */
  put(grant: AccessGrant): Promise<AccessGrant>;
  /** Remove a non-owner grant. */
  remove(artifactId: string, principalId: string): Promise<boolean>;
  /**
   * Demote `fromPrincipal` to collaborator and promote `toPrincipal` to owner
   * in one step. Readers never observe zero or two owners.
   */
  transferOwnership(artifactId: string, fromPrincipal: string, toPrincipal: string, at: string): Promise<OwnershipTransferResult>;
}

export interface StorageObjectStore {
  get(hash: string): Promise<StorageObject | null>;
  put(object: StorageObject): Promise<StorageObject>;
  update(hash: string, updates: Partial<Omit<StorageObject, 'hash'>>): Promise<StorageObject | null>;
  delete(hash: string): Promise<boolean>;
  /** Objects with no references last uploaded before `uploadedBefore`. */
  listUnreferenced(uploadedBefore: string): Promise<StorageObject[]>;
}

export interface TagStore {
  /** Catalog in tag order. */
  list(): Promise<ArtifactTag[]>;
  /** Null when the tag is already in the catalog. */
  create(tag: ArtifactTag): Promise<ArtifactTag | null>;
  /** The subset of `tags` not in the catalog. */
  missing(tags: readonly string[]): Promise<string[]>;
}

export interface AuditStore {
  create(record: AuditRecord): Promise<AuditRecord>;
  listByResource(resourceId: string, options?: ListOptions): Promise<AuditRecord[]>;
}

export function toListResult<T>(items: T[], total: number, options?: ListOptions): ListResult<T> {
  const limit = options?.limit ?? 100;
  const offset = options?.offset ?? 0;
  return {
    items,
    total,
    limit,
    offset,
    hasMore: offset + items.length < total,
  };
}

export interface Store {
  artifacts: ArtifactStore;
  versions: VersionStore;
  grants: GrantStore;
  storageObjects: StorageObjectStore;
  tags: TagStore;
  audit: AuditStore;
}
