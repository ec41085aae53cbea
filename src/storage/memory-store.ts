/**
 * In-memory storage implementation.
 *
 * Reference implementation for development and testing. The per-artifact
 * primitives run inside a KeyedLock section keyed by artifact id, which is
 * the mutual-exclusion domain a database-backed store would get from a row
 * lock or a conditional update.
 *
 * Every value crossing the store boundary is deep-copied, so callers can
 * never mutate stored state through a returned object.
 */

import { Artifact, Visibility } from '../domain/artifact';
import { AuditRecord } from '../domain/audit';
import { conflictingSequenceError, RegistryError } from '../domain/errors';
import { AccessGrant, GrantRole } from '../domain/grant';
import { StorageObject } from '../domain/storage-object';
import { ArtifactTag } from '../domain/tag';
import { canTransitionVersion, emptyMetrics, METRIC_FIELD, Version, VersionDraft, VersionEventType, VersionStatus } from '../domain/version';
import { KeyedLock } from './keyed-lock';
import {
  Store,
  ArtifactStore,
  ArtifactUpdate,
  ArtifactUpdateResult,
  VersionStore,
  TombstoneResult,
  GrantStore,
  OwnershipTransferResult,
  StorageObjectStore,
  TagStore,
  AuditStore,
  ListOptions,
  ListResult,
  toListResult,
} from './store';

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

/** Drop keys explicitly set to undefined so a spread never erases a field. */
function withoutUndefined<T extends object>(value: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key in value) {
    if (value[key] !== undefined) result[key] = value[key];
  }
  return result;
}

/** State shared by the sub-stores; the artifact lock guards all of it per artifact. */
interface MemoryState {
  artifacts: Map<string, Artifact>;
  versions: Map<string, Map<number, Version>>;
  grants: Map<string, Map<string, AccessGrant>>;
  locks: KeyedLock;
}

class MemoryArtifactStore implements ArtifactStore {
  constructor(private state: MemoryState) {}

  async create(artifact: Artifact, owner: AccessGrant): Promise<Artifact> {
    return this.state.locks.run(artifact.id, () => {
      if (this.state.artifacts.has(artifact.id)) {
        throw new Error(`Artifact already exists: ${artifact.id}`);
      }
      this.state.artifacts.set(artifact.id, deepCopy(artifact));
      this.state.grants.set(artifact.id, new Map([[owner.principalId, deepCopy(owner)]]));
      this.state.versions.set(artifact.id, new Map());
      return deepCopy(artifact);
    });
  }

  async getById(id: string): Promise<Artifact | null> {
    const artifact = this.state.artifacts.get(id);
    return artifact ? deepCopy(artifact) : null;
  }

  async update(id: string, update: ArtifactUpdate, expectedRevision?: number): Promise<ArtifactUpdateResult> {
    return this.state.locks.run(id, (): ArtifactUpdateResult => {
      const existing = this.state.artifacts.get(id);
      if (!existing) return { status: 'not-found' };
      if (expectedRevision !== undefined && existing.revision !== expectedRevision) {
        return { status: 'conflict', currentRevision: existing.revision };
      }
      const updated: Artifact = {
        ...existing,
        ...deepCopy(withoutUndefined(update)),
        revision: existing.revision + 1,
        updatedAt: new Date().toISOString(),
      };
      this.state.artifacts.set(id, updated);
      return { status: 'updated', artifact: deepCopy(updated) };
    });
  }

  async delete(id: string): Promise<Version[] | null> {
    return this.state.locks.run(id, () => {
      if (!this.state.artifacts.delete(id)) return null;
      const versions = [...(this.state.versions.get(id)?.values() ?? [])];
      this.state.versions.delete(id);
      this.state.grants.delete(id);
      return versions.map(deepCopy);
    });
  }

  async listVisible(principalId: string | undefined, options?: ListOptions): Promise<ListResult<Artifact>> {
    const visible = [...this.state.artifacts.values()]
      .filter(
        (artifact) =>
          artifact.visibility === Visibility.Public ||
          (principalId !== undefined && this.state.grants.get(artifact.id)?.has(principalId) === true),
      )
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt) || a.id.localeCompare(b.id));
    return toListResult(applyListOptions(visible, options).map(deepCopy), visible.length, options);
  }

  async incrementReproRequests(id: string): Promise<Artifact | null> {
    return this.state.locks.run(id, () => {
      const artifact = this.state.artifacts.get(id);
      if (!artifact) return null;
      artifact.reproRequests += 1;
      return deepCopy(artifact);
    });
  }
}

class MemoryVersionStore implements VersionStore {
  constructor(private state: MemoryState) {}

  async append(artifactId: string, draft: VersionDraft): Promise<Version | null> {
    return this.state.locks.run(artifactId, () => {
      const artifact = this.state.artifacts.get(artifactId);
      const versions = this.state.versions.get(artifactId);
      if (!artifact || !versions) return null;

      const sequence = artifact.versionCount + 1;
      if (versions.has(sequence)) {
        throw new RegistryError(conflictingSequenceError(artifactId, sequence));
      }
      const version: Version = {
        ...deepCopy(draft),
        artifactId,
        sequence,
        status: VersionStatus.Created,
        metrics: emptyMetrics(),
      };
      versions.set(sequence, version);
      artifact.versionCount = sequence;
      return deepCopy(version);
    });
  }

  async getBySequence(artifactId: string, sequence: number): Promise<Version | null> {
    const version = this.state.versions.get(artifactId)?.get(sequence);
    return version ? deepCopy(version) : null;
  }

  async listByArtifact(artifactId: string, options?: { includeTombstoned?: boolean }): Promise<Version[]> {
    const versions = [...(this.state.versions.get(artifactId)?.values() ?? [])]
      .filter((v) => options?.includeTombstoned || v.status === VersionStatus.Created)
      .sort((a, b) => a.sequence - b.sequence);
    return versions.map(deepCopy);
  }

  async tombstone(artifactId: string, sequence: number, at: string): Promise<TombstoneResult> {
    return this.state.locks.run(artifactId, (): TombstoneResult => {
      const version = this.state.versions.get(artifactId)?.get(sequence);
      if (!version) return { status: 'not-found' };
      if (!canTransitionVersion(version.status, VersionStatus.Tombstoned)) {
        return { status: 'already-tombstoned', version: deepCopy(version) };
      }
      version.status = VersionStatus.Tombstoned;
      version.tombstonedAt = at;
      return { status: 'tombstoned', version: deepCopy(version) };
    });
  }

  async recordEvent(artifactId: string, sequence: number, eventType: VersionEventType): Promise<Version | null> {
    return this.state.locks.run(artifactId, () => {
      const version = this.state.versions.get(artifactId)?.get(sequence);
      if (!version || version.status !== VersionStatus.Created) return null;
      version.metrics[METRIC_FIELD[eventType]] += 1;
      return deepCopy(version);
    });
  }

  async verifyLink(artifactId: string, sequence: number, urn: string, at: string): Promise<Version | null> {
    return this.state.locks.run(artifactId, () => {
      const version = this.state.versions.get(artifactId)?.get(sequence);
      const link = version?.links.find((l) => l.urn === urn);
      if (!version || !link) return null;
      link.verified = true;
      link.verifiedAt = at;
      return deepCopy(version);
    });
  }
}

class MemoryGrantStore implements GrantStore {
  constructor(private state: MemoryState) {}

  async listByArtifact(artifactId: string): Promise<AccessGrant[]> {
    return [...(this.state.grants.get(artifactId)?.values() ?? [])].map(deepCopy);
  }

  async get(artifactId: string, principalId: string): Promise<AccessGrant | null> {
    const grant = this.state.grants.get(artifactId)?.get(principalId);
    return grant ? deepCopy(grant) : null;
  }

  async put(grant: AccessGrant): Promise<AccessGrant> {
    return this.state.locks.run(grant.artifactId, () => {
      const grants = this.state.grants.get(grant.artifactId);
      if (!grants) throw new Error(`Artifact not found: ${grant.artifactId}`);
      if (grant.role === GrantRole.Owner || grants.get(grant.principalId)?.role === GrantRole.Owner) {
        throw new Error('Owner grants change only through transferOwnership');
      }
      grants.set(grant.principalId, deepCopy(grant));
      return deepCopy(grant);
    });
  }

  async remove(artifactId: string, principalId: string): Promise<boolean> {
    return this.state.locks.run(artifactId, () => {
      const grants = this.state.grants.get(artifactId);
      const existing = grants?.get(principalId);
      if (!grants || !existing) return false;
      if (existing.role === GrantRole.Owner) {
        throw new Error('Owner grants change only through transferOwnership');
      }
      return grants.delete(principalId);
    });
  }

  async transferOwnership(
    artifactId: string,
    fromPrincipal: string,
    toPrincipal: string,
    at: string,
  ): Promise<OwnershipTransferResult> {
    return this.state.locks.run(artifactId, (): OwnershipTransferResult => {
      const artifact = this.state.artifacts.get(artifactId);
      const grants = this.state.grants.get(artifactId);
      if (!artifact || !grants) return { status: 'not-found' };
      const current = grants.get(fromPrincipal);
      if (!current || current.role !== GrantRole.Owner) return { status: 'not-owner' };

      const previousOwner: AccessGrant = { ...current, role: GrantRole.Collaborator, grantedBy: fromPrincipal, createdAt: at };
      const newOwner: AccessGrant = { artifactId, principalId: toPrincipal, role: GrantRole.Owner, grantedBy: fromPrincipal, createdAt: at };
      grants.set(fromPrincipal, previousOwner);
      grants.set(toPrincipal, newOwner);
      artifact.ownerId = toPrincipal;
      return { status: 'transferred', previousOwner: deepCopy(previousOwner), newOwner: deepCopy(newOwner) };
    });
  }
}

class MemoryStorageObjectStore implements StorageObjectStore {
  private data = new Map<string, StorageObject>();

  async get(hash: string): Promise<StorageObject | null> {
    const object = this.data.get(hash);
    return object ? deepCopy(object) : null;
  }

  async put(object: StorageObject): Promise<StorageObject> {
    this.data.set(object.hash, deepCopy(object));
    return deepCopy(object);
  }

  async update(hash: string, updates: Partial<Omit<StorageObject, 'hash'>>): Promise<StorageObject | null> {
    const existing = this.data.get(hash);
    if (!existing) return null;
    const updated = { ...existing, ...deepCopy(withoutUndefined(updates)) };
    this.data.set(hash, updated);
    return deepCopy(updated);
  }

  async delete(hash: string): Promise<boolean> {
    return this.data.delete(hash);
  }

  async listUnreferenced(uploadedBefore: string): Promise<StorageObject[]> {
    return [...this.data.values()]
      .filter((o) => o.refCount === 0 && o.lastUploadedAt < uploadedBefore)
      .map(deepCopy);
  }
}

class MemoryTagStore implements TagStore {
  private data = new Map<string, ArtifactTag>();

  constructor(seed: readonly string[]) {
    const createdAt = new Date().toISOString();
    for (const tag of seed) this.data.set(tag, { tag, createdAt, createdBy: 'config' });
  }

  async list(): Promise<ArtifactTag[]> {
    return [...this.data.values()].sort((a, b) => a.tag.localeCompare(b.tag)).map(deepCopy);
  }

  async create(tag: ArtifactTag): Promise<ArtifactTag | null> {
    if (this.data.has(tag.tag)) return null;
    this.data.set(tag.tag, deepCopy(tag));
    return deepCopy(tag);
  }

  async missing(tags: readonly string[]): Promise<string[]> {
    return [...new Set(tags)].filter((tag) => !this.data.has(tag));
  }
}

class MemoryAuditStore implements AuditStore {
  private data: AuditRecord[] = [];

  async create(record: AuditRecord): Promise<AuditRecord> {
    this.data.push(deepCopy(record));
    return deepCopy(record);
  }

  async listByResource(resourceId: string, options?: ListOptions): Promise<AuditRecord[]> {
    const items = this.data.filter((r) => r.resourceId === resourceId);
    return applyListOptions(items.map(deepCopy), options);
  }
}

export interface MemoryStoreOptions {
  /** Tags the catalog starts with. */
  tags?: readonly string[];
}

export function createMemoryStore(options: MemoryStoreOptions = {}): Store {
  const state: MemoryState = {
    artifacts: new Map(),
    versions: new Map(),
    grants: new Map(),
    locks: new KeyedLock(),
  };
  return {
    artifacts: new MemoryArtifactStore(state),
    versions: new MemoryVersionStore(state),
    grants: new MemoryGrantStore(state),
    storageObjects: new MemoryStorageObjectStore(),
    tags: new MemoryTagStore(options.tags ?? []),
    audit: new MemoryAuditStore(),
  };
}
