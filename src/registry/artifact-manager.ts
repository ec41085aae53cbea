/**
 * Artifact & Version Manager.
 *
 * Lifecycle of artifacts, their versions and their grants. Every operation
 * loads the artifact with its grants, asks the access evaluator, then calls
 * the store's per-artifact primitives. It never touches content bytes; the
 * registry service wraps version creation and deletion with the storage
 * reference counting.
 */

import { randomBytes } from 'crypto';
import { v4 as uuid } from 'uuid';
import { AccessDecision, AccessSubject, authorize } from '../access/access-evaluator';
import { AuditService } from '../audit/audit-service';
import { Artifact, ArtifactMetadata, ArtifactPatch } from '../domain/artifact';
import {
  RegistryError,
  artifactNotFoundError,
  authError,
  grantNotFoundError,
  immutableVersionError,
  linkNotFoundError,
  reproductionDisabledError,
  revisionConflictError,
  tagExistsError,
  unknownTagsError,
  validationError,
  versionNotFoundError,
} from '../domain/errors';
import { AccessGrant, ArtifactOperation, GrantRole } from '../domain/grant';
import { ArtifactTag } from '../domain/tag';
import { Version, VersionDraft, VersionEventType, VersionLinkInput, isLive } from '../domain/version';
import { ListOptions, ListResult, Store } from '../storage/store';
import { logger } from '../logger';

/** Content a new version will point at, as resolved by the content store. */
export type ContentRef = Pick<VersionDraft, 'contentHash' | 'contentUrn' | 'size'>;

export interface AuthorizedArtifact {
  artifact: Artifact;
  grants: AccessGrant[];
  /** The caller's role on the artifact, if any. */
  role: GrantRole | null;
}

export interface ArtifactManagerOptions {
  now?: () => Date;
  generateSharingKey?: () => string;
}

export function generateSharingKey(): string {
  return randomBytes(33).toString('base64url');
}

export class ArtifactManager {
  private now: () => Date;
  private newSharingKey: () => string;
  private log = logger.child({ component: 'artifact-manager' });

  constructor(
    private store: Store,
    private audit: AuditService,
    options: ArtifactManagerOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    this.newSharingKey = options.generateSharingKey ?? generateSharingKey;
  }

  /**
   * Load an artifact and check `operation` against it. A caller who may not
   * even see the artifact gets the same error as for a missing one.
   */
  async loadAuthorized(subject: AccessSubject, artifactId: string, operation: ArtifactOperation): Promise<AuthorizedArtifact> {
    const artifact = await this.store.artifacts.getById(artifactId);
    if (!artifact) throw new RegistryError(artifactNotFoundError(artifactId));
    const grants = await this.store.grants.listByArtifact(artifactId);
    const decision: AccessDecision = authorize(subject, artifact, grants, operation);
    if (!decision.allowed) {
      if (decision.reason === 'not-visible') throw new RegistryError(artifactNotFoundError(artifactId));
      this.log.debug('Operation denied', { artifactId, principalId: subject.principalId, operation, role: decision.role });
      throw new RegistryError(authError(`Operation ${operation} on artifact ${artifactId} requires a stronger role`));
    }
    return { artifact, grants, role: decision.role };
  }

  async createArtifact(principalId: string, metadata: ArtifactMetadata): Promise<Artifact> {
    await this.requireCatalogTags(metadata.tags);
    const now = this.now().toISOString();
    const artifact: Artifact = {
      ...metadata,
      id: `art_${uuid()}`,
      ownerId: principalId,
      sharingKey: this.newSharingKey(),
      revision: 1,
      versionCount: 0,
      reproRequests: 0,
      createdAt: now,
      updatedAt: now,
    };
    const owner: AccessGrant = {
      artifactId: artifact.id,
      principalId,
      role: GrantRole.Owner,
      grantedBy: principalId,
      createdAt: now,
    };

    const created = await this.store.artifacts.create(artifact, owner);
    await this.audit.record({
      actorId: principalId,
      action: 'artifact.created',
      resourceId: created.id,
      details: { title: created.title, visibility: created.visibility },
    });
    return created;
  }

  async getArtifact(subject: AccessSubject, artifactId: string): Promise<AuthorizedArtifact> {
    return this.loadAuthorized(subject, artifactId, ArtifactOperation.Read);
  }

  async listArtifacts(principalId: string | undefined, options?: ListOptions): Promise<ListResult<Artifact>> {
    return this.store.artifacts.listVisible(principalId, options);
  }

  /** Live versions; tombstoned ones too for collaborators and owners. */
  async listVersions(subject: AccessSubject, artifactId: string, options: { includeTombstoned?: boolean } = {}): Promise<Version[]> {
    await this.loadAuthorized(
      subject,
      artifactId,
      options.includeTombstoned ? ArtifactOperation.ViewHistory : ArtifactOperation.Read,
    );
    return this.store.versions.listByArtifact(artifactId, { includeTombstoned: options.includeTombstoned });
  }

  /** A live version. Tombstoned versions are reported as missing. */
  async getVersion(subject: AccessSubject, artifactId: string, sequence: number): Promise<Version> {
    await this.loadAuthorized(subject, artifactId, ArtifactOperation.Read);
    return this.liveVersion(artifactId, sequence);
  }

  /** Append a version. The store assigns the sequence; links start unverified. */
  async createVersion(principalId: string, artifactId: string, content: ContentRef, links: VersionLinkInput[] = []): Promise<Version> {
    await this.loadAuthorized({ principalId }, artifactId, ArtifactOperation.CreateVersion);

    const version = await this.store.versions.append(artifactId, {
      ...content,
      createdAt: this.now().toISOString(),
      createdBy: principalId,
      links: links.map((link) => ({ urn: link.urn, label: link.label, verified: false })),
    });
    if (!version) throw new RegistryError(artifactNotFoundError(artifactId));

    await this.audit.record({
      actorId: principalId,
      action: 'version.created',
      resourceId: artifactId,
      details: { sequence: version.sequence, contentHash: version.contentHash },
    });
    return version;
  }

  /**
   * Refuse a client-chosen sequence: naming an existing version is an attempt
   * to overwrite it, anything else is a malformed request.
   */
  async rejectRequestedSequence(artifactId: string, sequence: number): Promise<never> {
    const existing = await this.store.versions.getBySequence(artifactId, sequence);
    if (existing) {
      throw new RegistryError(immutableVersionError(artifactId, sequence, 'versions cannot be overwritten'));
    }
    throw new RegistryError(validationError('Version sequence numbers are assigned by the registry', { sequence }));
  }

  async updateMetadata(principalId: string, artifactId: string, patch: ArtifactPatch, expectedRevision?: number): Promise<Artifact> {
    await this.loadAuthorized({ principalId }, artifactId, ArtifactOperation.UpdateMetadata);
    if (patch.tags) await this.requireCatalogTags(patch.tags);

    const result = await this.store.artifacts.update(artifactId, patch, expectedRevision);
    switch (result.status) {
      case 'not-found':
        throw new RegistryError(artifactNotFoundError(artifactId));
      case 'conflict':
        throw new RegistryError(revisionConflictError(artifactId, expectedRevision ?? result.currentRevision, result.currentRevision));
      case 'updated':
        await this.audit.record({
          actorId: principalId,
          action: 'artifact.updated',
          resourceId: artifactId,
          details: { fields: Object.keys(patch), revision: result.artifact.revision },
        });
        return result.artifact;
    }
  }

  /** Tombstone a version and return it so its content can be released. */
  async deleteVersion(principalId: string, artifactId: string, sequence: number): Promise<Version> {
    await this.loadAuthorized({ principalId }, artifactId, ArtifactOperation.DeleteVersion);

    const result = await this.store.versions.tombstone(artifactId, sequence, this.now().toISOString());
    if (result.status !== 'tombstoned') {
      throw new RegistryError(versionNotFoundError(artifactId, sequence));
    }
    await this.audit.record({
      actorId: principalId,
      action: 'version.tombstoned',
      resourceId: artifactId,
      details: { sequence, contentHash: result.version.contentHash },
    });
    return result.version;
  }

  async transferOwnership(principalId: string, artifactId: string, newOwnerId: string): Promise<AccessGrant> {
    await this.loadAuthorized({ principalId }, artifactId, ArtifactOperation.TransferOwnership);
    if (newOwnerId === principalId) {
      throw new RegistryError(validationError('Artifact is already owned by this principal'));
    }

    const result = await this.store.grants.transferOwnership(artifactId, principalId, newOwnerId, this.now().toISOString());
    switch (result.status) {
      case 'not-found':
        throw new RegistryError(artifactNotFoundError(artifactId));
      case 'not-owner':
        // Lost a race with a concurrent transfer.
        throw new RegistryError(authError(`Principal ${principalId} no longer owns artifact ${artifactId}`));
      case 'transferred':
        await this.audit.record({
          actorId: principalId,
          action: 'ownership.transferred',
          resourceId: artifactId,
          details: { from: principalId, to: newOwnerId },
        });
        return result.newOwner;
    }
  }

  /** Give `targetId` a collaborator or viewer role, replacing any it holds. */
  async grantAccess(principalId: string, artifactId: string, targetId: string, role: GrantRole): Promise<AccessGrant> {
    const { grants } = await this.loadAuthorized({ principalId }, artifactId, ArtifactOperation.ManageGrants);
    if (role === GrantRole.Owner) {
      throw new RegistryError(validationError('The owner role is assigned only by transferring ownership'));
    }
    if (grants.some((grant) => grant.principalId === targetId && grant.role === GrantRole.Owner)) {
      throw new RegistryError(validationError('The owner grant cannot be changed; transfer ownership instead'));
    }

    const grant = await this.store.grants.put({
      artifactId,
      principalId: targetId,
      role,
      grantedBy: principalId,
      createdAt: this.now().toISOString(),
    });
    await this.audit.record({
      actorId: principalId,
      action: 'grant.assigned',
      resourceId: artifactId,
      details: { principalId: targetId, role },
    });
    return grant;
  }

  async revokeAccess(principalId: string, artifactId: string, targetId: string): Promise<void> {
    const { grants } = await this.loadAuthorized({ principalId }, artifactId, ArtifactOperation.ManageGrants);
    const existing = grants.find((grant) => grant.principalId === targetId);
    if (!existing) throw new RegistryError(grantNotFoundError(artifactId, targetId));
    if (existing.role === GrantRole.Owner) {
      throw new RegistryError(validationError('The owner grant cannot be revoked; transfer ownership instead'));
    }

    if (!(await this.store.grants.remove(artifactId, targetId))) {
      throw new RegistryError(grantNotFoundError(artifactId, targetId));
    }
    await this.audit.record({
      actorId: principalId,
      action: 'grant.revoked',
      resourceId: artifactId,
      details: { principalId: targetId, role: existing.role },
    });
  }

  async listGrants(subject: AccessSubject, artifactId: string): Promise<AccessGrant[]> {
    const { grants } = await this.loadAuthorized(subject, artifactId, ArtifactOperation.ListGrants);
    return grants;
  }

  /**
   * Remove the artifact with its grants and versions. Returns the content
   * hashes of the versions that were still live, one entry per reference.
   */
  async deleteArtifact(principalId: string, artifactId: string): Promise<string[]> {
    await this.loadAuthorized({ principalId }, artifactId, ArtifactOperation.DeleteArtifact);
    const removed = await this.store.artifacts.delete(artifactId);
    if (!removed) throw new RegistryError(artifactNotFoundError(artifactId));

    const liveHashes = removed.filter(isLive).map((version) => version.contentHash);
    await this.audit.record({
      actorId: principalId,
      action: 'artifact.deleted',
      resourceId: artifactId,
      details: { versions: removed.length },
    });
    return liveHashes;
  }

  async rotateSharingKey(principalId: string, artifactId: string): Promise<string> {
    await this.loadAuthorized({ principalId }, artifactId, ArtifactOperation.RotateSharingKey);
    const sharingKey = this.newSharingKey();
    const result = await this.store.artifacts.update(artifactId, { sharingKey });
    if (result.status !== 'updated') throw new RegistryError(artifactNotFoundError(artifactId));

    await this.audit.record({
      actorId: principalId,
      action: 'artifact.sharing-key-rotated',
      resourceId: artifactId,
    });
    return result.artifact.sharingKey;
  }

  async recordEvent(subject: AccessSubject, artifactId: string, sequence: number, eventType: VersionEventType): Promise<Version> {
    await this.loadAuthorized(subject, artifactId, ArtifactOperation.RecordMetrics);
    const version = await this.store.versions.recordEvent(artifactId, sequence, eventType);
    if (!version) throw new RegistryError(versionNotFoundError(artifactId, sequence));
    return version;
  }

  /** Count a request to reproduce the artifact's results. */
  async requestReproduction(principalId: string, artifactId: string, sharingKey?: string): Promise<Artifact> {
    const { artifact } = await this.loadAuthorized({ principalId, sharingKey }, artifactId, ArtifactOperation.RequestReproduction);
    if (!artifact.reproducibility.enableRequests) {
      throw new RegistryError(reproductionDisabledError(artifactId));
    }
    const updated = await this.store.artifacts.incrementReproRequests(artifactId);
    if (!updated) throw new RegistryError(artifactNotFoundError(artifactId));

    await this.audit.record({
      actorId: principalId,
      action: 'artifact.reproduction-requested',
      resourceId: artifactId,
      details: { reproRequests: updated.reproRequests, accessHours: updated.reproducibility.accessHours },
    });
    return updated;
  }

  /** Mark a version's link checked. Callers must already hold the admin scope. */
  async verifyLink(adminId: string, artifactId: string, sequence: number, urn: string): Promise<Version> {
    const version = await this.store.versions.verifyLink(artifactId, sequence, urn, this.now().toISOString());
    if (!version) {
      if (!(await this.store.versions.getBySequence(artifactId, sequence))) {
        throw new RegistryError(versionNotFoundError(artifactId, sequence));
      }
      throw new RegistryError(linkNotFoundError(artifactId, sequence, urn));
    }
    await this.audit.record({
      actorId: adminId,
      action: 'version.link-verified',
      resourceId: artifactId,
      details: { sequence, urn },
    });
    return version;
  }

  async listTags(): Promise<ArtifactTag[]> {
    return this.store.tags.list();
  }

  /** Add a tag to the catalog. Callers must already hold the admin scope. */
  async createTag(adminId: string, tag: string): Promise<ArtifactTag> {
    const created = await this.store.tags.create({ tag, createdAt: this.now().toISOString(), createdBy: adminId });
    if (!created) throw new RegistryError(tagExistsError(tag));
    await this.audit.record({ actorId: adminId, action: 'tag.created', resourceId: tag });
    return created;
  }

  private async requireCatalogTags(tags: readonly string[]): Promise<void> {
    const unknown = await this.store.tags.missing(tags);
    if (unknown.length > 0) throw new RegistryError(unknownTagsError(unknown));
  }

  private async liveVersion(artifactId: string, sequence: number): Promise<Version> {
    const version = await this.store.versions.getBySequence(artifactId, sequence);
    if (!version || !isLive(version)) {
      throw new RegistryError(versionNotFoundError(artifactId, sequence));
    }
    return version;
  }
}
