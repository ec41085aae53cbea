/**
 * Registry API core.
 *
 * One method per external operation. Composes the token service, the
 * artifact manager and the content store, and owns the boundaries between
 * them: content is written and retained before a version is appended, and a
 * failed append releases the reference it took.
 */

import { AccessSubject } from '../access/access-evaluator';
import { TokenService } from '../auth/token-service';
import { ContentStore, PutResult } from '../content/content-store';
import { Artifact, ArtifactMetadata, ArtifactPatch } from '../domain/artifact';
import { RegistryError, insufficientScopeError, isRegistryError, unauthenticatedError } from '../domain/errors';
import { AccessGrant, ArtifactOperation, GrantRole } from '../domain/grant';
import { StorageObject, contentUrn } from '../domain/storage-object';
import { ArtifactTag } from '../domain/tag';
import { Principal, Scope, ServiceToken, SubjectTokenType, hasScope } from '../domain/token';
import { Version, VersionEventType, VersionLinkInput } from '../domain/version';
import { ListOptions, ListResult } from '../storage/store';
import { logger } from '../logger';
import { ArtifactManager, AuthorizedArtifact } from './artifact-manager';

/** Who is calling: an authenticated principal, a sharing key holder, or nobody. */
export interface Caller {
  principal?: Principal;
  sharingKey?: string;
}

export interface ArtifactView extends AuthorizedArtifact {
  versions: Version[];
}

export interface UploadOptions {
  backend?: string;
  signal?: AbortSignal;
  /** Sequence the client asked for; always refused. */
  requestedSequence?: number;
}

export interface ReferenceOptions {
  /** Sequence the client asked for; always refused. */
  requestedSequence?: number;
  links?: VersionLinkInput[];
}

export interface RegistryServiceOptions {
  gcGraceSeconds: number;
}

function subjectOf(caller: Caller): AccessSubject {
  return { principalId: caller.principal?.id, sharingKey: caller.sharingKey };
}

function requirePrincipal(caller: Caller): Principal {
  if (!caller.principal) throw new RegistryError(unauthenticatedError());
  return caller.principal;
}

function requireAdmin(caller: Caller): Principal {
  const principal = requirePrincipal(caller);
  if (!hasScope(principal.scopes, Scope.RegistryAdmin)) {
    throw new RegistryError(insufficientScopeError(Scope.RegistryAdmin));
  }
  return principal;
}

export class RegistryService {
  private log = logger.child({ component: 'registry' });

  constructor(
    readonly tokens: TokenService,
    readonly artifacts: ArtifactManager,
    readonly contents: ContentStore,
    private options: RegistryServiceOptions,
  ) {}

  async exchangeToken(
    subjectToken: string,
    scopes: readonly Scope[],
    subjectTokenType: SubjectTokenType = SubjectTokenType.Jwt,
  ): Promise<ServiceToken> {
    return this.tokens.exchange(subjectToken, scopes, subjectTokenType);
  }

  async listArtifacts(caller: Caller, options?: ListOptions): Promise<ListResult<Artifact>> {
    return this.artifacts.listArtifacts(caller.principal?.id, options);
  }

  /** Linking projects is reserved to registry admins. */
  async createArtifact(caller: Caller, metadata: ArtifactMetadata): Promise<Artifact> {
    const principal = metadata.linkedProjects.length > 0 ? requireAdmin(caller) : requirePrincipal(caller);
    return this.artifacts.createArtifact(principal.id, metadata);
  }

  async getArtifact(caller: Caller, artifactId: string): Promise<ArtifactView> {
    const view = await this.artifacts.getArtifact(subjectOf(caller), artifactId);
    const versions = await this.artifacts.listVersions(subjectOf(caller), artifactId);
    return { ...view, versions };
  }

  async updateArtifact(caller: Caller, artifactId: string, patch: ArtifactPatch, expectedRevision?: number): Promise<Artifact> {
    const principal = patch.linkedProjects !== undefined ? requireAdmin(caller) : requirePrincipal(caller);
    return this.artifacts.updateMetadata(principal.id, artifactId, patch, expectedRevision);
  }

  async requestReproduction(caller: Caller, artifactId: string): Promise<Artifact> {
    return this.artifacts.requestReproduction(requirePrincipal(caller).id, artifactId, caller.sharingKey);
  }

  /** Delete the artifact and release the content its live versions held. */
  async deleteArtifact(caller: Caller, artifactId: string): Promise<void> {
    const hashes = await this.artifacts.deleteArtifact(requirePrincipal(caller).id, artifactId);
    for (const hash of hashes) {
      await this.releaseReference(hash, artifactId);
    }
  }

  async rotateSharingKey(caller: Caller, artifactId: string): Promise<string> {
    return this.artifacts.rotateSharingKey(requirePrincipal(caller).id, artifactId);
  }

  async listGrants(caller: Caller, artifactId: string): Promise<AccessGrant[]> {
    return this.artifacts.listGrants(subjectOf(caller), artifactId);
  }

  async grantAccess(caller: Caller, artifactId: string, targetId: string, role: GrantRole): Promise<AccessGrant> {
    return this.artifacts.grantAccess(requirePrincipal(caller).id, artifactId, targetId, role);
  }

  async revokeAccess(caller: Caller, artifactId: string, targetId: string): Promise<void> {
    await this.artifacts.revokeAccess(requirePrincipal(caller).id, artifactId, targetId);
  }

  async transferOwnership(caller: Caller, artifactId: string, newOwnerId: string): Promise<AccessGrant> {
    return this.artifacts.transferOwnership(requirePrincipal(caller).id, artifactId, newOwnerId);
  }

  /**
   * Store `bytes` and append a version pointing at them. The upload runs
   * before any artifact lock is taken; the reference is released again if
   * the append fails.
   */
  async createVersionFromUpload(caller: Caller, artifactId: string, bytes: Buffer, options: UploadOptions = {}): Promise<Version> {
    const principal = requirePrincipal(caller);
    // Refuse before moving any bytes.
    await this.artifacts.loadAuthorized({ principalId: principal.id }, artifactId, ArtifactOperation.CreateVersion);
    if (options.requestedSequence !== undefined) {
      return this.artifacts.rejectRequestedSequence(artifactId, options.requestedSequence);
    }

    let stored = await this.contents.put(bytes, { backend: options.backend, signal: options.signal });
    try {
      await this.contents.retain(stored.object.hash);
    } catch (err) {
      // Reclaimed between put and retain; store it again once.
      if (!isRegistryError(err, 'STORAGE.NOT_FOUND')) throw err;
      this.log.warn('Content reclaimed before it was referenced, uploading again', { hash: stored.object.hash });
      stored = await this.contents.put(bytes, { backend: options.backend, signal: options.signal });
      await this.contents.retain(stored.object.hash);
    }

    return this.appendRetained(principal.id, artifactId, stored.object);
  }

  /** Append a version pointing at content already stored (e.g. via uploadContent). */
  async createVersionFromReference(caller: Caller, artifactId: string, contentHash: string, options: ReferenceOptions = {}): Promise<Version> {
    const principal = requirePrincipal(caller);
    await this.artifacts.loadAuthorized({ principalId: principal.id }, artifactId, ArtifactOperation.CreateVersion);
    if (options.requestedSequence !== undefined) {
      return this.artifacts.rejectRequestedSequence(artifactId, options.requestedSequence);
    }

    // Missing or pending content is not found, quarantined content is gone.
    const retained = await this.contents.retain(contentHash);
    return this.appendRetained(principal.id, artifactId, retained, options.links);
  }

  async verifyVersionLink(caller: Caller, artifactId: string, sequence: number, urn: string): Promise<Version> {
    return this.artifacts.verifyLink(requireAdmin(caller).id, artifactId, sequence, urn);
  }

  async listVersions(caller: Caller, artifactId: string, options: { includeTombstoned?: boolean } = {}): Promise<Version[]> {
    return this.artifacts.listVersions(subjectOf(caller), artifactId, options);
  }

  async getVersion(caller: Caller, artifactId: string, sequence: number): Promise<Version> {
    return this.artifacts.getVersion(subjectOf(caller), artifactId, sequence);
  }

  /** Tombstone a version, then drop its content reference. */
  async deleteVersion(caller: Caller, artifactId: string, sequence: number): Promise<Version> {
    const version = await this.artifacts.deleteVersion(requirePrincipal(caller).id, artifactId, sequence);
    await this.releaseReference(version.contentHash, artifactId);
    return version;
  }

  async getVersionContent(caller: Caller, artifactId: string, sequence: number): Promise<{ version: Version; bytes: Buffer }> {
    const version = await this.artifacts.getVersion(subjectOf(caller), artifactId, sequence);
    const bytes = await this.contents.get(version.contentHash);
    return { version, bytes };
  }

  async recordEvent(caller: Caller, artifactId: string, sequence: number, eventType: VersionEventType): Promise<Version> {
    return this.artifacts.recordEvent(subjectOf(caller), artifactId, sequence, eventType);
  }

  /**
   * Store content without a version. Unreferenced objects are reclaimed by
   * garbage collection once the grace period passes.
   */
  async uploadContent(caller: Caller, bytes: Buffer, options: { backend?: string; signal?: AbortSignal } = {}): Promise<PutResult> {
    requirePrincipal(caller);
    return this.contents.put(bytes, options);
  }

  async listTags(): Promise<ArtifactTag[]> {
    return this.artifacts.listTags();
  }

  async createTag(caller: Caller, tag: string): Promise<ArtifactTag> {
    return this.artifacts.createTag(requireAdmin(caller).id, tag);
  }

  async verifyContent(hash: string): Promise<boolean> {
    return this.contents.verify(hash);
  }

  async collectGarbage(now?: Date): Promise<string[]> {
    return this.contents.collectGarbage({ olderThanMs: this.options.gcGraceSeconds * 1000, now });
  }

  private async appendRetained(principalId: string, artifactId: string, object: StorageObject, links?: VersionLinkInput[]): Promise<Version> {
    try {
      return await this.artifacts.createVersion(
        principalId,
        artifactId,
        { contentHash: object.hash, contentUrn: contentUrn(object.backend, object.hash), size: object.size },
        links,
      );
    } catch (err) {
      await this.contents.release(object.hash);
      throw err;
    }
  }

  /** The version is already gone; a failed release leaves a leaked reference, not an error. */
  private async releaseReference(hash: string, artifactId: string): Promise<void> {
    try {
      await this.contents.release(hash);
    } catch (err) {
      this.log.error('Failed to release content reference', {
        hash,
        artifactId,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
