import {
  ArtifactOperation,
  GrantRole,
  OPERATION_REQUIRED_ROLE,
  countOwners,
  roleSatisfies,
} from '../../src/domain/grant';
import { canonicalScopes, parseScopeClaim, Scope } from '../../src/domain/token';
import { VersionStatus, canTransitionVersion } from '../../src/domain/version';
import { contentUrn, isContentHash } from '../../src/domain/storage-object';
import { isUrn } from '../../src/domain/urn';

describe('Grant roles', () => {
  test('roles are strictly ordered', () => {
    expect(roleSatisfies(GrantRole.Owner, GrantRole.Collaborator)).toBe(true);
    expect(roleSatisfies(GrantRole.Collaborator, GrantRole.Viewer)).toBe(true);
    expect(roleSatisfies(GrantRole.Viewer, GrantRole.Viewer)).toBe(true);
    expect(roleSatisfies(GrantRole.Viewer, GrantRole.Collaborator)).toBe(false);
    expect(roleSatisfies(GrantRole.Collaborator, GrantRole.Owner)).toBe(false);
  });

  test('each operation names its weakest role', () => {
    expect(OPERATION_REQUIRED_ROLE[ArtifactOperation.Read]).toBe(GrantRole.Viewer);
    expect(OPERATION_REQUIRED_ROLE[ArtifactOperation.RecordMetrics]).toBe(GrantRole.Viewer);
    expect(OPERATION_REQUIRED_ROLE[ArtifactOperation.RequestReproduction]).toBe(GrantRole.Viewer);
    expect(OPERATION_REQUIRED_ROLE[ArtifactOperation.CreateVersion]).toBe(GrantRole.Collaborator);
    expect(OPERATION_REQUIRED_ROLE[ArtifactOperation.UpdateMetadata]).toBe(GrantRole.Collaborator);
    expect(OPERATION_REQUIRED_ROLE[ArtifactOperation.DeleteVersion]).toBe(GrantRole.Owner);
    expect(OPERATION_REQUIRED_ROLE[ArtifactOperation.ManageGrants]).toBe(GrantRole.Owner);
    expect(OPERATION_REQUIRED_ROLE[ArtifactOperation.TransferOwnership]).toBe(GrantRole.Owner);
  });

  test('countOwners', () => {
    const base = { artifactId: 'art_1', grantedBy: 'alice', createdAt: '2024-01-01T00:00:00Z' };
    expect(
      countOwners([
        { ...base, principalId: 'alice', role: GrantRole.Owner },
        { ...base, principalId: 'bob', role: GrantRole.Collaborator },
      ]),
    ).toBe(1);
  });
});

describe('Scopes', () => {
  test('canonicalScopes de-duplicates and orders', () => {
    expect(canonicalScopes([Scope.RegistryAdmin, Scope.ArtifactsRead, Scope.RegistryAdmin])).toEqual([
      Scope.ArtifactsRead,
      Scope.RegistryAdmin,
    ]);
  });

  test('parseScopeClaim keeps only registry scopes', () => {
    expect(parseScopeClaim('openid artifacts:write email  artifacts:read')).toEqual([Scope.ArtifactsRead, Scope.ArtifactsWrite]);
    expect(parseScopeClaim(undefined)).toEqual([]);
    expect(parseScopeClaim(['artifacts:read'])).toEqual([]);
  });
});

describe('Version lifecycle', () => {
  test('created -> tombstoned is the only transition', () => {
    expect(canTransitionVersion(VersionStatus.Created, VersionStatus.Tombstoned)).toBe(true);
    expect(canTransitionVersion(VersionStatus.Tombstoned, VersionStatus.Created)).toBe(false);
    expect(canTransitionVersion(VersionStatus.Tombstoned, VersionStatus.Tombstoned)).toBe(false);
  });
});

describe('Storage object identifiers', () => {
  test('isContentHash accepts lowercase sha-256 hex only', () => {
    expect(isContentHash('a'.repeat(64))).toBe(true);
    expect(isContentHash('A'.repeat(64))).toBe(false);
    expect(isContentHash('a'.repeat(63))).toBe(false);
  });

  test('contentUrn', () => {
    expect(contentUrn('memory', 'abc')).toBe('urn:registry:contents:memory:abc');
  });

  test('isUrn', () => {
    expect(isUrn('urn:project:CHI-210123')).toBe(true);
    expect(isUrn('urn:disk-image:chi.tacc:abc/def?x=1')).toBe(true);
    expect(isUrn('urn:doi:10.1000/182')).toBe(true);
    expect(isUrn('https://example.com/project')).toBe(false);
    expect(isUrn('urn:project:')).toBe(false);
    expect(isUrn('urn:has space:x')).toBe(false);
  });
});
