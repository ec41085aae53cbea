import { authorize } from '../../src/access/access-evaluator';
import { Artifact, Visibility } from '../../src/domain/artifact';
import { AccessGrant, ArtifactOperation, GrantRole } from '../../src/domain/grant';

const NOW = '2024-01-01T00:00:00.000Z';

function artifact(visibility: Visibility): Artifact {
  return {
    id: 'art_1',
    title: 'Dataset',
    shortDescription: 'A dataset',
    tags: [],
    authors: [],
    visibility,
    linkedProjects: [],
    reproducibility: { enableRequests: false },
    ownerId: 'alice',
    sharingKey: 'share-key-123',
    revision: 1,
    versionCount: 0,
    reproRequests: 0,
    createdAt: NOW,
    updatedAt: NOW,
  };
}

function grant(principalId: string, role: GrantRole): AccessGrant {
  return { artifactId: 'art_1', principalId, role, grantedBy: 'alice', createdAt: NOW };
}

const grants = [grant('alice', GrantRole.Owner), grant('bob', GrantRole.Collaborator), grant('carol', GrantRole.Viewer)];

describe('authorize', () => {
  test('anyone may read a public artifact', () => {
    expect(authorize({}, artifact(Visibility.Public), grants, ArtifactOperation.Read)).toEqual({
      allowed: true,
      via: 'public',
      role: null,
    });
  });

  test('public visibility does not open write operations', () => {
    expect(authorize({ principalId: 'mallory' }, artifact(Visibility.Public), grants, ArtifactOperation.CreateVersion)).toEqual({
      allowed: false,
      reason: 'insufficient-role',
      role: null,
    });
  });

  test('a stranger cannot see a private artifact', () => {
    expect(authorize({ principalId: 'mallory' }, artifact(Visibility.Private), grants, ArtifactOperation.Read)).toEqual({
      allowed: false,
      reason: 'not-visible',
      role: null,
    });
    expect(authorize({}, artifact(Visibility.Private), grants, ArtifactOperation.DeleteArtifact)).toEqual({
      allowed: false,
      reason: 'not-visible',
      role: null,
    });
  });

  test('the sharing key opens reads of a private artifact', () => {
    const decision = authorize({ sharingKey: 'share-key-123' }, artifact(Visibility.Private), grants, ArtifactOperation.Read);
    expect(decision).toEqual({ allowed: true, via: 'sharing-key', role: null });
  });

  test('the sharing key does not open writes', () => {
    const decision = authorize({ sharingKey: 'share-key-123' }, artifact(Visibility.Private), grants, ArtifactOperation.UpdateMetadata);
    expect(decision).toEqual({ allowed: false, reason: 'insufficient-role', role: null });
  });

  test('a wrong sharing key is ignored', () => {
    const decision = authorize({ sharingKey: 'share-key-124' }, artifact(Visibility.Private), grants, ArtifactOperation.Read);
    expect(decision).toEqual({ allowed: false, reason: 'not-visible', role: null });
  });

  test('viewers read and record metrics but cannot create versions', () => {
    const subject = { principalId: 'carol' };
    expect(authorize(subject, artifact(Visibility.Private), grants, ArtifactOperation.Read).allowed).toBe(true);
    expect(authorize(subject, artifact(Visibility.Private), grants, ArtifactOperation.RecordMetrics).allowed).toBe(true);
    expect(authorize(subject, artifact(Visibility.Private), grants, ArtifactOperation.CreateVersion)).toEqual({
      allowed: false,
      reason: 'insufficient-role',
      role: GrantRole.Viewer,
    });
  });

  test('anyone who can see a public artifact may ask to reproduce it', () => {
    expect(authorize({ principalId: 'mallory' }, artifact(Visibility.Public), grants, ArtifactOperation.RequestReproduction)).toEqual({
      allowed: true,
      via: 'public',
      role: null,
    });
    expect(authorize({ principalId: 'mallory' }, artifact(Visibility.Private), grants, ArtifactOperation.RequestReproduction)).toEqual({
      allowed: false,
      reason: 'not-visible',
      role: null,
    });
  });

  test('collaborators create versions and update metadata but cannot manage grants', () => {
    const subject = { principalId: 'bob' };
    expect(authorize(subject, artifact(Visibility.Private), grants, ArtifactOperation.CreateVersion)).toEqual({
      allowed: true,
      via: 'grant',
      role: GrantRole.Collaborator,
    });
    expect(authorize(subject, artifact(Visibility.Private), grants, ArtifactOperation.UpdateMetadata).allowed).toBe(true);
    expect(authorize(subject, artifact(Visibility.Private), grants, ArtifactOperation.ManageGrants).allowed).toBe(false);
    expect(authorize(subject, artifact(Visibility.Private), grants, ArtifactOperation.DeleteVersion).allowed).toBe(false);
  });

  test('owners may do everything', () => {
    for (const operation of Object.values(ArtifactOperation)) {
      expect(authorize({ principalId: 'alice' }, artifact(Visibility.Private), grants, operation).allowed).toBe(true);
    }
  });
});
