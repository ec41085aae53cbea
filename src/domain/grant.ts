/**
 * Per-artifact access grants.
 *
 * Authorization on an artifact is a role bound to a (principal, artifact)
 * pair. Roles are strictly ordered, so each operation names the weakest role
 * that may perform it.
 */

export enum GrantRole {
  Owner = 'owner',
  Collaborator = 'collaborator',
  Viewer = 'viewer',
}

const ROLE_RANK: Record<GrantRole, number> = {
  [GrantRole.Viewer]: 1,
  [GrantRole.Collaborator]: 2,
  [GrantRole.Owner]: 3,
};

/** Operations the access evaluator decides on. */
export enum ArtifactOperation {
  Read = 'read',
  RecordMetrics = 'record-metrics',
  RequestReproduction = 'request-reproduction',
  ViewHistory = 'view-history',
  ListGrants = 'list-grants',
  CreateVersion = 'create-version',
  UpdateMetadata = 'update-metadata',
  DeleteVersion = 'delete-version',
  ManageGrants = 'manage-grants',
  TransferOwnership = 'transfer-ownership',
  DeleteArtifact = 'delete-artifact',
  RotateSharingKey = 'rotate-sharing-key',
}

export const OPERATION_REQUIRED_ROLE: Record<ArtifactOperation, GrantRole> = {
  [ArtifactOperation.Read]: GrantRole.Viewer,
  [ArtifactOperation.RecordMetrics]: GrantRole.Viewer,
  [ArtifactOperation.RequestReproduction]: GrantRole.Viewer,
  [ArtifactOperation.ViewHistory]: GrantRole.Collaborator,
  [ArtifactOperation.ListGrants]: GrantRole.Collaborator,
  [ArtifactOperation.CreateVersion]: GrantRole.Collaborator,
  [ArtifactOperation.UpdateMetadata]: GrantRole.Collaborator,
  [ArtifactOperation.DeleteVersion]: GrantRole.Owner,
  [ArtifactOperation.ManageGrants]: GrantRole.Owner,
  [ArtifactOperation.TransferOwnership]: GrantRole.Owner,
  [ArtifactOperation.DeleteArtifact]: GrantRole.Owner,
  [ArtifactOperation.RotateSharingKey]: GrantRole.Owner,
};

/** Operations open to anyone who can see the artifact. */
export const READ_OPERATIONS: ReadonlySet<ArtifactOperation> = new Set([
  ArtifactOperation.Read,
  ArtifactOperation.RecordMetrics,
  ArtifactOperation.RequestReproduction,
]);

export interface AccessGrant {
  artifactId: string;
  principalId: string;
  role: GrantRole;
  /** Principal who created or last changed the grant. */
  grantedBy: string;
  createdAt: string;
}

/** True when `held` is at least as strong as `required`. */
export function roleSatisfies(held: GrantRole, required: GrantRole): boolean {
  return ROLE_RANK[held] >= ROLE_RANK[required];
}

export function countOwners(grants: readonly AccessGrant[]): number {
  return grants.filter((grant) => grant.role === GrantRole.Owner).length;
}
