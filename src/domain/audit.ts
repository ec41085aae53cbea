/**
 * Audit trail domain model.
 */

export type AuditAction =
  | 'artifact.created'
  | 'artifact.updated'
  | 'artifact.deleted'
  | 'artifact.sharing-key-rotated'
  | 'artifact.reproduction-requested'
  | 'version.created'
  | 'version.tombstoned'
  | 'version.link-verified'
  | 'tag.created'
  | 'grant.assigned'
  | 'grant.revoked'
  | 'ownership.transferred'
  | 'content.quarantined'
  | 'content.reclaimed';

export type AuditOutcome = 'success' | 'failure' | 'denied';

/** An immutable audit record. */
export interface AuditRecord {
  id: string;
  timestamp: string;
  actorId: string;
  action: AuditAction;
  /** Artifact id, content hash for storage actions, or the tag name. */
  resourceId: string;
  outcome: AuditOutcome;
  details?: Record<string, unknown>;
}
