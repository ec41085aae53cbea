/**
 * Access Control Evaluator.
 *
 * Decides whether a subject may perform an operation on an artifact, from
 * the artifact's visibility, an optional sharing key and the artifact's
 * grants. Pure and synchronous: callers load the artifact and grants first.
 *
 * Precedence:
 *   1. public artifact, read-class operation      -> allow
 *   2. read-class operation with the sharing key   -> allow
 *   3. grant whose role covers the operation       -> allow
 *   4. otherwise deny: `not-visible` when the subject cannot even read the
 *      artifact, `insufficient-role` when it can read but not do this.
 */

import { timingSafeEqual } from 'crypto';
import { Artifact, Visibility } from '../domain/artifact';
import {
  AccessGrant,
  ArtifactOperation,
  GrantRole,
  OPERATION_REQUIRED_ROLE,
  READ_OPERATIONS,
  roleSatisfies,
} from '../domain/grant';

/** Who is asking. Anonymous callers have no principal id. */
export interface AccessSubject {
  principalId?: string;
  sharingKey?: string;
}

export type AccessDecision =
  | { allowed: true; via: 'public' | 'sharing-key' | 'grant'; role: GrantRole | null }
  | { allowed: false; reason: 'not-visible' | 'insufficient-role'; role: GrantRole | null };

export function roleOf(principalId: string | undefined, grants: readonly AccessGrant[]): GrantRole | null {
  if (principalId === undefined) return null;
  return grants.find((grant) => grant.principalId === principalId)?.role ?? null;
}

function sharingKeyMatches(presented: string | undefined, actual: string): boolean {
  if (!presented) return false;
  const a = Buffer.from(presented, 'utf8');
  const b = Buffer.from(actual, 'utf8');
  return a.length === b.length && timingSafeEqual(a, b);
}

export function authorize(
  subject: AccessSubject,
  artifact: Artifact,
  grants: readonly AccessGrant[],
  operation: ArtifactOperation,
): AccessDecision {
  const role = roleOf(subject.principalId, grants);
  const readClass = READ_OPERATIONS.has(operation);
  const isPublic = artifact.visibility === Visibility.Public;
  const hasKey = sharingKeyMatches(subject.sharingKey, artifact.sharingKey);

  if (readClass && isPublic) return { allowed: true, via: 'public', role };
  if (readClass && hasKey) return { allowed: true, via: 'sharing-key', role };
  if (role && roleSatisfies(role, OPERATION_REQUIRED_ROLE[operation])) {
    return { allowed: true, via: 'grant', role };
  }

  const canRead = isPublic || hasKey || role !== null;
  return { allowed: false, reason: canRead ? 'insufficient-role' : 'not-visible', role };
}
