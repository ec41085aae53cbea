/**
 * Token and principal domain model.
 *
 * Scopes bound what a bearer may do at all; per-artifact roles (see grant.ts)
 * decide what it may do to a given artifact.
 */

/** Capabilities a token may carry. */
export enum Scope {
  ArtifactsRead = 'artifacts:read',
  ArtifactsWrite = 'artifacts:write',
  ArtifactsWriteMetrics = 'artifacts:write_metrics',
  RegistryAdmin = 'registry:admin',
}

/** Canonical scope order; issued scope sets are always listed in it. */
export const ALL_SCOPES: readonly Scope[] = Object.values(Scope);

/** RFC 8693 token types accepted as the subject of an exchange. */
export enum SubjectTokenType {
  /** Identity provider token. */
  Jwt = 'urn:ietf:params:oauth:token-type:jwt',
  /** Registry token being narrowed. */
  AccessToken = 'urn:ietf:params:oauth:token-type:access_token',
}

export const DEFAULT_REQUESTED_SCOPES: readonly Scope[] = [Scope.ArtifactsRead];

export function isScope(value: string): value is Scope {
  return ALL_SCOPES.some((scope) => scope === value);
}

/** De-duplicate and order scopes canonically. */
export function canonicalScopes(scopes: Iterable<Scope>): Scope[] {
  const wanted = new Set(scopes);
  return ALL_SCOPES.filter((scope) => wanted.has(scope));
}

/**
 * Parse an OAuth-style space-separated scope claim, keeping only registry
 * scopes. Identity providers put their own scopes (openid, email) alongside.
 */
export function parseScopeClaim(claim: unknown): Scope[] {
  if (typeof claim !== 'string') return [];
  return canonicalScopes(claim.split(/\s+/).filter(isScope));
}

export function formatScopes(scopes: readonly Scope[]): string {
  return scopes.join(' ');
}

/** An authenticated identity. */
export interface Principal {
  /** Subject identifier; the key AccessGrants refer to. */
  id: string;
  /** Issuer that vouched for the subject. */
  issuer: string;
  /** Client the credential was issued to, when the issuer says. */
  authorizedParty?: string;
  /** Scopes this principal is authorized to hold. */
  scopes: Scope[];
}

/** A freshly signed service token. */
export interface ServiceToken {
  token: string;
  tokenId: string;
  principalId: string;
  scopes: Scope[];
  keyId: string;
  /** Seconds since epoch. */
  issuedAt: number;
  /** Seconds since epoch. */
  expiresAt: number;
}

/** What a verified service token tells the registry. */
export interface ServiceTokenClaims {
  principal: Principal;
  scopes: Scope[];
  tokenId: string;
  keyId: string;
  expiresAt: number;
}

export function hasScope(scopes: readonly Scope[], scope: Scope): boolean {
  return scopes.includes(scope);
}
