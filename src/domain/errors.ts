/**
 * Typed error model.
 *
 * Failures travel as TypedError values: a namespaced code, a message, a
 * retryable flag and optional structured details. Service code throws them
 * wrapped in RegistryError; the API error handler unwraps `typedError` and
 * maps the code onto an HTTP status.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'AUTH'
  | 'ARTIFACT'
  | 'VERSION'
  | 'GRANT'
  | 'STORAGE'
  | 'VALIDATION'
  | 'RATE_LIMIT'
  | 'SYSTEM';

/** Suggested remediation a client can act on. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

export interface TypedError {
  /** Namespaced error code (e.g., "STORAGE.QUARANTINED"). */
  code: string;
  message: string;
  /** Whether the same request is expected to succeed later without changes. */
  retryable: boolean;
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

export function createTypedError(params: {
  code: string;
  message: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Exception carrier for a TypedError. */
export class RegistryError extends Error {
  readonly typedError: TypedError;

  constructor(typedError: TypedError) {
    super(typedError.message);
    this.name = 'RegistryError';
    this.typedError = typedError;
  }

  get code(): string {
    return this.typedError.code;
  }
}

export function isRegistryError(err: unknown, code?: string): err is RegistryError {
  return err instanceof RegistryError && (code === undefined || err.code === code);
}

// --- Token and authentication errors ---

export function invalidTokenError(reason: string): TypedError {
  return createTypedError({
    code: 'AUTH.INVALID_TOKEN',
    message: `Invalid token: ${reason}`,
  });
}

export function tokenExpiredError(): TypedError {
  return createTypedError({
    code: 'AUTH.TOKEN_EXPIRED',
    message: 'Token has expired',
    suggestedFixes: [{ type: 'REQUEST_NEW_TOKEN', params: {}, description: 'Exchange a fresh identity token at POST /token' }],
  });
}

export function badSignatureError(): TypedError {
  return createTypedError({
    code: 'AUTH.BAD_SIGNATURE',
    message: 'Token signature could not be verified',
  });
}

export function unauthenticatedError(): TypedError {
  return createTypedError({
    code: 'AUTH.UNAUTHENTICATED',
    message: 'Authentication required',
  });
}

export function scopeEscalationError(requested: string[], authorized: string[]): TypedError {
  const excess = requested.filter((scope) => !authorized.includes(scope));
  return createTypedError({
    code: 'AUTH.SCOPE_ESCALATION',
    message: `Requested scopes exceed what the credential authorizes: ${excess.join(' ')}`,
    details: { requested, authorized, excess },
    suggestedFixes: [{ type: 'NARROW_SCOPE', params: { scope: authorized.join(' ') } }],
  });
}

export function insufficientScopeError(required: string): TypedError {
  return createTypedError({
    code: 'AUTH.INSUFFICIENT_SCOPE',
    message: `Token lacks required scope: ${required}`,
    details: { requiredScope: required },
  });
}

export function authError(message: string): TypedError {
  return createTypedError({
    code: 'AUTH.FORBIDDEN',
    message,
  });
}

// --- Registry errors ---

/**
 * Returned both for artifacts that do not exist and for artifacts the caller
 * may not see. The value depends only on the requested id.
 */
export function artifactNotFoundError(artifactId: string): TypedError {
  return createTypedError({
    code: 'ARTIFACT.NOT_FOUND',
    message: `Artifact not found: ${artifactId}`,
  });
}

export function revisionConflictError(artifactId: string, expected: number, current: number): TypedError {
  return createTypedError({
    code: 'ARTIFACT.REVISION_CONFLICT',
    message: `Artifact ${artifactId} was modified concurrently (expected revision ${expected}, found ${current})`,
    details: { expectedRevision: expected, currentRevision: current },
    suggestedFixes: [{ type: 'REFETCH_AND_RETRY', params: { revision: current } }],
  });
}

export function versionNotFoundError(artifactId: string, sequence: number): TypedError {
  return createTypedError({
    code: 'VERSION.NOT_FOUND',
    message: `Version ${sequence} of artifact ${artifactId} not found`,
  });
}

export function immutableVersionError(artifactId: string, sequence: number, reason: string): TypedError {
  return createTypedError({
    code: 'VERSION.IMMUTABLE',
    message: `Version ${sequence} of artifact ${artifactId} cannot be modified: ${reason}`,
  });
}

export function grantNotFoundError(artifactId: string, principalId: string): TypedError {
  return createTypedError({
    code: 'GRANT.NOT_FOUND',
    message: `No grant for ${principalId} on artifact ${artifactId}`,
  });
}

export function linkNotFoundError(artifactId: string, sequence: number, urn: string): TypedError {
  return createTypedError({
    code: 'LINK.NOT_FOUND',
    message: `Version ${sequence} of artifact ${artifactId} has no link to ${urn}`,
  });
}

export function reproductionDisabledError(artifactId: string): TypedError {
  return createTypedError({
    code: 'ARTIFACT.REPRODUCTION_DISABLED',
    message: `Artifact ${artifactId} does not accept reproduction requests`,
  });
}

export function unknownTagsError(tags: string[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.UNKNOWN_TAG',
    message: `Unknown tags: ${tags.join(', ')}`,
    details: { unknownTags: tags },
    suggestedFixes: [{ type: 'USE_CATALOG_TAG', params: { catalog: '/api/v1/tags' } }],
  });
}

export function tagExistsError(tag: string): TypedError {
  return createTypedError({
    code: 'TAG.EXISTS',
    message: `Tag already exists: ${tag}`,
  });
}

export function conflictingSequenceError(artifactId: string, sequence: number): TypedError {
  return createTypedError({
    code: 'SYSTEM.CONFLICTING_SEQUENCE',
    message: `Sequence ${sequence} already assigned on artifact ${artifactId}`,
    details: { artifactId, sequence },
  });
}

// --- Storage errors ---

export function storageNotFoundError(hash: string): TypedError {
  return createTypedError({
    code: 'STORAGE.NOT_FOUND',
    message: `Content not found: ${hash}`,
  });
}

export function quarantinedError(hash: string): TypedError {
  return createTypedError({
    code: 'STORAGE.QUARANTINED',
    message: `Content ${hash} failed integrity verification and is quarantined`,
    details: { hash },
  });
}

export function backendUnavailableError(backend: string, attempts: number, cause: string): TypedError {
  return createTypedError({
    code: 'STORAGE.BACKEND_UNAVAILABLE',
    message: `Storage backend "${backend}" unavailable after ${attempts} attempts: ${cause}`,
    retryable: true,
    details: { backend, attempts },
    suggestedFixes: [{ type: 'WAIT_AND_RETRY', params: { delayMs: 5000 } }],
  });
}

export function backendRejectedError(backend: string, cause: string): TypedError {
  return createTypedError({
    code: 'STORAGE.BACKEND_REJECTED',
    message: `Storage backend "${backend}" rejected the request: ${cause}`,
    details: { backend },
  });
}

export function contentTooLargeError(size: number, limit: number): TypedError {
  return createTypedError({
    code: 'VALIDATION.CONTENT_TOO_LARGE',
    message: `Content of ${size} bytes exceeds the ${limit} byte limit`,
    details: { size, limit },
  });
}

export function validationError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    details,
  });
}

export function rateLimitedError(retryAfterMs: number, limit: number, windowMs: number): TypedError {
  const retryAfterSec = Math.ceil(retryAfterMs / 1000);
  return createTypedError({
    code: 'RATE_LIMIT.EXCEEDED',
    message: `Rate limit exceeded. Try again in ${retryAfterSec} seconds.`,
    retryable: true,
    details: { retryAfterMs, limit, windowMs },
  });
}

export function internalError(message: string): TypedError {
  return createTypedError({
    code: 'SYSTEM.INTERNAL',
    message,
  });
}

/**
 * Mask a secret, keeping the last 4 characters for identification.
 * Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

export interface ApiErrorResponse {
  error: TypedError;
}

export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}

/** HTTP status for a typed error code. */
export function httpStatusFor(error: TypedError): number {
  switch (error.code) {
    case 'AUTH.INVALID_TOKEN':
    case 'AUTH.TOKEN_EXPIRED':
    case 'AUTH.BAD_SIGNATURE':
    case 'AUTH.UNAUTHENTICATED':
      return 401;
    case 'AUTH.SCOPE_ESCALATION':
      return 400;
    case 'ARTIFACT.REVISION_CONFLICT':
    case 'ARTIFACT.REPRODUCTION_DISABLED':
    case 'VERSION.IMMUTABLE':
    case 'TAG.EXISTS':
      return 409;
    case 'STORAGE.QUARANTINED':
      return 410;
    case 'VALIDATION.CONTENT_TOO_LARGE':
      return 413;
    case 'STORAGE.BACKEND_UNAVAILABLE':
      return 503;
  }
  if (error.code.startsWith('AUTH.')) return 403;
  if (error.code.endsWith('.NOT_FOUND')) return 404;
  if (error.code.startsWith('VALIDATION.')) return 400;
  if (error.code.startsWith('RATE_LIMIT.')) return 429;
  return 500;
}
