/**
 * API Middleware — authentication, scope checks, validation and error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { TokenService } from '../auth/token-service';
import { StorageCancelledError } from '../content/content-store';
import {
  RegistryError,
  apiError,
  contentTooLargeError,
  httpStatusFor,
  insufficientScopeError,
  internalError,
  invalidTokenError,
  isRegistryError,
  unauthenticatedError,
  validationError,
} from '../domain/errors';
import { Scope, hasScope } from '../domain/token';
import { Caller } from '../registry/registry-service';
import { logger } from '../logger';

/** Request carrying the resolved caller. */
export interface AuthenticatedRequest extends Request {
  caller?: Caller;
}

const BEARER = /^Bearer\s+(\S+)$/i;

function sharingKeyOf(req: Request): string | undefined {
  const header = req.get('x-sharing-key');
  if (header) return header;
  const query = req.query.sharing_key;
  return typeof query === 'string' && query ? query : undefined;
}

/**
 * Resolve the caller. Requests without an Authorization header proceed
 * anonymously; a header that is present must carry a valid service token.
 */
export function authenticate(tokens: TokenService) {
  return async (req: AuthenticatedRequest, _res: Response, next: NextFunction) => {
    const sharingKey = sharingKeyOf(req);
    const header = req.get('authorization');
    if (!header) {
      req.caller = { sharingKey };
      next();
      return;
    }

    const match = BEARER.exec(header);
    if (!match) {
      next(new RegistryError(invalidTokenError('expected a Bearer token')));
      return;
    }

    try {
      const claims = await tokens.verifyServiceToken(match[1]);
      req.caller = { principal: { ...claims.principal, scopes: claims.scopes }, sharingKey };
      next();
    } catch (err) {
      next(err);
    }
  };
}

/**
 * Require `scope` on the caller's token. With `allowAnonymous`, callers
 * without a token pass through (public reads); callers with one still need
 * the scope.
 */
export function requireScope(scope: Scope, options: { allowAnonymous?: boolean } = {}) {
  return (req: AuthenticatedRequest, _res: Response, next: NextFunction) => {
    const principal = req.caller?.principal;
    if (!principal) {
      next(options.allowAnonymous ? undefined : new RegistryError(unauthenticatedError()));
      return;
    }
    if (!hasScope(principal.scopes, scope)) {
      next(new RegistryError(insufficientScopeError(scope)));
      return;
    }
    next();
  };
}

export function callerOf(req: AuthenticatedRequest): Caller {
  return req.caller ?? {};
}

/** Aborts when the client goes away before the response is sent. */
export function uploadSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) controller.abort();
  });
  return controller.signal;
}

/** Parse `value` with `schema`, failing with VALIDATION.SCHEMA and the zod issues. */
export function parseWith<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
    const first = issues[0];
    throw new RegistryError(
      validationError(first ? `Invalid request: ${first.path || 'body'}: ${first.message}` : 'Invalid request', { issues }),
    );
  }
  return parsed.data;
}

/** Errors raised by the body parsers carry a `type` and an HTTP status. */
function bodyParserError(err: unknown): RegistryError | null {
  if (!(err instanceof Error) || !('type' in err) || typeof err.type !== 'string') return null;
  if (err.type === 'entity.too.large') {
    const length = 'length' in err && typeof err.length === 'number' ? err.length : 0;
    const limit = 'limit' in err && typeof err.limit === 'number' ? err.limit : 0;
    return new RegistryError(contentTooLargeError(length, limit));
  }
  if (err.type === 'entity.parse.failed') {
    return new RegistryError(validationError('Request body is not valid JSON'));
  }
  return null;
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (err instanceof StorageCancelledError) {
    logger.info('Upload cancelled by client', { hash: err.hash, persisted: err.persisted, path: req.path });
    if (!res.headersSent) res.status(499).end();
    return;
  }

  const known = isRegistryError(err) ? err : bodyParserError(err);
  if (known) {
    const status = httpStatusFor(known.typedError);
    const context = { code: known.code, status, method: req.method, path: req.path };
    if (status >= 500) logger.error('Request failed', context);
    else logger.warn('Request error', context);
    res.status(status).json(apiError(known.typedError));
    return;
  }

  logger.error('Unhandled request error', {
    method: req.method,
    path: req.path,
    message: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  res.status(500).json(apiError(internalError('Internal server error')));
}
